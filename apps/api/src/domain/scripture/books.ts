import fs from "fs";
import path from "path";
import { z } from "zod";

/**
 * Canonical book names and their abbreviations.
 *
 * Matching strips every non-alphanumeric character and lowercases, so
 * "1 John", "1John" and "1-john" share one key.
 */

const BOOKS_PATH = path.join(__dirname, "..", "..", "..", "data", "books.json");

const bookTableSchema = z.array(
  z.object({
    name: z.string().min(1),
    aliases: z.array(z.string().min(1)),
  }),
);

export type BookTable = z.infer<typeof bookTableSchema>;

let aliasIndex: Map<string, string> | null = null;
let canonicalNames: string[] | null = null;

export function normalizeBookToken(token: string): string {
  return token.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function loadBookTable(): BookTable {
  const raw = fs.readFileSync(BOOKS_PATH, "utf-8");
  return bookTableSchema.parse(JSON.parse(raw));
}

function getAliasIndex(): Map<string, string> {
  if (aliasIndex) {
    return aliasIndex;
  }

  const table = loadBookTable();
  const index = new Map<string, string>();

  for (const book of table) {
    for (const alias of [book.name, ...book.aliases]) {
      index.set(normalizeBookToken(alias), book.name);
    }
  }

  aliasIndex = index;
  canonicalNames = table.map((book) => book.name);
  return index;
}

/**
 * Resolve a book token to its canonical name, or null when unknown.
 */
export function resolveBookName(token: string): string | null {
  const key = normalizeBookToken(token);
  if (!key) {
    return null;
  }
  return getAliasIndex().get(key) ?? null;
}

export function listCanonicalBooks(): string[] {
  getAliasIndex();
  return [...(canonicalNames ?? [])];
}
