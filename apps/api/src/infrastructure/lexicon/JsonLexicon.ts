import { readFile } from "fs/promises";
import { inject, injectable } from "tsyringe";
import { z } from "zod";
import { TYPES } from "../../di/types";
import { ILexicon } from "../../domain/scripture/ports/ILexicon";
import { LexiconEntry } from "../../domain/scripture/types";
import { IConfig } from "../../shared/config/IConfig";
import { ILogger } from "../logging/ILogger";

const lexiconSchema = z.record(
  z.string().regex(/^\d+$/),
  z.object({
    headword: z.string(),
    transliteration: z.string(),
    gloss: z.string(),
  }),
);

/**
 * Greek lexicon keyed by Strong's number, loaded once from a JSON file.
 *
 * A missing file leaves the lexicon empty; a malformed one is an error.
 */
@injectable()
export class JsonLexicon implements ILexicon {
  private entries: Promise<Map<string, LexiconEntry>> | null = null;

  constructor(
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) private readonly logger: ILogger,
  ) {}

  async getEntry(id: string): Promise<LexiconEntry | null> {
    const entries = await this.load();
    return entries.get(id) ?? null;
  }

  private load(): Promise<Map<string, LexiconEntry>> {
    if (!this.entries) {
      this.entries = this.readEntries().catch((error: unknown) => {
        this.entries = null;
        throw error;
      });
    }
    return this.entries;
  }

  private async readEntries(): Promise<Map<string, LexiconEntry>> {
    const filePath = this.config.lexiconPath;

    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        this.logger.warn("Lexicon file not found; word study will have no definitions", {
          path: filePath,
        });
        return new Map();
      }
      throw error;
    }

    const parsed = lexiconSchema.parse(JSON.parse(raw));
    this.logger.debug("Lexicon loaded", {
      path: filePath,
      entries: Object.keys(parsed).length,
    });
    return new Map(Object.entries(parsed));
  }
}
