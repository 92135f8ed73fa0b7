import { LookupOptions } from "./value-objects/LookupOptions";
import { ScriptureVersion } from "./value-objects/ScriptureVersion";

/**
 * Scripture Types and Interfaces
 */

/** A parsed `[[scripture:...]]` directive, keyed by its spec text. */
export interface PlaceholderDirective {
  spec: string;
  reference: string;
  version: ScriptureVersion;
  options: LookupOptions;
}

/** One occurrence of a directive in a document. */
export interface DirectiveOccurrence {
  match: string;
  spec: string;
}

export interface LookupResult {
  reference: string;
  canonicalReference: string | null;
  version: ScriptureVersion;
  rawText: string;
  translationName: string | null;
  annotationIds: ReadonlySet<string>;
}

export interface TranslationResult {
  body: string;
  annotationIds: Set<string>;
}

export interface SourceFile {
  path: string;
  content: string;
}

export const COMMENTARY_SOURCES = ["mhc", "calvincommentaries"] as const;

export type CommentarySource = (typeof COMMENTARY_SOURCES)[number];

export interface CommentaryEntry {
  verseStart: number;
  verseEnd: number;
  text: string;
}

export interface CommentaryResult {
  source: CommentarySource;
  sourceName: string;
  reference: string;
  entries: CommentaryEntry[];
}

export interface LexiconEntry {
  headword: string;
  transliteration: string;
  gloss: string;
}

export interface AppendixRequest {
  wordStudy?: boolean;
  commentarySources?: CommentarySource[];
}
