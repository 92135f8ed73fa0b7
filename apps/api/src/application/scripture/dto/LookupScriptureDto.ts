import { z } from "zod";
import { LookupResult } from "../../../domain/scripture/types";
import {
  DEFAULT_LOOKUP_OPTIONS,
  LookupOptions,
  parseBooleanOption,
} from "../../../domain/scripture/value-objects/LookupOptions";
import {
  parseScriptureVersion,
  ScriptureVersion,
} from "../../../domain/scripture/value-objects/ScriptureVersion";
import { ValidationError } from "../../../shared/errors/DomainError";

const lookupQuerySchema = z.object({
  q: z
    .string({ required_error: "Query parameter 'q' is required" })
    .trim()
    .min(1, "Query parameter 'q' is required"),
  version: z.string().optional(),
  include_headings: z.string().optional(),
  include_verse_numbers: z.string().optional(),
  include_footnotes: z.string().optional(),
  include_short_copyright: z.string().optional(),
});

function flag(key: string, value: string | undefined, fallback: boolean): boolean {
  return value === undefined ? fallback : parseBooleanOption(key, value);
}

/**
 * Lookup Scripture DTO
 *
 * Query of GET /api/scripture
 */
export class LookupScriptureDto {
  constructor(
    public readonly reference: string,
    public readonly version: ScriptureVersion,
    public readonly options: LookupOptions,
  ) {}

  static fromRequest(query: unknown): LookupScriptureDto {
    const parsed = lookupQuerySchema.safeParse(query);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue.message, issue.path.join("."));
    }

    const data = parsed.data;
    return new LookupScriptureDto(data.q, parseScriptureVersion(data.version), {
      ...DEFAULT_LOOKUP_OPTIONS,
      includeHeadings: flag(
        "include_headings",
        data.include_headings,
        DEFAULT_LOOKUP_OPTIONS.includeHeadings,
      ),
      includeVerseNumbers: flag(
        "include_verse_numbers",
        data.include_verse_numbers,
        DEFAULT_LOOKUP_OPTIONS.includeVerseNumbers,
      ),
      includeFootnotes: flag(
        "include_footnotes",
        data.include_footnotes,
        DEFAULT_LOOKUP_OPTIONS.includeFootnotes,
      ),
      includeShortCopyright: flag(
        "include_short_copyright",
        data.include_short_copyright,
        DEFAULT_LOOKUP_OPTIONS.includeShortCopyright,
      ),
    });
  }
}

/**
 * Scripture DTO (Response)
 */
export class ScriptureDto {
  constructor(
    public readonly reference: string,
    public readonly canonical: string | null,
    public readonly text: string,
    public readonly version: ScriptureVersion,
    public readonly translation: string | null,
  ) {}

  static fromResult(result: LookupResult): ScriptureDto {
    return new ScriptureDto(
      result.reference,
      result.canonicalReference,
      result.rawText,
      result.version,
      result.translationName,
    );
  }
}
