import {
  InvalidBooleanError,
  UnknownOptionError,
} from "../../../shared/errors/ScriptureError";

export interface LookupOptions {
  readonly includeHeadings: boolean;
  readonly includeVerseNumbers: boolean;
  readonly includeFootnotes: boolean;
  readonly includeShortCopyright: boolean;
  readonly suppressCrossReferenceLinks: boolean;
}

export const DEFAULT_LOOKUP_OPTIONS: LookupOptions = Object.freeze({
  includeHeadings: false,
  includeVerseNumbers: true,
  includeFootnotes: false,
  includeShortCopyright: true,
  suppressCrossReferenceLinks: false,
});

const OPTION_ALIASES = new Map<string, keyof LookupOptions>([
  ["headings", "includeHeadings"],
  ["include_headings", "includeHeadings"],
  ["verses", "includeVerseNumbers"],
  ["verse_numbers", "includeVerseNumbers"],
  ["include_verse_numbers", "includeVerseNumbers"],
  ["footnotes", "includeFootnotes"],
  ["include_footnotes", "includeFootnotes"],
  ["copyright", "includeShortCopyright"],
  ["include_short_copyright", "includeShortCopyright"],
  ["nolinks", "suppressCrossReferenceLinks"],
  ["no_links", "suppressCrossReferenceLinks"],
  ["suppress_cross_reference_links", "suppressCrossReferenceLinks"],
]);

const TRUE_SPELLINGS = new Set(["true", "1", "yes", "y", "on"]);
const FALSE_SPELLINGS = new Set(["false", "0", "no", "n", "off"]);

/**
 * Map a directive option key (any case) to its LookupOptions field.
 * The error reports the key exactly as the author wrote it.
 */
export function resolveOptionKey(key: string): keyof LookupOptions {
  const field = OPTION_ALIASES.get(key.trim().toLowerCase());
  if (!field) {
    throw new UnknownOptionError(key.trim());
  }
  return field;
}

export function parseBooleanOption(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_SPELLINGS.has(normalized)) {
    return true;
  }
  if (FALSE_SPELLINGS.has(normalized)) {
    return false;
  }
  throw new InvalidBooleanError(key.trim(), value.trim());
}
