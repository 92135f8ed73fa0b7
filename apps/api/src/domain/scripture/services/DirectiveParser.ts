import {
  InvalidOptionSyntaxError,
  MissingReferenceError,
} from "../../../shared/errors/ScriptureError";
import { DirectiveOccurrence, PlaceholderDirective } from "../types";
import {
  DEFAULT_LOOKUP_OPTIONS,
  LookupOptions,
  parseBooleanOption,
  resolveOptionKey,
} from "../value-objects/LookupOptions";
import { parseScriptureVersion } from "../value-objects/ScriptureVersion";

/**
 * Scripture directive parser
 *
 * Directive syntax (case-insensitive, whitespace around the delimiters is ignored):
 *   [[scripture:<reference>|<version>|<key>=<value>|...]]
 *
 * Example:
 *   [[scripture:Romans 8:1-4|ESV|headings=true|verses=true]]
 */
const PLACEHOLDER_SOURCE = String.raw`\[\[\s*scripture\s*:\s*([^\]]+?)\s*\]\]`;

/**
 * Find every directive in a document, in order of appearance.
 * Identical spec text means the same directive, however it was spaced.
 */
export function extractDirectives(documentText: string): DirectiveOccurrence[] {
  const pattern = new RegExp(PLACEHOLDER_SOURCE, "gi");
  return Array.from(documentText.matchAll(pattern), (match) => ({
    match: match[0],
    spec: match[1].trim(),
  }));
}

/**
 * Replace every directive occurrence with the text rendered for its spec.
 */
export function replaceDirectives(
  documentText: string,
  render: (spec: string, match: string) => string,
): string {
  const pattern = new RegExp(PLACEHOLDER_SOURCE, "gi");
  return documentText.replace(pattern, (match: string, spec: string) =>
    render(spec.trim(), match),
  );
}

/**
 * Parse the pipe-delimited spec of a directive.
 *
 * Field 0 is the reference, field 1 the optional version, the rest are
 * key=value options. Empty fields are skipped.
 */
export function parseDirectiveSpec(spec: string): PlaceholderDirective {
  const parts = spec.split("|").map((part) => part.trim());
  const reference = parts[0] ?? "";

  if (!reference) {
    throw new MissingReferenceError(spec);
  }

  const version = parseScriptureVersion(parts[1]);
  const options: { -readonly [K in keyof LookupOptions]: boolean } = {
    ...DEFAULT_LOOKUP_OPTIONS,
  };

  for (const option of parts.slice(2)) {
    if (!option) {
      continue;
    }

    const separator = option.indexOf("=");
    if (separator === -1) {
      throw new InvalidOptionSyntaxError(option);
    }

    const key = option.slice(0, separator);
    const value = option.slice(separator + 1);
    options[resolveOptionKey(key)] = parseBooleanOption(key, value);
  }

  return {
    spec,
    reference,
    version,
    options,
  };
}

