const LEADING_VERSE_QUOTE = /^\s*\*\s*\d+\s*\*/;
const VERSE_MARKER = /\*\s*\d+\s*\*/g;
const ITALICS = /\*\s*([^*]+?)\s*\*/g;

/**
 * Strip SWORD formatting artefacts from commentary text.
 *
 * Commentaries often open by quoting the verses (`* 1 * In the beginning...`)
 * before the commentary proper, separated by a wide gap of spaces; the quote
 * is dropped when a substantial commentary follows it.
 */
export function cleanCommentaryText(text: string): string {
  let cleaned = text.replace(/\\par/g, "\n\n");

  if (LEADING_VERSE_QUOTE.test(cleaned)) {
    const gap = /\s{3,}/.exec(cleaned);
    if (gap) {
      const rest = cleaned.slice(gap.index + gap[0].length);
      if (rest.length > 100) {
        cleaned = rest;
      }
    }
  }

  return cleaned
    .replace(VERSE_MARKER, "")
    .replace(ITALICS, "$1")
    .replace(/ {2,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n\s*\n\s*\n+/g, "\n\n")
    .trim();
}
