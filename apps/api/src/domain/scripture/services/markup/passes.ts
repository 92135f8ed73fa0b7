/**
 * Markup translation passes.
 *
 * Each pass is a pure text transformation with one responsibility. They
 * are composed in a fixed order by MarkupTranslator; later passes assume
 * the cleanup done by earlier ones.
 */

const verseMacro = (verse: string): string => `\\vs{${verse}} `;

/**
 * Pass 1: drop a leading heading line (a line without any digit) and the
 * "Footnotes" section with everything after it.
 *
 * Headings only appear when they were requested; otherwise a digit-free
 * first line is passage text (verse numbers off) and is kept.
 */
export function stripHeadingAndFootnoteSection(
  raw: string,
  includeHeadings: boolean,
): string {
  const lines = raw.split(/\r?\n/);
  const isBlank = (line: string) => line.trim() === "";

  let start = 0;
  while (start < lines.length && isBlank(lines[start])) start++;

  if (includeHeadings && start < lines.length && !/\d/.test(lines[start])) {
    start++;
    while (start < lines.length && isBlank(lines[start])) start++;
  }

  let end = lines.length;
  for (let i = start; i < lines.length; i++) {
    if (lines[i].trim().toLowerCase() === "footnotes") {
      end = i;
      break;
    }
  }

  while (end > start && isBlank(lines[end - 1])) end--;

  return lines.slice(start, end).join("\n");
}

/** Pass 2: inline footnote markers such as "(1)". */
export function removeFootnoteMarkers(
  text: string,
  includeFootnotes: boolean,
): string {
  return includeFootnotes ? text : text.replace(/\(\d+\)/g, "");
}

/** Pass 3: trailing translation label such as "(ESV)". */
export function stripTranslationLabel(text: string): string {
  return text.replace(/\s*\([A-Za-z]{2,}\)\s*$/, "");
}

/** Pass 4: NET footnote anchors `<n id="12" />`. */
export function removeFootnoteAnchors(text: string): string {
  return text.replace(/<n\s+id="\d+"\s*\/>/g, "");
}

/**
 * Pass 5: every verse/chapter marker dialect becomes `\vs{n}`, or is
 * dropped leaving a single space when verse numbers were not requested.
 */
export function convertVerseMarkers(
  text: string,
  includeVerseNumbers: boolean,
): string {
  const marker = (verse: string): string =>
    includeVerseNumbers ? verseMacro(verse) : " ";

  return (
    text
      // <span class="vref"><b>3:<span class="verseNumber">2</span></b></span>
      .replace(
        /<span class="vref"><b>(\d+):<span class="verseNumber">(\d+)<\/span><\/b><\/span>\s*/g,
        (_match, _chapter: string, verse: string) => marker(verse),
      )
      // <span class="vref"><b><span class="verseNumber">4</span></b></span>
      .replace(
        /<span class="vref"><b><span class="verseNumber">(\d+)<\/span><\/b><\/span>\s*/g,
        (_match, verse: string) => marker(verse),
      )
      // <b>3:16</b>
      .replace(/<b>(\d+):(\d+)<\/b>\s*/g, (_match, _chapter: string, verse: string) =>
        marker(verse),
      )
      // <b>17</b>
      .replace(/<b>(\d+)<\/b>\s*/g, (_match, verse: string) => marker(verse))
      // [16]
      .replace(/(^|\s)\[(\d+)\]\s*/gm, (_match, lead: string, verse: string) =>
        includeVerseNumbers ? `${lead}${verseMacro(verse)}` : lead,
      )
  );
}

export interface LexicalConversion {
  text: string;
  annotationIds: Set<string>;
}

/**
 * Pass 6: `<st data-num="26">love</st>` becomes a hyperlink to the
 * word-study entry, or the bare word when links are suppressed.
 */
export function convertLexicalTags(
  text: string,
  suppressLinks: boolean,
): LexicalConversion {
  const annotationIds = new Set<string>();
  const converted = text.replace(
    /<st data-num="(\d+)"[^>]*>([^<]+)<\/st>/g,
    (_match, id: string, word: string) => {
      annotationIds.add(id);
      return suppressLinks ? word : `\\hyperlink{strongs-${id}}{${word}}`;
    },
  );
  return { text: converted, annotationIds };
}

/**
 * Best-effort chapter number of a free-text reference: the number before a
 * colon, else the only number, else the penultimate number ("1 John 3").
 */
export function extractChapter(reference: string): string | null {
  const colon = /(\d+)\s*:\s*\d+/.exec(reference);
  if (colon) {
    return colon[1];
  }

  const numbers = reference.match(/\b\d+\b/g);
  if (!numbers) {
    return null;
  }
  if (numbers.length === 1) {
    return numbers[0];
  }
  return numbers[numbers.length - 2];
}

/** Pass 7: `\ch{n}` on its own line before the passage. */
export function prependChapterMarker(
  text: string,
  reference: string,
  includeVerseNumbers: boolean,
): string {
  if (!includeVerseNumbers) {
    return text;
  }
  const chapter = extractChapter(reference);
  return chapter ? `\\ch{${chapter}}\n${text}` : text;
}

/** Pass 8a: any markup tag not handled above. */
export function stripRemainingTags(text: string): string {
  return text.replace(/<[^>]+>/g, "");
}

/** Pass 8b: runs of two or more spaces. */
export function collapseSpaces(text: string): string {
  return text.replace(/ {2,}/g, " ");
}
