import { resolveBookName } from "../books";
import {
  ReferenceParseError,
  UnknownBookError,
} from "../../../shared/errors/ScriptureError";

// Optional leading numeral, one or more words, chapter, optional :verse[-verse]
const REFERENCE_PATTERN =
  /^(\d?\s*[A-Za-z]+(?:\s+[A-Za-z]+)*)\s+(\d+)(?::(\d+)(?:\s*[-–]\s*(\d+))?)?$/;

/**
 * ScriptureReference Value Object
 *
 * Parsed form of a free-text reference such as "John 3:16", "Romans 8:1-4"
 * or "Genesis 1". `verseEnd` equals `verseStart` for a single verse and both
 * are null for a whole chapter.
 */
export class ScriptureReference {
  private constructor(
    public readonly book: string,
    public readonly chapter: number,
    public readonly verseStart: number | null,
    public readonly verseEnd: number | null,
  ) {
    Object.freeze(this);
  }

  static parse(text: string): ScriptureReference {
    const trimmed = text.trim();
    const match = REFERENCE_PATTERN.exec(trimmed);
    if (!match) {
      throw new ReferenceParseError(text);
    }

    const [, bookToken, chapterText, startText, endText] = match;

    const book = resolveBookName(bookToken);
    if (!book) {
      throw new UnknownBookError(bookToken.trim());
    }

    const chapter = parseInt(chapterText, 10);
    const verseStart = startText ? parseInt(startText, 10) : null;
    const verseEnd = endText ? parseInt(endText, 10) : verseStart;

    if (
      chapter < 1 ||
      verseStart === 0 ||
      (verseStart !== null && verseEnd !== null && verseEnd < verseStart)
    ) {
      throw new ReferenceParseError(text);
    }

    return new ScriptureReference(book, chapter, verseStart, verseEnd);
  }

  isWholeChapter(): boolean {
    return this.verseStart === null;
  }

  equals(other: ScriptureReference): boolean {
    return (
      this.book === other.book &&
      this.chapter === other.chapter &&
      this.verseStart === other.verseStart &&
      this.verseEnd === other.verseEnd
    );
  }

  toString(): string {
    if (this.verseStart === null) {
      return `${this.book} ${this.chapter}`;
    }
    if (this.verseEnd === null || this.verseEnd === this.verseStart) {
      return `${this.book} ${this.chapter}:${this.verseStart}`;
    }
    return `${this.book} ${this.chapter}:${this.verseStart}-${this.verseEnd}`;
  }
}

export function normalizeReference(text: string): ScriptureReference {
  return ScriptureReference.parse(text);
}
