import { describe, it, expect } from "@jest/globals";
import { ScriptureReference, normalizeReference } from "../ScriptureReference";
import {
  ReferenceParseError,
  UnknownBookError,
} from "../../../../shared/errors/ScriptureError";

describe("ScriptureReference", () => {
  describe("parse", () => {
    it("should parse a single verse with verseEnd equal to verseStart", () => {
      const ref = ScriptureReference.parse("John 3:16");

      expect(ref.book).toBe("John");
      expect(ref.chapter).toBe(3);
      expect(ref.verseStart).toBe(16);
      expect(ref.verseEnd).toBe(16);
    });

    it("should parse a verse range", () => {
      const ref = ScriptureReference.parse("Romans 8:1-4");

      expect(ref.verseStart).toBe(1);
      expect(ref.verseEnd).toBe(4);
    });

    it("should accept an en-dash and spaces around the range separator", () => {
      const ref = ScriptureReference.parse("Romans 8:1 – 4");

      expect(ref.verseStart).toBe(1);
      expect(ref.verseEnd).toBe(4);
    });

    it("should parse a chapter-only reference with null verses", () => {
      const ref = ScriptureReference.parse("Genesis 1");

      expect(ref.book).toBe("Genesis");
      expect(ref.chapter).toBe(1);
      expect(ref.verseStart).toBeNull();
      expect(ref.verseEnd).toBeNull();
      expect(ref.isWholeChapter()).toBe(true);
    });

    it("should resolve numbered book aliases to one canonical book", () => {
      const spellings = ["1 John 2:3", "1john 2:3", "ijohn 2:3", "1 Jn 2:3"];

      const books = spellings.map((s) => ScriptureReference.parse(s).book);

      expect(new Set(books)).toEqual(new Set(["1 John"]));
    });

    it("should resolve multi-word book names", () => {
      expect(ScriptureReference.parse("Song of Solomon 2:1").book).toBe(
        "Song of Solomon",
      );
    });

    it("should trim surrounding whitespace", () => {
      expect(ScriptureReference.parse("  Psalm 23  ").toString()).toBe(
        "Psalms 23",
      );
    });

    it("should throw ReferenceParseError with the offending text", () => {
      expect(() => ScriptureReference.parse("John")).toThrow(ReferenceParseError);
      expect(() => ScriptureReference.parse("John three")).toThrow(
        "Could not parse scripture reference 'John three'.",
      );
    });

    it("should throw UnknownBookError for an unknown book", () => {
      expect(() => ScriptureReference.parse("Hezekiah 3:1")).toThrow(
        UnknownBookError,
      );
      expect(() => ScriptureReference.parse("Hezekiah 3:1")).toThrow(
        "Unknown book 'Hezekiah'.",
      );
    });

    it("should reject chapter zero, verse zero and reversed ranges", () => {
      expect(() => ScriptureReference.parse("Genesis 0")).toThrow(ReferenceParseError);
      expect(() => ScriptureReference.parse("John 3:0")).toThrow(ReferenceParseError);
      expect(() => ScriptureReference.parse("Romans 8:4-1")).toThrow(
        ReferenceParseError,
      );
    });
  });

  describe("toString", () => {
    it("should format each reference shape", () => {
      expect(ScriptureReference.parse("jn 3").toString()).toBe("John 3");
      expect(ScriptureReference.parse("jn 3:16").toString()).toBe("John 3:16");
      expect(ScriptureReference.parse("jn 3:16-18").toString()).toBe(
        "John 3:16-18",
      );
    });
  });

  describe("equals", () => {
    it("should compare by value", () => {
      const a = normalizeReference("Rom 8:1-4");
      const b = normalizeReference("Romans 8:1–4");
      const c = normalizeReference("Romans 8:1");

      expect(a.equals(b)).toBe(true);
      expect(a.equals(c)).toBe(false);
    });
  });

  it("should be immutable", () => {
    const ref = ScriptureReference.parse("John 3:16");

    expect(Object.isFrozen(ref)).toBe(true);
  });
});
