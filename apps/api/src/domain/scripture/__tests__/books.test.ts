import { describe, it, expect } from "@jest/globals";
import { listCanonicalBooks, normalizeBookToken, resolveBookName } from "../books";

describe("books", () => {
  it("should list the 66 canonical books in order", () => {
    const books = listCanonicalBooks();

    expect(books).toHaveLength(66);
    expect(books[0]).toBe("Genesis");
    expect(books[65]).toBe("Revelation");
  });

  it("should normalize tokens by case and punctuation", () => {
    expect(normalizeBookToken("1 John")).toBe("1john");
    expect(normalizeBookToken("Song-of.Solomon")).toBe("songofsolomon");
  });

  it("should resolve canonical names and aliases", () => {
    expect(resolveBookName("genesis")).toBe("Genesis");
    expect(resolveBookName("Gen")).toBe("Genesis");
    expect(resolveBookName("1-Jn")).toBe("1 John");
    expect(resolveBookName("psalm")).toBe("Psalms");
  });

  it("should return null for unknown or empty tokens", () => {
    expect(resolveBookName("Hezekiah")).toBeNull();
    expect(resolveBookName("  ")).toBeNull();
  });
});
