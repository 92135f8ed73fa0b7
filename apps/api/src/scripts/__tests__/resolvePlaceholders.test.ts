import { describe, it, expect } from "@jest/globals";
import { parseCliArgs } from "../resolvePlaceholders";

describe("parseCliArgs", () => {
  it("should take the working directory and entry file", () => {
    expect(parseCliArgs(["./book", "main.tex"])).toEqual({
      workDir: "./book",
      entryFile: "main.tex",
      appendices: {},
    });
  });

  it("should read appendix flags in any position", () => {
    expect(
      parseCliArgs(["--word-study", "./book", "--commentary", "mhc, calvincommentaries", "main.tex"]),
    ).toEqual({
      workDir: "./book",
      entryFile: "main.tex",
      appendices: { wordStudy: true, commentarySources: ["mhc", "calvincommentaries"] },
    });
  });

  it("should reject unknown commentary sources", () => {
    expect(() => parseCliArgs(["./book", "main.tex", "--commentary", "mhc,barnes"])).toThrow(
      "Unknown commentary source: barnes",
    );
  });

  it("should reject a missing source list and unknown flags", () => {
    expect(() => parseCliArgs(["./book", "main.tex", "--commentary"])).toThrow(
      /^--commentary needs a source list/,
    );
    expect(() => parseCliArgs(["./book", "main.tex", "--verbose"])).toThrow(
      /^Unknown flag --verbose/,
    );
  });

  it("should require exactly two positional arguments", () => {
    expect(() => parseCliArgs(["./book"])).toThrow(/^Usage: resolve-placeholders/);
    expect(() => parseCliArgs(["./book", "main.tex", "extra.tex"])).toThrow(
      /^Usage: resolve-placeholders/,
    );
  });
});
