import { describe, it, expect } from "@jest/globals";
import { ResolvePlaceholdersUseCase } from "../ResolvePlaceholdersUseCase";
import { ResolutionDto, ResolvePlaceholdersDto } from "../../dto/ResolvePlaceholdersDto";
import { PlaceholderResolver } from "../../../../domain/scripture/services/PlaceholderResolver";
import { ScriptureProviderRegistry } from "../../../../domain/scripture/services/ScriptureProviderRegistry";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import {
  createTestConfig,
  FakeAnalyzer,
  FakeCommentaryLookup,
  FakeLexicon,
  FakeScriptureProvider,
} from "../../../../__tests__/helpers/fakes";

describe("ResolvePlaceholdersUseCase", () => {
  it("should return the changed files of the uploaded set", async () => {
    const net = new FakeScriptureProvider("NET", {
      "John 3:16": {
        text: '<b>3:16</b> For God loved <st data-num="2889">the world</st>.',
        annotationIds: ["2889"],
      },
    });
    const resolver = new PlaceholderResolver(
      new ScriptureProviderRegistry([net]),
      new FakeAnalyzer(),
      new FakeCommentaryLookup(),
      new FakeLexicon(),
      createTestConfig(),
      new MockLogger(),
    );
    const useCase = new ResolvePlaceholdersUseCase(resolver);

    const result = await useCase.execute(
      new ResolvePlaceholdersDto([
        { path: "ch1.tex", content: "[[scripture:John 3:16|NET]]" },
        { path: "ch2.tex", content: "Plain." },
      ]),
    );

    expect(result).toBeInstanceOf(ResolutionDto);
    expect(result.ok).toBe(true);
    expect(result.files).toEqual([
      {
        path: "ch1.tex",
        content: [
          "\\begin{scripture}[John 3:16][version=NET]",
          "\\scripturefont",
          "\\ch{3}",
          "\\vs{16} For God loved \\hyperlink{strongs-2889}{the world}.",
          "\\end{scripture}",
        ].join("\n"),
      },
    ]);
    expect(result.annotationIds).toEqual(["2889"]);
    expect(result.references).toEqual(["John 3:16"]);
    expect(result.directives).toBe(1);
  });
});
