import { describe, it, expect, beforeEach } from "@jest/globals";
import { ResolveDirectoryUseCase } from "../ResolveDirectoryUseCase";
import { PlaceholderResolver } from "../../../../domain/scripture/services/PlaceholderResolver";
import { ScriptureProviderRegistry } from "../../../../domain/scripture/services/ScriptureProviderRegistry";
import { InMemoryDocumentRepository } from "../../../../infrastructure/persistence/in-memory/InMemoryDocumentRepository";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import { BatchResolutionError } from "../../../../shared/errors/ScriptureError";
import {
  createTestConfig,
  FakeAnalyzer,
  FakeCommentaryLookup,
  FakeLexicon,
  FakeScriptureProvider,
} from "../../../../__tests__/helpers/fakes";

const WORK_DIR = "/books/gospel";

const BLOCK = [
  "\\begin{scripture}[John 3:16][version=ESV]",
  "\\scripturefont",
  "\\ch{3}",
  "\\vs{16} For God so loved the world.",
  "\\end{scripture}",
].join("\n");

describe("ResolveDirectoryUseCase", () => {
  let documents: InMemoryDocumentRepository;
  let useCase: ResolveDirectoryUseCase;

  beforeEach(() => {
    const logger = new MockLogger();
    const esv = new FakeScriptureProvider("ESV", {
      "John 3:16": { canonical: "John 3:16", text: "[16] For God so loved the world. (ESV)" },
    });
    const resolver = new PlaceholderResolver(
      new ScriptureProviderRegistry([esv]),
      new FakeAnalyzer(),
      new FakeCommentaryLookup(),
      new FakeLexicon(),
      createTestConfig(),
      logger,
    );
    documents = new InMemoryDocumentRepository();
    useCase = new ResolveDirectoryUseCase(resolver, documents, logger);
  });

  it("should write back only the files that changed", async () => {
    documents.seed(WORK_DIR, {
      "main.tex": "\\documentclass{book}\n\\begin{document}\n\\input{ch1}\n\\end{document}\n",
      "ch1.tex": "Read [[scripture:John 3:16]] today.",
      "notes.tex": "Nothing to resolve.",
    });

    const result = await useCase.execute({ workDir: WORK_DIR, entryFile: "main.tex" });

    expect(result).toEqual({
      written: ["ch1.tex", "main.tex"],
      directives: 1,
      annotationIds: [],
      references: ["John 3:16"],
    });
    expect(documents.writeCount).toBe(1);
    expect(documents.read(WORK_DIR, "ch1.tex")).toBe(`Read ${BLOCK} today.`);
    expect(documents.read(WORK_DIR, "main.tex")).toBe(
      "\\documentclass{book}\n\\usepackage{scripture}\n\\begin{document}\n\\input{ch1}\n\\end{document}\n",
    );
    expect(documents.read(WORK_DIR, "notes.tex")).toBe("Nothing to resolve.");
  });

  it("should not write when there is nothing to resolve", async () => {
    documents.seed(WORK_DIR, { "main.tex": "\\begin{document}\n\\end{document}\n" });

    const result = await useCase.execute({ workDir: WORK_DIR, entryFile: "main.tex" });

    expect(result.written).toEqual([]);
    expect(documents.writeCount).toBe(0);
  });

  it("should write nothing when a directive fails", async () => {
    documents.seed(WORK_DIR, {
      "main.tex": "\\begin{document}\n\\end{document}\n",
      "ch1.tex": "[[scripture:John 3:16]] and [[scripture:John 3:16|KJV]]",
    });

    await expect(
      useCase.execute({ workDir: WORK_DIR, entryFile: "main.tex" }),
    ).rejects.toBeInstanceOf(BatchResolutionError);
    expect(documents.writeCount).toBe(0);
    expect(documents.read(WORK_DIR, "ch1.tex")).toBe(
      "[[scripture:John 3:16]] and [[scripture:John 3:16|KJV]]",
    );
  });
});
