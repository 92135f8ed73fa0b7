/**
 * In-process stand-ins for the scripture collaborators
 */

import { IScriptureProvider } from "../../domain/scripture/ports/IScriptureProvider";
import { IScriptureAnalyzer } from "../../domain/scripture/ports/IScriptureAnalyzer";
import { ICommentaryLookup } from "../../domain/scripture/ports/ICommentaryLookup";
import { ILexicon } from "../../domain/scripture/ports/ILexicon";
import {
  CommentaryResult,
  CommentarySource,
  LexiconEntry,
  LookupResult,
} from "../../domain/scripture/types";
import { LookupOptions } from "../../domain/scripture/value-objects/LookupOptions";
import { ScriptureReference } from "../../domain/scripture/value-objects/ScriptureReference";
import { ScriptureVersion } from "../../domain/scripture/value-objects/ScriptureVersion";
import { IConfig } from "../../shared/config/IConfig";

export function createTestConfig(overrides: Partial<IConfig> = {}): IConfig {
  return {
    port: 3001,
    nodeEnv: "test",
    esvApiKey: "test-key",
    esvApiUrl: "https://esv.test/v3/passage/text/",
    netApiUrl: "https://net.test/api/",
    providerTimeoutMs: 1000,
    commentaryApiUrl: "https://commentary.test",
    commentaryTimeoutMs: 1000,
    openAiApiKey: undefined,
    openAiModel: "gpt-4o",
    enableScriptureAnalysis: false,
    analysisTimeoutMs: 1000,
    resolveConcurrency: 2,
    lexiconPath: "/nonexistent/lexicon.json",
    validate: () => undefined,
    ...overrides,
  };
}

interface FakePassage {
  canonical?: string;
  text: string;
  annotationIds?: string[];
}

/**
 * Serves canned passages keyed by the normalized reference string.
 * Unknown references, or entries that are errors, are thrown.
 */
export class FakeScriptureProvider implements IScriptureProvider {
  readonly name: string;
  readonly calls: Array<{ reference: string; options: LookupOptions }> = [];

  constructor(
    readonly version: ScriptureVersion,
    private readonly passages: Record<string, FakePassage | Error>,
  ) {
    this.name = `Fake ${version}`;
  }

  async fetch(
    reference: ScriptureReference,
    options: LookupOptions,
  ): Promise<LookupResult> {
    const key = reference.toString();
    this.calls.push({ reference: key, options });

    const passage = this.passages[key];
    if (passage === undefined) {
      throw new Error(`No fake passage for ${key}`);
    }
    if (passage instanceof Error) {
      throw passage;
    }

    return {
      reference: key,
      canonicalReference: passage.canonical ?? key,
      version: this.version,
      rawText: passage.text,
      translationName: this.name,
      annotationIds: new Set(passage.annotationIds ?? []),
    };
  }
}

export class FakeAnalyzer implements IScriptureAnalyzer {
  readonly calls: string[] = [];

  constructor(
    private readonly transform: (markup: string) => string | Promise<string> = (m) => m,
  ) {}

  async analyze(markup: string, referenceLabel: string): Promise<string> {
    this.calls.push(referenceLabel);
    return this.transform(markup);
  }
}

export class FakeLexicon implements ILexicon {
  constructor(private readonly entries: Record<string, LexiconEntry> = {}) {}

  async getEntry(id: string): Promise<LexiconEntry | null> {
    return this.entries[id] ?? null;
  }
}

export class FakeCommentaryLookup implements ICommentaryLookup {
  readonly calls: Array<{ reference: string; source: CommentarySource }> = [];

  constructor(
    private readonly results: Record<string, Partial<Record<CommentarySource, CommentaryResult>>> = {},
  ) {}

  async lookup(
    reference: string,
    source: CommentarySource,
  ): Promise<CommentaryResult | null> {
    this.calls.push({ reference, source });
    return this.results[reference]?.[source] ?? null;
  }
}

export function commentary(
  reference: string,
  source: CommentarySource,
  sourceName: string,
  text: string,
): CommentaryResult {
  return {
    source,
    sourceName,
    reference,
    entries: [{ verseStart: 1, verseEnd: 1, text }],
  };
}
