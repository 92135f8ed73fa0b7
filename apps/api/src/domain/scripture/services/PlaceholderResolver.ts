import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IConfig } from "../../../shared/config/IConfig";
import { AppError } from "../../../shared/errors/AppError";
import {
  BatchResolutionError,
  DirectiveFailure,
} from "../../../shared/errors/ScriptureError";
import { mapWithConcurrency } from "../../../shared/utils/concurrency";
import { ICommentaryLookup } from "../ports/ICommentaryLookup";
import { ILexicon } from "../ports/ILexicon";
import { IScriptureAnalyzer } from "../ports/IScriptureAnalyzer";
import { AppendixRequest, PlaceholderDirective, SourceFile } from "../types";
import { ScriptureReference } from "../value-objects/ScriptureReference";
import { preservesStructuralMacros } from "./analysisGuard";
import { buildCommentaryAppendix, buildWordStudyAppendix } from "./appendices";
import {
  extractDirectives,
  parseDirectiveSpec,
  replaceDirectives,
} from "./DirectiveParser";
import {
  ensureSupportPackage,
  insertBeforeDocumentEnd,
  renderPassageBlock,
} from "./latex";
import { translateMarkup } from "./markup/MarkupTranslator";
import { ResolutionSession } from "./ResolutionSession";
import { ScriptureProviderRegistry } from "./ScriptureProviderRegistry";

export type ResolutionPhase =
  | "collecting"
  | "resolving"
  | "failed"
  | "substituting"
  | "appending"
  | "done";

export interface ResolveRequest {
  files: SourceFile[];
  entryFile?: string;
  appendices?: AppendixRequest;
  signal?: AbortSignal;
}

export interface ResolveResult {
  phase: ResolutionPhase;
  /** Files whose content changed, in input order */
  files: SourceFile[];
  /** Number of distinct directives resolved */
  directives: number;
  annotationIds: string[];
  references: string[];
}

type DirectiveOutcome =
  | { ok: true; spec: string; block: string }
  | { ok: false; failure: DirectiveFailure };

/**
 * Placeholder Resolver
 *
 * Runs one resolution pass over a set of LaTeX sources:
 *
 *   collecting -> resolving -> failed
 *                           -> substituting -> appending -> done
 *
 * Every distinct directive is fetched once. If any directive fails the
 * pass stops in `failed` with a BatchResolutionError and no content is
 * returned; otherwise the changed files are returned for the caller to
 * persist.
 */
@injectable()
export class PlaceholderResolver {
  private readonly logger: ILogger;

  constructor(
    private readonly providers: ScriptureProviderRegistry,
    @inject(TYPES.ScriptureAnalyzer) private readonly analyzer: IScriptureAnalyzer,
    @inject(TYPES.CommentaryLookup) private readonly commentary: ICommentaryLookup,
    @inject(TYPES.Lexicon) private readonly lexicon: ILexicon,
    @inject(TYPES.Config) private readonly config: IConfig,
    @inject(TYPES.Logger) logger: ILogger,
  ) {
    this.logger = logger.child({ service: "PlaceholderResolver" });
  }

  async resolveAll(request: ResolveRequest): Promise<ResolveResult> {
    const { files, entryFile, appendices, signal } = request;
    const session = new ResolutionSession();
    let phase: ResolutionPhase = "collecting";
    const enter = (next: ResolutionPhase): void => {
      this.logger.debug("Resolution phase", { from: phase, to: next });
      phase = next;
    };

    this.logger.debug("Resolution phase", { to: phase, files: files.length });

    const specs = this.collectSpecs(files);

    enter("resolving");
    const outcomes = await mapWithConcurrency(
      specs,
      this.config.resolveConcurrency,
      (spec) => this.resolveDirective(spec, session),
    );
    session.complete();

    const failures: DirectiveFailure[] = [];
    const blocks = new Map<string, string>();
    for (const outcome of outcomes) {
      if (outcome.ok) {
        blocks.set(outcome.spec, outcome.block);
      } else {
        failures.push(outcome.failure);
      }
    }

    if (failures.length > 0) {
      enter("failed");
      this.logger.warn("Resolution pass failed", {
        failed: failures.length,
        directives: specs.length,
      });
      throw new BatchResolutionError(failures);
    }

    signal?.throwIfAborted();

    enter("substituting");
    const contents = new Map<string, string>();
    for (const file of files) {
      contents.set(
        file.path,
        replaceDirectives(file.content, (spec, match) => blocks.get(spec) ?? match),
      );
    }

    const entryContent = entryFile !== undefined ? contents.get(entryFile) : undefined;
    if (entryFile !== undefined && entryContent === undefined && specs.length > 0) {
      this.logger.warn("Entry file not found among sources", { entryFile });
    }

    if (entryFile !== undefined && entryContent !== undefined && specs.length > 0) {
      let patched = ensureSupportPackage(entryContent);

      if (appendices?.wordStudy || appendices?.commentarySources?.length) {
        enter("appending");
        const appendix = await this.buildAppendices(session, appendices);
        if (appendix) {
          const inserted = insertBeforeDocumentEnd(patched, appendix);
          if (inserted === null) {
            this.logger.warn("Entry file has no \\end{document}; appendices skipped", {
              entryFile,
            });
          } else {
            patched = inserted;
          }
        }
      }

      contents.set(entryFile, patched);
    }

    signal?.throwIfAborted();

    const changed = files
      .map((file) => ({ path: file.path, content: contents.get(file.path) ?? file.content }))
      .filter((file, index) => file.content !== files[index].content);

    enter("done");
    this.logger.info("Resolution pass complete", {
      directives: specs.length,
      changedFiles: changed.length,
    });

    return {
      phase: "done",
      files: changed,
      directives: specs.length,
      annotationIds: session.collectedAnnotationIds(),
      references: session.collectedCanonicalReferences(),
    };
  }

  /** Distinct directive specs in order of first appearance. */
  private collectSpecs(files: SourceFile[]): string[] {
    const specs = new Set<string>();
    for (const file of files) {
      for (const occurrence of extractDirectives(file.content)) {
        specs.add(occurrence.spec);
      }
    }
    return [...specs];
  }

  private async resolveDirective(
    spec: string,
    session: ResolutionSession,
  ): Promise<DirectiveOutcome> {
    let directive: PlaceholderDirective | null = null;

    try {
      directive = parseDirectiveSpec(spec);
      const reference = ScriptureReference.parse(directive.reference);
      const provider = this.providers.get(directive.version);
      const result = await provider.fetch(reference, directive.options);

      const label = result.canonicalReference ?? result.reference;
      const translation = translateMarkup(result.rawText, label, directive.options);
      const body = await this.analyze(translation.body, label);

      session.recordAnnotationIds(translation.annotationIds);
      session.recordCanonicalReference(label);

      return {
        ok: true,
        spec,
        block: renderPassageBlock(label, directive.version, body),
      };
    } catch (error) {
      return { ok: false, failure: this.describeFailure(spec, directive, error) };
    }
  }

  private async analyze(markup: string, label: string): Promise<string> {
    let analyzed: string;
    try {
      analyzed = await this.analyzer.analyze(markup, label);
    } catch (error) {
      this.logger.warn("Scripture analysis failed; using untransformed markup", {
        reference: label,
        reason: error instanceof Error ? error.message : String(error),
      });
      return markup;
    }

    if (!preservesStructuralMacros(markup, analyzed)) {
      this.logger.warn("Scripture analysis dropped structural macros; discarded", {
        reference: label,
      });
      return markup;
    }
    return analyzed;
  }

  private describeFailure(
    spec: string,
    directive: PlaceholderDirective | null,
    error: unknown,
  ): DirectiveFailure {
    const fields = spec.split("|").map((field) => field.trim());
    const reference = directive?.reference ?? fields[0] ?? spec;
    const version = directive?.version ?? (fields[1] ? fields[1].toUpperCase() : "ESV");

    if (error instanceof AppError) {
      return { directive: spec, reference, version, code: error.code, message: error.message };
    }

    this.logger.error(
      "Unexpected error resolving directive",
      error instanceof Error ? error : new Error(String(error)),
      { directive: spec },
    );
    return {
      directive: spec,
      reference,
      version,
      code: "INTERNAL_ERROR",
      message: "Unexpected error while resolving the passage.",
    };
  }

  private async buildAppendices(
    session: ResolutionSession,
    request: AppendixRequest,
  ): Promise<string> {
    const sections: string[] = [];

    if (request.wordStudy) {
      const wordStudy = await buildWordStudyAppendix(
        session.collectedAnnotationIds(),
        this.lexicon,
      );
      if (wordStudy) {
        sections.push(wordStudy);
      }
    }

    if (request.commentarySources?.length) {
      const commentary = await buildCommentaryAppendix(
        session.collectedCanonicalReferences(),
        request.commentarySources,
        this.commentary,
        this.config.resolveConcurrency,
      );
      if (commentary) {
        sections.push(commentary);
      }
    }

    return sections.join("\n\n");
  }
}
