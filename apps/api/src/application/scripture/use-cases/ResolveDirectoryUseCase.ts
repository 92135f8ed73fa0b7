import { inject, injectable } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { AppendixRequest } from "../../../domain/scripture/types";
import { IDocumentRepository } from "../../../domain/scripture/repositories/IDocumentRepository";
import { PlaceholderResolver } from "../../../domain/scripture/services/PlaceholderResolver";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

export interface ResolveDirectoryRequest {
  workDir: string;
  entryFile: string;
  appendices?: AppendixRequest;
  signal?: AbortSignal;
}

export interface ResolveDirectoryResult {
  written: string[];
  directives: number;
  annotationIds: string[];
  references: string[];
}

/**
 * Resolve Directory Use Case
 *
 * Resolves every .tex source of a working directory in place. Files are
 * written only after the whole pass succeeded, and only those that changed.
 */
@injectable()
export class ResolveDirectoryUseCase
  implements IUseCase<ResolveDirectoryRequest, ResolveDirectoryResult>
{
  constructor(
    private resolver: PlaceholderResolver,

    @inject(TYPES.DocumentRepository)
    private documents: IDocumentRepository,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(
    request: ResolveDirectoryRequest,
  ): Promise<ResolveDirectoryResult> {
    const files = await this.documents.listSources(request.workDir);

    this.logger.info("Resolving placeholders in directory", {
      workDir: request.workDir,
      sources: files.length,
    });

    const result = await this.resolver.resolveAll({
      files,
      entryFile: request.entryFile,
      appendices: request.appendices,
      signal: request.signal,
    });

    if (result.files.length > 0) {
      await this.documents.writeSources(request.workDir, result.files);
    }

    return {
      written: result.files.map((file) => file.path),
      directives: result.directives,
      annotationIds: result.annotationIds,
      references: result.references,
    };
  }
}
