import { z } from "zod";
import {
  AppendixRequest,
  COMMENTARY_SOURCES,
  SourceFile,
} from "../../../domain/scripture/types";
import { ValidationError } from "../../../shared/errors/DomainError";

const resolveBodySchema = z.object({
  files: z
    .array(
      z.object({
        path: z.string().min(1),
        content: z.string(),
      }),
    )
    .min(1, "At least one file is required"),
  entryFile: z.string().min(1).optional(),
  appendices: z
    .object({
      wordStudy: z.boolean().optional(),
      commentarySources: z.array(z.enum(COMMENTARY_SOURCES)).optional(),
    })
    .optional(),
});

/**
 * Resolve Placeholders DTO
 *
 * Body of POST /api/placeholders/resolve
 */
export class ResolvePlaceholdersDto {
  constructor(
    public readonly files: SourceFile[],
    public readonly entryFile?: string,
    public readonly appendices?: AppendixRequest,
  ) {}

  static fromRequest(body: unknown): ResolvePlaceholdersDto {
    const parsed = resolveBodySchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue.message, issue.path.join("."));
    }

    const paths = new Set<string>();
    for (const file of parsed.data.files) {
      if (paths.has(file.path)) {
        throw new ValidationError(`Duplicate file path '${file.path}'`, "files");
      }
      paths.add(file.path);
    }

    return new ResolvePlaceholdersDto(
      parsed.data.files,
      parsed.data.entryFile,
      parsed.data.appendices,
    );
  }
}

/**
 * Resolution DTO (Response)
 */
export class ResolutionDto {
  constructor(
    public readonly ok: true,
    public readonly files: SourceFile[],
    public readonly directives: number,
    public readonly annotationIds: string[],
    public readonly references: string[],
  ) {}
}
