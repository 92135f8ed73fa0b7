import { injectable } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  ResolutionDto,
  ResolvePlaceholdersDto,
} from "../dto/ResolvePlaceholdersDto";
import { PlaceholderResolver } from "../../../domain/scripture/services/PlaceholderResolver";

/**
 * Resolve Placeholders Use Case
 *
 * Resolves the directives of an uploaded source set and returns the files
 * that changed. Nothing is stored.
 */
@injectable()
export class ResolvePlaceholdersUseCase
  implements IUseCase<ResolvePlaceholdersDto, ResolutionDto>
{
  constructor(private resolver: PlaceholderResolver) {}

  async execute(dto: ResolvePlaceholdersDto): Promise<ResolutionDto> {
    const result = await this.resolver.resolveAll({
      files: dto.files,
      entryFile: dto.entryFile,
      appendices: dto.appendices,
    });

    return new ResolutionDto(
      true,
      result.files,
      result.directives,
      result.annotationIds,
      result.references,
    );
  }
}
