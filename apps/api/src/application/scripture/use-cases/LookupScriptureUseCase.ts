import { inject, injectable } from "tsyringe";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { LookupScriptureDto, ScriptureDto } from "../dto/LookupScriptureDto";
import { ScriptureProviderRegistry } from "../../../domain/scripture/services/ScriptureProviderRegistry";
import { ScriptureReference } from "../../../domain/scripture/value-objects/ScriptureReference";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Lookup Scripture Use Case
 *
 * Fetches one passage as the provider returns it, without translation.
 */
@injectable()
export class LookupScriptureUseCase
  implements IUseCase<LookupScriptureDto, ScriptureDto>
{
  constructor(
    private providers: ScriptureProviderRegistry,

    @inject(TYPES.Logger)
    private logger: ILogger,
  ) {}

  async execute(dto: LookupScriptureDto): Promise<ScriptureDto> {
    const reference = ScriptureReference.parse(dto.reference);
    const provider = this.providers.get(dto.version);

    this.logger.info("Looking up scripture", {
      reference: reference.toString(),
      version: dto.version,
    });

    const result = await provider.fetch(reference, dto.options);
    return ScriptureDto.fromResult(result);
  }
}
