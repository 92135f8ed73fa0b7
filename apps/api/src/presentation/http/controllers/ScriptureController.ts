import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { LookupScriptureUseCase } from "../../../application/scripture/use-cases/LookupScriptureUseCase";
import { LookupScriptureDto } from "../../../application/scripture/dto/LookupScriptureDto";
import { TYPES } from "../../../di/types";
import { ValidationError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Scripture HTTP Controller
 */
@injectable()
export class ScriptureController {
  constructor(
    @inject(TYPES.LookupScriptureUseCase)
    private lookupScriptureUseCase: LookupScriptureUseCase,
  ) {}

  /**
   * GET /api/scripture?q=John+3:16&version=ESV
   */
  async lookup(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = LookupScriptureDto.fromRequest(req.query);

      const scripture = await this.lookupScriptureUseCase.execute(dto);

      res.status(200).json(scripture);
    } catch (error) {
      if (error instanceof ValidationError) {
        next(new BadRequestError(error.message));
      } else {
        next(error);
      }
    }
  }
}
