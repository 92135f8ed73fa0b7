import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { ResolvePlaceholdersUseCase } from "../../../application/scripture/use-cases/ResolvePlaceholdersUseCase";
import { ResolvePlaceholdersDto } from "../../../application/scripture/dto/ResolvePlaceholdersDto";
import { TYPES } from "../../../di/types";
import { ValidationError } from "../../../shared/errors/DomainError";
import { BadRequestError } from "../../../shared/errors/HttpError";

/**
 * Placeholders HTTP Controller
 *
 * A failed pass reaches the error handler as a BatchResolutionError
 * listing every failing directive.
 */
@injectable()
export class PlaceholdersController {
  constructor(
    @inject(TYPES.ResolvePlaceholdersUseCase)
    private resolvePlaceholdersUseCase: ResolvePlaceholdersUseCase,
  ) {}

  /**
   * POST /api/placeholders/resolve
   */
  async resolve(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const dto = ResolvePlaceholdersDto.fromRequest(req.body);

      const resolution = await this.resolvePlaceholdersUseCase.execute(dto);

      res.status(200).json(resolution);
    } catch (error) {
      if (error instanceof ValidationError) {
        next(new BadRequestError(error.message));
      } else {
        next(error);
      }
    }
  }
}
