import { AppError, SerializedError } from "./AppError";

/**
 * Domain-level errors
 *
 * These represent invalid input to a domain operation
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }

  toJSON(): SerializedError {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}
