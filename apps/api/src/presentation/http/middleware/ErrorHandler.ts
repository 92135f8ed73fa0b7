import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import { ValidationError } from "../../../shared/errors/DomainError";
import {
  BatchResolutionError,
  ScriptureError,
} from "../../../shared/errors/ScriptureError";
import { container } from "../../../di/Container";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

/**
 * Centralized Error Handler Middleware
 *
 * Maps domain errors to HTTP errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);

  // Log error
  const context = { path: req.path, method: req.method };
  if (err instanceof AppError && err.isOperational) {
    logger.warn(err.message, { ...context, code: err.code });
  } else {
    logger.error("Error handler caught error", err, context);
  }

  // Handle known error types
  if (err instanceof HttpError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(process.env.NODE_ENV !== "production" && { stack: err.stack }),
    });
    return;
  }

  if (err instanceof BatchResolutionError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      failures: err.failures,
    });
    return;
  }

  // Scripture errors carry their own status; upstream details stay in the logs
  if (err instanceof ScriptureError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Map domain errors to HTTP errors
  if (err instanceof ValidationError) {
    res.status(400).json({
      error: err.message,
      code: err.code,
      field: err.field,
    });
    return;
  }

  // Malformed JSON body rejected by express.json()
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({
      error: "Request body is not valid JSON",
      code: "BAD_REQUEST",
    });
    return;
  }

  if (err instanceof AppError) {
    res.status(500).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error:
      process.env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
    ...(process.env.NODE_ENV !== "production" && { stack: err.stack }),
  });
}
