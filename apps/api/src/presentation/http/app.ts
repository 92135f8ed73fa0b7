import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { createScriptureRouter } from "./routes/scripture.routes";
import { createPlaceholdersRouter } from "./routes/placeholders.routes";
import { errorHandler } from "./middleware/ErrorHandler";
import { NotFoundError } from "../../shared/errors/HttpError";

export interface AppOptions {
  /** Emit morgan access logs */
  accessLog?: boolean;
}

/**
 * Build the Express application from the registrations in the DI container.
 */
export function createApp(options: AppOptions = {}): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Logging
  if (options.accessLog) {
    app.use(morgan("combined"));
  }

  // Body parsing (LaTeX sources can be large)
  app.use(express.json({ limit: "10mb" }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "scripture-press-api",
    });
  });

  // API Routes
  app.use("/api/scripture", createScriptureRouter());
  app.use("/api/placeholders", createPlaceholdersRouter());

  // 404 handler
  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}
