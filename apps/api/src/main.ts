/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";

// Initialize DI container
import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { createApp } from "./presentation/http/app";

async function bootstrap(): Promise<void> {
  // Get configuration and logger from DI container
  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting API server...");

  const app = createApp({ accessLog: true });

  // Start server
  app.listen(config.port, () => {
    logger.info("API server started", {
      port: config.port,
      env: config.nodeEnv,
      scriptureAnalysis: config.enableScriptureAnalysis,
    });
  });
}

bootstrap().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
