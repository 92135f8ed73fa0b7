import pino from "pino";
import { injectable } from "tsyringe";
import { ILogger, LogContext } from "./ILogger";

let rootLogger: pino.Logger | null = null;

function getRootLogger(): pino.Logger {
  if (rootLogger) {
    return rootLogger;
  }

  rootLogger = pino({
    name: "scripture-press",
    level: process.env.LOG_LEVEL || "info",
    transport:
      process.env.NODE_ENV !== "production"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              ignore: "pid,hostname",
              translateTime: "SYS:standard",
            },
          }
        : undefined,
  });
  return rootLogger;
}

/**
 * Pino logger implementation
 */
@injectable()
export class PinoLogger implements ILogger {
  private logger: pino.Logger;

  constructor() {
    this.logger = getRootLogger();
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.logger.error(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  fatal(message: string, error?: Error, context?: LogContext): void {
    this.logger.fatal(
      {
        ...context,
        err: error,
      },
      message,
    );
  }

  child(bindings: LogContext): ILogger {
    const childLogger = new PinoLogger();
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }
}
