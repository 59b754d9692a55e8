/**
 * Node Logger
 *
 * JSON lines on stderr; stdout belongs to the records a run prints.
 */

import pino, { type Logger, type LoggerOptions } from "pino";
import { type FileContext, LOG_LEVELS, type LogLevel, type NodeLoggerOptions } from "./types.js";

const STDERR = 2;

/** Keys that never reach the output, e.g. from a logged config object */
export const REDACT_PATHS: readonly string[] = ["password", "token", "secret", "*.password", "*.token", "*.secret"];

/**
 * Map a raw LOG_LEVEL value onto a pino level, falling back when it is unknown.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

export function createNodeLogger(options: NodeLoggerOptions): Logger {
  const { service, level = "info", environment, pretty = process.env.NODE_ENV === "development" } = options;

  const loggerOptions: LoggerOptions = {
    level,
    base: { service, environment },
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: [...REDACT_PATHS], censor: "[REDACTED]" },
  };

  if (pretty) {
    return pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          destination: STDERR,
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "service,environment",
          singleLine: true,
        },
      })
    );
  }
  return pino(loggerOptions, pino.destination({ dest: STDERR, sync: true }));
}

/**
 * Resolves once buffered lines are written; await before the process exits.
 */
export function flushLogger(logger: Logger): Promise<void> {
  return new Promise((resolve, reject) => {
    logger.flush((error) => (error ? reject(error) : resolve()));
  });
}

export function withFileContext(logger: Logger, context: FileContext): Logger {
  return logger.child({ file: context.file, position: context.position });
}
