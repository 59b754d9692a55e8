export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface NodeLoggerOptions {
  /** Service name stamped on every line */
  service: string;
  level?: LogLevel;
  environment?: string;
  /** Human-readable lines through pino-pretty. Defaults to NODE_ENV === "development". */
  pretty?: boolean;
}

/**
 * Bindings for log lines emitted while one export is processed.
 */
export interface FileContext {
  file: string;
  /** Position of the file in the current run, 1-based */
  position?: number;
}
