export { createNodeLogger, flushLogger, REDACT_PATHS, resolveLogLevel, withFileContext } from "./node.js";
export { type FileContext, LOG_LEVELS, type LogLevel, type NodeLoggerOptions } from "./types.js";

export type { Logger } from "pino";
