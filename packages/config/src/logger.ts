import { createNodeLogger, type Logger, resolveLogLevel } from "@index-tape/logger";

export const log: Logger = createNodeLogger({
  service: "config",
  level: resolveLogLevel(process.env.LOG_LEVEL),
  environment: process.env.NODE_ENV,
});
