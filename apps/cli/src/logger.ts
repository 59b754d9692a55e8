import { createNodeLogger, type Logger, resolveLogLevel } from "@index-tape/logger";

export const log: Logger = createNodeLogger({
	service: "cli",
	level: resolveLogLevel(process.env.LOG_LEVEL),
	environment: process.env.NODE_ENV,
});
