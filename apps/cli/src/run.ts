/**
 * CLI Runner
 *
 * Resolves the run configuration, discovers the exports of a directory and
 * prints their records in snapshot order.
 */

import { basename, join } from "node:path";
import { ConfigError, loadRunConfig, type RunConfig, type RunConfigInput } from "@index-tape/config";
import type { Logger } from "@index-tape/logger";
import { discoverDataFiles, type FileOutcome, IndexParser, IOError, runBatch } from "@index-tape/parser";
import { type CliOptions, parseCliArgs, USAGE, UsageError, VERSION } from "./args.js";
import { log } from "./logger.js";

export const ExitCode = {
	OK: 0,
	USAGE: 1,
	UNREADABLE_DIRECTORY: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
	/** Receives one output line at a time, without the newline */
	write: (line: string) => void;
	/** Usage and argument errors */
	error: (line: string) => void;
	env: NodeJS.ProcessEnv;
	logger?: Logger;
}

function toOverrides(options: CliOptions): RunConfigInput {
	return {
		target_date: options.targetDate,
		// No positional filters leaves the configured ones in place
		filters: options.filters.length > 0 ? options.filters : undefined,
		min_bytes: options.minBytes,
		discovery: {
			file_stem: options.fileStem,
			file_ext: options.fileExt,
		},
	};
}

export function noDataMessage(file: string): string {
	return `File ${basename(file)} doesn't contain valid data.`;
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<ExitCode> {
	const logger = io.logger ?? log;

	let options: CliOptions;
	try {
		options = parseCliArgs(argv);
	} catch (error) {
		if (error instanceof UsageError) {
			io.error(error.message);
			io.error(USAGE);
			return ExitCode.USAGE;
		}
		throw error;
	}

	if (options.help) {
		io.write(USAGE);
		return ExitCode.OK;
	}
	if (options.version) {
		io.write(VERSION);
		return ExitCode.OK;
	}

	const directory = options.directory ?? ".";

	let config: RunConfig;
	try {
		config = await loadRunConfig({
			configPath: options.configPath,
			env: io.env,
			overrides: toOverrides(options),
		});
	} catch (error) {
		if (error instanceof ConfigError) {
			logger.error({ code: error.code, source: error.source }, error.message);
			io.error(error.message);
			return ExitCode.USAGE;
		}
		throw error;
	}

	let files: string[];
	try {
		files = discoverDataFiles(directory, {
			stem: config.discovery.file_stem,
			ext: config.discovery.file_ext,
		});
	} catch (error) {
		if (error instanceof IOError) {
			logger.error({ directory, errno: error.errno }, error.message);
			io.error(error.message);
			return ExitCode.UNREADABLE_DIRECTORY;
		}
		throw error;
	}

	logger.info({ directory, files: files.length }, "Exports discovered");

	const parser = new IndexParser({ layout: config.layout, logger });
	if (config.target_date !== undefined) {
		parser.setTargetDate(config.target_date);
	}

	const print = (outcome: FileOutcome) => {
		if (outcome.status === "parsed") {
			for (const line of parser.render(outcome.records)) {
				io.write(line);
			}
		} else if (outcome.status === "skipped" && outcome.reason === "no-data") {
			io.write(noDataMessage(outcome.file));
		}
	};

	runBatch(
		parser,
		files.map((name) => join(directory, name)),
		{ filters: config.filters, minBytes: config.min_bytes, logger, onOutcome: print }
	);

	return ExitCode.OK;
}
