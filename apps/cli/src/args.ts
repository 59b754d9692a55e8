/**
 * Command-line arguments.
 */

import { parseArgs } from "node:util";

export const VERSION = "0.1.0";

export const USAGE = `Usage: index-tape <dir> [filter...] [options]

Prints the records of every export in <dir>, oldest snapshot first.
Records already printed for an earlier snapshot are not repeated.

Arguments:
  dir                   Directory holding the exports
  filter                Keep only records containing one of these strings

Options:
  --file-stem <stem>    Prefix of the export file names (default: data_ibex)
  --file-ext <ext>      Extension of the export files (default: csv)
  --target-date <date>  Only read exports of this day, e.g. 21/01/2023
  --min-bytes <n>       Skip files smaller than n bytes (default: 560)
  -c, --config <path>   YAML run configuration
  -h, --help            Show this help
  -V, --version         Show the version

Environment:
  INDEX_TAPE_TARGET_DATE, INDEX_TAPE_FILTERS, INDEX_TAPE_MIN_BYTES,
  INDEX_TAPE_FILE_STEM, INDEX_TAPE_FILE_EXT, LOG_LEVEL`;

export interface CliOptions {
	directory?: string;
	filters: string[];
	fileStem?: string;
	fileExt?: string;
	targetDate?: string;
	minBytes?: number;
	configPath?: string;
	help: boolean;
	version: boolean;
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

function parseMinBytes(value: string | undefined): number | undefined {
	if (value === undefined) {
		return undefined;
	}
	const bytes = Number(value);
	if (value.trim() === "" || !Number.isInteger(bytes) || bytes < 0) {
		throw new UsageError(`--min-bytes expects a non-negative integer, got "${value}"`);
	}
	return bytes;
}

/**
 * @throws UsageError on unknown options, missing option values or a missing directory
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
	let parsed: ReturnType<typeof parse>;
	try {
		parsed = parse(argv);
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}

	const { values, positionals } = parsed;
	const [directory, ...filters] = positionals;
	const help = values.help ?? false;
	const version = values.version ?? false;

	if (directory === undefined && !help && !version) {
		throw new UsageError("Missing the directory to read exports from");
	}

	return {
		directory,
		filters,
		fileStem: values["file-stem"],
		fileExt: values["file-ext"],
		targetDate: values["target-date"],
		minBytes: parseMinBytes(values["min-bytes"]),
		configPath: values.config,
		help,
		version,
	};
}

function parse(argv: readonly string[]) {
	return parseArgs({
		args: [...argv],
		allowPositionals: true,
		strict: true,
		options: {
			"file-stem": { type: "string" },
			"file-ext": { type: "string" },
			"target-date": { type: "string" },
			"min-bytes": { type: "string" },
			config: { type: "string", short: "c" },
			help: { type: "boolean", short: "h" },
			version: { type: "boolean", short: "V" },
		},
	});
}
