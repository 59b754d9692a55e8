/**
 * Batch Runner
 *
 * Feeds a list of exports through one parser, strictly in the order given,
 * and turns per-file failures into outcomes instead of aborting the run.
 */

import { statSync } from "node:fs";
import { basename } from "node:path";
import { type Logger, withFileContext } from "@index-tape/logger";
import { type InsufficientDataError, IOError, ParseError } from "./errors.js";
import { log } from "./logger.js";
import type { IndexParser } from "./parser.js";
import type { NormalizedRecord } from "./records.js";

export const DEFAULT_MIN_BYTES = 560;

export type FileOutcome =
  | { status: "parsed"; file: string; records: NormalizedRecord[] }
  | { status: "skipped"; file: string; reason: "too-small"; bytes: number }
  | { status: "skipped"; file: string; reason: "no-data"; error: InsufficientDataError }
  | { status: "failed"; file: string; error: ParseError };

export interface BatchSummary {
  files: number;
  parsed: number;
  skipped: number;
  failed: number;
  /** Records returned across all parsed files */
  records: number;
}

export interface BatchResult {
  outcomes: FileOutcome[];
  summary: BatchSummary;
}

export interface BatchOptions {
  /** Substring filters applied to every file */
  filters?: readonly string[];
  /** Files smaller than this are skipped unread (default: 560) */
  minBytes?: number;
  logger?: Logger;
  /** Called as soon as each file is done, before the next one is read */
  onOutcome?: (outcome: FileOutcome) => void;
}

function processFile(
  parser: IndexParser,
  file: string,
  filters: readonly string[],
  minBytes: number
): FileOutcome {
  let bytes: number;
  try {
    bytes = statSync(file).size;
  } catch (error) {
    return { status: "failed", file, error: IOError.fromCause(file, "stat", error) };
  }

  if (bytes < minBytes) {
    return { status: "skipped", file, reason: "too-small", bytes };
  }

  try {
    const result = parser.filterFileResult(file, filters);
    if (result.status === "no-data") {
      return { status: "skipped", file, reason: "no-data", error: result.error };
    }
    return { status: "parsed", file, records: result.records };
  } catch (error) {
    if (error instanceof ParseError) {
      return { status: "failed", file, error };
    }
    throw error;
  }
}

/**
 * Parse `files` in order with `parser`. The parser's ledger carries over from
 * one file to the next, so the order must be chronological.
 */
export function runBatch(
  parser: IndexParser,
  files: readonly string[],
  options: BatchOptions = {}
): BatchResult {
  const { filters = [], minBytes = DEFAULT_MIN_BYTES, logger = log, onOutcome } = options;

  const outcomes: FileOutcome[] = [];
  const summary: BatchSummary = { files: files.length, parsed: 0, skipped: 0, failed: 0, records: 0 };

  for (const [index, file] of files.entries()) {
    const fileLog = withFileContext(logger, { file: basename(file), position: index + 1 });
    const outcome = processFile(parser, file, filters, minBytes);

    switch (outcome.status) {
      case "parsed":
        summary.parsed++;
        summary.records += outcome.records.length;
        fileLog.debug({ records: outcome.records.length }, "File parsed");
        break;
      case "skipped":
        summary.skipped++;
        if (outcome.reason === "too-small") {
          fileLog.info({ bytes: outcome.bytes, minBytes }, "File below size threshold, skipped");
        } else {
          fileLog.warn({ reason: outcome.error.message }, "File skipped");
        }
        break;
      case "failed":
        summary.failed++;
        fileLog.warn({ code: outcome.error.code, reason: outcome.error.message }, "File failed");
        break;
    }

    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  logger.info(summary, "Batch finished");
  return { outcomes, summary };
}
