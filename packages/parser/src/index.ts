/**
 * Index Parser Package
 *
 * Parses raw exports of a stock-index price table into normalized records,
 * with target-day gating, substring filters and cross-file deduplication.
 *
 * @example
 * ```ts
 * import { IndexParser, discoverDataFiles, runBatch } from "@index-tape/parser";
 *
 * const files = discoverDataFiles("./exports").map((name) => `./exports/${name}`);
 * const parser = new IndexParser();
 * const { outcomes } = runBatch(parser, files, { filters: ["ACS"] });
 * ```
 */

// Batch runs
export {
  type BatchOptions,
  type BatchResult,
  type BatchSummary,
  DEFAULT_MIN_BYTES,
  type FileOutcome,
  runBatch,
} from "./batch.js";
// Target-day gate
export { DateGate, DEFAULT_DATE_SEPARATOR, type GateDecision, normalizeDay } from "./dateGate.js";
// Discovery
export {
  compareSnapshotNames,
  DEFAULT_FILE_EXT,
  DEFAULT_FILE_STEM,
  type DiscoverOptions,
  discoverDataFiles,
} from "./discover.js";
// Errors
export {
  InsufficientDataError,
  IOError,
  MalformedRowError,
  ParseError,
  type ParseErrorCode,
} from "./errors.js";
// Extraction
export { FIELD_SEPARATOR, fieldAt, pickFields, type RowContext, splitFields } from "./extract.js";
export { filterRecords } from "./filter.js";
// Timestamp ledger
export {
  CLOSED,
  encodeTimestamp,
  type LedgerLayout,
  type LedgerPass,
  type LedgerSlot,
  TimestampLedger,
  UNSET,
} from "./ledger.js";
export { type RawFile, readRawFile, splitLines } from "./lines.js";
export { extractStockNames } from "./names.js";
// Parser
export { IndexParser, type IndexParserOptions, type ParseResult, TEXT_SOURCE } from "./parser.js";
export { type NormalizedRecord, type RecordShape, renderRecord, renderRecords } from "./records.js";
export { classifyLine, trailerBoundary, type Zone } from "./zones.js";
