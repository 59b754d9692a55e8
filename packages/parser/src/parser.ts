/**
 * Index Parser
 *
 * Turns a raw export of an index price table (the whole page pasted into a
 * text file) into normalized records: one for the index itself, then one per
 * listed stock.
 *
 * A parser instance owns a target day and a timestamp ledger. Feed it the
 * snapshots of a trading day in chronological order and every call returns
 * only the rows that changed since the previous snapshot.
 *
 * @example
 * ```ts
 * const parser = new IndexParser();
 * parser.setTargetDate("06/02/2024");
 *
 * for (const file of files) {
 *   const records = parser.filterFile(file, ["ACS", "AENA"]);
 *   if (records === null) continue; // not a real export
 *   for (const line of parser.render(records)) console.log(line);
 * }
 * ```
 */

import { type ParserLayout, type ParserLayoutInput, ParserLayoutSchema } from "@index-tape/config";
import type { Logger } from "@index-tape/logger";
import { DateGate, normalizeDay } from "./dateGate.js";
import { InsufficientDataError } from "./errors.js";
import { type RowContext, pickFields, splitFields } from "./extract.js";
import { filterRecords } from "./filter.js";
import { TimestampLedger } from "./ledger.js";
import { type RawFile, readRawFile, splitLines } from "./lines.js";
import { log } from "./logger.js";
import { extractStockNames } from "./names.js";
import { type NormalizedRecord, renderRecords } from "./records.js";
import { classifyLine, trailerBoundary } from "./zones.js";

export interface IndexParserOptions {
  /** Partial layout; unspecified keys take the default export layout */
  layout?: ParserLayoutInput;
  /** Share or pre-populate a ledger; a fresh one is created otherwise */
  ledger?: TimestampLedger;
  logger?: Logger;
}

export type ParseResult =
  | { status: "ok"; records: NormalizedRecord[] }
  | { status: "no-data"; error: InsufficientDataError };

/** Label used as the source of in-memory input */
export const TEXT_SOURCE = "<text>";

export class IndexParser {
  readonly layout: ParserLayout;
  readonly ledger: TimestampLedger;
  private readonly logger: Logger;
  private targetDay: string | undefined;

  /**
   * @throws ZodError if the layout is invalid
   */
  constructor(options: IndexParserOptions = {}) {
    this.layout = ParserLayoutSchema.parse(options.layout ?? {});
    this.ledger = options.ledger ?? new TimestampLedger();
    this.logger = options.logger ?? log;
  }

  /**
   * Parser for exports whose structure differs from the default one.
   */
  static withLayout(layout: ParserLayoutInput): IndexParser {
    return new IndexParser({ layout });
  }

  /** Current target day of month, undefined when none was set */
  get targetDate(): string | undefined {
    return this.targetDay;
  }

  /**
   * Restrict parsing to exports of one day. A full date such as
   * "21/01/2023" is accepted; only its day is kept.
   *
   * @returns the stored day
   */
  setTargetDate(date: string): string {
    this.targetDay = normalizeDay(date, this.layout.date_separator);
    this.logger.info({ targetDay: this.targetDay }, "Target day set");
    return this.targetDay;
  }

  // ============================================
  // Extraction (no ledger)
  // ============================================

  /**
   * Classify and extract the rows of a file, applying the target-day gate.
   *
   * @returns null when the file is too short to be an export
   * @throws IOError if the file cannot be read
   * @throws MalformedRowError if a row lacks a configured column
   */
  extractFile(path: string): NormalizedRecord[] | null {
    return unwrap(this.extractRaw(readRawFile(path)));
  }

  extractText(text: string, source = TEXT_SOURCE): NormalizedRecord[] | null {
    return unwrap(this.extractRaw({ source, lines: splitLines(text) }));
  }

  // ============================================
  // Parsing (extraction + ledger)
  // ============================================

  /**
   * Extract a file and drop every row whose time stamp was already seen by
   * this parser. Rows carrying the close marker are never returned.
   *
   * @returns null when the file is too short to be an export
   * @throws IOError if the file cannot be read
   * @throws MalformedRowError if a row lacks a configured column
   */
  parseFile(path: string): NormalizedRecord[] | null {
    return unwrap(this.parseRaw(readRawFile(path), []));
  }

  parseText(text: string, source = TEXT_SOURCE): NormalizedRecord[] | null {
    return unwrap(this.parseRaw({ source, lines: splitLines(text) }, []));
  }

  /**
   * Same as {@link parseFile}, then keep only records containing one of
   * `filters`. An empty list behaves exactly like `parseFile`.
   */
  filterFile(path: string, filters: readonly string[]): NormalizedRecord[] | null {
    return unwrap(this.filterFileResult(path, filters));
  }

  filterText(text: string, filters: readonly string[], source = TEXT_SOURCE): NormalizedRecord[] | null {
    return unwrap(this.parseRaw({ source, lines: splitLines(text) }, filters));
  }

  /**
   * {@link filterFile} with the reason spelled out when there is no data.
   */
  filterFileResult(path: string, filters: readonly string[]): ParseResult {
    return this.parseRaw(readRawFile(path), filters);
  }

  /** Rendered output lines */
  render(records: readonly NormalizedRecord[]): string[] {
    return renderRecords(records, this.layout.delimiter);
  }

  // ============================================
  // Internals
  // ============================================

  private parseRaw(raw: RawFile, filters: readonly string[]): ParseResult {
    const extracted = this.extractRaw(raw);
    if (extracted.status === "no-data") {
      return extracted;
    }

    // Every name in the export is tracked, not only the filtered ones
    if (this.ledger.seed(extractStockNames(extracted.records))) {
      this.logger.debug({ source: raw.source, entities: this.ledger.size }, "Timestamp ledger seeded");
    }

    const pass = this.ledger.admit(extracted.records, this.layout);
    const records = filterRecords(pass.kept, filters, this.layout.delimiter);

    this.logger.debug(
      {
        source: raw.source,
        extracted: extracted.records.length,
        duplicates: pass.duplicates,
        closed: pass.closed,
        kept: records.length,
      },
      "Parsed file"
    );

    return { status: "ok", records };
  }

  private extractRaw(raw: RawFile): ParseResult {
    const { lines, source } = raw;
    const layout = this.layout;

    if (lines.length < layout.min_lines) {
      this.logger.info(
        { source, lines: lines.length, minimum: layout.min_lines },
        "File contains no valid data to be parsed"
      );
      return { status: "no-data", error: new InsufficientDataError(source, layout.min_lines, lines.length) };
    }

    const boundary = trailerBoundary(lines.length, layout);
    const gate = new DateGate(this.targetDay, layout);
    const records: NormalizedRecord[] = [];

    for (const [index, line] of lines.entries()) {
      const zone = classifyLine(index, layout, boundary);
      if (zone === "header") {
        continue;
      }
      if (zone === "trailer") {
        break;
      }

      const context: RowContext = { source, lineNumber: index + 1 };
      const fields = splitFields(line);

      if (gate.inspect(fields, context) === "stop") {
        this.logger.debug({ source, targetDay: this.targetDay }, "Export is for a different day");
        break;
      }

      const columns = zone === "index" ? layout.index_columns : layout.stock_columns;
      records.push({ shape: zone, fields: pickFields(fields, columns, context) });
    }

    return { status: "ok", records };
  }
}

function unwrap(result: ParseResult): NormalizedRecord[] | null {
  return result.status === "ok" ? result.records : null;
}
