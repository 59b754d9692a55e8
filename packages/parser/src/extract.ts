/**
 * Column extraction from tab-separated rows.
 */

import { MalformedRowError } from "./errors.js";

export interface RowContext {
  source: string;
  /** 1-based line number */
  lineNumber: number;
}

export const FIELD_SEPARATOR = "\t";

export function splitFields(line: string): string[] {
  return line.split(FIELD_SEPARATOR);
}

/**
 * Bounds-checked field access.
 *
 * @throws MalformedRowError if the row has no field at `column`
 */
export function fieldAt(fields: readonly string[], column: number, context: RowContext): string {
  const value = fields[column];
  if (value === undefined) {
    throw new MalformedRowError(context.source, context.lineNumber, column, fields.length);
  }
  return value;
}

/**
 * Project `columns` of a split row, in the order given.
 *
 * @throws MalformedRowError on the first column the row lacks
 */
export function pickFields(
  fields: readonly string[],
  columns: readonly number[],
  context: RowContext
): string[] {
  return columns.map((column) => fieldAt(fields, column, context));
}
