/**
 * Normalized records and their rendered form.
 *
 * Records stay as ordered field lists inside the parser; the delimiter-joined
 * string is only produced at the output boundary.
 */

export type RecordShape = "index" | "stock";

export interface NormalizedRecord {
  /** Which column template produced the record */
  readonly shape: RecordShape;
  readonly fields: readonly string[];
}

export function renderRecord(record: NormalizedRecord, delimiter: string): string {
  return record.fields.join(delimiter);
}

export function renderRecords(records: readonly NormalizedRecord[], delimiter: string): string[] {
  return records.map((record) => renderRecord(record, delimiter));
}
