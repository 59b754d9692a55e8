import { type NormalizedRecord, renderRecord } from "./records.js";

/**
 * Keep records whose rendered line contains at least one of `filters`.
 * An empty filter list keeps the batch unchanged.
 */
export function filterRecords(
  records: readonly NormalizedRecord[],
  filters: readonly string[],
  delimiter: string
): NormalizedRecord[] {
  if (filters.length === 0) {
    return [...records];
  }
  return records.filter((record) => {
    const line = renderRecord(record, delimiter);
    return filters.some((filter) => line.includes(filter));
  });
}
