import type { NormalizedRecord } from "./records.js";

/**
 * Entity names present in a batch, in batch order: the first field of every
 * record. Seeds the ledger from whatever the export actually lists, so a
 * change in index membership needs no configuration change.
 */
export function extractStockNames(records: readonly NormalizedRecord[]): string[] {
  return records.map((record) => record.fields[0] ?? "");
}
