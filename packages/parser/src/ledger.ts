/**
 * Timestamp Ledger
 *
 * Remembers, per entity, the last time stamp that was let through. It lives
 * as long as the parser that owns it, so successive snapshots of one trading
 * day only contribute the rows that changed since the previous snapshot.
 */

import type { ParserLayout } from "@index-tape/config";
import type { NormalizedRecord } from "./records.js";

/** Seeded, nothing admitted yet */
export const UNSET = "unset";
/** Session over; nothing new until the next trading day */
export const CLOSED = "closed";

export type LedgerSlot = typeof UNSET | typeof CLOSED | number;

export type LedgerLayout = Pick<ParserLayout, "timestamp_field" | "close_marker">;

export interface LedgerPass {
  kept: NormalizedRecord[];
  /** Records dropped because their time stamp was already recorded */
  duplicates: number;
  /** Records dropped because they carried the close marker */
  closed: number;
}

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/**
 * "15:19:51" -> 151951. Anything that is not a 32-bit integer once the
 * colons are gone encodes as 0.
 */
export function encodeTimestamp(raw: string): number {
  const digits = raw.replaceAll(":", "");
  if (!/^[+-]?\d+$/.test(digits)) {
    return 0;
  }
  const value = Number(digits);
  return value >= INT32_MIN && value <= INT32_MAX ? value : 0;
}

export class TimestampLedger {
  private readonly slots = new Map<string, LedgerSlot>();

  get size(): number {
    return this.slots.size;
  }

  get(name: string): LedgerSlot | undefined {
    return this.slots.get(name);
  }

  entries(): [string, LedgerSlot][] {
    return [...this.slots.entries()];
  }

  /**
   * Mark every name as unset. Only the first non-empty name list counts;
   * later calls leave the ledger untouched.
   *
   * @returns true if the ledger was seeded by this call
   */
  seed(names: readonly string[]): boolean {
    if (this.slots.size > 0 || names.length === 0) {
      return false;
    }
    for (const name of names) {
      this.slots.set(name, UNSET);
    }
    return true;
  }

  /**
   * Drop records whose time stamp matches the one on record for their entity,
   * updating the ledger in place. Admission is by inequality: an earlier time
   * stamp than the recorded one is let through and replaces it.
   */
  admit(records: readonly NormalizedRecord[], layout: LedgerLayout): LedgerPass {
    const pass: LedgerPass = { kept: [], duplicates: 0, closed: 0 };

    for (const record of records) {
      const name = record.fields[0] ?? "";
      const stamp = record.fields[layout.timestamp_field] ?? "";

      if (stamp === layout.close_marker) {
        this.slots.set(name, CLOSED);
        pass.closed++;
        continue;
      }

      const encoded = encodeTimestamp(stamp);
      if (this.slots.get(name) === encoded) {
        pass.duplicates++;
        continue;
      }

      this.slots.set(name, encoded);
      pass.kept.push(record);
    }

    return pass;
  }
}
