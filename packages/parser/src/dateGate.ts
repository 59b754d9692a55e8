/**
 * Target-day gate.
 *
 * Only the day of month is compared: "23/01/2023" and "23" both reduce to "23".
 */

import type { ParserLayout } from "@index-tape/config";
import { type RowContext, fieldAt } from "./extract.js";

export const DEFAULT_DATE_SEPARATOR = "/";

export function normalizeDay(date: string, separator = DEFAULT_DATE_SEPARATOR): string {
  if (!date.includes(separator)) {
    return date;
  }
  return date.split(separator)[0] ?? "";
}

export type GateDecision = "pass" | "stop";

/**
 * Per-file gate. The first qualifying row decides: on a match every later
 * row passes unchecked, on a mismatch the file is abandoned.
 */
export class DateGate {
  private satisfied: boolean;

  constructor(
    private readonly targetDay: string | undefined,
    private readonly layout: Pick<ParserLayout, "date_column" | "date_separator">
  ) {
    this.satisfied = targetDay === undefined;
  }

  inspect(fields: readonly string[], context: RowContext): GateDecision {
    if (this.satisfied) {
      return "pass";
    }
    const raw = fieldAt(fields, this.layout.date_column, context);
    if (normalizeDay(raw, this.layout.date_separator) !== this.targetDay) {
      return "stop";
    }
    this.satisfied = true;
    return "pass";
  }
}
