/**
 * Positional zones of a raw export.
 *
 * ```text
 * 0 .. header_skip            header (skipped), except index_line
 * index_line                  the index row
 * header_skip .. boundary     stock rows
 * boundary .. end             trailer (extraction stops)
 * ```
 */

import type { ParserLayout } from "@index-tape/config";

export type Zone = "header" | "index" | "stock" | "trailer";

type ZoneLayout = Pick<ParserLayout, "header_skip" | "index_line" | "trailer_skip">;

/**
 * First line index that belongs to the trailer.
 */
export function trailerBoundary(lineCount: number, layout: Pick<ParserLayout, "trailer_skip">): number {
  return Math.max(0, lineCount - layout.trailer_skip);
}

/**
 * Zone of the line at `index` (zero-based). The index line wins over every
 * other zone, wherever it sits.
 */
export function classifyLine(index: number, layout: ZoneLayout, boundary: number): Zone {
  if (index === layout.index_line) {
    return "index";
  }
  if (index < layout.header_skip) {
    return "header";
  }
  if (index < boundary) {
    return "stock";
  }
  return "trailer";
}
