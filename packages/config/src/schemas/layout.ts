/**
 * Parser Layout Schema
 *
 * Describes where things live in a raw index-table export: how many lines to
 * skip at either end, which line carries the index itself, and which tab
 * fields are kept for the index row and for each stock row.
 */

import { z } from "zod";

const ColumnIndex = z.number().int().min(0);

export const ParserLayoutSchema = z
  .object({
    /** Lines skipped at the top of the file (the index line excepted) */
    header_skip: ColumnIndex.default(11),
    /** Zero-based line holding the index row; may sit inside the header */
    index_line: ColumnIndex.default(6),
    /** Lines ignored at the bottom of the file */
    trailer_skip: ColumnIndex.default(5),
    /** Raw fields kept for the index row, in output order */
    index_columns: z.array(ColumnIndex).min(1).default([0, 5, 6, 1]),
    /** Raw fields kept for each stock row, in output order */
    stock_columns: z.array(ColumnIndex).min(1).default([0, 7, 8, 1, 5, 6]),
    /** Raw field holding the date checked against the target day */
    date_column: ColumnIndex.default(5),
    /** Field of an extracted record holding its time stamp */
    timestamp_field: ColumnIndex.default(2),
    /** Files with fewer lines carry no usable data */
    min_lines: z.number().int().min(1).default(51),
    delimiter: z.string().min(1).default(";"),
    date_separator: z.string().length(1).default("/"),
    /** Time stamp value published once the trading session is over */
    close_marker: z.string().min(1).default("Cierre"),
  })
  .superRefine((layout, ctx) => {
    const width = Math.min(layout.index_columns.length, layout.stock_columns.length);
    if (layout.timestamp_field >= width) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["timestamp_field"],
        message: `timestamp_field must point inside both column lists (fewer than ${width})`,
      });
    }
  });
export type ParserLayout = z.infer<typeof ParserLayoutSchema>;
export type ParserLayoutInput = z.input<typeof ParserLayoutSchema>;

export const DEFAULT_PARSER_LAYOUT: ParserLayout = ParserLayoutSchema.parse({});
