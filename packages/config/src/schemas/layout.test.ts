/**
 * Parser Layout Schema Tests
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_PARSER_LAYOUT, ParserLayoutSchema } from "./layout.js";
import { RunConfigSchema } from "./run.js";

describe("ParserLayoutSchema", () => {
  it("fills the default export layout", () => {
    expect(DEFAULT_PARSER_LAYOUT).toEqual({
      header_skip: 11,
      index_line: 6,
      trailer_skip: 5,
      index_columns: [0, 5, 6, 1],
      stock_columns: [0, 7, 8, 1, 5, 6],
      date_column: 5,
      timestamp_field: 2,
      min_lines: 51,
      delimiter: ";",
      date_separator: "/",
      close_marker: "Cierre",
    });
  });

  it("keeps supplied values and defaults the rest", () => {
    const layout = ParserLayoutSchema.parse({ header_skip: 2, index_line: 0, min_lines: 4 });
    expect(layout.header_skip).toBe(2);
    expect(layout.index_line).toBe(0);
    expect(layout.min_lines).toBe(4);
    expect(layout.trailer_skip).toBe(5);
  });

  it("rejects negative and fractional column indices", () => {
    expect(ParserLayoutSchema.safeParse({ index_columns: [0, -1] }).success).toBe(false);
    expect(ParserLayoutSchema.safeParse({ stock_columns: [1.5] }).success).toBe(false);
  });

  it("rejects empty column lists", () => {
    expect(ParserLayoutSchema.safeParse({ stock_columns: [] }).success).toBe(false);
  });

  it("requires the time stamp field inside both column lists", () => {
    const result = ParserLayoutSchema.safeParse({ index_columns: [0, 1], timestamp_field: 2 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["timestamp_field"]);
    }
    expect(ParserLayoutSchema.safeParse({ index_columns: [0, 1, 2], timestamp_field: 2 }).success).toBe(
      true
    );
  });

  it("requires a single-character date separator", () => {
    expect(ParserLayoutSchema.safeParse({ date_separator: "//" }).success).toBe(false);
  });
});

describe("RunConfigSchema", () => {
  it("defaults discovery, filters and the byte gate", () => {
    const config = RunConfigSchema.parse({});
    expect(config.filters).toEqual([]);
    expect(config.min_bytes).toBe(560);
    expect(config.discovery).toEqual({ file_stem: "data_ibex", file_ext: "csv" });
    expect(config.layout).toEqual(DEFAULT_PARSER_LAYOUT);
  });

  it("rejects empty filter strings", () => {
    expect(RunConfigSchema.safeParse({ filters: [""] }).success).toBe(false);
  });
});
