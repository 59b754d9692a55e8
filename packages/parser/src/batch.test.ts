/**
 * Batch Runner Tests
 */

import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildDefaultExport,
  buildRawTable,
  createTempDir,
  makeStocks,
  type TempDir,
} from "@index-tape/test-utils";
import { type FileOutcome, runBatch } from "./batch.js";
import { InsufficientDataError, IOError, MalformedRowError } from "./errors.js";
import { IndexParser } from "./parser.js";

function malformedExport(): string {
  const lines = buildDefaultExport().split("\n");
  lines[20] = "STK10\t19,50";
  return lines.join("\n");
}

/**
 * Same export a few minutes later: only STK01 traded again.
 */
function laterExport(): string {
  const stocks = makeStocks(35).map((stock) =>
    stock.name === "STK01" ? { ...stock, price: "11,60", time: "15:25:00" } : stock
  );
  return buildRawTable({ stocks });
}

function shortExport(): string {
  // Big enough to pass the byte gate, too short to be an export
  return `${Array.from({ length: 20 }, (_, i) => `Linea de relleno numero ${i} sin datos de cotizacion`).join("\n")}\n`;
}

describe("runBatch", () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it("reports every file and keeps going past failures", () => {
    const files = [
      dir.write("data_ibex.csv", buildDefaultExport()),
      dir.write("data_ibex(1).csv", "x"),
      dir.write("data_ibex(2).csv", shortExport()),
      dir.write("data_ibex(3).csv", malformedExport()),
      dir.write("data_ibex(4).csv", laterExport()),
      join(dir.path, "data_ibex(5).csv"),
    ];

    const streamed: FileOutcome["status"][] = [];
    const { outcomes, summary } = runBatch(new IndexParser(), files, {
      onOutcome: (outcome) => streamed.push(outcome.status),
    });

    expect(outcomes.map((outcome) => outcome.status)).toEqual([
      "parsed",
      "skipped",
      "skipped",
      "failed",
      "parsed",
      "failed",
    ]);
    expect(streamed).toEqual(outcomes.map((outcome) => outcome.status));
    expect(summary).toEqual({ files: 6, parsed: 2, skipped: 2, failed: 2, records: 37 });

    const [first, tiny, short, malformed, second, missing] = outcomes;
    expect(first?.status === "parsed" && first.records).toHaveLength(36);
    expect(tiny).toEqual({ status: "skipped", file: files[1], reason: "too-small", bytes: 1 });

    expect(short?.status === "skipped" && short.reason === "no-data" && short.error).toBeInstanceOf(
      InsufficientDataError
    );
    if (short?.status === "skipped" && short.reason === "no-data") {
      expect(short.error.lineCount).toBe(20);
      expect(short.error.minimumLines).toBe(51);
    }

    expect(malformed?.status === "failed" && malformed.error).toBeInstanceOf(MalformedRowError);
    if (second?.status === "parsed") {
      expect(second.records.map((record) => record.fields[0])).toEqual(["STK01"]);
    }
    expect(missing?.status === "failed" && missing.error).toBeInstanceOf(IOError);
  });

  it("applies filters to every file", () => {
    const files = [dir.write("data_ibex.csv", buildDefaultExport())];
    const { outcomes } = runBatch(new IndexParser(), files, { filters: ["STK07", "STK12"] });

    const [only] = outcomes;
    expect(only?.status).toBe("parsed");
    if (only?.status === "parsed") {
      expect(only.records.map((record) => record.fields[0])).toEqual(["STK07", "STK12"]);
    }
  });

  it("parses small files when the byte gate is lowered", () => {
    const files = [dir.write("data_ibex.csv", "x")];
    const { outcomes } = runBatch(new IndexParser(), files, { minBytes: 0 });
    expect(outcomes[0]).toMatchObject({ status: "skipped", reason: "no-data" });
  });

  it("returns an empty run for no files", () => {
    expect(runBatch(new IndexParser(), [])).toEqual({
      outcomes: [],
      summary: { files: 0, parsed: 0, skipped: 0, failed: 0, records: 0 },
    });
  });
});
