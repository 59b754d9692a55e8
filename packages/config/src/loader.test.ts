/**
 * Configuration Loader Tests
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ConfigError } from "./errors.js";
import { loadConfigFromFile, loadRunConfig } from "./loader.js";
import { DEFAULT_PARSER_LAYOUT } from "./schemas/index.js";

const FIXTURES_DIR = fileURLToPath(new URL("../tests/fixtures/", import.meta.url));
const fixture = (name: string) => join(FIXTURES_DIR, name);

describe("loadRunConfig", () => {
  it("returns schema defaults when nothing is supplied", async () => {
    const config = await loadRunConfig({ env: {} });

    expect(config.target_date).toBeUndefined();
    expect(config.filters).toEqual([]);
    expect(config.min_bytes).toBe(560);
    expect(config.discovery).toEqual({ file_stem: "data_ibex", file_ext: "csv" });
    expect(config.layout).toEqual(DEFAULT_PARSER_LAYOUT);
  });

  it("layers environment and overrides over the YAML file", async () => {
    const config = await loadRunConfig({
      configPath: fixture("afternoon.yaml"),
      env: { INDEX_TAPE_MIN_BYTES: "200", INDEX_TAPE_FILTERS: "SAN, BBVA" },
      overrides: { filters: ["ITX"], target_date: undefined },
    });

    expect(config.min_bytes).toBe(200);
    // Arrays are replaced, not concatenated
    expect(config.filters).toEqual(["ITX"]);
    // An undefined override leaves the file value in place
    expect(config.target_date).toBe("06/02/2024");
    expect(config.discovery).toEqual({ file_stem: "snapshot", file_ext: "csv" });
  });

  it("deep merges nested layout values with defaults", async () => {
    const config = await loadRunConfig({
      configPath: fixture("afternoon.yaml"),
      env: {},
      overrides: { layout: { header_skip: 9 } },
    });

    expect(config.layout.header_skip).toBe(9);
    expect(config.layout.trailer_skip).toBe(3);
    expect(config.layout.delimiter).toBe(",");
    expect(config.layout.stock_columns).toEqual([0, 7, 8, 1, 5, 6]);
  });

  it("strips a leading dot from the file extension", async () => {
    const config = await loadRunConfig({ env: {}, overrides: { discovery: { file_ext: ".txt" } } });
    expect(config.discovery.file_ext).toBe("txt");
  });

  it("rejects a non-numeric INDEX_TAPE_MIN_BYTES", async () => {
    await expect(loadRunConfig({ env: { INDEX_TAPE_MIN_BYTES: "lots" } })).rejects.toMatchObject({
      code: "VALIDATION_FAILED",
    });
  });

  it("rejects a YAML file that is not a mapping", async () => {
    await expect(loadRunConfig({ configPath: fixture("list.yaml"), env: {} })).rejects.toThrow(
      "must contain a mapping"
    );
  });

  it("throws on a missing config file", async () => {
    const promise = loadRunConfig({ configPath: fixture("missing.yaml"), env: {} });
    await expect(promise).rejects.toBeInstanceOf(ConfigError);
    await expect(promise).rejects.toMatchObject({ code: "LOAD_FAILED" });
  });
});

describe("loadConfigFromFile", () => {
  it("loads and validates a YAML file", async () => {
    const config = await loadConfigFromFile(fixture("afternoon.yaml"));

    expect(config.target_date).toBe("06/02/2024");
    expect(config.filters).toEqual(["ACS", "AENA"]);
    expect(config.min_bytes).toBe(100);
    expect(config.layout.index_line).toBe(6);
  });

  it("reports every failing path", async () => {
    try {
      await loadConfigFromFile(fixture("invalid.yaml"));
      expect.unreachable("invalid config should not load");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe("VALIDATION_FAILED");
        expect(error.issues.map((issue) => issue.path.join("."))).toEqual([
          "min_bytes",
          "layout.index_columns.1",
        ]);
        expect(error.message).toContain("Config validation failed");
      }
    }
  });

  it("throws when the file does not exist", async () => {
    await expect(loadConfigFromFile(fixture("missing.yaml"))).rejects.toThrow("Failed to load YAML");
  });
});
