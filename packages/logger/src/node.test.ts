/**
 * Node Logger Tests
 */

import { describe, expect, it } from "vitest";
import { createNodeLogger, flushLogger, resolveLogLevel, withFileContext } from "./node.js";

describe("resolveLogLevel", () => {
  it("accepts known levels regardless of case and padding", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel(" warn ")).toBe("warn");
    expect(resolveLogLevel("silent")).toBe("silent");
  });

  it("falls back for unknown or missing values", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("verbose")).toBe("info");
    expect(resolveLogLevel("", "error")).toBe("error");
  });
});

describe("createNodeLogger", () => {
  it("applies the requested level", () => {
    const logger = createNodeLogger({ service: "test-service", level: "warn", pretty: false });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("error")).toBe(true);
    expect(logger.isLevelEnabled("info")).toBe(false);
  });

  it("binds file context on child loggers", () => {
    const logger = createNodeLogger({ service: "test-service", level: "silent", pretty: false });
    const child = withFileContext(logger, { file: "data_ibex.csv", position: 1 });
    expect(child.bindings()).toMatchObject({ file: "data_ibex.csv", position: 1 });
  });
});

describe("flushLogger", () => {
  it("resolves once pending lines are written", async () => {
    const logger = createNodeLogger({ service: "test-service", level: "silent", pretty: false });
    logger.info("not written at this level");
    await expect(flushLogger(logger)).resolves.toBeUndefined();
  });
});
