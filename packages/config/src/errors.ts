/**
 * Configuration Errors
 */

import type { z } from "zod";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: "LOAD_FAILED" | "VALIDATION_FAILED",
    public readonly source?: string,
    public readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }

  static loadFailed(source: string, cause: unknown): ConfigError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ConfigError(`Failed to load YAML from ${source}: ${message}`, "LOAD_FAILED", source);
  }

  static validationFailed(error: z.ZodError, source?: string): ConfigError {
    const details = error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return new ConfigError(
      `Config validation failed: ${details}`,
      "VALIDATION_FAILED",
      source,
      error.issues
    );
  }
}
