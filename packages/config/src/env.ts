/**
 * Environment overrides for run configuration.
 *
 * | Variable                 | Key                  |
 * | ------------------------ | -------------------- |
 * | INDEX_TAPE_TARGET_DATE   | target_date          |
 * | INDEX_TAPE_FILTERS       | filters (comma list) |
 * | INDEX_TAPE_MIN_BYTES     | min_bytes            |
 * | INDEX_TAPE_FILE_STEM     | discovery.file_stem  |
 * | INDEX_TAPE_FILE_EXT      | discovery.file_ext   |
 */

import type { RunConfigInput } from "./schemas/index.js";

export const ENV_PREFIX = "INDEX_TAPE_";

function readVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`]?.trim();
  return value ? value : undefined;
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Build a partial run config from INDEX_TAPE_* variables. Unset or blank
 * variables contribute nothing.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): RunConfigInput {
  const overrides: RunConfigInput = {};

  const targetDate = readVar(env, "TARGET_DATE");
  if (targetDate) {
    overrides.target_date = targetDate;
  }

  const filters = readVar(env, "FILTERS");
  if (filters) {
    overrides.filters = splitList(filters);
  }

  const minBytes = readVar(env, "MIN_BYTES");
  if (minBytes) {
    // Left for the schema to reject when not numeric
    overrides.min_bytes = Number(minBytes);
  }

  const fileStem = readVar(env, "FILE_STEM");
  const fileExt = readVar(env, "FILE_EXT");
  if (fileStem || fileExt) {
    overrides.discovery = {
      ...(fileStem ? { file_stem: fileStem } : {}),
      ...(fileExt ? { file_ext: fileExt } : {}),
    };
  }

  return overrides;
}
