/**
 * Configuration Loader
 *
 * Loads a YAML run configuration and layers environment variables and
 * explicit overrides on top of it.
 */

import { readFile } from "node:fs/promises";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { readEnvOverrides } from "./env.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { type RunConfig, type RunConfigInput, RunConfigSchema } from "./schemas/index.js";

/**
 * Later sources replace arrays instead of appending to them, so a filter
 * list given on the command line is not mixed with the one in the file.
 */
const mergeConfig = deepmergeCustom({ mergeArrays: false });

export interface LoadRunConfigOptions {
  /** Optional YAML file; defaults apply when omitted */
  configPath?: string;
  /** Environment to read INDEX_TAPE_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, typically from the command line */
  overrides?: RunConfigInput;
}

/**
 * Load and parse a YAML file
 *
 * @throws ConfigError if the file cannot be read or parsed
 */
async function loadYaml(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return parse(content) ?? {};
  } catch (error) {
    throw ConfigError.loadFailed(path, error);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Drop keys whose value is undefined so they never mask a lower layer.
 */
function compact(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== undefined) {
      result[key] = compact(entry);
    }
  }
  return result;
}

/**
 * Validate a merged configuration object.
 *
 * @throws ConfigError with the zod issues when validation fails
 */
export function validateRunConfig(raw: unknown, source?: string): RunConfig {
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigError.validationFailed(result.error, source);
  }
  return result.data;
}

/**
 * Load configuration from a specific file
 *
 * @throws ConfigError if the file cannot be read or fails validation
 */
export async function loadConfigFromFile(path: string): Promise<RunConfig> {
  const content = await loadYaml(path);
  return validateRunConfig(content, path);
}

/**
 * Load the run configuration.
 *
 * Precedence (highest to lowest):
 * 1. `overrides`
 * 2. Environment variables (INDEX_TAPE_*)
 * 3. YAML file at `configPath`
 * 4. Schema defaults
 */
export async function loadRunConfig(options: LoadRunConfigOptions = {}): Promise<RunConfig> {
  const { configPath, env = process.env, overrides = {} } = options;

  const layers: Record<string, unknown>[] = [];

  if (configPath) {
    const fromFile = await loadYaml(configPath);
    if (!isRecord(fromFile)) {
      throw new ConfigError(
        `Config file ${configPath} must contain a mapping`,
        "VALIDATION_FAILED",
        configPath
      );
    }
    layers.push(fromFile);
  }

  const fromEnv = readEnvOverrides(env);
  if (Object.keys(fromEnv).length > 0) {
    log.debug({ keys: Object.keys(fromEnv) }, "Applying environment overrides");
  }

  for (const layer of [fromEnv, overrides]) {
    const cleaned = compact(layer);
    if (isRecord(cleaned)) {
      layers.push(cleaned);
    }
  }

  const merged = mergeConfig({}, ...layers);
  return validateRunConfig(merged, configPath);
}
