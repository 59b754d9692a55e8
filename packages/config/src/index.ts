/**
 * Configuration Package
 *
 * Zod schemas for the parser layout and batch runs, plus a loader that
 * layers YAML, environment variables and command-line overrides.
 *
 * @example
 * ```ts
 * import { loadRunConfig } from "@index-tape/config";
 *
 * const config = await loadRunConfig({
 *   configPath: "configs/default.yaml",
 *   overrides: { target_date: "06/02/2024" },
 * });
 * console.log(config.layout.stock_columns); // [0, 7, 8, 1, 5, 6]
 * ```
 */

export { ENV_PREFIX, readEnvOverrides, splitList } from "./env.js";
export { ConfigError } from "./errors.js";
export {
  type LoadRunConfigOptions,
  loadConfigFromFile,
  loadRunConfig,
  validateRunConfig,
} from "./loader.js";
export * from "./schemas/index.js";
