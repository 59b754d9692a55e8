/**
 * Configuration Schemas Index
 *
 * Exports all Zod schemas and their inferred TypeScript types.
 */

// Parser layout
export {
  DEFAULT_PARSER_LAYOUT,
  type ParserLayout,
  type ParserLayoutInput,
  ParserLayoutSchema,
} from "./layout.js";
// Run configuration
export {
  type DiscoveryConfig,
  DiscoveryConfigSchema,
  type RunConfig,
  type RunConfigInput,
  RunConfigSchema,
} from "./run.js";
