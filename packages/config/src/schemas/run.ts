/**
 * Run Configuration Schema
 *
 * Settings for one batch run over a directory of raw exports.
 */

import { z } from "zod";
import { ParserLayoutSchema } from "./layout.js";

export const DiscoveryConfigSchema = z.object({
  /** File names must start with this stem */
  file_stem: z.string().min(1).default("data_ibex"),
  /** Extension without the leading dot */
  file_ext: z
    .string()
    .min(1)
    .transform((ext) => ext.replace(/^\./, ""))
    .default("csv"),
});
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

export const RunConfigSchema = z.object({
  /** Day of month, or a full dd/mm/yyyy date of which only the day is kept */
  target_date: z.string().min(1).optional(),
  /** Substrings a record must contain to be kept; empty keeps everything */
  filters: z.array(z.string().min(1)).default([]),
  /** Files smaller than this many bytes are skipped before parsing */
  min_bytes: z.number().int().min(0).default(560),
  discovery: DiscoveryConfigSchema.default({}),
  layout: ParserLayoutSchema.default({}),
});
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;
