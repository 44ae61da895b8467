/**
 * Zod schemas for protonlink configuration validation
 */

import { z } from "zod";
import { FAMILY_IDS } from "./families/_types.js";
import { DEFAULT_FAMILY } from "./families/_registry.js";

export const DEFAULT_EXTRACT_DIR = "~/.steam/steam/compatibilitytools.d";
export const DEFAULT_TRACE_MAX_ROWS = 50_000;

export const releaseFamilySchema = z.enum(FAMILY_IDS);

export const tracesConfigSchema = z.object({
  maxRows: z.number().int().positive().default(DEFAULT_TRACE_MAX_ROWS),
});

export const configSchema = z.object({
  extractDir: z.string().min(1).default(DEFAULT_EXTRACT_DIR),
  family: releaseFamilySchema.default(DEFAULT_FAMILY),
  traces: tracesConfigSchema.default({}),
});

export type ProtonLinkConfig = z.infer<typeof configSchema>;
