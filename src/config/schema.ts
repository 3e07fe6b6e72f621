// ─── Conversion Config Schema ───────────────────────────────────────────────
//
// Settings for batch conversion, from CLI flags, an optional JSON config
// file, or MCP tool arguments. All three go through these schemas.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { LOOP_STYLES } from "../msd/types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const ConvertOptionsSchema = z.object({
  loopStyle: z.enum(LOOP_STYLES).default("meta"),
});

export const BatchConfigSchema = ConvertOptionsSchema.extend({
  outDir: z.string().min(1).optional(),
  overwrite: z.boolean().default(true),
  extension: z.string().regex(/^\.[A-Za-z0-9]+$/, "extension must look like \".mid\"").default(".mid"),
  initialCapacityFactor: z.number().int().min(1).max(16).default(2),
  maxAttempts: z.number().int().min(1).max(8).default(4),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type BatchConfigInput = z.input<typeof BatchConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a batch config object.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = BatchConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

/** Parse a config, filling defaults. Throws ZodError on invalid input. */
export function resolveConfig(config: BatchConfigInput = {}): BatchConfig {
  return BatchConfigSchema.parse(config);
}
