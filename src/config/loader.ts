// ─── Config Loader ──────────────────────────────────────────────────────────
//
// Reads a JSON config file, merges CLI overrides on top, validates with Zod.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import { BatchConfigSchema, type BatchConfig, type BatchConfigInput } from "./schema.js";

/**
 * Load a batch config. `overrides` win over values from the file.
 * With no file, only the overrides and defaults apply.
 */
export function loadBatchConfig(filePath: string | null, overrides: BatchConfigInput = {}): BatchConfig {
  let raw: Record<string, unknown> = {};
  if (filePath) {
    if (!existsSync(filePath)) {
      throw new Error(`Config not found: ${filePath}`);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf8"));
    } catch (err) {
      throw new Error(`Invalid JSON in ${basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isRecord(parsed)) {
      throw new Error(`Invalid config ${basename(filePath)}: expected a JSON object`);
    }
    raw = parsed;
  }

  const result = BatchConfigSchema.safeParse({ ...raw, ...dropUndefined(overrides) });
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config${filePath ? ` ${basename(filePath)}` : ""}:\n${issues}`);
  }

  return result.data;
}

function dropUndefined(values: BatchConfigInput): Partial<BatchConfigInput> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
