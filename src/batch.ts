// ─── Batch Conversion ───────────────────────────────────────────────────────
//
// File-level driver around the converter: finds .msd files, converts each
// into a caller-sized buffer (growing it on BufferTooSmall), and writes
// the .mid beside the input or into an output directory. One bad file
// never stops the rest.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readdirSync, statSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { assembleTrack, type ConversionResult } from "./msd/convert.js";
import { isMsdError } from "./msd/errors.js";
import { writeSmfInto } from "./msd/smf.js";
import type { ConversionReport } from "./msd/types.js";
import type { BatchConfig } from "./config/schema.js";

export type BatchStatus = "ok" | "skipped" | "error";

/** Outcome for one input file. */
export interface BatchResult {
  input: string;
  /** Path written (or that would have been written). Null if never resolved. */
  output: string | null;
  status: BatchStatus;
  /** Reason for "skipped" or "error". */
  message?: string;
  report?: ConversionReport;
}

const MSD_EXTENSION = ".msd";

/**
 * Resolve `path` to the .msd files to convert.
 * A file is taken as-is; a directory yields its *.msd entries, sorted.
 */
export function findMsdFiles(path: string): string[] {
  if (!existsSync(path)) {
    throw new Error(`Path not found: ${path}`);
  }
  if (!statSync(path).isDirectory()) return [path];

  return readdirSync(path)
    .filter(f => extname(f).toLowerCase() === MSD_EXTENSION)
    .sort((a, b) => a.localeCompare(b))
    .map(f => join(path, f))
    .filter(f => statSync(f).isFile());
}

/** Output path for an input: same stem, configured extension and directory. */
export function outputPathFor(input: string, config: BatchConfig): string {
  const stem = basename(input, extname(input));
  return join(config.outDir ?? dirname(input), stem + config.extension);
}

/**
 * Convert bytes the way a caller with a fixed buffer would: start at
 * `input.length × initialCapacityFactor`, and on BufferTooSmall retry with
 * the size the converter asked for.
 */
export function convertBuffer(input: Uint8Array, config: BatchConfig): ConversionResult {
  const { track, report } = assembleTrack(input, { loopStyle: config.loopStyle });

  let capacity = Math.max(1, input.length * config.initialCapacityFactor);
  for (let attempt = 1; ; attempt++) {
    const output = new Uint8Array(capacity);
    try {
      const written = writeSmfInto(track, report.timebase, output);
      return { smf: output.slice(0, written), report };
    } catch (err) {
      if (!isMsdError(err, "BufferTooSmall") || attempt >= config.maxAttempts) throw err;
      capacity = err.requiredSize ?? capacity * 2;
    }
  }
}

/** Convert one file and write the result. */
export async function convertFile(input: string, config: BatchConfig): Promise<BatchResult> {
  const output = outputPathFor(input, config);

  if (!config.overwrite && existsSync(output)) {
    return { input, output, status: "skipped", message: "output exists" };
  }

  try {
    const bytes = await readFile(input);
    const { smf, report } = convertBuffer(bytes, config);
    await mkdir(dirname(output), { recursive: true });
    await writeFile(output, smf);
    return { input, output, status: "ok", report };
  } catch (err) {
    return { input, output, status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Convert a file or every .msd in a directory, in order.
 * `onResult` sees each result as soon as it is ready.
 */
export async function convertPaths(
  path: string,
  config: BatchConfig,
  onResult?: (result: BatchResult, index: number) => void,
): Promise<BatchResult[]> {
  const files = findMsdFiles(path);
  const results: BatchResult[] = [];

  for (const [i, file] of files.entries()) {
    const result = await convertFile(file, config);
    results.push(result);
    onResult?.(result, i + 1);
  }

  return results;
}

/** One status line per file, e.g. `1: a.msd -> a.mid ... OK`. */
export function formatBatchLine(index: number, result: BatchResult): string {
  switch (result.status) {
    case "ok": {
      const loop = result.report?.loop ? ", loop" : "";
      const cut = result.report?.truncated ? ", truncated" : "";
      return `${index}: ${result.input} -> ${result.output} ... OK${loop}${cut}`;
    }
    case "skipped":
      return `${index}: ${result.input} ... SKIP: ${result.message ?? ""}`;
    case "error":
      return `${index}: ${result.input} ... ERROR: ${result.message ?? "unknown error"}`;
  }
}
