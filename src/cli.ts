#!/usr/bin/env node
// ─── wmsd-midi: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   wmsd-midi                          # Show help
//   wmsd-midi convert <file|dir>       # Convert .msd → .mid (meta loop markers)
//   wmsd-midi convert <dir> --loop cc  # Loop start as CC 111
//   wmsd-midi convert <dir> --out DIR  # Write into DIR
//   wmsd-midi convert <f> --verbose    # Also print the conversion report
//   wmsd-midi inspect <file.mid>       # Summarize a MIDI file
// ─────────────────────────────────────────────────────────────────────────────

import { convertPaths, formatBatchLine, type BatchResult } from "./batch.js";
import { loadBatchConfig } from "./config/loader.js";
import type { BatchConfigInput } from "./config/schema.js";
import { formatInspection, inspectMidiFile } from "./midi/inspect.js";
import type { LoopStyle } from "./msd/types.js";
import { formatReport } from "./report.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const LOOP_FLAGS: Record<string, LoopStyle> = {
  meta: "meta",
  cc: "controller",
  controller: "controller",
};

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Check for boolean flag (no value). */
function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdConvert(args: string[]): Promise<void> {
  const target = args[0];
  if (!target || target.startsWith("--")) {
    fail("Usage: wmsd-midi convert <file.msd | dir> [--loop meta|cc] [--out DIR] [--ext .mid] [--no-overwrite] [--config FILE] [--verbose]");
  }

  const loopArg = getFlag(args, "--loop");
  let loopStyle: LoopStyle | undefined;
  if (loopArg !== null) {
    loopStyle = LOOP_FLAGS[loopArg];
    if (!loopStyle) {
      fail(`Unknown loop style: "${loopArg}". Available: meta, cc`);
    }
  }

  const verbose = hasFlag(args, "--verbose");
  const overrides: BatchConfigInput = {
    loopStyle,
    outDir: getFlag(args, "--out") ?? undefined,
    extension: getFlag(args, "--ext") ?? undefined,
    overwrite: hasFlag(args, "--no-overwrite") ? false : undefined,
  };

  let results: BatchResult[];
  try {
    const config = loadBatchConfig(getFlag(args, "--config"), overrides);
    results = await convertPaths(target, config, (result, index) => {
      const line = formatBatchLine(index, result);
      if (result.status === "error") console.error(line);
      else console.log(line);
      if (verbose && result.report) {
        console.log(formatReport(result.report).replace(/^/gm, "    "));
      }
    });
  } catch (err) {
    fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (results.length === 0) {
    fail(`No .msd files found in: ${target}`);
  }

  const failed = results.filter(r => r.status === "error").length;
  const ok = results.filter(r => r.status === "ok").length;
  console.log(`\n${ok} converted, ${results.length - ok - failed} skipped, ${failed} failed.`);
  if (failed > 0) process.exit(1);
}

async function cmdInspect(args: string[]): Promise<void> {
  const file = args[0];
  if (!file) {
    fail("Usage: wmsd-midi inspect <file.mid>");
  }

  try {
    const info = await inspectMidiFile(file);
    console.log(`\n${file}`);
    console.log(formatInspection(info));
    console.log();
  } catch (err) {
    fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function cmdHelp(): void {
  console.log(`
wmsd-midi — convert WMSD music containers to Standard MIDI Files

Commands:
  convert <file.msd | dir>   Convert one file, or every .msd in a directory
    --loop meta|cc           Loop markers: FF 06 loopStart/loopEnd (default), or CC 111
    --out DIR                Write .mid files into DIR (default: beside the input)
    --ext .mid               Output extension
    --no-overwrite           Skip outputs that already exist
    --config FILE            JSON config (loopStyle, outDir, overwrite, extension, ...)
    --verbose                Print packet/event counts and the loop point per file
  inspect <file.mid>         Summarize a MIDI file (tempo, markers, events)
  help                       Show this help
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "convert":
      await cmdConvert(args.slice(1));
      break;
    case "inspect":
      await cmdInspect(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'wmsd-midi help' for usage.`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
