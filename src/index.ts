// ─── wmsd-midi ──────────────────────────────────────────────────────────────
//
// Converts WMSD music containers (.msd) into format-0 Standard MIDI Files.
//
// Usage:
//   import { convertMsdToSmf } from "wmsd-midi";
//   const smf = convertMsdToSmf(msdBytes, { loopStyle: "controller" });
// ─────────────────────────────────────────────────────────────────────────────

// Core converter
export * from "./msd/index.js";

// Batch conversion (files and directories)
export {
  findMsdFiles,
  outputPathFor,
  convertBuffer,
  convertFile,
  convertPaths,
  formatBatchLine,
} from "./batch.js";

export type { BatchResult, BatchStatus } from "./batch.js";

// Config
export {
  ConvertOptionsSchema,
  BatchConfigSchema,
  validateConfig,
  resolveConfig,
} from "./config/schema.js";
export { loadBatchConfig } from "./config/loader.js";

export type { BatchConfig, BatchConfigInput, ConfigError } from "./config/schema.js";

// Inspection
export { inspectMidi, inspectMidiFile, formatInspection } from "./midi/inspect.js";
export { formatReport } from "./report.js";

export type { MidiInspection, InspectedTempo, InspectedMarker } from "./midi/types.js";
