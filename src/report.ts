// ─── Conversion Report Formatting ───────────────────────────────────────────

import type { ConversionReport } from "./msd/types.js";

/** Human-readable conversion report. */
export function formatReport(report: ConversionReport): string {
  const e = report.events;
  const lines = [
    `Timebase: ${report.timebase} (division ${report.division})`,
    `Packets: ${report.packetsRead} read / ${report.packetsDeclared} declared (${report.packetsIndexed} indexed)` +
      (report.truncated ? " — stream truncated" : ""),
    `Events: ${e.short} short, ${e.tempo} tempo, ${e.sysex} sysex` +
      ` | ${e.skipped} skipped, ${e.dropped} dropped, ${e.sysexTruncated} cut sysex`,
    report.loop
      ? `Loop: starts at packet #${report.loop.packetIndex} (id ${report.loop.packetId}, ${report.loop.style} markers)`
      : "Loop: none",
    `Output: ${report.totalLength} bytes (track ${report.trackLength})`,
  ];
  return lines.join("\n");
}
