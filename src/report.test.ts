import { describe, it, expect } from "vitest";
import { formatReport } from "./report.js";
import { convertMsd } from "./msd/convert.js";
import { buildMsd, shortEvent } from "./test-support/msd-builder.js";

describe("formatReport", () => {
  it("describes an empty container with no loop", () => {
    const { report } = convertMsd(buildMsd());
    expect(formatReport(report).split("\n")).toEqual([
      "Timebase: 480 (division 480)",
      "Packets: 0 read / 0 declared (0 indexed)",
      "Events: 0 short, 0 tempo, 0 sysex | 0 skipped, 0 dropped, 0 cut sysex",
      "Loop: none",
      "Output: 26 bytes (track 4)",
    ]);
  });

  it("names the packet that opens the loop", () => {
    const input = buildMsd({
      packets: [
        { id: 1, nodeId: 2, events: [shortEvent(10, 0x90, 0x3c, 0x64)] },
        { id: 2, nodeId: 2, events: [shortEvent(20, 0x80, 0x3c, 0x00)] },
      ],
    });
    const { report } = convertMsd(input, { loopStyle: "controller" });
    expect(formatReport(report).split("\n")).toEqual([
      "Timebase: 480 (division 480)",
      "Packets: 2 read / 2 declared (2 indexed)",
      "Events: 2 short, 0 tempo, 0 sysex | 0 skipped, 0 dropped, 0 cut sysex",
      "Loop: starts at packet #1 (id 2, controller markers)",
      "Output: 38 bytes (track 16)",
    ]);
  });

  it("flags a truncated packet stream", () => {
    const { report } = convertMsd(buildMsd({ timebase: 0x1_0060, packetCount: 3 }));
    const lines = formatReport(report).split("\n");
    expect(lines[0]).toBe("Timebase: 65632 (division 96)");
    expect(lines[1]).toBe("Packets: 0 read / 3 declared (0 indexed) — stream truncated");
  });
});
