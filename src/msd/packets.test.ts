import { describe, it, expect } from "vitest";
import { parseMsdHeader } from "./header.js";
import { readPackets, scanPacketIndex } from "./packets.js";
import { buildMsd, concat } from "../test-support/msd-builder.js";

function scan(input: Uint8Array): number[] {
  return scanPacketIndex(input, parseMsdHeader(input));
}

function read(input: Uint8Array) {
  return Array.from(readPackets(input, parseMsdHeader(input)));
}

describe("scanPacketIndex", () => {
  it("records node ids in stream order", () => {
    const input = buildMsd({
      packets: [
        { id: 1, nodeId: 10 },
        { id: 2, nodeId: 20, events: [Uint8Array.of(1, 2, 3, 4, 5)] },
        { id: 3, nodeId: 30 },
      ],
    });
    expect(scan(input)).toEqual([10, 20, 30]);
  });

  it("stops at the declared packet count", () => {
    const input = buildMsd({
      packets: [{ id: 1, nodeId: 10 }, { id: 2, nodeId: 20 }],
      packetCount: 1,
    });
    expect(scan(input)).toEqual([10]);
  });

  it("stops when fewer than 16 bytes remain", () => {
    const input = concat([
      buildMsd({ packets: [{ id: 1, nodeId: 10 }], packetCount: 3 }),
      new Uint8Array(8),
    ]);
    expect(scan(input)).toEqual([10]);
  });

  it("keeps the node id of a packet whose payload overruns the buffer, then stops", () => {
    const input = buildMsd({
      packets: [
        { id: 1, nodeId: 10 },
        { id: 2, nodeId: 20, declaredLength: 100 },
        { id: 3, nodeId: 30 },
      ],
    });
    expect(scan(input)).toEqual([10, 20]);
  });

  it("returns an empty list for an empty stream", () => {
    expect(scan(buildMsd({ packetCount: 4 }))).toEqual([]);
  });
});

describe("readPackets", () => {
  it("yields unpadded payloads and skips the padding", () => {
    const input = buildMsd({
      packets: [
        { id: 7, nodeId: 8, events: [Uint8Array.of(1, 2, 3, 4, 5)] },
        { id: 9, nodeId: 7, events: [Uint8Array.of(6, 7)] },
      ],
    });
    const packets = read(input);
    expect(packets.map(p => [p.packetId, p.nodeId])).toEqual([[7, 8], [9, 7]]);
    expect(Array.from(packets[0].payload)).toEqual([1, 2, 3, 4, 5]);
    expect(Array.from(packets[1].payload)).toEqual([6, 7]);
  });

  it("ends quietly at a truncated packet", () => {
    const input = buildMsd({
      packets: [
        { id: 1, nodeId: 10, events: [Uint8Array.of(1, 2, 3, 4)] },
        { id: 2, nodeId: 20, declaredLength: 64 },
      ],
    });
    expect(read(input).map(p => p.packetId)).toEqual([1]);
  });
});
