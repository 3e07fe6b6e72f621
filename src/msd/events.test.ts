import { describe, it, expect } from "vitest";
import { midiMessageLength, translatePayload, type TranslationContext } from "./events.js";
import { TrackAssembler } from "./track.js";
import { emptyTally } from "./types.js";
import {
  concat,
  record,
  shortEvent,
  skipEvent,
  sysexEvent,
  tempoEvent,
} from "../test-support/msd-builder.js";

function createContext(): TranslationContext {
  return { track: new TrackAssembler(), loopStyle: "meta", loopStarted: false, tally: emptyTally() };
}

function translate(...records: Uint8Array[]): { bytes: number[]; ctx: TranslationContext } {
  const ctx = createContext();
  translatePayload(concat(records), ctx);
  return { bytes: Array.from(ctx.track.toBytes()), ctx };
}

describe("midiMessageLength", () => {
  it("follows the status-nibble table", () => {
    expect([0x80, 0x90, 0xa0, 0xb0, 0xc0, 0xd0, 0xe0, 0xf0].map(midiMessageLength))
      .toEqual([3, 3, 2, 3, 2, 2, 3, 0]);
  });

  it("looks up data bytes by bits 4-6 only", () => {
    expect(midiMessageLength(0x10)).toBe(3);
    expect(midiMessageLength(0x45)).toBe(2);
    expect(midiMessageLength(0x7f)).toBe(0);
  });
});

describe("translatePayload: short messages", () => {
  it("writes a note-on with its delta", () => {
    const { bytes, ctx } = translate(shortEvent(0, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([0x00, 0x90, 0x3c, 0x64]);
    expect(ctx.tally.short).toBe(1);
  });

  it("writes 2-byte messages without the third byte", () => {
    const { bytes } = translate(shortEvent(4, 0xc0, 0x05, 0x77), shortEvent(0, 0xd3, 0x40, 0x77));
    expect(bytes).toEqual([0x04, 0xc0, 0x05, 0x00, 0xd3, 0x40]);
  });

  it("encodes large deltas as multi-byte VLQ", () => {
    const { bytes } = translate(shortEvent(200, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([0x81, 0x48, 0x90, 0x3c, 0x64]);
  });

  it("drops unsupported statuses and carries their delta forward", () => {
    const { bytes, ctx } = translate(shortEvent(5, 0xf8), shortEvent(3, 0x90, 0x40, 0x7f));
    expect(bytes).toEqual([0x08, 0x90, 0x40, 0x7f]);
    expect(ctx.tally.dropped).toBe(1);
  });

  it("treats a type-0 record starting with FF as a no-op", () => {
    const { bytes, ctx } = translate(shortEvent(6, 0xff, 0x01, 0x02), shortEvent(1, 0x80, 0x3c, 0x00));
    expect(bytes).toEqual([0x07, 0x80, 0x3c, 0x00]);
    expect(ctx.tally.short).toBe(1);
  });
});

describe("translatePayload: tempo", () => {
  it("un-reverses the tempo bytes into a Set Tempo event", () => {
    const { bytes, ctx } = translate(tempoEvent(0, 500_000));
    expect(bytes).toEqual([0x00, 0xff, 0x51, 0x03, 0x07, 0xa1, 0x20]);
    expect(ctx.tally.tempo).toBe(1);
  });

  it("ignores bit 0x40 of the type tag", () => {
    const { bytes } = translate(tempoEvent(12, 0x0f4240, 0x41));
    expect(bytes).toEqual([0x0c, 0xff, 0x51, 0x03, 0x0f, 0x42, 0x40]);
  });
});

describe("translatePayload: system exclusive", () => {
  const gsReset = [0xf0, 0x41, 0x10, 0x42, 0x12, 0x40, 0x00, 0x7f, 0x00, 0x41, 0xf7];

  it("writes the data after the implicit F0 and steps past the padding", () => {
    const { bytes, ctx } = translate(sysexEvent(0, gsReset), shortEvent(5, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([
      0x00, 0xf0, 0x0a, 0x41, 0x10, 0x42, 0x12, 0x40, 0x00, 0x7f, 0x00, 0x41, 0xf7,
      0x05, 0x90, 0x3c, 0x64,
    ]);
    expect(ctx.tally.sysex).toBe(1);
  });

  it("abandons the payload when the declared length overruns it", () => {
    const { bytes, ctx } = translate(sysexEvent(2, [0xf0, 0x01, 0x02, 0xf7], 40), shortEvent(0, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([]);
    expect(ctx.track.delta).toBe(2);
    expect(ctx.tally.sysexTruncated).toBe(1);
    expect(ctx.tally.short).toBe(0);
  });

  it("writes an empty sysex for a zero length", () => {
    const { bytes } = translate(sysexEvent(1, []));
    expect(bytes).toEqual([0x01, 0xf0, 0x00]);
  });
});

describe("translatePayload: skip and no-op records", () => {
  it("steps over a skip record's data and keeps its delta", () => {
    const { bytes, ctx } = translate(skipEvent(7, 5), shortEvent(3, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([0x0a, 0x90, 0x3c, 0x64]);
    expect(ctx.tally.skipped).toBe(1);
  });

  it("moves past a zero-length skip record", () => {
    const { bytes } = translate(skipEvent(1, 0, 0x82), shortEvent(1, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([0x02, 0x90, 0x3c, 0x64]);
  });

  it("consumes unknown low types silently", () => {
    const { bytes, ctx } = translate(record(4, 0x90, 0x3c, 0x64, 0x02), shortEvent(1, 0x90, 0x3c, 0x64));
    expect(bytes).toEqual([0x05, 0x90, 0x3c, 0x64]);
    expect(ctx.tally.short).toBe(1);
  });

  it("ignores a trailing partial record", () => {
    const { bytes } = translate(shortEvent(0, 0x90, 0x3c, 0x64), shortEvent(9, 0x80, 0x3c, 0x00).subarray(0, 8));
    expect(bytes).toEqual([0x00, 0x90, 0x3c, 0x64]);
  });
});
