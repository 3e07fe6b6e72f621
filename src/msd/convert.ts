// ─── MSD → SMF Conversion ───────────────────────────────────────────────────
//
// header → node-id pre-pass → single pass over packets (loop marker,
// event records) → end of track → MThd/MTrk.
//
// All state lives in one TranslationContext per call; nothing is shared
// between conversions.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMsdHeader } from "./header.js";
import { readPackets, scanPacketIndex } from "./packets.js";
import { translatePayload, type TranslationContext } from "./events.js";
import { closeLoop, loopTarget, openLoop } from "./loop.js";
import { TrackAssembler } from "./track.js";
import { smfSize, writeSmf, writeSmfInto } from "./smf.js";
import { emptyTally, type ConversionReport, type ConvertOptions, type LoopPoint } from "./types.js";

export interface ConversionResult {
  smf: Uint8Array;
  report: ConversionReport;
}

/**
 * Build the MIDI track for an MSD buffer without wrapping it in chunks.
 *
 * @throws MsdConvertError InvalidFormat for a bad header,
 *         AllocationFailure if the track buffer cannot grow.
 */
export function assembleTrack(
  input: Uint8Array,
  options: ConvertOptions = {},
): { track: Uint8Array; report: ConversionReport } {
  const header = parseMsdHeader(input);
  const loopStyle = options.loopStyle ?? "meta";

  const nodeIds = scanPacketIndex(input, header);
  const target = loopTarget(nodeIds);

  const ctx: TranslationContext = {
    track: new TrackAssembler(input.length * 2),
    loopStyle,
    loopStarted: false,
    tally: emptyTally(),
  };

  let loop: LoopPoint | null = null;
  let packetsRead = 0;
  for (const packet of readPackets(input, header)) {
    if (openLoop(ctx, packet.packetId, target)) {
      loop = { packetIndex: packetsRead, packetId: packet.packetId, style: loopStyle };
    }
    translatePayload(packet.payload, ctx);
    packetsRead++;
  }

  closeLoop(ctx);
  ctx.track.end();

  const track = ctx.track.toBytes();
  return {
    track,
    report: {
      timebase: header.timebase,
      division: header.timebase & 0xffff,
      packetsDeclared: header.packetCount,
      packetsIndexed: nodeIds.length,
      packetsRead,
      truncated: packetsRead < header.packetCount,
      events: ctx.tally,
      loop,
      trackLength: track.length,
      totalLength: smfSize(track.length),
    },
  };
}

/** Convert an MSD buffer to an exactly sized SMF plus a report. */
export function convertMsd(input: Uint8Array, options: ConvertOptions = {}): ConversionResult {
  const { track, report } = assembleTrack(input, options);
  return { smf: writeSmf(track, report.timebase), report };
}

/** Convert an MSD buffer and return only the SMF bytes. */
export function convertMsdToSmf(input: Uint8Array, options: ConvertOptions = {}): Uint8Array {
  return convertMsd(input, options).smf;
}

/**
 * Convert into a caller-supplied buffer. Returns the bytes written.
 *
 * @throws MsdConvertError BufferTooSmall (with `requiredSize`) when
 *         `output` is shorter than the result; `output` is not modified.
 */
export function convertMsdInto(
  input: Uint8Array,
  output: Uint8Array,
  options: ConvertOptions = {},
): number {
  const { track, report } = assembleTrack(input, options);
  return writeSmfInto(track, report.timebase, output);
}
