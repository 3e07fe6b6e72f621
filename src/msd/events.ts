// ─── Event Translator ───────────────────────────────────────────────────────
//
// Turns the 12-byte event records of one packet payload into MIDI events.
// Record type comes from byte 11 masked with 0xBF:
//
//   0x00  short MIDI message in bytes 8..  (unless byte 8 is 0xFF)
//   0x01  tempo, 3 bytes stored reversed in bytes 8..10
//   0x80  inline sysex; 24-bit length in param, data follows the record
//   0x8X+ other records with the high bit: skip param & 0xFFFFFF bytes
//   else  no-op
//
// Records that write nothing keep their delta in the accumulator, so it
// lands on the next event that is written.
// ─────────────────────────────────────────────────────────────────────────────

import { align4, readU32LE } from "./bytes.js";
import { META_SET_TEMPO, type TrackAssembler } from "./track.js";
import { EVENT_RECORD_SIZE, type EventTally, type LoopStyle } from "./types.js";

const TYPE_MASK = 0xbf;
const TYPE_SHORT = 0x00;
const TYPE_TEMPO = 0x01;
const TYPE_SYSEX = 0x80;
const LENGTH_MASK = 0xff_ffff;

/** Per-conversion state threaded through the packet and event stages. */
export interface TranslationContext {
  track: TrackAssembler;
  loopStyle: LoopStyle;
  /** Set once the loop-start marker has been written. Never cleared. */
  loopStarted: boolean;
  tally: EventTally;
}

/** Message lengths by status high nibble, 0x8_ through 0xF_. */
const MESSAGE_LENGTHS = [3, 3, 2, 3, 2, 2, 3, 0] as const;

/**
 * Length of the short message a status byte starts, 0 when unsupported.
 * Only bits 4-6 are consulted, so 0x0_ reads like 0x8_.
 */
export function midiMessageLength(status: number): number {
  return MESSAGE_LENGTHS[(status >> 4) & 0x7];
}

/** Translate every complete record in `payload` into `ctx.track`. */
export function translatePayload(payload: Uint8Array, ctx: TranslationContext): void {
  const { track, tally } = ctx;
  let offset = 0;

  while (offset + EVENT_RECORD_SIZE <= payload.length) {
    track.addDelta(readU32LE(payload, offset));
    const param = readU32LE(payload, offset + 8);
    const tag = payload[offset + 11];
    const type = tag & TYPE_MASK;
    const status = payload[offset + 8];

    if (type === TYPE_SHORT && status !== 0xff) {
      const length = midiMessageLength(status);
      if (length > 0) {
        track.writeShort(payload.slice(offset + 8, offset + 8 + length));
        tally.short++;
      } else {
        tally.dropped++;
      }
    } else if (type === TYPE_TEMPO) {
      track.writeMeta(
        META_SET_TEMPO,
        Uint8Array.of(payload[offset + 10], payload[offset + 9], payload[offset + 8]),
      );
      tally.tempo++;
    } else if (type === TYPE_SYSEX) {
      const length = param & LENGTH_MASK;
      const start = offset + EVENT_RECORD_SIZE;
      if (start + length > payload.length) {
        tally.sysexTruncated++;
        break;
      }
      track.writeSysex(payload.subarray(start, start + length));
      tally.sysex++;
      offset += align4(length);
    } else if (type & 0x80) {
      offset += align4(param & LENGTH_MASK);
      tally.skipped++;
    }

    offset += EVENT_RECORD_SIZE;
  }
}
