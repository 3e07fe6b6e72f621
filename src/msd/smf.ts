// ─── SMF Writer ─────────────────────────────────────────────────────────────
//
//   MThd  len=6  format=0  ntrks=1  division      (14 bytes)
//   MTrk  len=L  <track bytes>                    (8 + L bytes)
//
// All chunk fields big-endian.
// ─────────────────────────────────────────────────────────────────────────────

import { MsdConvertError } from "./errors.js";

export const SMF_OVERHEAD = 22;

/** Total file size for a track of `trackLength` bytes. */
export function smfSize(trackLength: number): number {
  return SMF_OVERHEAD + trackLength;
}

/**
 * Write a format-0 SMF into `output` and return the number of bytes written.
 * `timebase` is truncated to 16 bits.
 *
 * @throws MsdConvertError BufferTooSmall, leaving `output` untouched.
 */
export function writeSmfInto(track: Uint8Array, timebase: number, output: Uint8Array): number {
  const total = smfSize(track.length);
  if (output.length < total) {
    throw new MsdConvertError(
      "BufferTooSmall",
      `Output buffer too small: ${output.length} bytes, need ${total}`,
      { requiredSize: total },
    );
  }

  const view = new DataView(output.buffer, output.byteOffset, total);
  writeAscii(output, 0, "MThd");
  view.setUint32(4, 6);
  view.setUint16(8, 0);
  view.setUint16(10, 1);
  view.setUint16(12, timebase & 0xffff);
  writeAscii(output, 14, "MTrk");
  view.setUint32(18, track.length);
  output.set(track, SMF_OVERHEAD);
  return total;
}

/** Write a format-0 SMF into a freshly allocated, exactly sized buffer. */
export function writeSmf(track: Uint8Array, timebase: number): Uint8Array {
  const output = new Uint8Array(smfSize(track.length));
  writeSmfInto(track, timebase, output);
  return output;
}

function writeAscii(target: Uint8Array, offset: number, text: string): void {
  for (let i = 0; i < text.length; i++) {
    target[offset + i] = text.charCodeAt(i);
  }
}
