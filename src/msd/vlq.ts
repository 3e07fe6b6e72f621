// ─── Variable-Length Quantities ─────────────────────────────────────────────
//
// MIDI's base-128 big-endian integer encoding: seven bits per byte, high
// bit set on every byte except the last. Delta times and event lengths
// in the track are written this way.
// ─────────────────────────────────────────────────────────────────────────────

/** Largest value the encoder accepts (unsigned 32-bit). */
export const VLQ_MAX_VALUE = 0xffff_ffff;

/** Longest encoding of a 32-bit value. */
export const VLQ_MAX_BYTES = 5;

/**
 * Encode an unsigned 32-bit integer as a VLQ.
 *
 *   0          → [0x00]
 *   127        → [0x7F]
 *   128        → [0x81, 0x00]
 *   0x0FFFFFFF → [0xFF, 0xFF, 0xFF, 0x7F]
 */
export function encodeVlq(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > VLQ_MAX_VALUE) {
    throw new RangeError(`VLQ value out of range: ${value}`);
  }

  const bytes: number[] = [value & 0x7f];
  let remaining = value >>> 7;
  while (remaining > 0) {
    bytes.unshift((remaining & 0x7f) | 0x80);
    remaining >>>= 7;
  }
  return Uint8Array.from(bytes);
}

/** Number of bytes encodeVlq would produce, without encoding. */
export function vlqLength(value: number): number {
  if (value < 0x80) return 1;
  if (value < 0x4000) return 2;
  if (value < 0x20_0000) return 3;
  if (value < 0x1000_0000) return 4;
  return 5;
}

/**
 * Decode a VLQ starting at `offset`.
 * Returns the value and how many bytes it occupied.
 */
export function decodeVlq(bytes: Uint8Array, offset = 0): { value: number; length: number } {
  let value = 0;
  for (let i = 0; i < VLQ_MAX_BYTES; i++) {
    const pos = offset + i;
    if (pos >= bytes.length) {
      throw new RangeError(`Truncated VLQ at offset ${offset}`);
    }
    const byte = bytes[pos];
    // Multiply rather than shift: a 5-byte value overflows 32-bit bitwise ops.
    value = value * 128 + (byte & 0x7f);
    if ((byte & 0x80) === 0) {
      if (value > VLQ_MAX_VALUE) {
        throw new RangeError(`VLQ value exceeds 32 bits at offset ${offset}`);
      }
      return { value, length: i + 1 };
    }
  }
  throw new RangeError(`VLQ longer than ${VLQ_MAX_BYTES} bytes at offset ${offset}`);
}
