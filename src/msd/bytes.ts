// ─── Little-Endian Reads ────────────────────────────────────────────────────

/** Read an unsigned 32-bit little-endian integer. Caller checks bounds. */
export function readU32LE(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true);
}

/** Round up to the next multiple of 4. */
export function align4(length: number): number {
  return Math.ceil(length / 4) * 4;
}
