// ─── Track Assembler ────────────────────────────────────────────────────────
//
// Collects MIDI events for the single output track. Every event is
// written as <VLQ delta><event bytes>, where delta is the time
// accumulated since the previous event; writing an event resets it.
// ─────────────────────────────────────────────────────────────────────────────

import { MsdConvertError } from "./errors.js";
import { vlqLength } from "./vlq.js";

const INITIAL_CAPACITY = 4096;

export const META_SET_TEMPO = 0x51;
export const META_MARKER = 0x06;
export const META_END_OF_TRACK = 0x2f;

export class TrackAssembler {
  private buffer: Uint8Array;
  private length = 0;
  private pendingDelta = 0;
  private ended = false;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = allocate(Math.max(16, initialCapacity));
  }

  /** Ticks accumulated since the last written event. */
  get delta(): number {
    return this.pendingDelta;
  }

  /** Bytes written so far. */
  get byteLength(): number {
    return this.length;
  }

  /** Advance the clock. Wraps at 2^32 like the container's u32 deltas. */
  addDelta(ticks: number): void {
    this.pendingDelta = (this.pendingDelta + ticks) >>> 0;
  }

  /** Write a channel/system message verbatim. */
  writeShort(message: Uint8Array): void {
    this.beginEvent(message.length);
    this.put(message);
  }

  /** Write FF <type> <VLQ len> <data>. */
  writeMeta(type: number, data: Uint8Array = new Uint8Array(0)): void {
    this.beginEvent(2 + vlqLength(data.length) + data.length);
    this.putByte(0xff);
    this.putByte(type);
    this.putVlq(data.length);
    this.put(data);
  }

  /**
   * Write an F0 system-exclusive event. `message` is the complete sysex
   * including its leading F0, which the SMF encoding leaves implicit.
   */
  writeSysex(message: Uint8Array): void {
    const body = message.subarray(Math.min(1, message.length));
    this.beginEvent(1 + vlqLength(body.length) + body.length);
    this.putByte(0xf0);
    this.putVlq(body.length);
    this.put(body);
  }

  /** Append the end-of-track meta event. Nothing may be written after it. */
  end(): void {
    this.writeMeta(META_END_OF_TRACK);
    this.ended = true;
  }

  /** Copy of the assembled track bytes. */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  // ── Internals ──

  /** Reserve room for delta + `size` event bytes and write the delta. */
  private beginEvent(size: number): void {
    if (this.ended) {
      throw new Error("Track already ended");
    }
    this.reserve(vlqLength(this.pendingDelta) + size);
    this.putVlq(this.pendingDelta);
    this.pendingDelta = 0;
  }

  private reserve(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < needed) capacity *= 2;
    const grown = allocate(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
  }

  private putByte(value: number): void {
    this.buffer[this.length++] = value;
  }

  private put(bytes: Uint8Array): void {
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  // Same encoding as encodeVlq, written straight into the buffer.
  private putVlq(value: number): void {
    const size = vlqLength(value);
    for (let i = size - 1; i >= 0; i--) {
      const group = Math.floor(value / 2 ** (7 * i)) & 0x7f;
      this.putByte(i === 0 ? group : group | 0x80);
    }
  }
}

function allocate(size: number): Uint8Array {
  try {
    return new Uint8Array(size);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new MsdConvertError("AllocationFailure", `Could not allocate ${size} bytes for the track`, {
        cause: err,
      });
    }
    throw err;
  }
}
