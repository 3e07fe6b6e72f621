// ─── MSD Test Builder ───────────────────────────────────────────────────────
//
// Assembles small WMSD containers byte by byte for tests.
// ─────────────────────────────────────────────────────────────────────────────

export interface PacketFixture {
  id: number;
  nodeId: number;
  /** Event records, concatenated as the payload. */
  events?: Uint8Array[];
  /** Overrides the length field (to fake a truncated packet). */
  declaredLength?: number;
}

export interface MsdFixture {
  timebase?: number;
  packets?: PacketFixture[];
  /** Overrides the header's packet count. */
  packetCount?: number;
}

/** Raw 12-byte record: delta, 4 reserved bytes, then bytes 8..11 as given. */
export function record(delta: number, b8: number, b9: number, b10: number, b11: number): Uint8Array {
  const out = new Uint8Array(12);
  const view = new DataView(out.buffer);
  view.setUint32(0, delta, true);
  out.set([b8, b9, b10, b11], 8);
  return out;
}

/** Type-0 record carrying a short MIDI message (up to 3 bytes). */
export function shortEvent(delta: number, ...message: number[]): Uint8Array {
  return record(delta, message[0] ?? 0, message[1] ?? 0, message[2] ?? 0, 0x00);
}

/** Type-1 tempo record; the tempo is stored low byte first. */
export function tempoEvent(delta: number, microsecondsPerBeat: number, tag = 0x01): Uint8Array {
  return record(
    delta,
    microsecondsPerBeat & 0xff,
    (microsecondsPerBeat >> 8) & 0xff,
    (microsecondsPerBeat >> 16) & 0xff,
    tag,
  );
}

/** Type-0x80 inline sysex: record + data padded to 4. `length` may lie. */
export function sysexEvent(delta: number, data: number[], length = data.length): Uint8Array {
  const head = record(delta, length & 0xff, (length >> 8) & 0xff, (length >> 16) & 0xff, 0x80);
  return concat([head, pad4(Uint8Array.from(data))]);
}

/** Skip record with the high bit set, followed by `skip` filler bytes (padded). */
export function skipEvent(delta: number, skip: number, tag = 0x81, filler = 0xee): Uint8Array {
  const head = record(delta, skip & 0xff, (skip >> 8) & 0xff, (skip >> 16) & 0xff, tag);
  return concat([head, pad4(new Uint8Array(skip).fill(filler))]);
}

/** Build a complete container. */
export function buildMsd(fixture: MsdFixture = {}): Uint8Array {
  const packets = fixture.packets ?? [];
  const header = new Uint8Array(0x14);
  header.set([0x57, 0x4d, 0x53, 0x44], 0); // "WMSD"
  const hv = new DataView(header.buffer);
  hv.setUint32(4, fixture.timebase ?? 480, true);
  hv.setUint32(0x10, fixture.packetCount ?? packets.length, true);

  const parts: Uint8Array[] = [header];
  for (const p of packets) {
    const payload = concat(p.events ?? []);
    const head = new Uint8Array(16);
    const view = new DataView(head.buffer);
    view.setUint32(0, p.id, true);
    view.setUint32(4, p.nodeId, true);
    view.setUint32(12, p.declaredLength ?? payload.length, true);
    parts.push(head, pad4(payload));
  }
  return concat(parts);
}

export function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const p of parts) {
    out.set(p, offset);
    offset += p.length;
  }
  return out;
}

/** ASCII bytes of a string. */
export function ascii(text: string): number[] {
  return Array.from(text, (ch) => ch.charCodeAt(0));
}

function pad4(bytes: Uint8Array): Uint8Array {
  const padded = new Uint8Array(Math.ceil(bytes.length / 4) * 4);
  padded.set(bytes);
  return padded;
}
