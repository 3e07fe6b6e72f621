// ─── MSD Container Types ────────────────────────────────────────────────────
//
// Layouts of the WMSD container (all integers little-endian):
//
//   header  (0x14 bytes)  "WMSD" | timebase u32 | 8 reserved | packet count u32
//   packet  (16 + n)      id u32 | node id u32 | reserved u32 | n u32 | payload
//   event   (12 bytes)    delta u32 | reserved u32 | param u32
//
// Packet payloads are padded to a multiple of 4. The top byte of an event's
// param doubles as its type tag (masked with 0xBF).
// ─────────────────────────────────────────────────────────────────────────────

export const MSD_MAGIC = "WMSD";
export const MSD_HEADER_SIZE = 0x14;
export const PACKET_HEADER_SIZE = 16;
export const EVENT_RECORD_SIZE = 12;

/** How the loop boundary is written into the MIDI track. */
export const LOOP_STYLES = ["meta", "controller"] as const;
export type LoopStyle = (typeof LOOP_STYLES)[number];

/** Validated container header. */
export interface MsdHeader {
  /** Ticks per quarter note. Written to the SMF truncated to 16 bits. */
  timebase: number;
  /** Number of packets the header declares. The stream may hold fewer. */
  packetCount: number;
  /** Offset of the first packet. */
  bodyOffset: number;
}

/** One packet located in the stream. */
export interface MsdPacket {
  packetId: number;
  nodeId: number;
  /** View over the payload bytes (unpadded). */
  payload: Uint8Array;
}

/** Options accepted by the converter. */
export interface ConvertOptions {
  /** Loop marker style. Default "meta". */
  loopStyle?: LoopStyle;
}

/** Counts of what the event translator did with a packet's records. */
export interface EventTally {
  short: number;
  tempo: number;
  sysex: number;
  /** Skip/control records stepped over. */
  skipped: number;
  /** Short messages whose status has no known length. */
  dropped: number;
  /** Payloads abandoned at an inline sysex longer than what remains. */
  sysexTruncated: number;
}

/** Where the loop boundary was placed. */
export interface LoopPoint {
  /** Zero-based index of the packet that opened the loop. */
  packetIndex: number;
  packetId: number;
  style: LoopStyle;
}

/** What a conversion did. Truncation shows up here rather than as an error. */
export interface ConversionReport {
  timebase: number;
  /** Division written to MThd (timebase & 0xFFFF). */
  division: number;
  packetsDeclared: number;
  packetsIndexed: number;
  packetsRead: number;
  /** The packet stream ended before the declared count. */
  truncated: boolean;
  events: EventTally;
  loop: LoopPoint | null;
  trackLength: number;
  totalLength: number;
}

/** Map the numeric loop flag (0 = meta markers, 1 = CC 111) to a style. */
export function loopStyleFromFlag(flag: number): LoopStyle {
  if (flag === 0) return "meta";
  if (flag === 1) return "controller";
  throw new RangeError(`Unknown loop flag: ${flag} (expected 0 or 1)`);
}

export function emptyTally(): EventTally {
  return { short: 0, tempo: 0, sysex: 0, skipped: 0, dropped: 0, sysexTruncated: 0 };
}
