// ─── Packet Stream ──────────────────────────────────────────────────────────
//
// Packets follow the header back to back, each a 16-byte record plus a
// payload padded to 4 bytes. Both walks below stop quietly at the first
// packet that does not fit in the buffer.
// ─────────────────────────────────────────────────────────────────────────────

import { align4, readU32LE } from "./bytes.js";
import { PACKET_HEADER_SIZE, type MsdHeader, type MsdPacket } from "./types.js";

/**
 * Pre-pass: collect the node id of every packet, in stream order.
 *
 * The main pass needs the last node id before it starts, to recognise the
 * packet that opens the loop. A packet whose payload overruns the buffer
 * still contributes its node id; the scan ends right after it.
 */
export function scanPacketIndex(input: Uint8Array, header: MsdHeader): number[] {
  const nodeIds: number[] = [];
  let offset = header.bodyOffset;

  for (let i = 0; i < header.packetCount && offset + PACKET_HEADER_SIZE <= input.length; i++) {
    nodeIds.push(readU32LE(input, offset + 4));
    const length = readU32LE(input, offset + 12);
    offset += PACKET_HEADER_SIZE;
    if (offset + length > input.length) break;
    offset += align4(length);
  }

  return nodeIds;
}

/** Main pass: yield each complete packet, in stream order. */
export function* readPackets(input: Uint8Array, header: MsdHeader): Generator<MsdPacket> {
  let offset = header.bodyOffset;

  for (let i = 0; i < header.packetCount && offset + PACKET_HEADER_SIZE <= input.length; i++) {
    const packetId = readU32LE(input, offset);
    const nodeId = readU32LE(input, offset + 4);
    const length = readU32LE(input, offset + 12);
    offset += PACKET_HEADER_SIZE;
    if (offset + length > input.length) return;

    yield { packetId, nodeId, payload: input.subarray(offset, offset + length) };
    offset += align4(length);
  }
}
