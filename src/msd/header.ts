// ─── MSD Header Parser ──────────────────────────────────────────────────────

import { MsdConvertError } from "./errors.js";
import { readU32LE } from "./bytes.js";
import { MSD_HEADER_SIZE, MSD_MAGIC, type MsdHeader } from "./types.js";

/**
 * Validate the container header and read timebase + packet count.
 * This is the only check applied to the container as a whole.
 *
 * @throws MsdConvertError InvalidFormat when the input is shorter than the
 *         header or does not start with "WMSD".
 */
export function parseMsdHeader(input: Uint8Array): MsdHeader {
  if (input.length < MSD_HEADER_SIZE) {
    throw new MsdConvertError(
      "InvalidFormat",
      `Input too small for an MSD header: ${input.length} bytes (need ${MSD_HEADER_SIZE})`,
    );
  }

  for (let i = 0; i < MSD_MAGIC.length; i++) {
    if (input[i] !== MSD_MAGIC.charCodeAt(i)) {
      throw new MsdConvertError("InvalidFormat", `Bad magic: expected "${MSD_MAGIC}"`);
    }
  }

  return {
    timebase: readU32LE(input, 4),
    packetCount: readU32LE(input, 0x10),
    bodyOffset: MSD_HEADER_SIZE,
  };
}
