// ─── MSD Converter: Barrel ──────────────────────────────────────────────────

export { assembleTrack, convertMsd, convertMsdInto, convertMsdToSmf } from "./convert.js";
export type { ConversionResult } from "./convert.js";
export { MsdConvertError, isMsdError, ERROR_KINDS } from "./errors.js";
export type { MsdErrorKind } from "./errors.js";
export { encodeVlq, decodeVlq, vlqLength, VLQ_MAX_BYTES, VLQ_MAX_VALUE } from "./vlq.js";
export { parseMsdHeader } from "./header.js";
export { scanPacketIndex, readPackets } from "./packets.js";
export { translatePayload, midiMessageLength } from "./events.js";
export type { TranslationContext } from "./events.js";
export { openLoop, closeLoop, loopTarget, LOOP_CONTROLLER } from "./loop.js";
export { TrackAssembler, META_END_OF_TRACK, META_MARKER, META_SET_TEMPO } from "./track.js";
export { writeSmf, writeSmfInto, smfSize, SMF_OVERHEAD } from "./smf.js";
export {
  LOOP_STYLES,
  MSD_MAGIC,
  MSD_HEADER_SIZE,
  PACKET_HEADER_SIZE,
  EVENT_RECORD_SIZE,
  loopStyleFromFlag,
  emptyTally,
} from "./types.js";
export type {
  LoopStyle,
  MsdHeader,
  MsdPacket,
  ConvertOptions,
  ConversionReport,
  EventTally,
  LoopPoint,
} from "./types.js";
