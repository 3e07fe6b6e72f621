// ─── Loop Markers ───────────────────────────────────────────────────────────
//
// The loop opens at the first packet whose id equals the node id of the
// last packet in the stream (the packet the sequence jumps back to).
//
//   meta style        FF 06 "loopStart" ... FF 06 "loopEnd"
//   controller style  B0 6F 00 (CC 111 on channel 0); no end marker
// ─────────────────────────────────────────────────────────────────────────────

import { META_MARKER } from "./track.js";
import type { TranslationContext } from "./events.js";

const LOOP_START_TEXT = "loopStart";
const LOOP_END_TEXT = "loopEnd";
export const LOOP_CONTROLLER = 111;

/** Node id the loop jumps back to, or null when the scan found no packets. */
export function loopTarget(nodeIds: readonly number[]): number | null {
  return nodeIds.length > 0 ? nodeIds[nodeIds.length - 1] : null;
}

/**
 * Write the loop-start marker if `packetId` opens the loop.
 * Fires at most once per conversion. Returns true when it fired.
 */
export function openLoop(ctx: TranslationContext, packetId: number, target: number | null): boolean {
  if (ctx.loopStarted || target === null || packetId !== target) return false;

  if (ctx.loopStyle === "meta") {
    ctx.track.writeMeta(META_MARKER, latin1(LOOP_START_TEXT));
  } else {
    ctx.track.writeShort(Uint8Array.of(0xb0, LOOP_CONTROLLER, 0x00));
  }
  ctx.loopStarted = true;
  return true;
}

/** Write the loop-end marker. Controller style has none. */
export function closeLoop(ctx: TranslationContext): void {
  if (ctx.loopStarted && ctx.loopStyle === "meta") {
    ctx.track.writeMeta(META_MARKER, latin1(LOOP_END_TEXT));
  }
}

function latin1(text: string): Uint8Array {
  return Uint8Array.from(text, (ch) => ch.charCodeAt(0));
}
