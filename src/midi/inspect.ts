// ─── MIDI Inspector ─────────────────────────────────────────────────────────
//
// Reads a standard MIDI file back through midi-file and summarizes what a
// conversion produced: tempo map, loop markers, event mix.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { parseMidi, type MidiData } from "midi-file";
import { LOOP_CONTROLLER } from "../msd/loop.js";
import type { InspectedMarker, InspectedTempo, MidiInspection } from "./types.js";

type MidiEvent = MidiData["tracks"][number][number];

/** Summarize SMF bytes. Throws if midi-file cannot parse them. */
export function inspectMidi(bytes: Uint8Array): MidiInspection {
  const midi = parseMidi(bytes);

  const eventTypes: Record<string, number> = {};
  const tempoChanges: InspectedTempo[] = [];
  const markers: InspectedMarker[] = [];
  const loopControllers: number[] = [];
  let eventCount = 0;
  let totalTicks = 0;
  let endsWithEndOfTrack = midi.tracks.length > 0;

  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      eventCount++;
      eventTypes[event.type] = (eventTypes[event.type] ?? 0) + 1;
      collect(event, tick, tempoChanges, markers, loopControllers);
    }
    totalTicks = Math.max(totalTicks, tick);

    const last = track[track.length - 1];
    if (!last || last.type !== "endOfTrack") endsWithEndOfTrack = false;
  }

  return {
    format: midi.header.format,
    trackCount: midi.tracks.length,
    ticksPerBeat: midi.header.ticksPerBeat ?? null,
    eventCount,
    eventTypes,
    tempoChanges,
    markers,
    loopControllers,
    totalTicks,
    endsWithEndOfTrack,
  };
}

/** Read and summarize a .mid file. */
export async function inspectMidiFile(path: string): Promise<MidiInspection> {
  const bytes = await readFile(path);
  return inspectMidi(new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength));
}

/** Render an inspection as indented text lines. */
export function formatInspection(info: MidiInspection): string {
  const lines: string[] = [];
  lines.push(`Format ${info.format}, ${info.trackCount} track(s), ${info.ticksPerBeat ?? "SMPTE"} ticks/beat`);
  lines.push(`Events: ${info.eventCount} | Length: ${info.totalTicks} ticks`);

  const mix = Object.entries(info.eventTypes)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([type, count]) => `${type}=${count}`)
    .join(", ");
  if (mix) lines.push(`  ${mix}`);

  for (const t of info.tempoChanges) {
    lines.push(`  tempo @${t.tick}: ${t.bpm} BPM (${t.microsecondsPerBeat} µs/beat)`);
  }
  for (const m of info.markers) {
    lines.push(`  marker @${m.tick}: "${m.text}"`);
  }
  for (const tick of info.loopControllers) {
    lines.push(`  CC${LOOP_CONTROLLER} @${tick}`);
  }
  if (!info.endsWithEndOfTrack) {
    lines.push("  warning: a track does not end with end-of-track");
  }

  return lines.join("\n");
}

// ─── Internal ────────────────────────────────────────────────────────────────

function collect(
  event: MidiEvent,
  tick: number,
  tempoChanges: InspectedTempo[],
  markers: InspectedMarker[],
  loopControllers: number[],
): void {
  switch (event.type) {
    case "setTempo":
      tempoChanges.push({
        tick,
        microsecondsPerBeat: event.microsecondsPerBeat,
        bpm: Math.round((60_000_000 / event.microsecondsPerBeat) * 100) / 100,
      });
      break;
    case "marker":
      markers.push({ tick, text: event.text });
      break;
    case "controller":
      if (event.controllerType === LOOP_CONTROLLER) loopControllers.push(tick);
      break;
  }
}
