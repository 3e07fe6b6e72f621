// ─── MIDI Inspection Types ──────────────────────────────────────────────────
//
// Summary of a standard MIDI file as read back by the midi-file parser.
// Positions are absolute ticks from the start of the track.
// ─────────────────────────────────────────────────────────────────────────────

/** A tempo change found in the file. */
export interface InspectedTempo {
  tick: number;
  /** Microseconds per quarter note (raw MIDI tempo value). */
  microsecondsPerBeat: number;
  /** Tempo in BPM, rounded to two decimals. */
  bpm: number;
}

/** A marker meta event (FF 06). */
export interface InspectedMarker {
  tick: number;
  text: string;
}

/** Result of inspecting a standard MIDI file. */
export interface MidiInspection {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  trackCount: number;
  /** Ticks per quarter note, or null for SMPTE timing. */
  ticksPerBeat: number | null;
  /** Total events across all tracks, end-of-track included. */
  eventCount: number;
  /** Event count keyed by midi-file event type ("noteOn", "sysEx", ...). */
  eventTypes: Record<string, number>;
  tempoChanges: InspectedTempo[];
  markers: InspectedMarker[];
  /** Ticks of CC 111 events (controller-style loop starts). */
  loopControllers: number[];
  /** Length of the longest track in ticks. */
  totalTicks: number;
  /** Every track's last event is end-of-track. */
  endsWithEndOfTrack: boolean;
}
