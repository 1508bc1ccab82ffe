// ─── Chirp → MIDI Exporter ───────────────────────────────────────────────────
//
// Writes a format-1 MIDI file: a conductor track with the title, copyright,
// time and key signatures and tempo map, then one track per Chirp channel.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiEvent } from "midi-file";
import type { Chirp } from "../chirp/chirp.js";
import { ChirpError } from "../chirp/errors.js";
import { noteEnd, type ChirpSink, type KeySignatureEvent, type TimeSignatureEvent } from "../chirp/types.js";

/** Velocity written for notes that carry none. */
export const DEFAULT_VELOCITY = 64;

export interface MidiExportOptions {
  /** Written to the conductor track. Omitted when empty. */
  timeSignatures?: readonly TimeSignatureEvent[];
  /** Written to the conductor track. Omitted when empty. */
  keySignatures?: readonly KeySignatureEvent[];
}

interface TimedEvent {
  tick: number;
  event: MidiEvent;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Encode a Chirp as a standard MIDI file.
 *
 * @throws ChirpError MalformedRepresentation if a channel id is not a MIDI
 *   channel (0-15) or a pitch or velocity is outside 0-127.
 */
export function chirpToMidi(song: Chirp, options: MidiExportOptions = {}): Uint8Array {
  const tracks: MidiEvent[][] = [conductorTrack(song, options)];

  for (const channel of song.channels) {
    if (!Number.isInteger(channel.id) || channel.id > 15) {
      throw new ChirpError("MalformedRepresentation", `channel ${channel.id} is not a MIDI channel (0-15)`);
    }
    const timed: TimedEvent[] = [];
    if (channel.name) {
      timed.push({ tick: 0, event: { deltaTime: 0, meta: true, type: "trackName", text: channel.name } });
    }
    if (channel.instrument !== undefined) {
      timed.push({
        tick: 0,
        event: { deltaTime: 0, type: "programChange", channel: channel.id, programNumber: channel.instrument },
      });
    }

    const notes: TimedEvent[] = [];
    for (const note of channel.notes) {
      const velocity = note.velocity ?? DEFAULT_VELOCITY;
      if (note.pitch < 0 || note.pitch > 127 || velocity < 1 || velocity > 127) {
        throw new ChirpError(
          "MalformedRepresentation",
          `channel ${channel.id}: pitch ${note.pitch} / velocity ${velocity} at tick ${note.startTick} cannot be written to MIDI`,
        );
      }
      notes.push({
        tick: note.startTick,
        event: { deltaTime: 0, type: "noteOn", channel: channel.id, noteNumber: note.pitch, velocity },
      });
      notes.push({
        tick: noteEnd(note),
        event: { deltaTime: 0, type: "noteOff", channel: channel.id, noteNumber: note.pitch, velocity: 0 },
      });
    }
    // Note-offs first on a shared tick so a repeated pitch is not cut short.
    notes.sort((a, b) => a.tick - b.tick || offFirst(a.event) - offFirst(b.event));

    tracks.push(toDeltaTimes([...timed, ...notes]));
  }

  return new Uint8Array(
    writeMidi({
      header: { format: 1, numTracks: tracks.length, ticksPerBeat: song.ticksPerQuarter },
      tracks,
    }),
  );
}

/** A ChirpSink producing MIDI bytes. */
export function midiSink(options: MidiExportOptions = {}): ChirpSink<Uint8Array> {
  return { fromChirp: song => chirpToMidi(song, options) };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function conductorTrack(song: Chirp, options: MidiExportOptions): MidiEvent[] {
  const timed: TimedEvent[] = [];
  if (song.metadata.title) {
    timed.push({ tick: 0, event: { deltaTime: 0, meta: true, type: "trackName", text: song.metadata.title } });
  }
  if (song.metadata.copyright) {
    timed.push({
      tick: 0,
      event: { deltaTime: 0, meta: true, type: "copyrightNotice", text: song.metadata.copyright },
    });
  }
  for (const ts of options.timeSignatures ?? []) {
    timed.push({
      tick: ts.tick,
      event: {
        deltaTime: 0,
        meta: true,
        type: "timeSignature",
        numerator: ts.numerator,
        denominator: ts.denominator,
        metronome: 24,
        thirtyseconds: 8,
      },
    });
  }
  for (const key of options.keySignatures ?? []) {
    timed.push({
      tick: key.tick,
      event: { deltaTime: 0, meta: true, type: "keySignature", key: key.fifths, scale: key.mode === "minor" ? 1 : 0 },
    });
  }
  for (const tempo of song.tempos) {
    timed.push({
      tick: tempo.tick,
      event: { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: tempo.microsecondsPerQuarter },
    });
  }
  timed.sort((a, b) => a.tick - b.tick);
  return toDeltaTimes(timed);
}

/** Stamp delta times on tick-ordered events and close the track. */
function toDeltaTimes(timed: readonly TimedEvent[]): MidiEvent[] {
  const track: MidiEvent[] = [];
  let last = 0;
  for (const { tick, event } of timed) {
    track.push({ ...event, deltaTime: tick - last });
    last = tick;
  }
  track.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
  return track;
}

function offFirst(event: MidiEvent): number {
  return event.type === "noteOff" ? 0 : 1;
}
