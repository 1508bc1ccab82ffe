// ─── MIDI → Chirp Importer ───────────────────────────────────────────────────
//
// Parses a standard MIDI file into a Chirp. One Chirp channel per MIDI
// channel; track names and the first program change on each channel name
// it. Time and key signatures have no place in a Chirp, so they are returned
// beside it for the measurizer.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData } from "midi-file";
import { Chirp, type ChannelInit } from "../chirp/chirp.js";
import { ChirpError } from "../chirp/errors.js";
import { DEFAULT_MICROSECONDS_PER_QUARTER } from "../chirp/timeline.js";
import {
  lastPerTick,
  type ChirpSource,
  type KeySignatureEvent,
  type NoteEvent,
  type TempoEvent,
  type TimeSignatureEvent,
} from "../chirp/types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MidiImport {
  chirp: Chirp;
  /** Ordered, first entry at tick 0 (4/4 when the file declares none). */
  timeSignatures: TimeSignatureEvent[];
  /** Ordered; empty when the file declares none. */
  keySignatures: KeySignatureEvent[];
}

interface PendingNote {
  startTick: number;
  velocity: number;
}

interface ChannelBuilder {
  name?: string;
  instrument?: number;
  notes: NoteEvent[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Convert a MIDI buffer into a Chirp plus its time- and key-signature maps.
 *
 * Notes still sounding at the end of their track and zero-length notes are
 * dropped. A note-on for a pitch that is already sounding ends the earlier
 * note first.
 *
 * @throws ChirpError MalformedRepresentation for SMPTE-timed files.
 */
export function midiToChirp(midiBuffer: Uint8Array): MidiImport {
  const midi = parseMidi(midiBuffer);
  const tpq = midi.header.ticksPerBeat;
  if (tpq === undefined) {
    throw new ChirpError("MalformedRepresentation", "SMPTE-timed MIDI files are not supported");
  }

  const channels = resolveChannels(midi);
  const chirp = new Chirp({
    ticksPerQuarter: tpq,
    tempos: extractTempoEvents(midi),
    metadata: extractMetadata(midi),
    channels: [...channels.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([id, c]): ChannelInit => ({ id, name: c.name, instrument: c.instrument, notes: c.notes })),
  });

  return {
    chirp,
    timeSignatures: extractTimeSigEvents(midi),
    keySignatures: extractKeySigEvents(midi),
  };
}

/** A ChirpSource over a MIDI buffer. */
export function midiSource(midiBuffer: Uint8Array): ChirpSource {
  return { toChirp: () => midiToChirp(midiBuffer).chirp };
}

// ─── Internal: Extract Events ────────────────────────────────────────────────

function extractTempoEvents(midi: MidiData): TempoEvent[] {
  const events: TempoEvent[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "setTempo") {
        events.push({ tick, microsecondsPerQuarter: event.microsecondsPerBeat });
      }
    }
  }
  return startAtZero(
    lastPerTick(events),
    { tick: 0, microsecondsPerQuarter: DEFAULT_MICROSECONDS_PER_QUARTER },
  );
}

function extractTimeSigEvents(midi: MidiData): TimeSignatureEvent[] {
  const events: TimeSignatureEvent[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "timeSignature") {
        events.push({ tick, numerator: event.numerator, denominator: event.denominator });
      }
    }
  }
  return startAtZero(lastPerTick(events), { tick: 0, numerator: 4, denominator: 4 });
}

function extractKeySigEvents(midi: MidiData): KeySignatureEvent[] {
  const events: KeySignatureEvent[] = [];
  for (const track of midi.tracks) {
    let tick = 0;
    for (const event of track) {
      tick += event.deltaTime;
      if (event.type === "keySignature") {
        events.push({ tick, fifths: event.key, mode: event.scale === 1 ? "minor" : "major" });
      }
    }
  }
  return lastPerTick(events);
}

function extractMetadata(midi: MidiData): { title?: string; copyright?: string } {
  const metadata: { title?: string; copyright?: string } = {};
  // Format 1 keeps song-wide meta events in the first track.
  for (const event of midi.tracks[0] ?? []) {
    if (event.type === "trackName" && metadata.title === undefined && midi.header.format === 1) {
      metadata.title = event.text;
    } else if (event.type === "copyrightNotice" && metadata.copyright === undefined) {
      metadata.copyright = event.text;
    }
  }
  return metadata;
}

// ─── Internal: Resolve Notes ─────────────────────────────────────────────────

/** Collect notes by MIDI channel with absolute tick positions. */
function resolveChannels(midi: MidiData): Map<number, ChannelBuilder> {
  const channels = new Map<number, ChannelBuilder>();
  const channelFor = (id: number): ChannelBuilder => {
    let c = channels.get(id);
    if (!c) {
      c = { notes: [] };
      channels.set(id, c);
    }
    return c;
  };

  for (const track of midi.tracks) {
    let tick = 0;
    let trackName: string | undefined;
    const pending = new Map<string, PendingNote>();

    const close = (channel: number, noteNumber: number) => {
      const key = `${channel}:${noteNumber}`;
      const start = pending.get(key);
      if (!start) return;
      pending.delete(key);
      if (tick > start.startTick) {
        channelFor(channel).notes.push({
          pitch: noteNumber,
          startTick: start.startTick,
          durationTicks: tick - start.startTick,
          velocity: start.velocity,
        });
      }
    };

    for (const event of track) {
      tick += event.deltaTime;

      if (event.type === "trackName") {
        trackName = event.text;
      } else if (event.type === "programChange") {
        const c = channelFor(event.channel);
        c.instrument ??= event.programNumber;
        c.name ??= trackName;
      } else if (event.type === "noteOn" && event.velocity > 0) {
        close(event.channel, event.noteNumber);
        const c = channelFor(event.channel);
        c.name ??= trackName;
        pending.set(`${event.channel}:${event.noteNumber}`, { startTick: tick, velocity: event.velocity });
      } else if (event.type === "noteOff" || (event.type === "noteOn" && event.velocity === 0)) {
        close(event.channel, event.noteNumber);
      }
    }
  }

  return channels;
}

// ─── Internal: Maps ──────────────────────────────────────────────────────────

function startAtZero<T extends { tick: number }>(events: T[], fallback: T): T[] {
  if (events.length > 0 && events[0].tick === 0) return events;
  return [fallback, ...events];
}
