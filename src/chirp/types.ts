// ─── Chirp Types ─────────────────────────────────────────────────────────────
//
// Shared value types for both song representations.
// All timing is in integer ticks; the tempo map turns ticks into seconds.
// ─────────────────────────────────────────────────────────────────────────────

import type { Chirp } from "./chirp.js";
import type { MChirp } from "./mchirp.js";

// ─── Timing ──────────────────────────────────────────────────────────────────

/** A tempo change with absolute tick position. */
export interface TempoEvent {
  tick: number;
  /** Microseconds per quarter note (raw MIDI tempo value). */
  microsecondsPerQuarter: number;
}

/** A time signature, e.g. 6/8 → { numerator: 6, denominator: 8 }. */
export interface TimeSignature {
  numerator: number;
  /** Beat unit. Must be a power of two. */
  denominator: number;
}

/** A time signature change with absolute tick position. */
export interface TimeSignatureEvent extends TimeSignature {
  tick: number;
}

/** A key signature as a position on the circle of fifths. */
export interface KeySignature {
  /** Sharps (positive) or flats (negative), -7 to 7. */
  fifths: number;
  mode: "major" | "minor";
}

/** A key signature change with absolute tick position. */
export interface KeySignatureEvent extends KeySignature {
  tick: number;
}

// ─── Notes ───────────────────────────────────────────────────────────────────

/** A sounding note. The channel is implied by the channel holding it. */
export interface NoteEvent {
  /** Semitone number, MIDI numbering (60 = C4). */
  pitch: number;
  /** Start time in ticks from the beginning of the song. */
  startTick: number;
  /** Duration in ticks. Always positive. */
  durationTicks: number;
  /** Velocity 0-127. */
  velocity?: number;
}

// ─── Metadata ────────────────────────────────────────────────────────────────

export interface SongMetadata {
  title: string;
  composer: string;
  copyright: string;
  /** Free-form key/value pairs carried by importers. */
  extra: Record<string, string>;
}

/** Per-channel descriptive data. */
export interface ChannelInfo {
  /** Channel id, stable for the life of the song. */
  id: number;
  name: string;
  /** General MIDI program number, if known. */
  instrument?: number;
}

// ─── Adapter Capabilities ────────────────────────────────────────────────────
//
// Importers and exporters implement whichever of these they can; the core
// never depends on a concrete adapter.

/** Something that can produce a Chirp (e.g. a MIDI or tracker importer). */
export interface ChirpSource {
  toChirp(): Chirp;
}

/** Something that can produce an MChirp (e.g. a score importer). */
export interface MChirpSource {
  toMChirp(): MChirp;
}

/** Something that can consume a Chirp into its own format. */
export interface ChirpSink<TOut> {
  fromChirp(song: Chirp): TOut;
}

/** Something that can consume an MChirp into its own format. */
export interface MChirpSink<TOut> {
  fromMChirp(song: MChirp): TOut;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function emptyMetadata(): SongMetadata {
  return { title: "", composer: "", copyright: "", extra: {} };
}

export function cloneMetadata(metadata: SongMetadata): SongMetadata {
  return { ...metadata, extra: { ...metadata.extra } };
}

/** End tick (exclusive) of a note. */
export function noteEnd(note: NoteEvent): number {
  return note.startTick + note.durationTicks;
}

/** True iff the two tick intervals intersect. */
export function notesOverlap(a: NoteEvent, b: NoteEvent): boolean {
  return a.startTick < noteEnd(b) && b.startTick < noteEnd(a);
}

/** Canonical note order: by start tick, then higher pitch first. */
export function compareNotes(a: NoteEvent, b: NoteEvent): number {
  return a.startTick - b.startTick || b.pitch - a.pitch;
}

/** Sort tick-stamped events; of several on one tick the last one stands. */
export function lastPerTick<T extends { tick: number }>(events: readonly T[]): T[] {
  const byTick = new Map<number, T>();
  for (const e of events) byTick.set(e.tick, e);
  return [...byTick.values()].sort((a, b) => a.tick - b.tick);
}
