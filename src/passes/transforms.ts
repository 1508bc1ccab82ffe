// ─── Stock Transformations ───────────────────────────────────────────────────
//
// Ready-made transformations for the transform engine. Each returns a fresh
// song and leaves its input alone.
// ─────────────────────────────────────────────────────────────────────────────

import { Chirp, type ChannelInit } from "../chirp/chirp.js";
import { MChirp } from "../chirp/mchirp.js";
import { lastPerTick, type NoteEvent, type TempoEvent } from "../chirp/types.js";
import type { Transform } from "./transform-engine.js";

/** MIDI notes at or below this are often used for signalling, not music. */
export const DEFAULT_CONTROL_NOTE_MAX = 8;

// ─── Chirp ───────────────────────────────────────────────────────────────────

/** Shift every pitch by a number of semitones. */
export function transpose(semitones: number): Transform<Chirp> {
  return song => mapNotes(song, n => ({ ...n, pitch: n.pitch + semitones }));
}

/**
 * Metric modulation: scale every tick position by num/denom and speed the
 * tempo up by the same factor so the music sounds the same. Tempo changes
 * that land on one tick collapse to the last of them.
 *
 * @throws ChirpError DegenerateEvent if a note's duration scales to zero.
 */
export function modulate(num: number, denom: number): Transform<Chirp> {
  if (!Number.isInteger(num) || !Number.isInteger(denom) || num <= 0 || denom <= 0) {
    throw new RangeError(`modulation must be a ratio of positive integers, got ${num}/${denom}`);
  }
  const scale = (tick: number) => Math.floor((tick * num) / denom);

  return song => {
    const init = song.toInit();
    const tempos = lastPerTick(
      (init.tempos ?? []).map(t => ({
        tick: scale(t.tick),
        microsecondsPerQuarter: Math.round((t.microsecondsPerQuarter * denom) / num),
      })),
    );
    const scaledGrid = ((init.grid ?? song.ticksPerQuarter) * num) / denom;
    return new Chirp({
      ...init,
      tempos,
      grid: Number.isInteger(scaledGrid) && scaledGrid > 0 ? scaledGrid : 1,
      channels: mapChannels(init.channels, n => ({
        ...n,
        startTick: scale(n.startTick),
        durationTicks: scale(n.durationTicks),
      })),
    });
  };
}

/** Drop notes with pitch at or below `max`. */
export function removeControlNotes(max: number = DEFAULT_CONTROL_NOTE_MAX): Transform<Chirp> {
  return song => {
    const init = song.toInit();
    return new Chirp({
      ...init,
      channels: (init.channels ?? []).map(c => ({
        ...c,
        notes: (c.notes ?? []).filter(n => n.pitch > max),
      })),
    });
  };
}

/**
 * Move every note by `delta` ticks. Tempo changes move with the notes; the
 * tempo in effect at the new tick 0 becomes the first tempo.
 *
 * @throws ChirpError MalformedRepresentation if a note would start before 0.
 */
export function shiftTicks(delta: number): Transform<Chirp> {
  return song => {
    const init = song.toInit();
    return new Chirp({
      ...init,
      tempos: shiftTempos(init.tempos ?? [], delta),
      channels: mapChannels(init.channels, n => ({ ...n, startTick: n.startTick + delta })),
    });
  };
}

/** Set the General MIDI program of channels by id. */
export function remapInstruments(programs: Readonly<Record<number, number>>): Transform<Chirp> {
  return song => {
    const init = song.toInit();
    return new Chirp({
      ...init,
      channels: (init.channels ?? []).map(c => ({
        ...c,
        instrument: programs[c.id] ?? c.instrument,
      })),
    });
  };
}

/** Run transformations left to right. */
export function composeTransforms<T>(...transforms: Transform<T>[]): Transform<T> {
  return input => transforms.reduce((song, t) => t(song), input);
}

// ─── MChirp ──────────────────────────────────────────────────────────────────

/**
 * Shift every pitch in an MChirp, ties and rests kept as they are. Key
 * signatures move with the notes, spelled with at most six sharps or five
 * flats.
 */
export function transposeMChirp(semitones: number): Transform<MChirp> {
  return song => {
    const init = song.toInit();
    return new MChirp({
      ...init,
      keySignatures: (init.keySignatures ?? []).map(k => ({ ...k, fifths: transposeFifths(k.fifths, semitones) })),
      channels: init.channels.map(c => ({
        ...c,
        measures: c.measures.map(events =>
          events.map(e => (e.kind === "note" ? { ...e, pitch: e.pitch + semitones } : e)),
        ),
      })),
    });
  };
}

// ─── Internal ────────────────────────────────────────────────────────────────

function mapNotes(song: Chirp, fn: (note: NoteEvent) => NoteEvent): Chirp {
  const init = song.toInit();
  return new Chirp({ ...init, channels: mapChannels(init.channels, fn) });
}

function mapChannels(
  channels: readonly ChannelInit[] | undefined,
  fn: (note: NoteEvent) => NoteEvent,
): ChannelInit[] {
  return (channels ?? []).map(c => ({ ...c, notes: (c.notes ?? []).map(fn) }));
}

function transposeFifths(fifths: number, semitones: number): number {
  const n = (((fifths + 7 * semitones) % 12) + 12) % 12;
  return n > 6 ? n - 12 : n;
}

function shiftTempos(tempos: readonly TempoEvent[], delta: number): TempoEvent[] {
  if (tempos.length === 0) return [];
  const moved = tempos.map((t, i) => ({ ...t, tick: i === 0 ? 0 : t.tick + delta }));
  const atOrBeforeZero = moved.filter(t => t.tick <= 0);
  const first = atOrBeforeZero[atOrBeforeZero.length - 1];
  return [{ ...first, tick: 0 }, ...moved.filter(t => t.tick > 0)];
}
