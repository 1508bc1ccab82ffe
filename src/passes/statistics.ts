// ─── Song Statistics ─────────────────────────────────────────────────────────
//
// Descriptive statistics over either representation, plus the stable text
// rendering used by the transform engine and the CLI.
// ─────────────────────────────────────────────────────────────────────────────

import type { Chirp } from "../chirp/chirp.js";
import { joinTiedNotes, type MChirp } from "../chirp/mchirp.js";
import { pitchToNoteName } from "../chirp/names.js";
import { noteEnd, type NoteEvent } from "../chirp/types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ChannelStatistics {
  id: number;
  name: string;
  noteCount: number;
  /** Notes per quarter note over the song's tick span. */
  density: number;
}

export interface SongStatistics {
  noteCount: number;
  /** null when the song has no notes. */
  pitchMin: number | null;
  pitchMax: number | null;
  /** pitch → count */
  pitchHistogram: Map<number, number>;
  /** duration in ticks → count */
  durationHistogram: Map<number, number>;
  tickStart: number;
  tickEnd: number;
  tickSpan: number;
  channels: ChannelStatistics[];
  /** MChirp only. */
  measureCount?: number;
}

interface ChannelNotes {
  id: number;
  name: string;
  notes: readonly NoteEvent[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

export function chirpStatistics(song: Chirp): SongStatistics {
  return computeStatistics(
    song.ticksPerQuarter,
    song.channels.map(c => ({ id: c.id, name: c.name, notes: c.notes })),
  );
}

/** Tied chains count as one note with their summed duration. */
export function mchirpStatistics(song: MChirp): SongStatistics {
  const stats = computeStatistics(
    song.ticksPerQuarter,
    song.channels.map(c => ({ id: c.id, name: c.name, notes: joinTiedNotes(c) })),
  );
  stats.measureCount = song.measures.length;
  return stats;
}

/**
 * Render statistics as a labeled text block, one field per line.
 */
export function formatStatistics(stats: SongStatistics): string {
  const lines: string[] = [`Notes: ${stats.noteCount}`];

  if (stats.pitchMin === null || stats.pitchMax === null) {
    lines.push("Pitch range: none");
  } else {
    lines.push(
      `Pitch range: ${stats.pitchMin}-${stats.pitchMax} (${nameOf(stats.pitchMin)}-${nameOf(stats.pitchMax)})`,
    );
  }

  lines.push(`Tick span: ${stats.tickStart}-${stats.tickEnd} (${stats.tickSpan} ticks)`);
  if (stats.measureCount !== undefined) lines.push(`Measures: ${stats.measureCount}`);
  lines.push(`Pitch histogram: ${formatHistogram(stats.pitchHistogram)}`);
  lines.push(`Duration histogram: ${formatHistogram(stats.durationHistogram)}`);

  for (const c of stats.channels) {
    lines.push(`Channel ${c.id} "${c.name}": ${c.noteCount} notes, ${c.density.toFixed(2)} notes/quarter`);
  }

  return lines.join("\n");
}

// ─── Internal ────────────────────────────────────────────────────────────────

function computeStatistics(ticksPerQuarter: number, channels: readonly ChannelNotes[]): SongStatistics {
  const pitchHistogram = new Map<number, number>();
  const durationHistogram = new Map<number, number>();
  let pitchMin: number | null = null;
  let pitchMax: number | null = null;
  let tickStart = Infinity;
  let tickEnd = 0;
  let noteCount = 0;

  for (const c of channels) {
    for (const n of c.notes) {
      noteCount++;
      pitchHistogram.set(n.pitch, (pitchHistogram.get(n.pitch) ?? 0) + 1);
      durationHistogram.set(n.durationTicks, (durationHistogram.get(n.durationTicks) ?? 0) + 1);
      pitchMin = pitchMin === null ? n.pitch : Math.min(pitchMin, n.pitch);
      pitchMax = pitchMax === null ? n.pitch : Math.max(pitchMax, n.pitch);
      tickStart = Math.min(tickStart, n.startTick);
      tickEnd = Math.max(tickEnd, noteEnd(n));
    }
  }

  if (noteCount === 0) tickStart = 0;
  const tickSpan = tickEnd - tickStart;
  const quarters = tickSpan / ticksPerQuarter;

  return {
    noteCount,
    pitchMin,
    pitchMax,
    pitchHistogram: sortedMap(pitchHistogram),
    durationHistogram: sortedMap(durationHistogram),
    tickStart,
    tickEnd,
    tickSpan,
    channels: channels.map(c => ({
      id: c.id,
      name: c.name,
      noteCount: c.notes.length,
      density: quarters > 0 ? c.notes.length / quarters : 0,
    })),
  };
}

function sortedMap(map: Map<number, number>): Map<number, number> {
  return new Map([...map.entries()].sort((a, b) => a[0] - b[0]));
}

function formatHistogram(histogram: Map<number, number>): string {
  if (histogram.size === 0) return "none";
  return [...histogram.entries()].map(([key, count]) => `${key}:${count}`).join(", ");
}

function nameOf(pitch: number): string {
  return pitch >= 0 && pitch <= 127 ? pitchToNoteName(pitch) : "?";
}
