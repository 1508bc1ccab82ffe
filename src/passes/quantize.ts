// ─── Quantizer ───────────────────────────────────────────────────────────────
//
// Chirp → Chirp. Snaps every note's start and end to the nearest multiple
// of a grid, or with a separate duration grid, the start to one and the
// length to the other. Ties round half up. Collapsed notes get one grid
// unit; notes that land on each other are left for the polyphony remover.
// ─────────────────────────────────────────────────────────────────────────────

import { Chirp } from "../chirp/chirp.js";
import { ChirpError } from "../chirp/errors.js";
import type { NoteEvent } from "../chirp/types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface QuantizeConfig {
  /** Grid unit in ticks, e.g. 120 for sixteenths at 480 tpq. */
  grid: number;
  /** Grid for note lengths. Omitted: note ends snap to `grid`. */
  durationGrid?: number;
}

/** What quantization moved, as delta → count histograms. */
export interface QuantizeReport {
  startDeltas: Map<number, number>;
  durationDeltas: Map<number, number>;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Throw InvalidGrid unless the grid is a positive integer dividing a whole
 * note at this resolution.
 */
export function assertValidGrid(grid: number, ticksPerQuarter: number): void {
  if (!Number.isInteger(grid) || grid <= 0) {
    throw new ChirpError("InvalidGrid", `grid must be a positive integer, got ${grid}`);
  }
  const whole = ticksPerQuarter * 4;
  if (whole % grid !== 0) {
    throw new ChirpError(
      "InvalidGrid",
      `grid ${grid} does not divide a whole note (${whole} ticks at ${ticksPerQuarter} per quarter)`,
    );
  }
}

/** Nearest multiple of grid, halves rounding up. Integer-only arithmetic. */
export function snapTick(tick: number, grid: number): number {
  return Math.floor((2 * tick + grid) / (2 * grid)) * grid;
}

/** Quantize one note. Never returns a non-positive duration. */
export function quantizeNote<T extends NoteEvent>(note: T, grid: number, durationGrid?: number): T {
  const start = snapTick(note.startTick, grid);
  if (durationGrid !== undefined) {
    const duration = snapTick(note.durationTicks, durationGrid);
    return { ...note, startTick: start, durationTicks: Math.max(duration, durationGrid) };
  }
  const end = snapTick(note.startTick + note.durationTicks, grid);
  return {
    ...note,
    startTick: start,
    durationTicks: end > start ? end - start : grid,
  };
}

/**
 * Quantize a song to a grid.
 *
 * @returns A new Chirp declaring `grid` (with a duration grid, the greatest
 *   common divisor of both), for which isQuantized() is true.
 * @throws ChirpError InvalidGrid
 */
export function quantize(song: Chirp, config: QuantizeConfig): Chirp {
  return quantizeWithReport(song, config).song;
}

/** Like quantize, also reporting how far starts and durations moved. */
export function quantizeWithReport(
  song: Chirp,
  config: QuantizeConfig,
): { song: Chirp; report: QuantizeReport } {
  const { grid, durationGrid } = config;
  assertValidGrid(grid, song.ticksPerQuarter);
  if (durationGrid !== undefined) assertValidGrid(durationGrid, song.ticksPerQuarter);

  const report: QuantizeReport = { startDeltas: new Map(), durationDeltas: new Map() };
  const init = song.toInit();

  const channels = (init.channels ?? []).map(channel => ({
    ...channel,
    notes: (channel.notes ?? []).map(note => {
      const q = quantizeNote(note, grid, durationGrid);
      bump(report.startDeltas, q.startTick - note.startTick);
      bump(report.durationDeltas, q.durationTicks - note.durationTicks);
      return q;
    }),
  }));

  const declared = durationGrid === undefined ? grid : gcd(grid, durationGrid);
  return { song: new Chirp({ ...init, grid: declared, channels }), report };
}

// ─── Grid estimation ─────────────────────────────────────────────────────────

/** Distance in ticks from a time to its nearest grid line. */
export function quantizationError(tick: number, grid: number): number {
  const below = Math.floor(tick / grid) * grid;
  return Math.min(tick - below, below + grid - tick);
}

/**
 * Estimate the grid the note starts were written on.
 *
 * Tries a quarter note, then its triplet, then each halving of the straight
 * value with its triplet, down to 128th notes. The worst-case error falls as
 * the grid approaches the right value and rises at the first incommensurate
 * one, so the first grid with zero error, or the last one before the error
 * grows, wins. Candidates that do not divide a whole note at this resolution
 * are skipped. Returns 1 (tick resolution) when nothing settles.
 */
export function estimateGrid(song: Chirp): number {
  return estimateGridFor(song.channels.flatMap(c => c.notes.map(n => n.startTick)), song.ticksPerQuarter);
}

/**
 * Estimate a grid for note lengths, the same way estimateGrid treats starts.
 * Performed lengths are ragged, so an estimate finer than the start grid is
 * replaced by half the start grid (the start grid itself if that is odd).
 */
export function estimateDurationGrid(song: Chirp, startGrid: number = estimateGrid(song)): number {
  const durations = song.channels.flatMap(c => c.notes.map(n => n.durationTicks));
  const grid = estimateGridFor(durations, song.ticksPerQuarter);
  if (grid >= startGrid) return grid;
  return startGrid % 2 === 0 ? startGrid / 2 : startGrid;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function estimateGridFor(times: readonly number[], tpq: number): number {
  if (times.length === 0) return tpq;
  const whole = tpq * 4;

  const worstError = (grid: number) =>
    times.reduce((max, t) => Math.max(max, quantizationError(t, grid)), 0);

  let lastError = times.length * tpq;
  let lastGrid = tpq;
  for (let noteValue = 4; noteValue <= 128; noteValue *= 2) {
    const straight = Math.floor(whole / noteValue);
    const candidates = [straight, Math.floor((straight * 2) / 3)];
    for (const grid of candidates) {
      if (grid < 1) return 1;
      if (whole % grid !== 0) continue;
      const e = worstError(grid);
      if (e === 0) return grid;
      if (e > lastError) return lastGrid;
      lastGrid = grid;
      lastError = e;
    }
  }
  return 1;
}

function bump(histogram: Map<number, number>, key: number): void {
  histogram.set(key, (histogram.get(key) ?? 0) + 1);
}

function gcd(a: number, b: number): number {
  while (b !== 0) [a, b] = [b, a % b];
  return a;
}
