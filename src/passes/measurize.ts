// ─── Measurizer ──────────────────────────────────────────────────────────────
//
// Chirp → MChirp. Lays a bar structure over a quantized, monophonic song:
// builds measures from a time-signature map, buckets each note into the
// measure holding its start, splits notes that cross a bar line into tied
// segments and fills the gaps with rests.
// ─────────────────────────────────────────────────────────────────────────────

import type { Chirp, ChirpChannel } from "../chirp/chirp.js";
import { ChirpError } from "../chirp/errors.js";
import {
  MChirp,
  measureEnd,
  ticksPerMeasure,
  type MChirpChannel,
  type Measure,
  type MeasureEvent,
  type MeasureNote,
} from "../chirp/mchirp.js";
import { noteEnd, type KeySignatureEvent, type TimeSignature, type TimeSignatureEvent } from "../chirp/types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface MeasurizeConfig {
  /** Ordered by tick; the first entry must be at tick 0. */
  timeSignatures: readonly TimeSignatureEvent[];
  /** Carried onto the MChirp as they are. */
  keySignatures?: readonly KeySignatureEvent[];
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Impose measures on a song.
 *
 * @throws ChirpError NotQuantized, PolyphonicInput (checked first, in that
 *   order), then MalformedTimeSignatureMap.
 */
export function measurize(song: Chirp, config: MeasurizeConfig): MChirp {
  if (!song.isQuantized()) {
    throw new ChirpError(
      "NotQuantized",
      `song is not quantized to its ${song.grid}-tick grid; run the quantizer first`,
    );
  }
  const polyphonic = song.channels.find(c => c.isPolyphonic());
  if (polyphonic) {
    throw new ChirpError(
      "PolyphonicInput",
      `channel ${polyphonic.id} has overlapping notes; run the polyphony remover first`,
    );
  }

  const measures = buildMeasures(song.ticksPerQuarter, config.timeSignatures, song.endTick());
  const channels = song.channels.map(c => measurizeChannel(c, measures));

  // Bar lines split notes and bound rests, so the grid must divide them too.
  const grid = measures.reduce((g, m) => gcd(g, m.lengthTicks), song.grid);

  return new MChirp({
    ticksPerQuarter: song.ticksPerQuarter,
    tempos: song.tempos,
    metadata: song.metadata,
    grid,
    measures,
    keySignatures: config.keySignatures,
    channels,
  });
}

/**
 * Build the bar structure covering [0, endTick). At least one measure is
 * always returned, and the last one is full length.
 *
 * @throws ChirpError MalformedTimeSignatureMap
 */
export function buildMeasures(
  ticksPerQuarter: number,
  timeSignatures: readonly TimeSignatureEvent[],
  endTick: number,
): Measure[] {
  const problems = validateTimeSignatureMap(ticksPerQuarter, timeSignatures);
  if (problems.length > 0) {
    throw new ChirpError(
      "MalformedTimeSignatureMap",
      `Invalid time signature map:\n  - ${problems.join("\n  - ")}`,
    );
  }

  const measures: Measure[] = [];
  let current = timeSignatures[0];
  let next = 1;
  let tick = 0;
  let previousStart = 0;

  // Walk bar lines past every change, even ones after the last note, so a
  // misplaced change is reported no matter where it sits.
  for (;;) {
    while (next < timeSignatures.length && timeSignatures[next].tick <= tick) {
      const change = timeSignatures[next];
      if (change.tick < tick) {
        throw new ChirpError(
          "MalformedTimeSignatureMap",
          `time signature change at tick ${change.tick} falls inside the measure [${previousStart}, ${tick})`,
        );
      }
      current = change;
      next++;
    }

    const needed = tick < endTick || measures.length === 0;
    if (!needed && next >= timeSignatures.length) break;

    const lengthTicks = ticksPerMeasure(ticksPerQuarter, current.numerator, current.denominator);
    if (needed) {
      measures.push({
        index: measures.length,
        timeSignature: { numerator: current.numerator, denominator: current.denominator },
        startTick: tick,
        lengthTicks,
      });
    }
    previousStart = tick;
    tick += lengthTicks;
  }

  return measures;
}

/**
 * Validate a time-signature map. Returns an array of problems (empty = valid).
 * Bar-line alignment of changes is checked while measures are built.
 */
export function validateTimeSignatureMap(
  ticksPerQuarter: number,
  timeSignatures: readonly TimeSignatureEvent[],
): string[] {
  const errors: string[] = [];
  if (timeSignatures.length === 0) {
    errors.push("time signature map must not be empty");
    return errors;
  }
  if (timeSignatures[0].tick !== 0) {
    errors.push(`first time signature must be at tick 0, got ${timeSignatures[0].tick}`);
  }
  timeSignatures.forEach((ts, i) => {
    if (!Number.isInteger(ts.tick) || ts.tick < 0) {
      errors.push(`timeSignature[${i}].tick must be a non-negative integer, got ${ts.tick}`);
    }
    if (i > 0 && ts.tick <= timeSignatures[i - 1].tick) {
      errors.push(`timeSignature[${i}].tick (${ts.tick}) must be greater than ${timeSignatures[i - 1].tick}`);
    }
    if (!Number.isInteger(ts.numerator) || ts.numerator <= 0) {
      errors.push(`timeSignature[${i}].numerator must be a positive integer, got ${ts.numerator}`);
    }
    if (!isPowerOfTwo(ts.denominator)) {
      errors.push(`timeSignature[${i}].denominator must be a power of two, got ${ts.denominator}`);
    } else if (!Number.isInteger(ticksPerMeasure(ticksPerQuarter, ts.numerator, ts.denominator))) {
      errors.push(`${ts.numerator}/${ts.denominator} is not a whole number of ticks at ${ticksPerQuarter} per quarter`);
    }
  });
  return errors;
}

/**
 * Parse a time signature string like "4/4" or "6/8".
 *
 * @throws ChirpError MalformedTimeSignatureMap on anything else.
 */
export function parseTimeSignature(text: string): TimeSignature {
  const match = text.trim().match(/^(\d+)\/(\d+)$/);
  const numerator = match ? Number(match[1]) : NaN;
  const denominator = match ? Number(match[2]) : NaN;
  if (!(numerator > 0) || !isPowerOfTwo(denominator)) {
    throw new ChirpError("MalformedTimeSignatureMap", `Invalid time signature: "${text}"`);
  }
  return { numerator, denominator };
}

/** Index of the measure containing a tick, or -1. */
export function measureIndexAt(measures: readonly Measure[], tick: number): number {
  let lo = 0;
  let hi = measures.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (tick < measures[mid].startTick) hi = mid - 1;
    else if (tick >= measureEnd(measures[mid])) lo = mid + 1;
    else return mid;
  }
  return -1;
}

// ─── Internal ────────────────────────────────────────────────────────────────

function measurizeChannel(channel: ChirpChannel, measures: readonly Measure[]): MChirpChannel {
  const buckets: MeasureEvent[][] = measures.map(() => []);

  for (const note of channel.notes) {
    const end = noteEnd(note);
    let start = note.startTick;
    while (start < end) {
      const index = measureIndexAt(measures, start);
      const segmentEnd = Math.min(end, measureEnd(measures[index]));
      const segment: MeasureNote = {
        kind: "note",
        pitch: note.pitch,
        startTick: start,
        durationTicks: segmentEnd - start,
        tiedFromPrevious: start !== note.startTick,
        tiedToNext: segmentEnd < end,
      };
      if (note.velocity !== undefined) segment.velocity = note.velocity;
      buckets[index].push(segment);
      start = segmentEnd;
    }
  }

  const result: MChirpChannel = {
    id: channel.id,
    name: channel.name,
    measures: buckets.map((events, i) => fillRests(events, measures[i])),
  };
  if (channel.instrument !== undefined) result.instrument = channel.instrument;
  return result;
}

/** Insert rests so the measure is covered from bar line to bar line. */
function fillRests(events: MeasureEvent[], measure: Measure): MeasureEvent[] {
  const filled: MeasureEvent[] = [];
  let cursor = measure.startTick;
  for (const e of events) {
    if (e.startTick > cursor) {
      filled.push({ kind: "rest", startTick: cursor, durationTicks: e.startTick - cursor });
    }
    filled.push(e);
    cursor = e.startTick + e.durationTicks;
  }
  const end = measureEnd(measure);
  if (cursor < end) {
    filled.push({ kind: "rest", startTick: cursor, durationTicks: end - cursor });
  }
  return filled;
}

function gcd(a: number, b: number): number {
  while (b !== 0) [a, b] = [b, a % b];
  return a;
}

function isPowerOfTwo(n: number): boolean {
  return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0;
}
