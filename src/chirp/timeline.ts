// ─── Tick Timeline ───────────────────────────────────────────────────────────
//
// Resolution + tempo map. Converts ticks to wall-clock seconds by
// piecewise-linear accumulation across tempo changes.
// ─────────────────────────────────────────────────────────────────────────────

import { ChirpError } from "./errors.js";
import type { TempoEvent } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_MICROSECONDS_PER_QUARTER = 500_000; // 120 BPM

export function bpmToMicroseconds(bpm: number): number {
  return Math.round(60_000_000 / bpm);
}

export function microsecondsToBpm(microsecondsPerQuarter: number): number {
  return 60_000_000 / microsecondsPerQuarter;
}

// ─── TickTimeline ────────────────────────────────────────────────────────────

export class TickTimeline {
  readonly ticksPerQuarter: number;
  readonly tempos: readonly TempoEvent[];

  /**
   * @param tempos Tempo map ordered by tick. Empty means 120 BPM throughout.
   * @throws ChirpError MalformedTempoMap / MalformedRepresentation
   */
  constructor(ticksPerQuarter: number, tempos: readonly TempoEvent[] = []) {
    if (!Number.isInteger(ticksPerQuarter) || ticksPerQuarter <= 0) {
      throw new ChirpError(
        "MalformedRepresentation",
        `ticksPerQuarter must be a positive integer, got ${ticksPerQuarter}`,
      );
    }
    const map = tempos.length > 0
      ? tempos.map(t => ({ ...t }))
      : [{ tick: 0, microsecondsPerQuarter: DEFAULT_MICROSECONDS_PER_QUARTER }];
    const problems = validateTempoMap(map);
    if (problems.length > 0) {
      throw new ChirpError("MalformedTempoMap", `Invalid tempo map:\n  - ${problems.join("\n  - ")}`);
    }
    this.ticksPerQuarter = ticksPerQuarter;
    this.tempos = map;
  }

  /** Initial tempo in BPM. */
  get bpm(): number {
    return microsecondsToBpm(this.tempos[0].microsecondsPerQuarter);
  }

  /** The tempo event in effect at a tick. */
  tempoAt(tick: number): TempoEvent {
    let current = this.tempos[0];
    for (const event of this.tempos) {
      if (event.tick > tick) break;
      current = event;
    }
    return current;
  }

  /** Convert a tick position to seconds, respecting tempo changes. */
  ticksToSeconds(targetTick: number): number {
    let seconds = 0;
    let currentTick = 0;
    let microsecondsPerQuarter = this.tempos[0].microsecondsPerQuarter;

    for (const event of this.tempos) {
      if (event.tick >= targetTick) break;

      if (event.tick > currentTick) {
        seconds += this.segmentSeconds(event.tick - currentTick, microsecondsPerQuarter);
        currentTick = event.tick;
      }
      microsecondsPerQuarter = event.microsecondsPerQuarter;
    }

    if (currentTick < targetTick) {
      seconds += this.segmentSeconds(targetTick - currentTick, microsecondsPerQuarter);
    }

    return seconds;
  }

  /** Inverse of ticksToSeconds. The result is fractional; callers round. */
  secondsToTicks(targetSeconds: number): number {
    let seconds = 0;
    for (let i = 0; i < this.tempos.length; i++) {
      const event = this.tempos[i];
      const next = this.tempos[i + 1];
      const secondsPerTick = event.microsecondsPerQuarter / 1_000_000 / this.ticksPerQuarter;
      if (next) {
        const span = (next.tick - event.tick) * secondsPerTick;
        if (seconds + span > targetSeconds) {
          return event.tick + (targetSeconds - seconds) / secondsPerTick;
        }
        seconds += span;
      } else {
        return event.tick + (targetSeconds - seconds) / secondsPerTick;
      }
    }
    return 0;
  }

  /** Copy with a different tempo map, same resolution. */
  withTempos(tempos: readonly TempoEvent[]): TickTimeline {
    return new TickTimeline(this.ticksPerQuarter, tempos);
  }

  private segmentSeconds(deltaTicks: number, microsecondsPerQuarter: number): number {
    return (deltaTicks / this.ticksPerQuarter) * (microsecondsPerQuarter / 1_000_000);
  }
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a tempo map. Returns an array of problems (empty = valid).
 */
export function validateTempoMap(tempos: readonly TempoEvent[]): string[] {
  const errors: string[] = [];
  if (tempos.length === 0) {
    errors.push("tempo map must not be empty");
    return errors;
  }
  if (tempos[0].tick !== 0) {
    errors.push(`first tempo event must be at tick 0, got ${tempos[0].tick}`);
  }
  for (let i = 0; i < tempos.length; i++) {
    const t = tempos[i];
    if (!Number.isInteger(t.tick) || t.tick < 0) {
      errors.push(`tempo[${i}].tick must be a non-negative integer, got ${t.tick}`);
    }
    if (!Number.isFinite(t.microsecondsPerQuarter) || t.microsecondsPerQuarter <= 0) {
      errors.push(`tempo[${i}] must be positive, got ${t.microsecondsPerQuarter}`);
    }
    if (i > 0 && t.tick <= tempos[i - 1].tick) {
      errors.push(`tempo[${i}].tick (${t.tick}) must be greater than tempo[${i - 1}].tick (${tempos[i - 1].tick})`);
    }
  }
  return errors;
}
