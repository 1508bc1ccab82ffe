// ─── MChirp ──────────────────────────────────────────────────────────────────
//
// The quantized, measure-aware song representation.
//
// Measures are shared by every channel. Each channel holds, per measure, an
// ordered run of notes and rests confined to that measure. Ticks are absolute
// (from song start), never measure-relative. A note that sounds across a bar
// line is stored as a chain of segments linked by tie flags.
// ─────────────────────────────────────────────────────────────────────────────

import { ChirpError, isChirpError } from "./errors.js";
import { TickTimeline } from "./timeline.js";
import {
  cloneMetadata,
  emptyMetadata,
  type ChannelInfo,
  type KeySignature,
  type KeySignatureEvent,
  type NoteEvent,
  type SongMetadata,
  type TempoEvent,
  type TimeSignature,
} from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface Measure {
  /** 0-based measure index. */
  index: number;
  timeSignature: TimeSignature;
  /** Absolute tick where this measure starts. */
  startTick: number;
  lengthTicks: number;
}

/** A note segment inside one measure. */
export interface MeasureNote extends NoteEvent {
  kind: "note";
  /** This segment continues a segment ending at its start in the previous measure. */
  tiedFromPrevious: boolean;
  /** This segment continues into the next measure. */
  tiedToNext: boolean;
}

export interface MeasureRest {
  kind: "rest";
  startTick: number;
  durationTicks: number;
}

export type MeasureEvent = MeasureNote | MeasureRest;

export interface MChirpChannel extends ChannelInfo {
  /** One event list per measure, indexed like MChirp.measures. */
  measures: readonly (readonly MeasureEvent[])[];
}

export interface MChirpInit {
  ticksPerQuarter: number;
  tempos?: readonly TempoEvent[];
  metadata?: Partial<SongMetadata>;
  /**
   * Grid every note and rest sits on, bar lines included. Defaults to one
   * quarter note.
   */
  grid?: number;
  measures: readonly Measure[];
  /** Ordered by tick. Empty means C major throughout. */
  keySignatures?: readonly KeySignatureEvent[];
  channels: readonly MChirpChannel[];
}

/** 1-based position of a tick in bar/beat terms. */
export interface MeasureBeat {
  measure: number;
  beat: number;
}

// ─── Measure math ────────────────────────────────────────────────────────────

/**
 * Compute ticks per measure for a given time signature.
 */
export function ticksPerMeasure(
  ticksPerQuarter: number,
  numerator: number,
  denominator: number,
): number {
  return ticksPerQuarter * numerator * (4 / denominator);
}

/** Ticks in one beat (one denominator unit). */
export function ticksPerBeat(ticksPerQuarter: number, denominator: number): number {
  return (ticksPerQuarter * 4) / denominator;
}

export function measureEnd(measure: Measure): number {
  return measure.startTick + measure.lengthTicks;
}

// ─── MChirp ──────────────────────────────────────────────────────────────────

export class MChirp {
  metadata: SongMetadata;
  readonly timeline: TickTimeline;
  readonly grid: number;
  readonly measures: readonly Measure[];
  readonly keySignatures: readonly KeySignatureEvent[];
  readonly channels: readonly MChirpChannel[];

  /** @throws ChirpError MalformedRepresentation if any invariant is broken. */
  constructor(init: MChirpInit) {
    this.timeline = new TickTimeline(init.ticksPerQuarter, init.tempos ?? []);
    this.metadata = { ...emptyMetadata(), ...init.metadata, extra: { ...init.metadata?.extra } };
    this.grid = init.grid ?? init.ticksPerQuarter;

    const problems = validateMChirp(init);
    if (problems.length > 0) {
      throw new ChirpError("MalformedRepresentation", `Invalid MChirp:\n  - ${problems.join("\n  - ")}`);
    }

    this.measures = init.measures.map(m => Object.freeze({ ...m, timeSignature: { ...m.timeSignature } }));
    this.keySignatures = (init.keySignatures ?? []).map(k => Object.freeze({ ...k }));
    this.channels = init.channels.map(cloneChannel);
  }

  get ticksPerQuarter(): number {
    return this.timeline.ticksPerQuarter;
  }

  get tempos(): readonly TempoEvent[] {
    return this.timeline.tempos;
  }

  /** End of the last measure. */
  endTick(): number {
    const last = this.measures[this.measures.length - 1];
    return measureEnd(last);
  }

  channel(id: number): MChirpChannel | undefined {
    return this.channels.find(c => c.id === id);
  }

  /** The measure whose range contains a tick, or undefined past the end. */
  measureAt(tick: number): Measure | undefined {
    let lo = 0;
    let hi = this.measures.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const m = this.measures[mid];
      if (tick < m.startTick) hi = mid - 1;
      else if (tick >= measureEnd(m)) lo = mid + 1;
      else return m;
    }
    return undefined;
  }

  /** Time signature in effect at a tick (the last one for ticks past the end). */
  timeSignatureAt(tick: number): TimeSignature {
    const m = this.measureAt(tick) ?? this.measures[this.measures.length - 1];
    return { ...m.timeSignature };
  }

  /** Key signature in effect at a tick; C major before the first change. */
  keySignatureAt(tick: number): KeySignature {
    let current: KeySignature = { fifths: 0, mode: "major" };
    for (const k of this.keySignatures) {
      if (k.tick > tick) break;
      current = k;
    }
    return { fifths: current.fifths, mode: current.mode };
  }

  /**
   * Measure and beat (both 1-based) containing a tick.
   * Returns undefined for ticks outside the song.
   */
  beatAt(tick: number): MeasureBeat | undefined {
    const m = this.measureAt(tick);
    if (!m) return undefined;
    const beatLength = ticksPerBeat(this.ticksPerQuarter, m.timeSignature.denominator);
    return {
      measure: m.index + 1,
      beat: Math.floor((tick - m.startTick) / beatLength) + 1,
    };
  }

  /** Number of note segments (not rests) across all channels. */
  segmentCount(): number {
    let count = 0;
    for (const c of this.channels) {
      for (const events of c.measures) {
        count += events.filter(e => e.kind === "note").length;
      }
    }
    return count;
  }

  toInit(): MChirpInit {
    return {
      ticksPerQuarter: this.ticksPerQuarter,
      tempos: this.tempos.map(t => ({ ...t })),
      metadata: cloneMetadata(this.metadata),
      grid: this.grid,
      measures: this.measures.map(m => ({ ...m, timeSignature: { ...m.timeSignature } })),
      keySignatures: this.keySignatures.map(k => ({ ...k })),
      channels: this.channels.map(cloneChannel),
    };
  }

  clone(): MChirp {
    return new MChirp(this.toInit());
  }
}

function cloneChannel(channel: MChirpChannel): MChirpChannel {
  const copy: MChirpChannel = {
    id: channel.id,
    name: channel.name,
    measures: channel.measures.map(events => events.map(e => ({ ...e }))),
  };
  if (channel.instrument !== undefined) copy.instrument = channel.instrument;
  return copy;
}

// ─── Tie joining ─────────────────────────────────────────────────────────────

/**
 * Flatten a channel's measures into whole notes: rests dropped, each tied
 * chain merged into one note with the summed duration.
 *
 * @throws ChirpError MalformedRepresentation on a broken tie chain.
 */
export function joinTiedNotes(channel: MChirpChannel): NoteEvent[] {
  const notes: NoteEvent[] = [];
  let open: NoteEvent | null = null;

  for (let measureIndex = 0; measureIndex < channel.measures.length; measureIndex++) {
    for (const e of channel.measures[measureIndex]) {
      if (e.kind === "rest") {
        if (open) throw brokenTie(channel.id, measureIndex, open);
        continue;
      }
      if (open) {
        const openEnd = open.startTick + open.durationTicks;
        if (!e.tiedFromPrevious || e.pitch !== open.pitch || e.startTick !== openEnd) {
          throw brokenTie(channel.id, measureIndex, open);
        }
        open.durationTicks += e.durationTicks;
      } else {
        if (e.tiedFromPrevious) {
          throw new ChirpError(
            "MalformedRepresentation",
            `channel ${channel.id} measure ${measureIndex}: pitch ${e.pitch} at tick ${e.startTick} continues a tie that was never started`,
          );
        }
        open = { pitch: e.pitch, startTick: e.startTick, durationTicks: e.durationTicks };
        if (e.velocity !== undefined) open.velocity = e.velocity;
      }
      if (!e.tiedToNext) {
        notes.push(open);
        open = null;
      }
    }
  }

  if (open) throw brokenTie(channel.id, channel.measures.length - 1, open);
  return notes;
}

function brokenTie(channelId: number, measureIndex: number, note: NoteEvent): ChirpError {
  return new ChirpError(
    "MalformedRepresentation",
    `channel ${channelId} measure ${measureIndex}: tie from pitch ${note.pitch} at tick ${note.startTick} has no continuation`,
  );
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate the structural invariants of an MChirp. Returns an array of
 * problems (empty = valid).
 */
export function validateMChirp(init: MChirpInit): string[] {
  const errors: string[] = [];
  const tpq = init.ticksPerQuarter;
  const grid = init.grid ?? tpq;
  const gridValid = Number.isInteger(grid) && grid > 0;

  if (!gridValid) {
    errors.push(`grid must be a positive integer, got ${grid}`);
  }

  if (init.measures.length === 0) {
    errors.push("measures must be a non-empty array");
    return errors;
  }

  let expectedStart = 0;
  init.measures.forEach((m, i) => {
    if (m.index !== i) errors.push(`measure[${i}].index should be ${i}, got ${m.index}`);
    if (m.startTick !== expectedStart) {
      errors.push(`measure[${i}].startTick should be ${expectedStart}, got ${m.startTick}`);
    }
    const { numerator, denominator } = m.timeSignature;
    const expectedLength = ticksPerMeasure(tpq, numerator, denominator);
    if (m.lengthTicks !== expectedLength) {
      errors.push(`measure[${i}].lengthTicks should be ${expectedLength} for ${numerator}/${denominator}, got ${m.lengthTicks}`);
    }
    expectedStart = m.startTick + m.lengthTicks;
  });

  errors.push(...validateKeySignatureMap(init.keySignatures ?? []));

  const ids = new Set<number>();
  for (const channel of init.channels) {
    if (ids.has(channel.id)) errors.push(`duplicate channel id ${channel.id}`);
    ids.add(channel.id);

    if (channel.measures.length !== init.measures.length) {
      errors.push(`channel ${channel.id} has ${channel.measures.length} measures, expected ${init.measures.length}`);
      continue;
    }

    channel.measures.forEach((events, i) => {
      const measure = init.measures[i];
      const end = measureEnd(measure);
      let cursor = measure.startTick;
      events.forEach((e, j) => {
        const where = `channel ${channel.id} measure ${i} event[${j}]`;
        if (!Number.isInteger(e.durationTicks) || e.durationTicks <= 0) {
          errors.push(`${where}: durationTicks must be a positive integer, got ${e.durationTicks}`);
        } else if (gridValid && (e.startTick % grid !== 0 || e.durationTicks % grid !== 0)) {
          errors.push(`${where}: [${e.startTick}, ${e.startTick + e.durationTicks}) is off the ${grid}-tick grid`);
        }
        if (e.startTick < cursor) {
          errors.push(`${where}: starts at ${e.startTick}, overlapping the previous event (ends ${cursor})`);
        }
        if (e.startTick < measure.startTick || e.startTick + e.durationTicks > end) {
          errors.push(`${where}: [${e.startTick}, ${e.startTick + e.durationTicks}) lies outside the measure [${measure.startTick}, ${end})`);
        }
        cursor = Math.max(cursor, e.startTick + e.durationTicks);
      });
    });

    try {
      joinTiedNotes(channel);
    } catch (err) {
      if (!isChirpError(err, "MalformedRepresentation")) throw err;
      errors.push(err.message);
    }
  }

  return errors;
}

/**
 * Validate a key-signature map. Returns an array of problems (empty = valid).
 */
export function validateKeySignatureMap(keySignatures: readonly KeySignatureEvent[]): string[] {
  const errors: string[] = [];
  keySignatures.forEach((k, i) => {
    if (!Number.isInteger(k.tick) || k.tick < 0) {
      errors.push(`keySignature[${i}].tick must be a non-negative integer, got ${k.tick}`);
    }
    if (i > 0 && k.tick <= keySignatures[i - 1].tick) {
      errors.push(`keySignature[${i}].tick (${k.tick}) must be greater than ${keySignatures[i - 1].tick}`);
    }
    if (!Number.isInteger(k.fifths) || k.fifths < -7 || k.fifths > 7) {
      errors.push(`keySignature[${i}].fifths must be an integer from -7 to 7, got ${k.fifths}`);
    }
  });
  return errors;
}
