// ─── Chirp ───────────────────────────────────────────────────────────────────
//
// The unquantized, polyphony-permitting song representation.
// Channels hold notes sorted by start tick; notes may overlap.
//
// The quantization flag is derived from the declared grid and cached until
// the next mutation of the song or any of its channels.
// ─────────────────────────────────────────────────────────────────────────────

import { ChirpError } from "./errors.js";
import { TickTimeline, validateTempoMap } from "./timeline.js";
import {
  cloneMetadata,
  compareNotes,
  emptyMetadata,
  noteEnd,
  type ChannelInfo,
  type NoteEvent,
  type SongMetadata,
  type TempoEvent,
} from "./types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ChannelInit {
  id: number;
  name?: string;
  instrument?: number;
  notes?: readonly NoteEvent[];
}

export interface ChirpInit {
  ticksPerQuarter: number;
  tempos?: readonly TempoEvent[];
  metadata?: Partial<SongMetadata>;
  /** Declared quantization grid in ticks. Defaults to one quarter note. */
  grid?: number;
  channels?: readonly ChannelInit[];
}

// ─── Note checks ─────────────────────────────────────────────────────────────

/**
 * Throw if a note cannot live in a song.
 * Non-positive durations are DegenerateEvent; anything else malformed is
 * MalformedRepresentation.
 */
export function assertValidNote(note: NoteEvent, where = "note"): void {
  if (!Number.isInteger(note.pitch)) {
    throw new ChirpError("MalformedRepresentation", `${where}: pitch must be an integer, got ${note.pitch}`);
  }
  if (!Number.isInteger(note.startTick) || note.startTick < 0) {
    throw new ChirpError("MalformedRepresentation", `${where}: startTick must be a non-negative integer, got ${note.startTick}`);
  }
  if (!Number.isInteger(note.durationTicks)) {
    throw new ChirpError("MalformedRepresentation", `${where}: durationTicks must be an integer, got ${note.durationTicks}`);
  }
  if (note.durationTicks <= 0) {
    throw new ChirpError(
      "DegenerateEvent",
      `${where}: durationTicks must be positive, got ${note.durationTicks} (pitch ${note.pitch} at tick ${note.startTick})`,
    );
  }
}

function freezeNote(note: NoteEvent): Readonly<NoteEvent> {
  const copy: NoteEvent = {
    pitch: note.pitch,
    startTick: note.startTick,
    durationTicks: note.durationTicks,
  };
  if (note.velocity !== undefined) copy.velocity = note.velocity;
  return Object.freeze(copy);
}

// ─── ChirpChannel ────────────────────────────────────────────────────────────

export class ChirpChannel implements ChannelInfo {
  readonly id: number;
  name: string;
  instrument?: number;
  private _notes: Readonly<NoteEvent>[] = [];
  private _revision = 0;

  constructor(init: ChannelInit) {
    if (!Number.isInteger(init.id) || init.id < 0) {
      throw new ChirpError("MalformedRepresentation", `channel id must be a non-negative integer, got ${init.id}`);
    }
    this.id = init.id;
    this.name = init.name ?? "";
    this.instrument = init.instrument;
    if (init.notes) this.setNotes(init.notes);
  }

  /** Notes in (startTick, pitch descending) order. */
  get notes(): readonly Readonly<NoteEvent>[] {
    return this._notes;
  }

  /** Bumped on every note mutation. */
  get revision(): number {
    return this._revision;
  }

  addNote(note: NoteEvent): void {
    assertValidNote(note, `channel ${this.id}`);
    const frozen = freezeNote(note);
    let i = this._notes.length;
    while (i > 0 && compareNotes(this._notes[i - 1], frozen) > 0) i--;
    this._notes.splice(i, 0, frozen);
    this._revision++;
  }

  /** Replace every note. The input is copied and sorted. */
  setNotes(notes: readonly NoteEvent[]): void {
    notes.forEach((n, i) => assertValidNote(n, `channel ${this.id} note[${i}]`));
    this._notes = notes.map(freezeNote).sort(compareNotes);
    this._revision++;
  }

  isPolyphonic(): boolean {
    // Sorted by start, so an overlap always shows up against the furthest end so far.
    let furthestEnd = -1;
    for (const n of this._notes) {
      if (n.startTick < furthestEnd) return true;
      furthestEnd = Math.max(furthestEnd, noteEnd(n));
    }
    return false;
  }

  /** Sum of note durations. */
  totalDuration(): number {
    return this._notes.reduce((sum, n) => sum + n.durationTicks, 0);
  }

  /** End tick of the last-ending note, 0 if empty. */
  endTick(): number {
    return this._notes.reduce((max, n) => Math.max(max, noteEnd(n)), 0);
  }

  info(): ChannelInfo {
    const info: ChannelInfo = { id: this.id, name: this.name };
    if (this.instrument !== undefined) info.instrument = this.instrument;
    return info;
  }

  toInit(): ChannelInit {
    return { ...this.info(), notes: this._notes.map(n => ({ ...n })) };
  }
}

// ─── Chirp ───────────────────────────────────────────────────────────────────

export class Chirp {
  metadata: SongMetadata;
  private _timeline: TickTimeline;
  private _grid: number;
  private _revision = 0;
  private readonly _channels: ChirpChannel[];
  private quantizedCache: { key: number; value: boolean } | null = null;

  constructor(init: ChirpInit) {
    this._timeline = new TickTimeline(init.ticksPerQuarter, init.tempos ?? []);
    this.metadata = { ...emptyMetadata(), ...init.metadata, extra: { ...init.metadata?.extra } };
    this._grid = checkGrid(init.grid ?? init.ticksPerQuarter);

    const ids = new Set<number>();
    this._channels = (init.channels ?? []).map(c => {
      if (ids.has(c.id)) {
        throw new ChirpError("MalformedRepresentation", `duplicate channel id ${c.id}`);
      }
      ids.add(c.id);
      return new ChirpChannel(c);
    });
  }

  get timeline(): TickTimeline {
    return this._timeline;
  }

  get ticksPerQuarter(): number {
    return this._timeline.ticksPerQuarter;
  }

  get tempos(): readonly TempoEvent[] {
    return this._timeline.tempos;
  }

  setTempos(tempos: readonly TempoEvent[]): void {
    this._timeline = this._timeline.withTempos(tempos);
  }

  /** Declared quantization grid in ticks. */
  get grid(): number {
    return this._grid;
  }

  setGrid(grid: number): void {
    this._grid = checkGrid(grid);
    this._revision++;
  }

  get channels(): readonly ChirpChannel[] {
    return this._channels;
  }

  channel(id: number): ChirpChannel | undefined {
    return this._channels.find(c => c.id === id);
  }

  /**
   * True iff every note's start and duration are multiples of the grid.
   * Cached; any mutation invalidates it.
   */
  isQuantized(): boolean {
    const key = this.mutationKey();
    if (this.quantizedCache && this.quantizedCache.key === key) {
      return this.quantizedCache.value;
    }
    const g = this._grid;
    const value = this._channels.every(c =>
      c.notes.every(n => n.startTick % g === 0 && n.durationTicks % g === 0),
    );
    this.quantizedCache = { key, value };
    return value;
  }

  /** True if any channel has overlapping notes. */
  isPolyphonic(): boolean {
    return this._channels.some(c => c.isPolyphonic());
  }

  noteCount(): number {
    return this._channels.reduce((sum, c) => sum + c.notes.length, 0);
  }

  /** End tick of the last-ending note in the song, 0 if empty. */
  endTick(): number {
    return this._channels.reduce((max, c) => Math.max(max, c.endTick()), 0);
  }

  /** Deep, independent copy of the construction data. */
  toInit(): ChirpInit {
    return {
      ticksPerQuarter: this.ticksPerQuarter,
      tempos: this.tempos.map(t => ({ ...t })),
      metadata: cloneMetadata(this.metadata),
      grid: this._grid,
      channels: this._channels.map(c => c.toInit()),
    };
  }

  clone(): Chirp {
    return new Chirp(this.toInit());
  }

  // Channel revisions only grow, so the sum changes whenever any of them does.
  private mutationKey(): number {
    return this._channels.reduce((sum, c) => sum + c.revision, this._revision);
  }
}

function checkGrid(grid: number): number {
  if (!Number.isInteger(grid) || grid <= 0) {
    throw new ChirpError("InvalidGrid", `grid must be a positive integer, got ${grid}`);
  }
  return grid;
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate Chirp construction data without building it.
 * Returns an array of problems (empty = valid).
 */
export function validateChirp(init: ChirpInit): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(init.ticksPerQuarter) || init.ticksPerQuarter <= 0) {
    errors.push(`ticksPerQuarter must be a positive integer, got ${init.ticksPerQuarter}`);
  }
  if (init.tempos && init.tempos.length > 0) {
    errors.push(...validateTempoMap(init.tempos));
  }
  if (init.grid !== undefined && (!Number.isInteger(init.grid) || init.grid <= 0)) {
    errors.push(`grid must be a positive integer, got ${init.grid}`);
  }

  const ids = new Set<number>();
  for (const channel of init.channels ?? []) {
    if (!Number.isInteger(channel.id) || channel.id < 0) {
      errors.push(`channel id must be a non-negative integer, got ${channel.id}`);
    }
    if (ids.has(channel.id)) errors.push(`duplicate channel id ${channel.id}`);
    ids.add(channel.id);

    (channel.notes ?? []).forEach((note, i) => {
      try {
        assertValidNote(note, `channel ${channel.id} note[${i}]`);
      } catch (err) {
        if (!(err instanceof ChirpError)) throw err;
        errors.push(err.message);
      }
    });
  }
  return errors;
}
