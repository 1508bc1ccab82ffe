// ─── Polyphony Remover ───────────────────────────────────────────────────────
//
// Chirp → Chirp. Leaves at most one sounding note per channel at any tick.
// Cross-channel overlaps are untouched.
// ─────────────────────────────────────────────────────────────────────────────

import { Chirp } from "../chirp/chirp.js";
import { compareNotes, noteEnd, type NoteEvent } from "../chirp/types.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export const POLYPHONY_POLICIES = [
  "highest-pitch-wins",
  "lowest-pitch-wins",
  "first-wins",
  "last-wins",
] as const;

export type PolyphonyPolicy = (typeof POLYPHONY_POLICIES)[number];

export interface PolyphonyConfig {
  policy: PolyphonyPolicy;
}

export interface PolyphonyReport {
  /** Notes shortened so they end where a winning note starts. */
  truncated: number;
  /** Notes removed entirely. */
  deleted: number;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Remove same-channel polyphony.
 *
 * Notes are walked in start order against the currently sounding note. On an
 * overlap the policy picks a winner:
 *   - later note wins: the sounding note is cut at the later note's start,
 *     and dropped if nothing is left of it
 *   - sounding note wins: the later note keeps only what sounds after the
 *     winner ends; it is dropped if it has the same pitch or nothing remains
 */
export function removePolyphony(song: Chirp, config: PolyphonyConfig): Chirp {
  return removePolyphonyWithReport(song, config).song;
}

/** Like removePolyphony, also counting truncated and deleted notes. */
export function removePolyphonyWithReport(
  song: Chirp,
  config: PolyphonyConfig,
): { song: Chirp; report: PolyphonyReport } {
  const report: PolyphonyReport = { truncated: 0, deleted: 0 };
  const init = song.toInit();

  const channels = (init.channels ?? []).map(channel => ({
    ...channel,
    notes: resolveChannel(channel.notes ?? [], config.policy, report),
  }));

  return { song: new Chirp({ ...init, channels }), report };
}

/**
 * Resolve one channel's notes. Exported for callers that work on bare note
 * lists; the input is not modified.
 */
export function resolveChannel(
  notes: readonly NoteEvent[],
  policy: PolyphonyPolicy,
  report: PolyphonyReport = { truncated: 0, deleted: 0 },
): NoteEvent[] {
  const queue = notes.map(n => ({ ...n })).sort(compareNotes);
  const kept: NoteEvent[] = [];
  let active: NoteEvent | null = null;

  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined) break;

    if (!active || next.startTick >= noteEnd(active)) {
      if (active) kept.push(active);
      active = next;
      continue;
    }

    if (laterWins(active, next, policy)) {
      const cut = next.startTick - active.startTick;
      if (cut > 0) {
        active.durationTicks = cut;
        kept.push(active);
        report.truncated++;
      } else {
        report.deleted++;
      }
      active = next;
    } else if (next.pitch === active.pitch || noteEnd(next) <= noteEnd(active)) {
      report.deleted++;
    } else {
      // The remainder re-enters the queue; it may now start after other notes.
      const end = noteEnd(next);
      next.startTick = noteEnd(active);
      next.durationTicks = end - next.startTick;
      insertSorted(queue, next);
      report.truncated++;
    }
  }

  if (active) kept.push(active);
  return kept;
}

// ─── Internal ────────────────────────────────────────────────────────────────

/**
 * Does the later-starting note beat the sounding one? Under the pitch
 * policies an equal pitch keeps the sounding note; last-wins always takes
 * the later one.
 */
function laterWins(active: NoteEvent, later: NoteEvent, policy: PolyphonyPolicy): boolean {
  switch (policy) {
    case "highest-pitch-wins":
      return later.pitch > active.pitch;
    case "lowest-pitch-wins":
      return later.pitch < active.pitch;
    case "first-wins":
      return false;
    case "last-wins":
      return true;
  }
}

function insertSorted(queue: NoteEvent[], note: NoteEvent): void {
  let i = 0;
  while (i < queue.length && compareNotes(queue[i], note) <= 0) i++;
  queue.splice(i, 0, note);
}
