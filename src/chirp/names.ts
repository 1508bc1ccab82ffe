// ─── Pitch & Duration Names ──────────────────────────────────────────────────
//
// Human-readable names for pitches (scientific notation, C4 = 60) and for
// tick durations ("dotted eighth", "quarter triplet", ...).
// ─────────────────────────────────────────────────────────────────────────────

import { ChirpError } from "./errors.js";
import type { KeySignature } from "./types.js";

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/** Tonics from seven flats to seven sharps. */
const MAJOR_KEYS = ["Cb", "Gb", "Db", "Ab", "Eb", "Bb", "F", "C", "G", "D", "A", "E", "B", "F#", "C#"] as const;
const MINOR_KEYS = ["Ab", "Eb", "Bb", "F", "C", "G", "D", "A", "E", "B", "F#", "C#", "G#", "D#", "A#"] as const;

const NOTE_OFFSETS: Record<string, number> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

/**
 * [numerator, denominator, name], as fractions of a quarter note.
 * Dotted values and triplets down to sixty-fourth notes.
 */
const DURATION_NAMES: ReadonlyArray<readonly [number, number, string]> = [
  [8, 1, "double whole"],
  [6, 1, "dotted whole"],
  [4, 1, "whole"],
  [3, 1, "dotted half"],
  [2, 1, "half"],
  [4, 3, "half triplet"],
  [3, 2, "dotted quarter"],
  [1, 1, "quarter"],
  [3, 4, "dotted eighth"],
  [2, 3, "quarter triplet"],
  [1, 2, "eighth"],
  [3, 8, "dotted sixteenth"],
  [1, 3, "eighth triplet"],
  [1, 4, "sixteenth"],
  [3, 16, "dotted thirty-second"],
  [1, 6, "sixteenth triplet"],
  [1, 8, "thirty-second"],
  [3, 32, "dotted sixty-fourth"],
  [1, 12, "thirty-second triplet"],
  [1, 16, "sixty-fourth"],
  [1, 24, "sixty-fourth triplet"],
];

/** Note-value strings ("4" = quarter, "8." = dotted eighth, "8-3" = eighth triplet) in quarters. */
export const NOTE_VALUES: Readonly<Record<string, readonly [number, number]>> = {
  "1.": [6, 1], "1": [4, 1], "2.": [3, 1], "2": [2, 1], "2-3": [4, 3],
  "4.": [3, 2], "4": [1, 1], "8.": [3, 4], "4-3": [2, 3],
  "8": [1, 2], "16.": [3, 8], "8-3": [1, 3], "16": [1, 4],
  "32.": [3, 16], "16-3": [1, 6], "32": [1, 8], "64.": [3, 32],
  "32-3": [1, 12], "64": [1, 16], "64-3": [1, 24],
};

// ─── Pitches ─────────────────────────────────────────────────────────────────

/**
 * Convert a MIDI note number to scientific pitch notation.
 * 60 → "C4", 69 → "A4", 48 → "C3"
 */
export function pitchToNoteName(pitch: number): string {
  if (!Number.isInteger(pitch) || pitch < 0 || pitch > 127) {
    throw new RangeError(`Illegal note number ${pitch}`);
  }
  const octave = Math.floor(pitch / 12) - 1;
  return `${NOTE_NAMES[pitch % 12]}${octave}`;
}

/**
 * Parse a scientific pitch name into a MIDI note number.
 * Accepts double accidentals: "C##4" → 62, "Dbb4" → 60.
 */
export function noteNameToPitch(name: string): number {
  const match = name.trim().match(/^([A-G])(##|#|bb|b)?(-1|\d)$/);
  if (!match) {
    throw new RangeError(`Illegal note name: "${name}"`);
  }
  const [, letter, accidental = "", octaveStr] = match;
  let pitch = NOTE_OFFSETS[letter] + 12 * (parseInt(octaveStr, 10) + 1);
  for (const ch of accidental) pitch += ch === "#" ? 1 : -1;
  if (pitch < 0 || pitch > 127) {
    throw new RangeError(`MIDI note out of range: ${pitch} (from "${name}")`);
  }
  return pitch;
}

// ─── Keys ────────────────────────────────────────────────────────────────────

/**
 * Name a key signature.
 * { fifths: 2, mode: "major" } → "D major", { fifths: -3, mode: "minor" } → "C minor"
 */
export function keySignatureName(key: KeySignature): string {
  const tonics = key.mode === "major" ? MAJOR_KEYS : MINOR_KEYS;
  const tonic = Number.isInteger(key.fifths) ? tonics[key.fifths + 7] : undefined;
  if (tonic === undefined) {
    throw new RangeError(`Illegal key signature: ${key.fifths} fifths`);
  }
  return `${tonic} ${key.mode}`;
}

// ─── Durations ───────────────────────────────────────────────────────────────

/**
 * Name a duration in ticks, e.g. 240 at 480 tpq → "eighth".
 * Returns "<unknown>" for durations with no standard name.
 */
export function durationToNoteName(durationTicks: number, ticksPerQuarter: number): string {
  for (const [num, den, name] of DURATION_NAMES) {
    // durationTicks / tpq === num / den, compared without floating point
    if (durationTicks * den === num * ticksPerQuarter) return name;
  }
  return "<unknown>";
}

/**
 * Quantization grid in ticks for a note-value string ("16", "8.", "4-3").
 * `dotted` halves the grid so dotted values land on it; `triplet` divides
 * by three.
 *
 * @throws ChirpError InvalidGrid for unknown values or a non-integral result.
 */
export function gridFromNoteValue(
  value: string,
  ticksPerQuarter: number,
  options: { dotted?: boolean; triplet?: boolean } = {},
): number {
  let key = value.trim();
  let dotted = options.dotted ?? false;
  let triplet = options.triplet ?? false;
  if (key.includes(".")) {
    dotted = true;
    key = key.replace(".", "");
  }
  if (key.includes("-3")) {
    triplet = true;
    key = key.replace("-3", "");
  }

  const fraction = NOTE_VALUES[key];
  if (!fraction) {
    throw new ChirpError("InvalidGrid", `Unknown note value: "${value}"`);
  }

  let divisor = fraction[1];
  if (dotted) divisor *= 2;
  if (triplet) divisor *= 3;
  const grid = (ticksPerQuarter * fraction[0]) / divisor;
  if (!Number.isInteger(grid) || grid <= 0) {
    throw new ChirpError("InvalidGrid", `Note value "${value}" does not fit ${ticksPerQuarter} ticks per quarter`);
  }
  return grid;
}
