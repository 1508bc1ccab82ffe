// ─── Transform Engine ────────────────────────────────────────────────────────
//
// Applies a caller-supplied transformation to a song and, in the same pass,
// reports statistics about what was fed in. Statistics are taken before the
// transformation runs, so a transform that mutates its input in place cannot
// change them. Errors thrown by the transformation propagate untouched.
//
// Usage:
//   const { output, text } = chirpTrans.run(song, transpose(12));
//   console.error(text);
// ─────────────────────────────────────────────────────────────────────────────

import type { Chirp } from "../chirp/chirp.js";
import type { MChirp } from "../chirp/mchirp.js";
import {
  chirpStatistics,
  formatStatistics,
  mchirpStatistics,
  type SongStatistics,
} from "./statistics.js";

export type Transform<TIn, TOut = TIn> = (input: TIn) => TOut;

export interface TransformResult<TOut> {
  output: TOut;
  /** Statistics of the input, never of the output. */
  statistics: SongStatistics;
  text: string;
}

export interface TransformEngine<T> {
  readonly name: string;
  statistics(input: T): SongStatistics;
  /** Identity when no transform is given. */
  run(input: T): TransformResult<T>;
  run<TOut>(input: T, transform: Transform<T, TOut>): TransformResult<TOut>;
}

export function createTransformEngine<T>(
  name: string,
  computeStatistics: (input: T) => SongStatistics,
): TransformEngine<T> {
  function run(input: T): TransformResult<T>;
  function run<TOut>(input: T, transform: Transform<T, TOut>): TransformResult<TOut>;
  function run(input: T, transform?: Transform<T, unknown>): TransformResult<unknown> {
    const statistics = computeStatistics(input);
    const text = formatStatistics(statistics);
    const output = transform ? transform(input) : input;
    return { output, statistics, text };
  }

  return {
    name,
    statistics: computeStatistics,
    run,
  };
}

/** Transform engine over Chirp songs. */
export const chirpTrans: TransformEngine<Chirp> = createTransformEngine("ChirpTrans", chirpStatistics);

/** Transform engine over MChirp songs. */
export const mchirpTrans: TransformEngine<MChirp> = createTransformEngine("MChirpTrans", mchirpStatistics);
