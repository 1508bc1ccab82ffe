// ─── Pipeline Runner ─────────────────────────────────────────────────────────
//
// Runs a parsed PipelineConfig over a Chirp: transforms first, then the
// quantizer, the polyphony remover and the measurizer, each only when the
// config names it. Every stage goes through the Chirp transform engine, so
// each stage records statistics of the song it was handed.
//
// The run stops at the first failing stage. The failure is returned, not
// thrown, together with the last song that was produced.
// ─────────────────────────────────────────────────────────────────────────────

import { Chirp } from "./chirp/chirp.js";
import type { MChirp } from "./chirp/mchirp.js";
import { gridFromNoteValue } from "./chirp/names.js";
import type { TimeSignatureEvent } from "./chirp/types.js";
import type { GridInput, PipelineConfig, TimeSignatureEntry, TransformStep } from "./config/schema.js";
import { measurize, parseTimeSignature } from "./passes/measurize.js";
import { removePolyphony } from "./passes/polyphony.js";
import { estimateDurationGrid, estimateGrid, quantize } from "./passes/quantize.js";
import type { SongStatistics } from "./passes/statistics.js";
import { chirpTrans, type Transform } from "./passes/transform-engine.js";
import { modulate, removeControlNotes, shiftTicks, transpose } from "./passes/transforms.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PipelineStage {
  name: string;
  /** Statistics of the song the stage was handed. */
  statistics: SongStatistics;
  text: string;
}

export interface PipelineResult {
  /** Stages that completed, in order. */
  stages: PipelineStage[];
  /** The last Chirp produced (the input if no Chirp stage completed). */
  chirp: Chirp;
  mchirp?: MChirp;
  /** Set when a stage threw; `failedStage` names it. */
  error?: unknown;
  failedStage?: string;
}

interface Step {
  name: string;
  apply: (song: Chirp) => Chirp | MChirp;
}

// ─── Public API ──────────────────────────────────────────────────────────────

export function runPipeline(input: Chirp, config: PipelineConfig): PipelineResult {
  const result: PipelineResult = { stages: [], chirp: input };

  for (const step of planSteps(config)) {
    try {
      const { output, statistics, text } = chirpTrans.run(result.chirp, step.apply);
      result.stages.push({ name: step.name, statistics, text });
      if (output instanceof Chirp) result.chirp = output;
      else result.mchirp = output;
    } catch (err) {
      result.error = err;
      result.failedStage = step.name;
      break;
    }
  }

  return result;
}

/** Build the transformation a config step describes. */
export function transformFromStep(step: TransformStep): Transform<Chirp> {
  switch (step.type) {
    case "transpose":
      return transpose(step.semitones);
    case "modulate":
      return modulate(step.num, step.denom);
    case "removeControlNotes":
      return removeControlNotes(step.max);
    case "shiftTicks":
      return shiftTicks(step.delta);
  }
}

/** Resolve a configured grid to ticks for this song. */
export function resolveGrid(grid: GridInput, song: Chirp): number {
  if (typeof grid === "number") return grid;
  if (grid === "auto") return estimateGrid(song);
  return gridFromNoteValue(grid, song.ticksPerQuarter);
}

/** Resolve a configured duration grid; "auto" estimates from note lengths. */
export function resolveDurationGrid(grid: GridInput, song: Chirp, startGrid: number): number {
  return grid === "auto" ? estimateDurationGrid(song, startGrid) : resolveGrid(grid, song);
}

/**
 * Convert configured time signatures to events.
 *
 * @throws ChirpError MalformedTimeSignatureMap
 */
export function resolveTimeSignatures(entries: readonly TimeSignatureEntry[]): TimeSignatureEvent[] {
  return entries.map(e => ({ tick: e.tick, ...parseTimeSignature(e.signature) }));
}

// ─── Internal ────────────────────────────────────────────────────────────────

function planSteps(config: PipelineConfig): Step[] {
  const steps: Step[] = config.transforms.map(t => ({ name: t.type, apply: transformFromStep(t) }));

  const { quantize: q, polyphony, measurize: m } = config;
  if (q) {
    steps.push({
      name: "quantize",
      apply: song => {
        const grid = resolveGrid(q.grid, song);
        if (q.durationGrid === undefined) return quantize(song, { grid });
        return quantize(song, { grid, durationGrid: resolveDurationGrid(q.durationGrid, song, grid) });
      },
    });
  }
  if (polyphony) {
    steps.push({ name: "removePolyphony", apply: song => removePolyphony(song, polyphony) });
  }
  if (m) {
    steps.push({
      name: "measurize",
      apply: song =>
        measurize(song, {
          timeSignatures: resolveTimeSignatures(m.timeSignatures),
          keySignatures: m.keySignatures,
        }),
    });
  }
  return steps;
}
