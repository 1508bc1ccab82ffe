// ─── Pipeline Config Schema ──────────────────────────────────────────────────
//
// Human-authored JSON that drives the pipeline runner and the CLI. Defaults
// are filled in here, at parse time, and nowhere else: every pass takes a
// complete config value.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { POLYPHONY_POLICIES } from "../passes/polyphony.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const NOTE_VALUE = /^(1|2|4|8|16|32|64)(\.|-3)?$/;
const TIME_SIGNATURE = /^\d+\/\d+$/;

/**
 * Ticks, a note value such as "16" or "8-3", or "auto" to estimate the grid
 * from the song.
 */
const GridSchema = z.union([
  z.number().int().positive(),
  z.string().regex(NOTE_VALUE, 'grid must be a note value like "16", "8.", "8-3"'),
  z.literal("auto"),
]);

export const QuantizeConfigSchema = z.object({
  grid: GridSchema,
  /** Separate grid for note lengths; note ends follow `grid` when omitted. */
  durationGrid: GridSchema.optional(),
});

export const PolyphonyConfigSchema = z.object({
  policy: z.enum(POLYPHONY_POLICIES).default("highest-pitch-wins"),
});

export const TimeSignatureEntrySchema = z.object({
  tick: z.number().int().min(0).default(0),
  signature: z.string().regex(TIME_SIGNATURE, 'signature must look like "4/4"'),
});

export const KeySignatureEntrySchema = z.object({
  tick: z.number().int().min(0).default(0),
  fifths: z.number().int().min(-7).max(7),
  mode: z.enum(["major", "minor"]).default("major"),
});

export const MeasurizeConfigSchema = z.object({
  timeSignatures: z.array(TimeSignatureEntrySchema).min(1).default([{ tick: 0, signature: "4/4" }]),
  keySignatures: z.array(KeySignatureEntrySchema).default([]),
});

export const TransformStepSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("transpose"), semitones: z.number().int() }),
  z.object({
    type: z.literal("modulate"),
    num: z.number().int().positive(),
    denom: z.number().int().positive(),
  }),
  z.object({
    type: z.literal("removeControlNotes"),
    max: z.number().int().min(0).max(127).default(8),
  }),
  z.object({ type: z.literal("shiftTicks"), delta: z.number().int() }),
]);

export const PipelineConfigSchema = z.object({
  transforms: z.array(TransformStepSchema).default([]),
  quantize: QuantizeConfigSchema.optional(),
  polyphony: PolyphonyConfigSchema.optional(),
  measurize: MeasurizeConfigSchema.optional(),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type GridInput = z.infer<typeof GridSchema>;
export type TimeSignatureEntry = z.infer<typeof TimeSignatureEntrySchema>;
export type KeySignatureEntry = z.infer<typeof KeySignatureEntrySchema>;
export type TransformStep = z.infer<typeof TransformStepSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a pipeline config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = PipelineConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
