// ─── chirp-pipeline ─────────────────────────────────────────────────────────
//
// Intermediate representations for symbolic music and the passes between
// them: quantize, remove polyphony, measurize, demeasurize, transform.
//
// Usage:
//   import { midiToChirp, quantize, removePolyphony, measurize } from "chirp-pipeline";
//   const { chirp, timeSignatures } = midiToChirp(bytes);
//   const mono = removePolyphony(quantize(chirp, { grid: 120 }), { policy: "highest-pitch-wins" });
//   const measured = measurize(mono, { timeSignatures });
// ─────────────────────────────────────────────────────────────────────────────

// Types
export type {
  TempoEvent,
  TimeSignature,
  TimeSignatureEvent,
  KeySignature,
  KeySignatureEvent,
  NoteEvent,
  SongMetadata,
  ChannelInfo,
  ChirpSource,
  MChirpSource,
  ChirpSink,
  MChirpSink,
} from "./chirp/types.js";
export { emptyMetadata, noteEnd, notesOverlap, compareNotes, lastPerTick } from "./chirp/types.js";

// Errors
export { ChirpError, isChirpError } from "./chirp/errors.js";
export type { ChirpErrorCode } from "./chirp/errors.js";

// Representations
export {
  TickTimeline,
  validateTempoMap,
  bpmToMicroseconds,
  microsecondsToBpm,
  DEFAULT_MICROSECONDS_PER_QUARTER,
} from "./chirp/timeline.js";
export { Chirp, ChirpChannel, assertValidNote, validateChirp } from "./chirp/chirp.js";
export type { ChirpInit, ChannelInit } from "./chirp/chirp.js";
export {
  MChirp,
  joinTiedNotes,
  validateMChirp,
  validateKeySignatureMap,
  ticksPerMeasure,
  ticksPerBeat,
  measureEnd,
} from "./chirp/mchirp.js";
export type {
  Measure,
  MeasureNote,
  MeasureRest,
  MeasureEvent,
  MChirpChannel,
  MChirpInit,
  MeasureBeat,
} from "./chirp/mchirp.js";

// Naming
export {
  NOTE_VALUES,
  pitchToNoteName,
  noteNameToPitch,
  durationToNoteName,
  gridFromNoteValue,
  keySignatureName,
} from "./chirp/names.js";

// Passes
export {
  quantize,
  quantizeWithReport,
  quantizeNote,
  snapTick,
  assertValidGrid,
  quantizationError,
  estimateGrid,
  estimateDurationGrid,
} from "./passes/quantize.js";
export type { QuantizeConfig, QuantizeReport } from "./passes/quantize.js";
export {
  removePolyphony,
  removePolyphonyWithReport,
  resolveChannel,
  POLYPHONY_POLICIES,
} from "./passes/polyphony.js";
export type { PolyphonyConfig, PolyphonyPolicy, PolyphonyReport } from "./passes/polyphony.js";
export {
  measurize,
  buildMeasures,
  validateTimeSignatureMap,
  parseTimeSignature,
  measureIndexAt,
} from "./passes/measurize.js";
export type { MeasurizeConfig } from "./passes/measurize.js";
export { demeasurize } from "./passes/demeasurize.js";

// Statistics + transform engine
export { chirpStatistics, mchirpStatistics, formatStatistics } from "./passes/statistics.js";
export type { SongStatistics, ChannelStatistics } from "./passes/statistics.js";
export { createTransformEngine, chirpTrans, mchirpTrans } from "./passes/transform-engine.js";
export type { Transform, TransformResult, TransformEngine } from "./passes/transform-engine.js";
export {
  transpose,
  transposeMChirp,
  modulate,
  removeControlNotes,
  shiftTicks,
  remapInstruments,
  composeTransforms,
  DEFAULT_CONTROL_NOTE_MAX,
} from "./passes/transforms.js";

// Config + pipeline
export {
  PipelineConfigSchema,
  QuantizeConfigSchema,
  PolyphonyConfigSchema,
  MeasurizeConfigSchema,
  TransformStepSchema,
  KeySignatureEntrySchema,
  validateConfig,
} from "./config/schema.js";
export type {
  PipelineConfig,
  TransformStep,
  TimeSignatureEntry,
  KeySignatureEntry,
  GridInput,
  ConfigError,
} from "./config/schema.js";
export { loadPipelineConfig, parsePipelineConfig } from "./config/loader.js";
export {
  runPipeline,
  transformFromStep,
  resolveGrid,
  resolveDurationGrid,
  resolveTimeSignatures,
} from "./pipeline.js";
export type { PipelineResult, PipelineStage } from "./pipeline.js";

// MIDI adapter
export { midiToChirp, midiSource } from "./midi/ingest.js";
export type { MidiImport } from "./midi/ingest.js";
export { chirpToMidi, midiSink, DEFAULT_VELOCITY } from "./midi/export.js";
export type { MidiExportOptions } from "./midi/export.js";
