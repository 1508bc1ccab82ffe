#!/usr/bin/env node
// ─── chirp: CLI Entry Point ──────────────────────────────────────────────────
//
// Usage:
//   chirp                               # Show help
//   chirp info <file.mid>               # Statistics and timing of a MIDI file
//   chirp transform <in.mid> <out.mid>  # Run the pipeline and write the result
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { isChirpError } from "./chirp/errors.js";
import { durationToNoteName, keySignatureName } from "./chirp/names.js";
import { microsecondsToBpm } from "./chirp/timeline.js";
import type { KeySignatureEvent, TimeSignatureEvent } from "./chirp/types.js";
import { loadPipelineConfig, parsePipelineConfig } from "./config/loader.js";
import type { PipelineConfig } from "./config/schema.js";
import { chirpToMidi } from "./midi/export.js";
import { midiToChirp, type MidiImport } from "./midi/ingest.js";
import { demeasurize } from "./passes/demeasurize.js";
import { estimateDurationGrid, estimateGrid } from "./passes/quantize.js";
import { chirpTrans, mchirpTrans } from "./passes/transform-engine.js";
import { runPipeline, type PipelineResult } from "./pipeline.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getIntFlag(args: string[], flag: string): number | null {
  const raw = getFlag(args, flag);
  if (raw === null) return null;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.error(`${flag} expects an integer, got "${raw}"`);
    process.exit(1);
  }
  return value;
}

function readMidi(path: string): MidiImport {
  if (!existsSync(path)) {
    console.error(`File not found: ${path}`);
    process.exit(1);
  }
  return midiToChirp(new Uint8Array(readFileSync(path)));
}

function formatTimeSignatures(timeSignatures: readonly TimeSignatureEvent[]): string {
  return timeSignatures.map(ts => `${ts.numerator}/${ts.denominator}@${ts.tick}`).join(", ");
}

function formatKeySignatures(keySignatures: readonly KeySignatureEvent[]): string {
  if (keySignatures.length === 0) return "none";
  return keySignatures.map(k => `${keySignatureName(k)}@${k.tick}`).join(", ");
}

/** Ticks stay numbers; note values and "auto" pass through to the schema. */
function gridArg(raw: string): string | number {
  return /^\d+$/.test(raw) ? Number(raw) : raw;
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdInfo(args: string[]): void {
  const file = args[0];
  if (!file) {
    console.error("Usage: chirp info <file.mid>");
    process.exit(1);
  }

  const { chirp, timeSignatures, keySignatures } = readMidi(file);
  const grid = estimateGrid(chirp);
  const durationGrid = estimateDurationGrid(chirp, grid);
  const tempos = chirp.tempos
    .map(t => `${microsecondsToBpm(t.microsecondsPerQuarter).toFixed(1)}@${t.tick}`)
    .join(", ");

  console.log(`\n${chirp.metadata.title || file}`);
  if (chirp.metadata.copyright) console.log(`Copyright: ${chirp.metadata.copyright}`);
  console.log(`Ticks per quarter: ${chirp.ticksPerQuarter}`);
  console.log(`Tempo (BPM@tick): ${tempos}`);
  console.log(`Time signatures: ${formatTimeSignatures(timeSignatures)}`);
  console.log(`Key signatures: ${formatKeySignatures(keySignatures)}`);
  console.log(`Duration: ${chirp.timeline.ticksToSeconds(chirp.endTick()).toFixed(1)}s`);
  console.log(`Estimated grid: ${grid} ticks (${durationToNoteName(grid, chirp.ticksPerQuarter)})`);
  console.log(`Estimated duration grid: ${durationGrid} ticks (${durationToNoteName(durationGrid, chirp.ticksPerQuarter)})`);
  console.log(`Polyphonic: ${chirp.isPolyphonic() ? "yes" : "no"}`);
  console.log("");
  console.log(chirpTrans.run(chirp).text);
  console.log("");
}

/** Build a raw config from command-line flags, layered over --config. */
function configFromArgs(args: string[], imported: MidiImport): PipelineConfig {
  const configPath = getFlag(args, "--config");
  const base = configPath ? loadPipelineConfig(configPath) : parsePipelineConfig({});

  const transforms = [...base.transforms];
  const transpose = getIntFlag(args, "--transpose");
  if (transpose !== null) transforms.push({ type: "transpose", semitones: transpose });
  const modulation = getFlag(args, "--modulate");
  if (modulation !== null) {
    const [num, denom] = modulation.split("/").map(Number);
    transforms.push({ type: "modulate", num, denom });
  }
  if (hasFlag(args, "--remove-control-notes")) transforms.push({ type: "removeControlNotes", max: 8 });
  const shift = getIntFlag(args, "--shift");
  if (shift !== null) transforms.push({ type: "shiftTicks", delta: shift });

  const raw: Record<string, unknown> = { ...base, transforms };

  const grid = getFlag(args, "--quantize");
  const durationGrid = getFlag(args, "--duration-grid");
  if (grid !== null || durationGrid !== null) {
    const quantize: Record<string, unknown> = { ...base.quantize };
    if (grid !== null) quantize.grid = gridArg(grid);
    if (durationGrid !== null) quantize.durationGrid = gridArg(durationGrid);
    raw.quantize = quantize;
  }
  const policy = getFlag(args, "--policy");
  if (policy !== null || hasFlag(args, "--monophonic")) raw.polyphony = policy ? { policy } : {};

  const timeSignature = getFlag(args, "--time-signature");
  const keySignatures = imported.keySignatures.map(k => ({ ...k }));
  if (timeSignature !== null) {
    raw.measurize = { timeSignatures: [{ tick: 0, signature: timeSignature }], keySignatures };
  } else if (hasFlag(args, "--measurize")) {
    raw.measurize = {
      timeSignatures: imported.timeSignatures.map(ts => ({
        tick: ts.tick,
        signature: `${ts.numerator}/${ts.denominator}`,
      })),
      keySignatures,
    };
  }

  return parsePipelineConfig(raw, "command-line options");
}

function cmdTransform(args: string[]): void {
  const [input, output] = args;
  if (!input || !output || input.startsWith("--") || output.startsWith("--")) {
    console.error("Usage: chirp transform <in.mid> <out.mid> [--config file.json] [--transpose N] [--modulate A/B] [--remove-control-notes] [--shift N] [--quantize GRID] [--duration-grid GRID] [--monophonic] [--policy POLICY] [--measurize] [--time-signature N/D] [--stats]");
    process.exit(1);
  }

  const imported = readMidi(input);
  const config = configFromArgs(args.slice(2), imported);
  const result = runPipeline(imported.chirp, config);
  const showStats = hasFlag(args, "--stats");

  for (const stage of result.stages) {
    console.error(`✓ ${stage.name}`);
    if (showStats) console.error(`${stage.text}\n`);
  }

  if (result.error !== undefined) {
    reportFailure(result);
    process.exit(1);
  }

  let timeSignatures = imported.timeSignatures;
  let keySignatures = imported.keySignatures;
  let song = result.chirp;
  if (result.mchirp) {
    if (showStats) console.error(`measurize output\n${mchirpTrans.run(result.mchirp).text}\n`);
    timeSignatures = result.mchirp.measures
      .filter((m, i, all) => i === 0 || m.timeSignature.numerator !== all[i - 1].timeSignature.numerator
        || m.timeSignature.denominator !== all[i - 1].timeSignature.denominator)
      .map(m => ({ tick: m.startTick, ...m.timeSignature }));
    keySignatures = [...result.mchirp.keySignatures];
    song = demeasurize(result.mchirp);
  }

  writeFileSync(output, chirpToMidi(song, { timeSignatures, keySignatures }));
  console.log(`Wrote ${output} (${song.noteCount()} notes)`);
}

function reportFailure(result: PipelineResult): void {
  const err = result.error;
  const code = isChirpError(err) ? ` [${err.code}]` : "";
  const message = err instanceof Error ? err.message : String(err);
  console.error(`✗ ${result.failedStage ?? "pipeline"}${code}: ${message}`);
}

function cmdHelp(): void {
  console.log(`
chirp: quantize, clean up and measure MIDI songs

Commands:
  info <file.mid>                    Show timing, keys, grid estimates and statistics
  transform <in.mid> <out.mid>       Run the pipeline and write a MIDI file
  help                               Show this help

Transform options:
  --config <file.json>               Pipeline config (flags below are applied on top)
  --transpose <semitones>            Shift every pitch
  --modulate <num/denom>             Metric modulation: scale ticks, keep the sound
  --remove-control-notes             Drop notes at or below pitch 8
  --shift <ticks>                    Move every note in time
  --quantize <grid>                  Grid in ticks, a note value (16, 8., 8-3) or auto
  --duration-grid <grid>             Separate grid for note lengths, same forms
  --monophonic                       Remove same-channel polyphony
  --policy <policy>                  highest-pitch-wins (default), lowest-pitch-wins,
                                     first-wins, last-wins
  --measurize                        Impose measures from the file's time signatures
  --time-signature <n/d>             Impose measures with one time signature
  --stats                            Print statistics for every stage
`);
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "info":
      cmdInfo(args.slice(1));
      break;
    case "transform":
      cmdTransform(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      console.error(`Unknown command: "${command}". Run 'chirp help' for usage.`);
      process.exit(1);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
