import { describe, it, expect } from "vitest";
import { Chirp } from "../chirp/chirp.js";
import { chirpStatistics } from "./statistics.js";
import { chirpTrans, createTransformEngine, mchirpTrans } from "./transform-engine.js";
import { measurize } from "./measurize.js";
import { removeControlNotes, transpose, transposeMChirp } from "./transforms.js";

function song(): Chirp {
  return new Chirp({
    ticksPerQuarter: 480,
    channels: [
      {
        id: 0,
        name: "lead",
        notes: [
          { pitch: 4, startTick: 0, durationTicks: 480 },
          { pitch: 60, startTick: 480, durationTicks: 480 },
          { pitch: 64, startTick: 960, durationTicks: 960 },
        ],
      },
    ],
  });
}

describe("chirpTrans", () => {
  it("is named ChirpTrans", () => {
    expect(chirpTrans.name).toBe("ChirpTrans");
    expect(mchirpTrans.name).toBe("MChirpTrans");
  });

  it("returns the input unchanged without a transform", () => {
    const input = song();
    expect(chirpTrans.run(input).output).toBe(input);
  });

  it("describes the input, not the output", () => {
    const input = song();
    const identity = chirpTrans.run(input);
    for (const transform of [transpose(12), removeControlNotes(8)]) {
      const result = chirpTrans.run(input, transform);
      expect(result.statistics).toEqual(identity.statistics);
      expect(result.text).toBe(identity.text);
    }
    expect(chirpTrans.run(input, removeControlNotes()).output.noteCount()).toBe(2);
  });

  it("snapshots statistics before a transform that mutates in place", () => {
    const input = song();
    const result = chirpTrans.run(input, s => {
      s.channels[0].addNote({ pitch: 72, startTick: 1920, durationTicks: 480 });
      return s;
    });
    expect(result.statistics.noteCount).toBe(3);
    expect(result.output.noteCount()).toBe(4);
  });

  it("propagates the transform's error unchanged", () => {
    const failure = new TypeError("boom");
    let caught: unknown;
    try {
      chirpTrans.run(song(), () => {
        throw failure;
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBe(failure);
  });

  it("can map to another type", () => {
    const result = chirpTrans.run(song(), s => s.noteCount());
    expect(result.output).toBe(3);
  });
});

describe("mchirpTrans", () => {
  it("reports measure statistics of the input", () => {
    const measured = measurize(song(), { timeSignatures: [{ tick: 0, numerator: 4, denominator: 4 }] });
    const result = mchirpTrans.run(measured, transposeMChirp(2));
    expect(result.statistics.measureCount).toBe(1);
    expect(result.statistics.pitchMax).toBe(64);
    expect(mchirpTrans.statistics(result.output).pitchMax).toBe(66);
  });
});

describe("createTransformEngine", () => {
  it("uses the statistics function it is given", () => {
    const engine = createTransformEngine("Custom", chirpStatistics);
    expect(engine.name).toBe("Custom");
    expect(engine.run(song()).text.split("\n")[0]).toBe("Notes: 3");
  });
});
