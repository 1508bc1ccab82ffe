import { describe, it, expect } from "vitest";
import { Chirp } from "../chirp/chirp.js";
import { isChirpError } from "../chirp/errors.js";
import {
  assertValidGrid,
  estimateDurationGrid,
  estimateGrid,
  quantizationError,
  quantize,
  quantizeWithReport,
  snapTick,
} from "./quantize.js";

function song(notes: Array<[number, number, number]>, ticksPerQuarter = 480): Chirp {
  return new Chirp({
    ticksPerQuarter,
    channels: [
      {
        id: 0,
        notes: notes.map(([pitch, startTick, durationTicks]) => ({ pitch, startTick, durationTicks })),
      },
    ],
  });
}

function triples(s: Chirp): Array<[number, number, number]> {
  return s.channels[0].notes.map(n => [n.pitch, n.startTick, n.durationTicks]);
}

describe("snapTick", () => {
  it("rounds to the nearest grid line", () => {
    expect(snapTick(130, 120)).toBe(120);
    expect(snapTick(179, 120)).toBe(120);
    expect(snapTick(181, 120)).toBe(240);
  });

  it("rounds exact halves up", () => {
    expect(snapTick(60, 120)).toBe(120);
    expect(snapTick(180, 120)).toBe(240);
  });
});

describe("quantize", () => {
  it("snaps start and end to the grid (start 130, duration 110 at grid 120)", () => {
    const q = quantize(song([[60, 130, 110]]), { grid: 120 });
    expect(triples(q)).toEqual([[60, 120, 120]]);
  });

  it("marks the result as quantized to the requested grid", () => {
    const input = song([[60, 13, 470], [62, 500, 230]]);
    expect(input.isQuantized()).toBe(false);
    const q = quantize(input, { grid: 120 });
    expect(q.grid).toBe(120);
    expect(q.isQuantized()).toBe(true);
  });

  it("gives collapsed notes one grid unit", () => {
    const q = quantize(song([[60, 100, 10]]), { grid: 120 });
    expect(triples(q)).toEqual([[60, 120, 120]]);
  });

  it("does not merge notes that land on each other", () => {
    const q = quantize(song([[60, 0, 100], [60, 10, 100]]), { grid: 120 });
    expect(triples(q)).toEqual([[60, 0, 120], [60, 0, 120]]);
  });

  it("is idempotent", () => {
    const input = song([[60, 7, 333], [64, 250, 95], [67, 901, 1201], [55, 1919, 1]]);
    for (const grid of [60, 120, 160, 480]) {
      const once = quantize(input, { grid });
      const twice = quantize(once, { grid });
      expect(twice.toInit()).toEqual(once.toInit());
    }
  });

  it("leaves its input untouched", () => {
    const input = song([[60, 130, 110]]);
    quantize(input, { grid: 120 });
    expect(triples(input)).toEqual([[60, 130, 110]]);
  });

  it("keeps velocity, channel info and tempo", () => {
    const input = new Chirp({
      ticksPerQuarter: 480,
      tempos: [{ tick: 0, microsecondsPerQuarter: 600_000 }],
      channels: [{ id: 4, name: "bass", instrument: 33, notes: [{ pitch: 40, startTick: 5, durationTicks: 470, velocity: 77 }] }],
    });
    const q = quantize(input, { grid: 240 });
    expect(q.tempos).toEqual([{ tick: 0, microsecondsPerQuarter: 600_000 }]);
    expect(q.channels[0].info()).toEqual({ id: 4, name: "bass", instrument: 33 });
    expect(q.channels[0].notes[0]).toEqual({ pitch: 40, startTick: 0, durationTicks: 480, velocity: 77 });
  });

  it("snaps lengths to a separate duration grid and declares the common grid", () => {
    const q = quantize(song([[60, 130, 250], [62, 500, 10]]), { grid: 120, durationGrid: 80 });
    expect(triples(q)).toEqual([[60, 120, 240], [62, 480, 80]]);
    expect(q.grid).toBe(40);
    expect(q.isQuantized()).toBe(true);
  });

  it("fails with InvalidGrid for a duration grid that does not divide a whole note", () => {
    try {
      quantize(song([[60, 0, 480]]), { grid: 120, durationGrid: 7 });
      expect.unreachable();
    } catch (err) {
      expect(isChirpError(err, "InvalidGrid")).toBe(true);
    }
  });

  it("fails with InvalidGrid for non-positive or non-dividing grids", () => {
    for (const grid of [0, -120, 7, 1.5]) {
      try {
        quantize(song([[60, 0, 480]]), { grid });
        expect.unreachable();
      } catch (err) {
        expect(isChirpError(err, "InvalidGrid")).toBe(true);
      }
    }
  });
});

describe("quantizeWithReport", () => {
  it("counts how far starts and durations moved", () => {
    const { report } = quantizeWithReport(song([[60, 130, 110], [62, 240, 120]]), { grid: 120 });
    expect([...report.startDeltas]).toEqual([[-10, 1], [0, 1]]);
    expect([...report.durationDeltas]).toEqual([[10, 1], [0, 1]]);
  });
});

describe("assertValidGrid", () => {
  it("accepts grids dividing a whole note", () => {
    expect(() => assertValidGrid(1920, 480)).not.toThrow();
    expect(() => assertValidGrid(80, 480)).not.toThrow();
  });

  it("rejects grids that do not", () => {
    expect(() => assertValidGrid(1000, 480)).toThrow("does not divide a whole note");
  });
});

describe("estimateGrid", () => {
  it("finds a sixteenth grid", () => {
    expect(estimateGrid(song([[60, 0, 120], [62, 120, 120], [64, 240, 120], [65, 360, 120]]))).toBe(120);
  });

  it("finds an eighth-triplet grid", () => {
    expect(estimateGrid(song([[60, 0, 160], [62, 160, 160], [64, 320, 160]]))).toBe(160);
  });

  it("returns a quarter for quarter-note starts and for an empty song", () => {
    expect(estimateGrid(song([[60, 0, 480], [62, 960, 480]]))).toBe(480);
    expect(estimateGrid(new Chirp({ ticksPerQuarter: 96 }))).toBe(96);
  });

  it("skips candidates that do not divide a whole note", () => {
    const s = song([[60, 0, 7], [62, 7, 7], [64, 14, 7], [65, 21, 7]], 120);
    const grid = estimateGrid(s);
    expect(grid).toBe(1);
    expect(() => assertValidGrid(grid, 120)).not.toThrow();
  });

  it("measures distance to the nearest grid line", () => {
    expect(quantizationError(130, 120)).toBe(10);
    expect(quantizationError(230, 120)).toBe(10);
    expect(quantizationError(240, 120)).toBe(0);
  });
});

describe("estimateDurationGrid", () => {
  it("halves the start grid when lengths are finer than it", () => {
    expect(estimateDurationGrid(song([[60, 0, 100], [62, 480, 110], [64, 960, 120]]))).toBe(240);
  });

  it("keeps an estimate at or above the start grid", () => {
    expect(estimateDurationGrid(song([[60, 0, 100], [62, 480, 110], [64, 960, 120]]), 120)).toBe(120);
    expect(estimateDurationGrid(song([[60, 0, 480], [62, 480, 480]]))).toBe(480);
  });
});
