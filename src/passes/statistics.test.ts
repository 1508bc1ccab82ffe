import { describe, it, expect } from "vitest";
import { Chirp } from "../chirp/chirp.js";
import { chirpStatistics, formatStatistics, mchirpStatistics } from "./statistics.js";
import { measurize } from "./measurize.js";

function band(): Chirp {
  return new Chirp({
    ticksPerQuarter: 480,
    channels: [
      {
        id: 0,
        name: "lead",
        notes: [
          { pitch: 60, startTick: 0, durationTicks: 480 },
          { pitch: 64, startTick: 480, durationTicks: 240 },
          { pitch: 67, startTick: 960, durationTicks: 480 },
        ],
      },
      { id: 1, name: "bass", notes: [{ pitch: 48, startTick: 0, durationTicks: 960 }] },
    ],
  });
}

describe("chirpStatistics", () => {
  it("computes counts, ranges and histograms", () => {
    const stats = chirpStatistics(band());
    expect(stats.noteCount).toBe(4);
    expect(stats.pitchMin).toBe(48);
    expect(stats.pitchMax).toBe(67);
    expect([...stats.pitchHistogram]).toEqual([[48, 1], [60, 1], [64, 1], [67, 1]]);
    expect([...stats.durationHistogram]).toEqual([[240, 1], [480, 2], [960, 1]]);
    expect(stats.tickStart).toBe(0);
    expect(stats.tickEnd).toBe(1440);
    expect(stats.tickSpan).toBe(1440);
    expect(stats.measureCount).toBeUndefined();
  });

  it("computes per-channel density in notes per quarter", () => {
    const stats = chirpStatistics(band());
    expect(stats.channels.map(c => [c.id, c.noteCount])).toEqual([[0, 3], [1, 1]]);
    expect(stats.channels[0].density).toBe(1);
    expect(stats.channels[1].density).toBeCloseTo(1 / 3, 10);
  });

  it("handles an empty song", () => {
    const stats = chirpStatistics(new Chirp({ ticksPerQuarter: 480, channels: [{ id: 0, name: "x" }] }));
    expect(stats.noteCount).toBe(0);
    expect(stats.pitchMin).toBeNull();
    expect(stats.pitchMax).toBeNull();
    expect(stats.tickSpan).toBe(0);
    expect(stats.channels[0].density).toBe(0);
  });
});

describe("mchirpStatistics", () => {
  it("counts a tied chain as one note and reports measures", () => {
    const song = new Chirp({
      ticksPerQuarter: 480,
      grid: 120,
      channels: [{ id: 0, notes: [{ pitch: 60, startTick: 1800, durationTicks: 480 }] }],
    });
    const stats = mchirpStatistics(measurize(song, { timeSignatures: [{ tick: 0, numerator: 4, denominator: 4 }] }));
    expect(formatStatistics(stats)).toBe(
      [
        "Notes: 1",
        "Pitch range: 60-60 (C4-C4)",
        "Tick span: 1800-2280 (480 ticks)",
        "Measures: 2",
        "Pitch histogram: 60:1",
        "Duration histogram: 480:1",
        'Channel 0 "": 1 notes, 1.00 notes/quarter',
      ].join("\n"),
    );
  });
});

describe("formatStatistics", () => {
  it("renders one labeled field per line", () => {
    expect(formatStatistics(chirpStatistics(band()))).toBe(
      [
        "Notes: 4",
        "Pitch range: 48-67 (C3-G4)",
        "Tick span: 0-1440 (1440 ticks)",
        "Pitch histogram: 48:1, 60:1, 64:1, 67:1",
        "Duration histogram: 240:1, 480:2, 960:1",
        'Channel 0 "lead": 3 notes, 1.00 notes/quarter',
        'Channel 1 "bass": 1 notes, 0.33 notes/quarter',
      ].join("\n"),
    );
  });

  it("renders an empty song with none markers", () => {
    const stats = chirpStatistics(new Chirp({ ticksPerQuarter: 480, channels: [{ id: 0, name: "x" }] }));
    expect(formatStatistics(stats)).toBe(
      [
        "Notes: 0",
        "Pitch range: none",
        "Tick span: 0-0 (0 ticks)",
        "Pitch histogram: none",
        "Duration histogram: none",
        'Channel 0 "x": 0 notes, 0.00 notes/quarter',
      ].join("\n"),
    );
  });

  it("marks pitches outside the MIDI range", () => {
    const stats = chirpStatistics(
      new Chirp({ ticksPerQuarter: 480, channels: [{ id: 0, notes: [{ pitch: 130, startTick: 0, durationTicks: 480 }] }] }),
    );
    expect(formatStatistics(stats).split("\n")[1]).toBe("Pitch range: 130-130 (?-?)");
  });
});
