import { describe, it, expect } from "vitest";
import { TickTimeline, bpmToMicroseconds, microsecondsToBpm, validateTempoMap } from "./timeline.js";
import { isChirpError } from "./errors.js";

describe("TickTimeline", () => {
  it("converts ticks to seconds at a constant tempo", () => {
    const t = new TickTimeline(480);
    expect(t.ticksToSeconds(480)).toBe(0.5);
    expect(t.ticksToSeconds(1920)).toBe(2);
  });

  it("accumulates across tempo changes", () => {
    // 120 BPM for one quarter, then 60 BPM
    const t = new TickTimeline(480, [
      { tick: 0, microsecondsPerQuarter: 500_000 },
      { tick: 480, microsecondsPerQuarter: 1_000_000 },
    ]);
    expect(t.ticksToSeconds(480)).toBe(0.5);
    expect(t.ticksToSeconds(960)).toBe(1.5);
    expect(t.secondsToTicks(1.5)).toBeCloseTo(960, 6);
    expect(t.secondsToTicks(0.25)).toBeCloseTo(240, 6);
  });

  it("finds the tempo in effect at a tick", () => {
    const t = new TickTimeline(480, [
      { tick: 0, microsecondsPerQuarter: 500_000 },
      { tick: 960, microsecondsPerQuarter: 400_000 },
    ]);
    expect(t.tempoAt(959).microsecondsPerQuarter).toBe(500_000);
    expect(t.tempoAt(960).microsecondsPerQuarter).toBe(400_000);
    expect(t.bpm).toBe(120);
  });

  it("rejects a non-positive resolution", () => {
    try {
      new TickTimeline(0);
      expect.unreachable();
    } catch (err) {
      expect(isChirpError(err, "MalformedRepresentation")).toBe(true);
    }
  });

  it("rejects a tempo map with non-increasing ticks", () => {
    try {
      new TickTimeline(480, [
        { tick: 0, microsecondsPerQuarter: 500_000 },
        { tick: 0, microsecondsPerQuarter: 400_000 },
      ]);
      expect.unreachable();
    } catch (err) {
      expect(isChirpError(err, "MalformedTempoMap")).toBe(true);
    }
  });
});

describe("validateTempoMap", () => {
  it("returns an empty list for a valid map", () => {
    expect(validateTempoMap([{ tick: 0, microsecondsPerQuarter: 500_000 }])).toEqual([]);
  });

  it("reports a missing tick-0 entry and a non-positive tempo", () => {
    expect(validateTempoMap([{ tick: 5, microsecondsPerQuarter: 0 }])).toEqual([
      "first tempo event must be at tick 0, got 5",
      "tempo[0] must be positive, got 0",
    ]);
  });
});

describe("bpm conversion", () => {
  it("round-trips common tempos", () => {
    expect(bpmToMicroseconds(120)).toBe(500_000);
    expect(bpmToMicroseconds(90)).toBe(666_667);
    expect(microsecondsToBpm(1_000_000)).toBe(60);
  });
});
