import { describe, it, expect } from "vitest";
import { Chirp } from "../chirp/chirp.js";
import { isChirpError } from "../chirp/errors.js";
import type { MeasureEvent } from "../chirp/mchirp.js";
import type { TimeSignatureEvent } from "../chirp/types.js";
import {
  buildMeasures,
  measureIndexAt,
  measurize,
  parseTimeSignature,
  validateTimeSignatureMap,
} from "./measurize.js";

const FOUR_FOUR: TimeSignatureEvent[] = [{ tick: 0, numerator: 4, denominator: 4 }];

function song(notes: Array<[number, number, number]>, grid = 120): Chirp {
  return new Chirp({
    ticksPerQuarter: 480,
    grid,
    channels: [{ id: 0, notes: notes.map(([pitch, startTick, durationTicks]) => ({ pitch, startTick, durationTicks })) }],
  });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isChirpError(err) ? err.code : "other";
  }
  return undefined;
}

function describeEvents(events: readonly MeasureEvent[]): string[] {
  return events.map(e =>
    e.kind === "rest"
      ? `rest ${e.startTick}+${e.durationTicks}`
      : `${e.pitch} ${e.startTick}+${e.durationTicks}${e.tiedFromPrevious ? " <" : ""}${e.tiedToNext ? " >" : ""}`,
  );
}

describe("measurize", () => {
  it("splits a note across a bar line into a tied pair (1800-2280 in 4/4)", () => {
    const m = measurize(song([[60, 1800, 480]]), { timeSignatures: FOUR_FOUR });
    expect(m.measures.map(x => [x.startTick, x.lengthTicks])).toEqual([[0, 1920], [1920, 1920]]);
    expect(describeEvents(m.channels[0].measures[0])).toEqual(["rest 0+1800", "60 1800+120 >"]);
    expect(describeEvents(m.channels[0].measures[1])).toEqual(["60 1920+360 <", "rest 2280+1560"]);
  });

  it("splits a note spanning several bars into a chain", () => {
    const m = measurize(song([[60, 960, 3840]]), { timeSignatures: FOUR_FOUR });
    expect(m.measures).toHaveLength(3);
    expect(describeEvents(m.channels[0].measures[0])).toEqual(["rest 0+960", "60 960+960 >"]);
    expect(describeEvents(m.channels[0].measures[1])).toEqual(["60 1920+1920 < >"]);
    expect(describeEvents(m.channels[0].measures[2])).toEqual(["60 3840+960 <", "rest 4800+960"]);
  });

  it("follows time-signature changes on bar lines", () => {
    const m = measurize(song([[60, 0, 480], [62, 3360, 480]]), {
      timeSignatures: [
        { tick: 0, numerator: 4, denominator: 4 },
        { tick: 1920, numerator: 3, denominator: 4 },
      ],
    });
    expect(m.measures.map(x => `${x.timeSignature.numerator}/${x.timeSignature.denominator}@${x.startTick}`)).toEqual([
      "4/4@0",
      "3/4@1920",
      "3/4@3360",
    ]);
  });

  it("covers every note start and the last note end", () => {
    const input = song([[60, 0, 240], [62, 240, 600], [64, 1920, 120], [65, 5000 - 200, 1000]], 40);
    const m = measurize(input, { timeSignatures: [{ tick: 0, numerator: 6, denominator: 8 }] });
    for (const note of input.channels[0].notes) {
      const containing = m.measures.filter(x => note.startTick >= x.startTick && note.startTick < x.startTick + x.lengthTicks);
      expect(containing).toHaveLength(1);
    }
    expect(m.endTick()).toBeGreaterThanOrEqual(input.endTick());
  });

  it("narrows the grid to one that divides every bar line", () => {
    const m = measurize(song([[60, 0, 1920]], 480), { timeSignatures: [{ tick: 0, numerator: 7, denominator: 8 }] });
    expect(m.grid).toBe(240);
    expect(describeEvents(m.channels[0].measures[0])).toEqual(["60 0+1680 >"]);
    expect(describeEvents(m.channels[0].measures[1])).toEqual(["60 1680+240 <", "rest 1920+1440"]);
  });

  it("keeps the song's grid when it already divides every bar line", () => {
    expect(measurize(song([[60, 0, 480]]), { timeSignatures: FOUR_FOUR }).grid).toBe(120);
  });

  it("emits one full measure for an empty song", () => {
    const m = measurize(new Chirp({ ticksPerQuarter: 480, channels: [{ id: 0 }] }), { timeSignatures: FOUR_FOUR });
    expect(m.measures).toHaveLength(1);
    expect(describeEvents(m.channels[0].measures[0])).toEqual(["rest 0+1920"]);
  });

  it("keeps velocity on every segment", () => {
    const input = new Chirp({
      ticksPerQuarter: 480,
      grid: 480,
      channels: [{ id: 0, notes: [{ pitch: 60, startTick: 1440, durationTicks: 960, velocity: 101 }] }],
    });
    const m = measurize(input, { timeSignatures: FOUR_FOUR });
    const velocities = m.channels[0].measures.flat().flatMap(e => (e.kind === "note" ? [e.velocity] : []));
    expect(velocities).toEqual([101, 101]);
  });

  it("fails with NotQuantized on an off-grid start", () => {
    expect(codeOf(() => measurize(song([[60, 130, 120]]), { timeSignatures: FOUR_FOUR }))).toBe("NotQuantized");
  });

  it("fails with NotQuantized when the declared grid is coarser than the notes", () => {
    expect(codeOf(() => measurize(song([[60, 1800, 480]], 480), { timeSignatures: FOUR_FOUR }))).toBe("NotQuantized");
  });

  it("fails with PolyphonicInput on overlapping notes, whatever the time signatures", () => {
    const poly = song([[60, 0, 480], [64, 240, 480]]);
    expect(codeOf(() => measurize(poly, { timeSignatures: FOUR_FOUR }))).toBe("PolyphonicInput");
    expect(codeOf(() => measurize(poly, { timeSignatures: [] }))).toBe("PolyphonicInput");
  });

  it("fails with MalformedTimeSignatureMap on a change inside a measure", () => {
    const timeSignatures = [
      { tick: 0, numerator: 4, denominator: 4 },
      { tick: 1000, numerator: 3, denominator: 4 },
    ];
    expect(codeOf(() => measurize(song([[60, 0, 480]]), { timeSignatures }))).toBe("MalformedTimeSignatureMap");
  });
});

describe("buildMeasures", () => {
  it("reports a misplaced change even after the last note", () => {
    try {
      buildMeasures(480, [{ tick: 0, numerator: 4, denominator: 4 }, { tick: 5000, numerator: 3, denominator: 4 }], 480);
      expect.unreachable();
    } catch (err) {
      expect(isChirpError(err, "MalformedTimeSignatureMap")).toBe(true);
      expect(isChirpError(err) && err.message).toBe(
        "time signature change at tick 5000 falls inside the measure [3840, 5760)",
      );
    }
  });

  it("stops at the first bar line at or after the end", () => {
    expect(buildMeasures(480, FOUR_FOUR, 3840).map(m => m.index)).toEqual([0, 1]);
    expect(buildMeasures(480, FOUR_FOUR, 3841).map(m => m.index)).toEqual([0, 1, 2]);
  });
});

describe("validateTimeSignatureMap", () => {
  it("accepts a valid map", () => {
    expect(validateTimeSignatureMap(480, FOUR_FOUR)).toEqual([]);
  });

  it("reports ordering and value problems", () => {
    expect(
      validateTimeSignatureMap(480, [
        { tick: 0, numerator: 4, denominator: 3 },
        { tick: 0, numerator: 0, denominator: 4 },
      ]),
    ).toEqual([
      "timeSignature[0].denominator must be a power of two, got 3",
      "timeSignature[1].tick (0) must be greater than 0",
      "timeSignature[1].numerator must be a positive integer, got 0",
    ]);
  });

  it("requires a first entry at tick 0", () => {
    expect(validateTimeSignatureMap(480, [{ tick: 480, numerator: 4, denominator: 4 }])).toEqual([
      "first time signature must be at tick 0, got 480",
    ]);
  });
});

describe("parseTimeSignature", () => {
  it("parses n/d", () => {
    expect(parseTimeSignature("6/8")).toEqual({ numerator: 6, denominator: 8 });
    expect(parseTimeSignature(" 3/4 ")).toEqual({ numerator: 3, denominator: 4 });
  });

  it("rejects anything else", () => {
    for (const text of ["4", "4/3", "0/4", "four/four"]) {
      expect(codeOf(() => parseTimeSignature(text))).toBe("MalformedTimeSignatureMap");
    }
  });
});

describe("measureIndexAt", () => {
  it("finds the containing measure or -1", () => {
    const measures = buildMeasures(480, FOUR_FOUR, 3840);
    expect(measureIndexAt(measures, 0)).toBe(0);
    expect(measureIndexAt(measures, 1920)).toBe(1);
    expect(measureIndexAt(measures, 3840)).toBe(-1);
  });
});
