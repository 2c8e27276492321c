import { test, expect } from "@playwright/test";
import {
  findGaps,
  mergeIntervals,
  buildTimeMapping,
  mapTime,
  planSpeedGaps,
  toProtectedRanges,
  remapPlacements,
  applyOffset,
} from "../../packages/timecue/time-map.ts";

test.describe("findGaps", () => {
  test("finds leading, middle and trailing gaps", () => {
    const ranges = [{ startSec: 5, endSec: 10 }, { startSec: 40, endSec: 50 }];
    expect(findGaps(ranges, 60, 2)).toEqual([
      { startSec: 0, endSec: 5 },
      { startSec: 10, endSec: 40 },
      { startSec: 50, endSec: 60 },
    ]);
  });

  test("middle gaps qualify at exactly the minimum, edges must exceed it", () => {
    const ranges = [{ startSec: 2, endSec: 5 }, { startSec: 7, endSec: 10 }];
    expect(findGaps(ranges, 12, 2)).toEqual([{ startSec: 5, endSec: 7 }]);
  });

  test("returns nothing without protected ranges", () => {
    expect(findGaps([], 60, 2)).toEqual([]);
  });

  test("overlapping ranges leave no gap inside the longer one", () => {
    const ranges = [{ startSec: 0, endSec: 10 }, { startSec: 2, endSec: 3 }, { startSec: 8, endSec: 12 }];
    expect(findGaps(ranges, 30, 2)).toEqual([{ startSec: 12, endSec: 30 }]);
  });
});

test("mergeIntervals joins overlapping and touching ranges", () => {
  expect(
    mergeIntervals([
      { startSec: 4, endSec: 6 },
      { startSec: 0, endSec: 2 },
      { startSec: 2, endSec: 3 },
      { startSec: 5, endSec: 9 },
    ]),
  ).toEqual([{ startSec: 0, endSec: 3 }, { startSec: 4, endSec: 9 }]);
});

test("toProtectedRanges skips clips without duration", () => {
  expect(
    toProtectedRanges([{ startSec: 8, durationSec: 2 }, { startSec: 1, durationSec: 0 }, { startSec: 3, durationSec: 1 }]),
  ).toEqual([{ startSec: 3, endSec: 4 }, { startSec: 8, endSec: 10 }]);
});

test.describe("buildTimeMapping", () => {
  const gaps = [{ startSec: 10, endSec: 40 }, { startSec: 50, endSec: 60 }];
  const ranges = [{ startSec: 0, endSec: 10 }, { startSec: 40, endSec: 50 }];
  const mapping = buildTimeMapping(gaps, ranges, 60, 3);

  test("compresses only the gap pieces", () => {
    expect(mapping.breakpoints.slice(0, 4)).toEqual([[0, 0], [10, 10], [40, 20], [50, 30]]);
    expect(mapping.breakpoints[4][0]).toBe(60);
    expect(mapping.breakpoints[4][1]).toBeCloseTo(100 / 3, 9);
    expect(mapping.newDurationSec).toBeCloseTo(100 / 3, 9);
    expect(mapping.factor).toBe(3);
  });

  test("maps the ends and interpolates inside pieces", () => {
    expect(mapTime(0, mapping.breakpoints)).toBe(0);
    expect(mapTime(60, mapping.breakpoints)).toBeCloseTo(mapping.newDurationSec, 9);
    expect(mapping.newDurationSec).toBeLessThanOrEqual(60);
    expect(mapTime(25, mapping.breakpoints)).toBe(15);
    expect(mapTime(45, mapping.breakpoints)).toBe(25);
  });

  test("is monotonic", () => {
    let previous = -Infinity;
    for (let t = 0; t <= 60; t += 0.5) {
      const mapped = mapTime(t, mapping.breakpoints);
      expect(mapped).toBeGreaterThanOrEqual(previous);
      previous = mapped;
    }
  });

  test("extrapolates beyond the mapped range along the nearest piece", () => {
    expect(mapTime(70, mapping.breakpoints)).toBeCloseTo(110 / 3, 9);
    expect(mapTime(-3, mapping.breakpoints)).toBeCloseTo(-3, 9);
  });
});

test("mapTime without breakpoints is the identity", () => {
  expect(mapTime(12.5, [])).toBe(12.5);
});

test.describe("planSpeedGaps", () => {
  test("speeds up the silence around a single narration range", () => {
    const plan = planSpeedGaps({
      protectedRanges: [{ startSec: 40, endSec: 50 }],
      videoDurationSec: 100,
      factor: 3,
      minGapSec: 2,
    });
    expect(plan.gaps).toEqual([{ startSec: 0, endSec: 40 }, { startSec: 50, endSec: 100 }]);
    expect(plan.totalGapSec).toBe(90);
    expect(plan.expectedSavingsSec).toBeCloseTo(60, 9);
    expect(plan.mapping.newDurationSec).toBeCloseTo(40, 9);
    expect(mapTime(45, plan.mapping.breakpoints)).toBeCloseTo(18.333, 3);
    expect(plan.speedSections).toEqual([
      { startSec: 0, endSec: 40, speed: 3 },
      { startSec: 50, endSec: 100, speed: 3 },
    ]);
  });

  test("leaves the timeline alone when no gap qualifies", () => {
    const plan = planSpeedGaps({
      protectedRanges: [{ startSec: 0, endSec: 5 }, { startSec: 6, endSec: 10 }],
      videoDurationSec: 11,
      factor: 3,
      minGapSec: 2,
    });
    expect(plan.gaps).toEqual([]);
    expect(plan.speedSections).toEqual([]);
    expect(plan.expectedDurationSec).toBe(11);
    expect(plan.mapping.breakpoints).toEqual([[0, 0], [11, 11]]);
    expect(mapTime(7.25, plan.mapping.breakpoints)).toBeCloseTo(7.25, 9);
  });

  test("never speeds up a short clip nested inside a longer one", () => {
    const plan = planSpeedGaps({
      protectedRanges: [{ startSec: 0, endSec: 10 }, { startSec: 2, endSec: 3 }, { startSec: 8, endSec: 12 }],
      videoDurationSec: 30,
      factor: 3,
      minGapSec: 2,
    });
    expect(plan.gaps).toEqual([{ startSec: 12, endSec: 30 }]);
    expect(plan.speedSections).toEqual([{ startSec: 12, endSec: 30, speed: 3 }]);
    expect(plan.mapping.breakpoints).toEqual([[0, 0], [12, 12], [30, 18]]);
    expect(plan.mapping.newDurationSec).toBe(18);
    expect(mapTime(8, plan.mapping.breakpoints)).toBe(8);
  });

  test("narration covering the whole video leaves it unchanged", () => {
    const plan = planSpeedGaps({
      protectedRanges: [{ startSec: 0, endSec: 10 }],
      videoDurationSec: 10,
      factor: 3,
      minGapSec: 2,
    });
    expect(plan.gaps).toEqual([]);
    expect(plan.mapping.breakpoints).toEqual([[0, 0], [10, 10]]);
    expect(plan.mapping.newDurationSec).toBe(10);
    expect(plan.expectedDurationSec).toBe(10);
  });
});

test("remapPlacements and applyOffset keep other fields", () => {
  const breakpoints: Array<[number, number]> = [[0, 0], [10, 10], [40, 20]];
  expect(remapPlacements([{ id: "a", startSec: 25 }], breakpoints)).toEqual([{ id: "a", startSec: 15 }]);
  expect(applyOffset([{ id: "a", startSec: 1 }, { id: "b", startSec: 5 }], -2)).toEqual([
    { id: "a", startSec: 0 },
    { id: "b", startSec: 3 },
  ]);
});
