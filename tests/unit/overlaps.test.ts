import { test, expect } from "@playwright/test";
import { fixOverlapsCascading, checkOverlaps } from "../../packages/timecue/overlaps.ts";
import type { PositionedSegment } from "../../packages/timecue/schemas/segment.ts";

function clip(id: string, startSec: number, durationSec: number): PositionedSegment {
  return { id, text: id, startSec, durationSec };
}

test("pushes an overlapping clip to the previous end plus the gap", () => {
  const { segments, adjustments } = fixOverlapsCascading([clip("intro", 2.5, 4), clip("prompt1", 5.2, 3)]);
  expect(segments[0].startSec).toBe(2.5);
  expect(segments[1].startSec).toBeCloseTo(6.8, 9);
  expect(adjustments).toHaveLength(1);
  expect(adjustments[0].segmentId).toBe("prompt1");
  expect(adjustments[0].originalStartSec).toBe(5.2);
  expect(adjustments[0].delaySec).toBeCloseTo(1.6, 9);
});

test("cascades a delay through later clips", () => {
  const { segments } = fixOverlapsCascading([clip("a", 0, 5), clip("b", 4, 3), clip("c", 7, 1)]);
  expect(segments.map((s) => s.startSec)).toEqual([0, 5.3, expect.closeTo(8.6, 9)]);
  expect(checkOverlaps(segments)).toEqual([]);
});

test("never moves a clip earlier and leaves touching clips alone", () => {
  const input = [clip("a", 1, 2), clip("b", 3, 1), clip("c", 10, 1)];
  const { segments, adjustments } = fixOverlapsCascading(input);
  expect(adjustments).toEqual([]);
  segments.forEach((s, i) => expect(s.startSec).toBeGreaterThanOrEqual(input[i].startSec));
});

test("honours a custom gap and does not mutate its input", () => {
  const input = [clip("a", 0, 2), clip("b", 1, 2)];
  const { segments } = fixOverlapsCascading(input, { gapSec: 0 });
  expect(segments[1].startSec).toBe(2);
  expect(input[1].startSec).toBe(1);
});

test("empty and single-clip lists come back unchanged", () => {
  expect(fixOverlapsCascading([])).toEqual({ segments: [], adjustments: [] });
  expect(fixOverlapsCascading([clip("intro", 2, 4)])).toEqual({
    segments: [clip("intro", 2, 4)],
    adjustments: [],
  });
  expect(checkOverlaps([])).toEqual([]);
});

test("checkOverlaps reports overlapping neighbours", () => {
  expect(checkOverlaps([clip("b", 3, 1), clip("a", 0, 4)])).toEqual([
    { firstId: "a", firstEndSec: 4, secondId: "b", secondStartSec: 3, overlapSec: 1 },
  ]);
});
