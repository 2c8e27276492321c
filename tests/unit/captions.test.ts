import { test, expect } from "@playwright/test";
import {
  calculateCaptionTimes,
  validateCaptionTiming,
  adjustTimeForSpeed,
  adjustCaptionTimesForEdits,
  type SkippedCaption,
} from "../../packages/timecue/captions.ts";
import { SegmentSchema } from "../../packages/timecue/schemas/segment.ts";

test.describe("calculateCaptionTimes", () => {
  const segments = [
    SegmentSchema.parse({ id: "b", anchor: "t_b", text: "Second" }),
    SegmentSchema.parse({ id: "a", anchor: "t_a", offsetSec: 0.5, text: "Hello there" }),
    SegmentSchema.parse({ id: "c", anchor: "t_missing", text: "Nowhere" }),
    SegmentSchema.parse({ id: "d", anchor: "t_a", text: "Silent" }),
  ];

  test("spans each segment's audio from its anchor, sorted by start", () => {
    const captions = calculateCaptionTimes(segments, { t_a: 1, t_b: 4 }, { a: 2, b: 1.5, c: 1 });
    expect(captions).toEqual([
      { startSec: 1.5, endSec: 3.5, text: "Hello there", segmentId: "a" },
      { startSec: 4, endSec: 5.5, text: "Second", segmentId: "b" },
    ]);
  });

  test("reports skipped segments and continues", () => {
    const skipped: SkippedCaption[] = [];
    calculateCaptionTimes(segments, { t_a: 1, t_b: 4 }, { a: 2, b: 1.5, c: 1, d: 0 }, {
      onSkip: (s) => skipped.push(s),
    });
    expect(skipped.map((s) => [s.segmentId, s.reason])).toEqual([
      ["c", "missing_marker"],
      ["d", "missing_audio"],
    ]);
    expect(skipped[0].detail).toBe("anchor marker 't_missing' not found in timeline");
  });
});

test.describe("validateCaptionTiming", () => {
  test("flags overlapping captions as an issue", () => {
    const result = validateCaptionTiming([
      { startSec: 0, endSec: 5, text: "First caption here" },
      { startSec: 3, endSec: 8, text: "Second caption here" },
    ]);
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual(["Caption 1 overlaps with 2 by 2.00s"]);
    expect(result.totalCaptions).toBe(2);
    expect(result.totalDurationSec).toBe(8);
  });

  test("warns about fast reading speed and long gaps", () => {
    const result = validateCaptionTiming([
      { startSec: 0, endSec: 1, text: "x".repeat(50) },
      { startSec: 7.5, endSec: 10, text: "calm" },
    ]);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      `Caption 1 ('${"x".repeat(30)}...') is too fast: 50.0 chars/sec`,
      "Large gap (6.5s) between caption 1 and 2",
    ]);
  });

  test("accepts an empty list", () => {
    expect(validateCaptionTiming([])).toEqual({
      valid: true,
      issues: [],
      warnings: [],
      totalCaptions: 0,
      totalDurationSec: 0,
    });
  });
});

test.describe("edit adjustment", () => {
  test("adjustTimeForSpeed compresses inside a section and shifts after it", () => {
    const sections = [{ startSec: 10, endSec: 20, speed: 2 }];
    expect(adjustTimeForSpeed(5, sections)).toBe(5);
    expect(adjustTimeForSpeed(15, sections)).toBe(12.5);
    expect(adjustTimeForSpeed(30, sections)).toBe(25);
  });

  test("adjustTimeForSpeed carries the saving of earlier sections once", () => {
    const sections = [
      { startSec: 30, endSec: 40, speed: 5 },
      { startSec: 10, endSec: 20, speed: 2 },
    ];
    expect(adjustTimeForSpeed(35, sections)).toBe(26);
    expect(adjustTimeForSpeed(50, sections)).toBe(37);
  });

  test("is the identity with no trim and no sections", () => {
    const captions = [
      { startSec: 1, endSec: 2, text: "a" },
      { startSec: 3.25, endSec: 4.75, text: "b", segmentId: "b" },
    ];
    expect(adjustCaptionTimesForEdits(captions)).toEqual(captions);
  });

  test("trims the head, dropping captions that end inside it", () => {
    const captions = [
      { startSec: 0, endSec: 1.5, text: "gone" },
      { startSec: 1, endSec: 4, text: "kept" },
      { startSec: 5, endSec: 6, text: "later" },
    ];
    expect(adjustCaptionTimesForEdits(captions, { trimStartSec: 2 })).toEqual([
      { startSec: 0, endSec: 2, text: "kept" },
      { startSec: 3, endSec: 4, text: "later" },
    ]);
    expect(captions[1].startSec).toBe(1);
  });

  test("applies speed sections after the trim", () => {
    const adjusted = adjustCaptionTimesForEdits([{ startSec: 22, endSec: 32, text: "late" }], {
      trimStartSec: 2,
      speedSections: [{ startSec: 10, endSec: 20, speed: 2 }],
    });
    expect(adjusted).toEqual([{ startSec: 15, endSec: 25, text: "late" }]);
  });
});
