import { test, expect } from "@playwright/test";
import { injectConditionalSegments, evaluateCondition } from "../../packages/timecue/fillers.ts";
import { ConditionalSegmentSchema, SegmentSchema } from "../../packages/timecue/schemas/segment.ts";

const markers = { t_wait_start: 10, t_wait_end: 25, t_error: 3 };

function waitFiller(extra: Record<string, unknown> = {}) {
  return ConditionalSegmentSchema.parse({
    id: "filler_wait",
    condition: { type: "duration_between", startMarker: "t_wait_start", endMarker: "t_wait_end", minDurationSec: 5 },
    offsetSec: 3,
    text: "Still processing...",
    ...extra,
  });
}

test.describe("evaluateCondition", () => {
  test("opens a window between two markers", () => {
    expect(evaluateCondition(waitFiller().condition, markers)).toEqual({ startMarker: "t_wait_start", durationSec: 15 });
  });

  test("rejects windows outside the duration bounds", () => {
    expect(evaluateCondition(waitFiller().condition, { t_wait_start: 10, t_wait_end: 12 })).toBeUndefined();
    const bounded = waitFiller({
      condition: { type: "duration_range", startMarker: "t_wait_start", endMarker: "t_wait_end", maxDurationSec: 10 },
    });
    expect(evaluateCondition(bounded.condition, markers)).toBeUndefined();
  });

  test("marker_exists opens an unbounded window", () => {
    expect(evaluateCondition({ type: "marker_exists", marker: "t_error" }, markers)).toEqual({
      startMarker: "t_error",
      durationSec: Infinity,
    });
    expect(evaluateCondition({ type: "marker_exists", marker: "t_absent" }, markers)).toBeUndefined();
  });
});

test.describe("injectConditionalSegments", () => {
  test("repeats while the window lasts, leaving the tail free", () => {
    const { added } = injectConditionalSegments(
      [],
      [waitFiller({ repeatable: true, maxRepeats: 5, repeatIntervalSec: 4 })],
      markers,
    );
    expect(added).toEqual([
      { id: "filler_wait_1", anchor: "t_wait_start", offsetSec: 3, text: "Still processing..." },
      { id: "filler_wait_2", anchor: "t_wait_start", offsetSec: 7, text: "Still processing..." },
      { id: "filler_wait_3", anchor: "t_wait_start", offsetSec: 11, text: "Still processing..." },
    ]);
  });

  test("a single filler keeps its base id", () => {
    const { added } = injectConditionalSegments([], [waitFiller()], markers);
    expect(added.map((s) => s.id)).toEqual(["filler_wait"]);
  });

  test("skips a filler that would start inside the tail", () => {
    expect(injectConditionalSegments([], [waitFiller({ offsetSec: 14.6 })], markers).added).toEqual([]);
    expect(injectConditionalSegments([], [waitFiller({ offsetSec: 14.4 })], markers).added).toHaveLength(1);
  });

  test("caps marker_exists repeats at maxRepeats", () => {
    const conditional = ConditionalSegmentSchema.parse({
      id: "filler_error",
      condition: { type: "marker_exists", marker: "t_error" },
      text: "Let's look at that error.",
      repeatable: true,
      maxRepeats: 3,
      repeatIntervalSec: 2,
    });
    const { added } = injectConditionalSegments([], [conditional], markers);
    expect(added.map((s) => [s.id, s.anchor, s.offsetSec])).toEqual([
      ["filler_error_1", "t_error", 0],
      ["filler_error_2", "t_error", 2],
      ["filler_error_3", "t_error", 4],
    ]);
  });

  test("never inserts an id twice and appends after the base segments", () => {
    const base = [SegmentSchema.parse({ id: "filler_wait", anchor: "t_wait_start", text: "Authored" })];
    const result = injectConditionalSegments(base, [waitFiller()], markers);
    expect(result.added).toEqual([]);
    expect(result.segments).toEqual(base);

    const other = SegmentSchema.parse({ id: "intro", anchor: "t_error", text: "Hi" });
    const appended = injectConditionalSegments([other], [waitFiller()], markers);
    expect(appended.segments.map((s) => s.id)).toEqual(["intro", "filler_wait"]);
  });

  test("adds nothing when the condition does not hold", () => {
    const { segments, added } = injectConditionalSegments([], [waitFiller()], { t_wait_start: 10 });
    expect(segments).toEqual([]);
    expect(added).toEqual([]);
  });
});
