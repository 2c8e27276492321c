import { test, expect } from "@playwright/test";
import { ops, getOpsByCategory, formatOpsHelp } from "../../packages/timecue/registry.ts";
import { PlaceInputSchema, placeOp } from "../../packages/timecue/ops/timeline.ts";
import { speedGapsOp } from "../../packages/timecue/ops/edit.ts";
import { planNarration } from "../../packages/timecue/compose.ts";
import { SegmentSchema } from "../../packages/timecue/schemas/segment.ts";

test("operation names are unique", () => {
  const names = ops.map((op) => op.name);
  expect(new Set(names).size).toBe(names.length);
});

test("every operation is on the CLI", () => {
  expect(ops.filter((op) => op.cli).map((op) => op.name)).toEqual([
    "timeline.markers",
    "timeline.place",
    "narration.distribute",
    "edit.speedGaps",
    "captions.build",
    "tool.doctor",
  ]);
});

test("lookups by category", () => {
  expect(getOpsByCategory("edit").map((op) => op.name)).toEqual(["edit.speedGaps"]);
  expect(getOpsByCategory("timeline").map((op) => op.name)).toEqual(["timeline.markers", "timeline.place"]);
});

test("ops help lists descriptions and examples by category", () => {
  const lines = formatOpsHelp().split("\n");
  expect(lines[0]).toBe("timeline:");
  expect(lines[1]).toBe("  timeline.markers       Inspect, check or convert a marker file.");
  expect(lines).toContain("edit:");
  expect(lines).toContain("  edit.speedGaps         Speed up silent gaps between narration.");
  expect(lines).toContain(
    "    $ timecue speed-gaps out/demo.mp4 --placements out/placements.json -o out/fast.mp4  # 3x through the gaps",
  );
  expect(lines[lines.length - 1]).toBe(`    ${ops[ops.length - 1].description}`);
});

test("input schemas validate CLI arguments", () => {
  expect(PlaceInputSchema.parse({ segmentsFile: "n.json", timelineFile: "t.md" })).toEqual({
    segmentsFile: "n.json",
    timelineFile: "t.md",
  });
  expect(() => PlaceInputSchema.parse({ segmentsFile: "n.json" })).toThrow();
});

test("output schemas accept the results the CLI prints", () => {
  const plan = planNarration({
    segments: [SegmentSchema.parse({ id: "dash", anchor: "t_dashboards_view", text: "Dashboards." })],
    markers: { t_dashboards_open: 9 },
    audioDurations: { dash: 2 },
  });
  const printed = placeOp.output.parse(plan);
  expect(printed.mode).toBe("lenient");
  expect(printed.fuzzyMatches).toEqual([
    { segmentId: "dash", anchor: "t_dashboards_view", marker: "t_dashboards_open", strategy: "fuzzy" },
  ]);
  expect(printed.placements.map((p) => p.startSec)).toEqual([9]);

  const sped = speedGapsOp.output.parse({
    success: true,
    video: "out/fast.mp4",
    originalDurationSec: 30,
    durationSec: 18,
    gaps: [{ startSec: 12, endSec: 30 }],
    gapsTotalSec: 18,
    factor: 3,
    timeMap: [[0, 0], [12, 12], [30, 18]],
    scaleFactor: 0.6,
  });
  expect(sped.factor).toBe(3);
  expect(sped.scaleFactor).toBe(0.6);
  expect(() => speedGapsOp.output.parse({ success: false, error: "x", code: "VALIDATION" })).toThrow();
});
