/**
 * @description Timeline operations: marker files and narration placement.
 */
import { z } from "zod";
import { defineOp } from "../define-op.ts";
import { PositionedSegmentSchema } from "../schemas/segment.ts";

const MarkerEventSchema = z.object({ name: z.string(), sec: z.number() });

export const MarkersInputSchema = z.object({
  timelineFile: z.string().describe("Marker file: a markdown table block or a JSON object of name → seconds."),
  out: z.string().optional().describe("Write the markers to this file (.md or .json) instead of printing a summary."),
  require: z.array(z.string()).default([]).describe("Markers that must be present."),
});

export type MarkersInput = z.infer<typeof MarkersInputSchema>;

export const MarkersOutputSchema = z.object({
  markerCount: z.number().describe("Number of markers."),
  markerNames: z.array(z.string()).describe("Marker names in time order."),
  firstMarker: MarkerEventSchema.nullable().describe("Earliest marker."),
  lastMarker: MarkerEventSchema.nullable().describe("Latest marker."),
  estimatedDurationSec: z.number().describe("Time of the latest marker."),
  missing: z.array(z.string()).describe("Required markers that are absent."),
  written: z.string().optional().describe("File the markers were written to."),
});

export const markersOp = defineOp({
  name: "timeline.markers",
  category: "timeline",
  summary: "Inspect, check or convert a marker file.",
  description:
    "Load a recorded timeline (markdown block or JSON), report its markers in time order, " +
    "check that required markers exist and optionally re-write it in another format.",
  input: MarkersInputSchema,
  output: MarkersOutputSchema,
  examples: [
    { title: "Summarize a timeline", code: "timecue markers out/timeline.md" },
    { title: "Convert to JSON", code: "timecue markers out/timeline.md --out out/timeline.json" },
  ],
  cli: true,
});

export const PlaceInputSchema = z.object({
  segmentsFile: z.string().describe("JSON file with `segments` and optional `conditionalSegments`."),
  timelineFile: z.string().describe("Marker file the segments are anchored to."),
  durationsFile: z.string().optional().describe("JSON object of segment id → audio seconds (defaults to each segment's durationSec)."),
  timeMapFile: z.string().optional().describe("JSON breakpoints from speed-gaps, to place onto the sped-up video."),
  gapSec: z.number().nonnegative().optional().describe("Silence kept after a delayed clip."),
});

export type PlaceInput = z.infer<typeof PlaceInputSchema>;

export const PlaceOutputSchema = z.object({
  success: z.boolean(),
  reason: z.string().optional(),
  mode: z.enum(["strict", "lenient"]).describe("Which resolver produced the placements."),
  placements: z.array(PositionedSegmentSchema),
  missingMarkers: z.array(z.string()),
  fuzzyMatches: z.array(z.object({
    segmentId: z.string(),
    anchor: z.string(),
    marker: z.string(),
    strategy: z.enum(["exact", "fuzzy", "inferred"]),
  })).describe("Segments placed against a marker other than their anchor."),
  overlapsFixed: z.array(z.object({
    segmentId: z.string(),
    originalStartSec: z.number(),
    newStartSec: z.number(),
    delaySec: z.number(),
  })),
  fillersAdded: z.array(z.string()),
  withoutAudio: z.array(z.string()).describe("Segment ids dropped for lack of audio."),
});

export type PlaceOutput = z.infer<typeof PlaceOutputSchema>;

export const placeOp = defineOp({
  name: "timeline.place",
  category: "timeline",
  summary: "Compute narration start times from markers.",
  description:
    "Resolve each segment's anchor to a marker (strict first, lenient fallback), inject " +
    "conditional fillers, remap through an optional time map and push overlapping clips later.",
  input: PlaceInputSchema,
  output: PlaceOutputSchema,
  examples: [
    { title: "Plan placements", code: "timecue place narration.json out/timeline.md --durations out/durations.json" },
  ],
  cli: true,
});

export const timelineOps = [markersOp, placeOp] as const;
