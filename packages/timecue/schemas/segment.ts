/**
 * @description Narration segment schemas: authored segments, resolved
 * placements and conditional filler definitions.
 */
import { z } from "zod";

export const SegmentSchema = z.object({
  id: z.string().describe("Segment id, unique within a segment set."),
  anchor: z.string().describe("Marker name the segment is timed against."),
  offsetSec: z.number().default(0).describe("Seconds added to the anchor time."),
  text: z.string().describe("Narration text."),
  durationSec: z.number().nonnegative().optional().describe("Narration audio length, once synthesized."),
  audioPath: z.string().optional().describe("Path to the synthesized narration audio."),
});

export type Segment = z.infer<typeof SegmentSchema>;

export const PositionedSegmentSchema = z.object({
  id: z.string().describe("Segment id."),
  text: z.string().describe("Narration text."),
  startSec: z.number().nonnegative().describe("Absolute start on the video timeline."),
  durationSec: z.number().nonnegative().describe("Audio length in seconds."),
  audioPath: z.string().optional().describe("Path to the narration audio."),
});

export type PositionedSegment = z.infer<typeof PositionedSegmentSchema>;

export const MarkerExistsConditionSchema = z.object({
  type: z.literal("marker_exists"),
  marker: z.string().describe("Marker that must be present."),
});

export const DurationConditionSchema = z.object({
  type: z.enum(["duration_between", "duration_range"]),
  startMarker: z.string().describe("Marker opening the monitored window."),
  endMarker: z.string().describe("Marker closing the monitored window."),
  minDurationSec: z.number().nonnegative().default(0).describe("Window must last at least this long."),
  maxDurationSec: z.number().nonnegative().optional().describe("Window must last at most this long."),
});

export const SegmentConditionSchema = z
  .union([MarkerExistsConditionSchema, DurationConditionSchema])
  .describe("When a conditional segment applies.");

export type MarkerExistsCondition = z.infer<typeof MarkerExistsConditionSchema>;
export type DurationCondition = z.infer<typeof DurationConditionSchema>;
export type SegmentCondition = z.infer<typeof SegmentConditionSchema>;

export const ConditionalSegmentSchema = z.object({
  id: z.string().describe("Base id; repeats get _1, _2, … suffixes."),
  condition: SegmentConditionSchema,
  offsetSec: z.number().default(0).describe("Seconds after the window's start marker."),
  text: z.string().describe("Filler narration text."),
  repeatable: z.boolean().default(false).describe("Repeat while the window lasts."),
  maxRepeats: z.number().int().positive().default(1).describe("Upper bound on repeats."),
  repeatIntervalSec: z.number().nonnegative().default(0).describe("Spacing between repeats."),
});

export type ConditionalSegment = z.infer<typeof ConditionalSegmentSchema>;

export const SegmentFileSchema = z.object({
  segments: z.array(SegmentSchema).describe("Authored narration segments."),
  conditionalSegments: z.array(ConditionalSegmentSchema).default([]).describe("Filler definitions."),
});

export type SegmentFile = z.infer<typeof SegmentFileSchema>;
