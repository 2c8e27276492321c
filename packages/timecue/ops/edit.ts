/**
 * @description Video editing operations: narration mixing and gap speed-up.
 */
import { z } from "zod";
import { defineOp } from "../define-op.ts";
import { BreakpointSchema, IntervalSchema } from "../schemas/timeline.ts";
import { PlaceOutputSchema } from "./timeline.ts";

export const DistributeInputSchema = z.object({
  video: z.string().describe("Recorded video."),
  audioDir: z.string().describe("Directory of per-segment narration .mp3 files."),
  segmentsFile: z.string().describe("JSON file with `segments` and optional `conditionalSegments`."),
  timelineFile: z.string().describe("Marker file recorded with the video."),
  output: z.string().describe("Output video path."),
  timeMapFile: z.string().optional().describe("Breakpoints from a previous speed-gaps run."),
});

export type DistributeInput = z.infer<typeof DistributeInputSchema>;

export const distributeOp = defineOp({
  name: "narration.distribute",
  category: "narration",
  summary: "Mix narration clips onto the video at their markers.",
  description:
    "Places every segment with audio at its marker, fixes overlaps and mixes the clips " +
    "into one audio track with ffmpeg (adelay + apad + amix, normalization off).",
  input: DistributeInputSchema,
  output: PlaceOutputSchema.extend({
    video: z.string().describe("Narrated video."),
    videoDurationSec: z.number().describe("Length of the source video."),
  }),
  examples: [
    {
      title: "Narrate a recording",
      code: "timecue distribute out/demo.mp4 --audio-dir out/audio --segments narration.json --timeline out/timeline.md -o out/narrated.mp4",
    },
  ],
  cli: true,
});

export const SpeedGapsInputSchema = z.object({
  video: z.string().describe("Video to speed up."),
  placementsFile: z.string().describe("JSON array of placements ({ startSec, durationSec }) whose spans stay at 1x."),
  output: z.string().describe("Output video path."),
  factor: z.number().gt(1).optional().describe("Speed multiplier for gaps."),
  minGapSec: z.number().nonnegative().optional().describe("Shorter gaps stay at normal speed."),
  timeMapOut: z.string().optional().describe("Write the breakpoints JSON here."),
});

export type SpeedGapsInput = z.infer<typeof SpeedGapsInputSchema>;

export const speedGapsOp = defineOp({
  name: "edit.speedGaps",
  category: "edit",
  summary: "Speed up silent gaps between narration.",
  description:
    "Finds gaps between protected narration spans, speeds them up in a single ffmpeg pass " +
    "and returns a piecewise-linear time map for re-timing markers and captions.",
  input: SpeedGapsInputSchema,
  output: z.object({
    success: z.literal(true),
    video: z.string(),
    originalDurationSec: z.number(),
    durationSec: z.number(),
    gaps: z.array(IntervalSchema),
    gapsTotalSec: z.number(),
    factor: z.number(),
    timeMap: z.array(BreakpointSchema).describe("Breakpoints [originalSec, newSec] for re-timing."),
    scaleFactor: z.number().describe("New duration over original duration."),
    note: z.string().optional(),
  }),
  examples: [
    { title: "3x through the gaps", code: "timecue speed-gaps out/demo.mp4 --placements out/placements.json -o out/fast.mp4" },
  ],
  cli: true,
});

export const editOps = [distributeOp, speedGapsOp] as const;
