/**
 * @description Caption operations.
 */
import { z } from "zod";
import { defineOp } from "../define-op.ts";
import { CaptionEntrySchema, CaptionValidationSchema } from "../schemas/caption.ts";

export const CaptionsInputSchema = z.object({
  segmentsFile: z.string().describe("JSON file with `segments`."),
  timelineFile: z.string().describe("Marker file recorded with the video."),
  durationsFile: z.string().describe("JSON object of segment id → audio seconds."),
  outDir: z.string().describe("Directory for captions.srt and captions.vtt."),
  trimStartSec: z.number().nonnegative().default(0).describe("Seconds cut from the start of the video."),
  speedSectionsFile: z.string().optional().describe("JSON array of { startSec, endSec, speed } applied to the video."),
  wordsPerGroup: z.number().int().positive().optional().describe("Split captions into groups of this many words."),
});

export type CaptionsInput = z.infer<typeof CaptionsInputSchema>;

export const captionsOp = defineOp({
  name: "captions.build",
  category: "captions",
  summary: "Write SRT and VTT captions from narration timing.",
  description:
    "Times each caption to its segment's marker and audio length, adjusts for trims and " +
    "speed changes, validates overlap and reading speed, then writes captions.srt and captions.vtt.",
  input: CaptionsInputSchema,
  output: z.object({
    success: z.literal(true),
    srtPath: z.string(),
    vttPath: z.string(),
    captions: z.array(CaptionEntrySchema),
    validation: CaptionValidationSchema,
    skipped: z.array(z.object({
      segmentId: z.string(),
      reason: z.enum(["missing_audio", "missing_marker"]),
      detail: z.string(),
    })),
  }),
  examples: [
    {
      title: "Captions for a narrated run",
      code: "timecue captions narration.json out/timeline.md --durations out/durations.json --out-dir out",
    },
  ],
  cli: true,
});

export const captionOps = [captionsOp] as const;
