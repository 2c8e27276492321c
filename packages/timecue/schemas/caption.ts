/**
 * @description Caption schemas.
 */
import { z } from "zod";
import { SpeedSectionSchema } from "./timeline.ts";

export const CaptionEntrySchema = z.object({
  startSec: z.number().describe("Caption start in seconds."),
  endSec: z.number().describe("Caption end in seconds."),
  text: z.string().describe("Caption text."),
  segmentId: z.string().optional().describe("Narration segment the caption was derived from."),
});

export type CaptionEntry = z.infer<typeof CaptionEntrySchema>;

export const CaptionEditsSchema = z.object({
  trimStartSec: z.number().nonnegative().default(0).describe("Seconds trimmed from the start of the video."),
  speedSections: z.array(SpeedSectionSchema).default([]).describe("Speed changes applied after the trim."),
});

export type CaptionEdits = z.input<typeof CaptionEditsSchema>;

export const CaptionValidationSchema = z.object({
  valid: z.boolean().describe("False when any caption overlaps the next one."),
  issues: z.array(z.string()).describe("Problems that make the captions invalid."),
  warnings: z.array(z.string()).describe("Informational pacing notes."),
  totalCaptions: z.number().int().describe("Number of captions checked."),
  totalDurationSec: z.number().describe("Span from the first start to the last end."),
});

export type CaptionValidation = z.infer<typeof CaptionValidationSchema>;
