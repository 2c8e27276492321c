/**
 * @description Tunables shared by the placement, speed-up and caption stages.
 */
import { z } from "zod";

export const TimelineOptionsSchema = z.object({
  overlapGapSec: z.number().nonnegative().default(0.3).describe("Silence inserted after a clip that had to be pushed later."),
  minGapSec: z.number().nonnegative().default(2).describe("Gaps shorter than this are left at normal speed."),
  speedFactor: z.number().gt(1).default(3).describe("Speed multiplier applied to silent gaps."),
  maxCaptionGapSec: z.number().positive().default(5).describe("Gaps between captions above this are reported."),
  maxCharsPerSec: z.number().positive().default(20).describe("Reading speed above this is reported."),
  fillerTailSec: z.number().nonnegative().default(0.5).describe("Fillers must start this long before the window closes."),
  ffmpegPath: z.string().default("ffmpeg").describe("ffmpeg binary (ffprobe is looked up next to it)."),
});

export type TimelineOptions = z.infer<typeof TimelineOptionsSchema>;

/**
 * Merge explicit options over environment overrides and defaults.
 * `TIMECUE_FFMPEG` overrides the ffmpeg binary.
 */
export function resolveOptions(
  partial: z.input<typeof TimelineOptionsSchema> = {},
  env: NodeJS.ProcessEnv = process.env,
): TimelineOptions {
  const merged = { ...partial };
  if (merged.ffmpegPath === undefined && env.TIMECUE_FFMPEG) {
    merged.ffmpegPath = env.TIMECUE_FFMPEG;
  }
  return TimelineOptionsSchema.parse(merged);
}
