/**
 * @description Timeline primitives: marker maps, intervals and time mappings.
 */
import { z } from "zod";

export const MarkerMapSchema = z
  .record(z.string().min(1), z.number().nonnegative())
  .describe("Marker name → seconds from recording start.");

export type MarkerMap = Readonly<Record<string, number>>;

export const IntervalSchema = z
  .object({
    startSec: z.number().describe("Interval start in seconds."),
    endSec: z.number().describe("Interval end in seconds (exclusive of start)."),
  })
  .refine((iv) => iv.endSec > iv.startSec, { message: "endSec must be greater than startSec" })
  .describe("A gap or protected range on the video timeline.");

export type Interval = z.infer<typeof IntervalSchema>;

export const BreakpointSchema = z
  .tuple([z.number().describe("originalSec"), z.number().describe("newSec")])
  .describe("One (original, new) pair of a piecewise-linear time mapping.");

export type Breakpoint = z.infer<typeof BreakpointSchema>;

export const TimeMappingSchema = z.object({
  breakpoints: z.array(BreakpointSchema).describe("Breakpoints, increasing in both coordinates."),
  originalDurationSec: z.number().nonnegative().describe("Duration before the speed-up."),
  newDurationSec: z.number().nonnegative().describe("Duration after the speed-up."),
  factor: z.number().positive().describe("Speed factor applied to gaps."),
});

export type TimeMapping = z.infer<typeof TimeMappingSchema>;

export const SpeedSectionSchema = z.object({
  startSec: z.number().nonnegative().describe("Section start on the source timeline."),
  endSec: z.number().nonnegative().describe("Section end on the source timeline."),
  speed: z.number().positive().describe("Playback speed multiplier for the section."),
});

export type SpeedSection = z.infer<typeof SpeedSectionSchema>;
