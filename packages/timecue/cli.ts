#!/usr/bin/env tsx
/**
 * @description timecue CLI: yargs-based command parser.
 * Commands: markers, place, distribute, speed-gaps, captions, doctor.
 * Inputs and printed results are validated with the operation schemas.
 */
import fs from "fs";
import { execFileSync } from "child_process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { z, type ZodType } from "zod";
import { MarkersInputSchema, PlaceInputSchema, markersOp, placeOp } from "./ops/timeline.ts";
import { DistributeInputSchema, SpeedGapsInputSchema, distributeOp, speedGapsOp } from "./ops/edit.ts";
import { CaptionsInputSchema, captionsOp } from "./ops/captions.ts";
import { doctorTool } from "./ops/tools.ts";
import { formatOpsHelp } from "./registry.ts";
import { SegmentFileSchema, type Segment } from "./schemas/segment.ts";
import { BreakpointSchema, SpeedSectionSchema } from "./schemas/timeline.ts";
import { resolveOptions } from "./schemas/options.ts";
import { loadMarkers, summarizeTimeline, validateTimelineCompleteness, writeMarkers } from "./markers.ts";
import { buildCaptionFiles, distributeNarration, planNarration, speedGaps } from "./compose.ts";
import { resolveFfprobe } from "./ffmpeg.ts";
import { errorMessage } from "./errors.ts";

// ---------------------------------------------------------------------------
//  Helpers
// ---------------------------------------------------------------------------

const DurationsSchema = z.record(z.number().nonnegative());
const TimeMapSchema = z.array(BreakpointSchema);
const PlacementsSchema = z.array(
  z.object({ id: z.string().optional(), startSec: z.number(), durationSec: z.number().nonnegative() }),
);

function readJson<T extends ZodType>(file: string, schema: T): z.infer<T> {
  if (!fs.existsSync(file)) throw new Error(`File not found: ${file}`);
  return schema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

function authoredDurations(segments: readonly Segment[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const s of segments) if (s.durationSec !== undefined) out[s.id] = s.durationSec;
  return out;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function versionLine(bin: string): string | undefined {
  try {
    return execFileSync(bin, ["-version"], { stdio: "pipe" }).toString().split("\n")[0];
  } catch {
    return undefined;
  }
}

// ---------------------------------------------------------------------------
//  CLI definition
// ---------------------------------------------------------------------------

const cli = yargs(hideBin(process.argv))
  .scriptName("timecue")
  .usage("$0 <command> [options]")
  .strict()
  .demandCommand(1, "Please specify a command: markers, place, distribute, speed-gaps, captions or doctor")
  .help();

// ---- markers <file> -------------------------------------------------------

cli.command(
  "markers <file>",
  markersOp.summary,
  (y) =>
    y
      .positional("file", { type: "string", demandOption: true, describe: MarkersInputSchema.shape.timelineFile.description })
      .option("out", { type: "string", describe: MarkersInputSchema.shape.out.description })
      .option("expect", { type: "string", array: true, describe: MarkersInputSchema.shape.require.description }),
  (argv) => {
    const input = MarkersInputSchema.parse({ timelineFile: argv.file, out: argv.out, require: argv.expect });
    const markers = loadMarkers(input.timelineFile);
    const completeness = validateTimelineCompleteness(input.require, markers);
    const written = input.out ? writeMarkers(input.out, markers) : undefined;
    print(markersOp.output.parse({ ...summarizeTimeline(markers), missing: completeness.missingMarkers, written }));
    if (!completeness.valid) process.exitCode = 1;
  },
);

// ---- place <segments> <timeline> ------------------------------------------

cli.command(
  "place <segments> <timeline>",
  placeOp.summary,
  (y) =>
    y
      .positional("segments", { type: "string", demandOption: true, describe: PlaceInputSchema.shape.segmentsFile.description })
      .positional("timeline", { type: "string", demandOption: true, describe: PlaceInputSchema.shape.timelineFile.description })
      .option("durations", { type: "string", describe: PlaceInputSchema.shape.durationsFile.description })
      .option("time-map", { type: "string", describe: PlaceInputSchema.shape.timeMapFile.description })
      .option("gap", { type: "number", describe: PlaceInputSchema.shape.gapSec.description }),
  (argv) => {
    const input = PlaceInputSchema.parse({
      segmentsFile: argv.segments,
      timelineFile: argv.timeline,
      durationsFile: argv.durations,
      timeMapFile: argv.timeMap,
      gapSec: argv.gap,
    });
    const options = resolveOptions({ overlapGapSec: input.gapSec });
    const file = readJson(input.segmentsFile, SegmentFileSchema);
    const audioDurations = input.durationsFile
      ? readJson(input.durationsFile, DurationsSchema)
      : authoredDurations(file.segments);

    const plan = planNarration({
      segments: file.segments,
      conditionalSegments: file.conditionalSegments,
      markers: loadMarkers(input.timelineFile),
      audioDurations,
      timeMap: input.timeMapFile ? readJson(input.timeMapFile, TimeMapSchema) : undefined,
      overlapGapSec: options.overlapGapSec,
      fillerTailSec: options.fillerTailSec,
    });
    print(placeOp.output.parse(plan));
    if (!plan.success) process.exitCode = 1;
  },
);

// ---- distribute <video> ---------------------------------------------------

cli.command(
  "distribute <video>",
  distributeOp.summary,
  (y) =>
    y
      .positional("video", { type: "string", demandOption: true, describe: DistributeInputSchema.shape.video.description })
      .option("audio-dir", { type: "string", demandOption: true, describe: DistributeInputSchema.shape.audioDir.description })
      .option("segments", { type: "string", demandOption: true, describe: DistributeInputSchema.shape.segmentsFile.description })
      .option("timeline", { type: "string", demandOption: true, describe: DistributeInputSchema.shape.timelineFile.description })
      .option("output", { alias: "o", type: "string", demandOption: true, describe: DistributeInputSchema.shape.output.description })
      .option("time-map", { type: "string", describe: DistributeInputSchema.shape.timeMapFile.description }),
  (argv) => {
    const input = DistributeInputSchema.parse({
      video: argv.video,
      audioDir: argv.audioDir,
      segmentsFile: argv.segments,
      timelineFile: argv.timeline,
      output: argv.output,
      timeMapFile: argv.timeMap,
    });
    const file = readJson(input.segmentsFile, SegmentFileSchema);
    const result = distributeNarration({
      videoPath: input.video,
      audioDir: input.audioDir,
      outputPath: input.output,
      segments: file.segments,
      conditionalSegments: file.conditionalSegments,
      markers: loadMarkers(input.timelineFile),
      timeMap: input.timeMapFile ? readJson(input.timeMapFile, TimeMapSchema) : undefined,
      options: resolveOptions(),
    });
    if (!result.success) {
      print(result);
      process.exitCode = 1;
      return;
    }
    print(distributeOp.output.parse(result));
  },
);

// ---- speed-gaps <video> ---------------------------------------------------

cli.command(
  "speed-gaps <video>",
  speedGapsOp.summary,
  (y) =>
    y
      .positional("video", { type: "string", demandOption: true, describe: SpeedGapsInputSchema.shape.video.description })
      .option("placements", { type: "string", demandOption: true, describe: SpeedGapsInputSchema.shape.placementsFile.description })
      .option("output", { alias: "o", type: "string", demandOption: true, describe: SpeedGapsInputSchema.shape.output.description })
      .option("factor", { type: "number", describe: SpeedGapsInputSchema.shape.factor.description })
      .option("min-gap", { type: "number", describe: SpeedGapsInputSchema.shape.minGapSec.description })
      .option("time-map-out", { type: "string", describe: SpeedGapsInputSchema.shape.timeMapOut.description }),
  (argv) => {
    const input = SpeedGapsInputSchema.parse({
      video: argv.video,
      placementsFile: argv.placements,
      output: argv.output,
      factor: argv.factor,
      minGapSec: argv.minGap,
      timeMapOut: argv.timeMapOut,
    });
    const options = resolveOptions({ speedFactor: input.factor, minGapSec: input.minGapSec });
    const result = speedGaps({
      videoPath: input.video,
      outputPath: input.output,
      placements: readJson(input.placementsFile, PlacementsSchema),
      factor: options.speedFactor,
      minGapSec: options.minGapSec,
      ffmpegPath: options.ffmpegPath,
    });
    if (!result.success) {
      print(result);
      process.exitCode = 1;
      return;
    }
    if (input.timeMapOut) {
      fs.writeFileSync(input.timeMapOut, JSON.stringify(result.timeMap, null, 2) + "\n", "utf-8");
    }
    print(speedGapsOp.output.parse(result));
  },
);

// ---- captions <segments> <timeline> ---------------------------------------

cli.command(
  "captions <segments> <timeline>",
  captionsOp.summary,
  (y) =>
    y
      .positional("segments", { type: "string", demandOption: true, describe: CaptionsInputSchema.shape.segmentsFile.description })
      .positional("timeline", { type: "string", demandOption: true, describe: CaptionsInputSchema.shape.timelineFile.description })
      .option("durations", { type: "string", demandOption: true, describe: CaptionsInputSchema.shape.durationsFile.description })
      .option("out-dir", { type: "string", demandOption: true, describe: CaptionsInputSchema.shape.outDir.description })
      .option("trim-start", { type: "number", describe: CaptionsInputSchema.shape.trimStartSec.description })
      .option("speed-sections", { type: "string", describe: CaptionsInputSchema.shape.speedSectionsFile.description })
      .option("words", { type: "number", describe: CaptionsInputSchema.shape.wordsPerGroup.description }),
  (argv) => {
    const input = CaptionsInputSchema.parse({
      segmentsFile: argv.segments,
      timelineFile: argv.timeline,
      durationsFile: argv.durations,
      outDir: argv.outDir,
      trimStartSec: argv.trimStart,
      speedSectionsFile: argv.speedSections,
      wordsPerGroup: argv.words,
    });
    const options = resolveOptions();
    const result = buildCaptionFiles({
      segments: readJson(input.segmentsFile, SegmentFileSchema).segments,
      markers: loadMarkers(input.timelineFile),
      audioDurations: readJson(input.durationsFile, DurationsSchema),
      outDir: input.outDir,
      edits: {
        trimStartSec: input.trimStartSec,
        speedSections: input.speedSectionsFile ? readJson(input.speedSectionsFile, z.array(SpeedSectionSchema)) : [],
      },
      wordsPerGroup: input.wordsPerGroup,
      maxGapSec: options.maxCaptionGapSec,
      maxCharsPerSec: options.maxCharsPerSec,
    });
    if (!result.success) {
      print(result);
      process.exitCode = 1;
      return;
    }
    print(captionsOp.output.parse(result));
    if (!result.validation.valid) process.exitCode = 1;
  },
);

// ---- doctor ---------------------------------------------------------------

cli.command(
  "doctor",
  doctorTool.summary,
  (y) => y.option("ops", { type: "boolean", default: false, describe: doctorTool.input.shape.ops.description }),
  (argv) => {
    const input = doctorTool.input.parse({ ops: argv.ops });
    const ffmpegPath = resolveOptions().ffmpegPath;
    const report = doctorTool.output.parse({
      platform: `${process.platform} ${process.arch}`,
      node: process.version,
      ffmpeg: versionLine(ffmpegPath),
      ffprobe: versionLine(resolveFfprobe(ffmpegPath)),
    });
    console.log(`platform: ${report.platform}`);
    console.log(`node: ${report.node}`);
    console.log(`ffmpeg: ${report.ffmpeg ?? `not found (${ffmpegPath})`}`);
    console.log(`ffprobe: ${report.ffprobe ?? "not found, durations fall back to ffmpeg's banner"}`);
    if (!process.env.TIMECUE_FFMPEG) {
      console.log("note: set TIMECUE_FFMPEG to use an ffmpeg binary outside PATH.");
    }
    if (input.ops) console.log(formatOpsHelp());
  },
);

// ---- parse & run ----------------------------------------------------------

cli.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
