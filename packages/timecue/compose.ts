/**
 * @description Narration composition pipeline: fillers, placement, overlap
 * fixing and the ffmpeg steps that consume them.
 *
 * `planNarration` is pure; `distributeNarration`, `speedGaps` and
 * `buildCaptionFiles` do the file and process I/O around it and report
 * failures as `{ success: false, error, code }` instead of throwing.
 */
import fs from "fs";
import path from "path";
import type { Breakpoint, Interval, MarkerMap } from "./schemas/timeline.ts";
import type { ConditionalSegment, PositionedSegment, Segment } from "./schemas/segment.ts";
import type { CaptionEdits, CaptionEntry, CaptionValidation } from "./schemas/caption.ts";
import type { TimelineOptions } from "./schemas/options.ts";
import { injectConditionalSegments } from "./fillers.ts";
import { resolvePlacements, type MarkerMatch } from "./placement.ts";
import { fixOverlapsCascading, type OverlapAdjustment } from "./overlaps.ts";
import { planSpeedGaps, remapPlacements, toProtectedRanges } from "./time-map.ts";
import { adjustCaptionTimesForEdits, calculateCaptionTimes, validateCaptionTiming, type SkippedCaption } from "./captions.ts";
import { formatSrt, formatVtt, groupWordCaptions } from "./subtitles.ts";
import {
  buildAudioPlacementArgs,
  buildSpeedArgs,
  hasAudioStream,
  probeDurationSeconds,
  runFfmpeg,
} from "./ffmpeg.ts";
import { errorCode, errorMessage } from "./errors.ts";

export interface Failure {
  success: false;
  error: string;
  code: string;
}

function failure(err: unknown): Failure {
  return { success: false, error: errorMessage(err), code: errorCode(err) };
}

// ---------------------------------------------------------------------------
//  Planning (pure)
// ---------------------------------------------------------------------------

export interface NarrationPlanInput {
  segments: readonly Segment[];
  conditionalSegments?: readonly ConditionalSegment[];
  markers: MarkerMap;
  /** Audio length per segment id; segments without one are not placed. */
  audioDurations: Readonly<Record<string, number>>;
  audioPaths?: Readonly<Record<string, string>>;
  /** Breakpoints of an earlier speed-up, when narration goes onto the sped-up video. */
  timeMap?: readonly Breakpoint[];
  overlapGapSec?: number;
  fillerTailSec?: number;
}

export interface NarrationPlan {
  success: boolean;
  reason?: string;
  mode: "strict" | "lenient";
  placements: PositionedSegment[];
  missingMarkers: string[];
  fuzzyMatches: MarkerMatch[];
  overlapsFixed: OverlapAdjustment[];
  fillersAdded: string[];
  /** Segment ids dropped for lack of audio. */
  withoutAudio: string[];
}

export function planNarration(input: NarrationPlanInput): NarrationPlan {
  const { segments, added } = injectConditionalSegments(
    input.segments,
    input.conditionalSegments ?? [],
    input.markers,
    { tailSec: input.fillerTailSec },
  );

  const voiced: Segment[] = [];
  const withoutAudio: string[] = [];
  for (const segment of segments) {
    const durationSec = input.audioDurations[segment.id];
    if (durationSec === undefined || !(durationSec > 0)) {
      withoutAudio.push(segment.id);
      continue;
    }
    const audioPath = input.audioPaths?.[segment.id] ?? segment.audioPath;
    voiced.push({ ...segment, durationSec, ...(audioPath !== undefined ? { audioPath } : {}) });
  }

  const base = {
    fillersAdded: added.map((s) => s.id),
    withoutAudio,
  };

  if (voiced.length === 0) {
    return {
      ...base,
      success: false,
      reason: "No narration audio available for any segment",
      mode: "strict",
      placements: [],
      missingMarkers: [],
      fuzzyMatches: [],
      overlapsFixed: [],
    };
  }

  const placement = resolvePlacements(voiced, input.markers);
  if (placement.segments.length === 0) {
    return {
      ...base,
      success: false,
      reason: `No segment could be placed; missing markers: ${placement.missing.join(", ")}`,
      mode: placement.mode,
      placements: [],
      missingMarkers: placement.missing,
      fuzzyMatches: placement.matches,
      overlapsFixed: [],
    };
  }

  const mapped = input.timeMap?.length
    ? remapPlacements(placement.segments, input.timeMap).sort((a, b) => a.startSec - b.startSec)
    : placement.segments;
  const fixed = fixOverlapsCascading(mapped, { gapSec: input.overlapGapSec });

  return {
    ...base,
    success: true,
    mode: placement.mode,
    placements: fixed.segments,
    missingMarkers: placement.missing,
    fuzzyMatches: placement.matches,
    overlapsFixed: fixed.adjustments,
  };
}

// ---------------------------------------------------------------------------
//  Audio lookup
// ---------------------------------------------------------------------------

/**
 * `<id>.mp3`, else the first `*.mp3` whose stem is `<id>`, ends in `_<id>`
 * or starts with `<id>_` (case-insensitive), e.g. `01_intro.mp3`.
 */
export function findAudioFile(audioDir: string, segmentId: string): string | undefined {
  const exact = path.join(audioDir, `${segmentId}.mp3`);
  if (fs.existsSync(exact)) return exact;
  if (!fs.existsSync(audioDir)) return undefined;

  const id = segmentId.toLowerCase();
  const hit = fs
    .readdirSync(audioDir)
    .filter((f) => f.toLowerCase().endsWith(".mp3"))
    .sort()
    .find((f) => {
      const stem = f.slice(0, -4).toLowerCase();
      return stem === id || stem.endsWith(`_${id}`) || stem.startsWith(`${id}_`);
    });
  return hit ? path.join(audioDir, hit) : undefined;
}

function collectAudio(segments: readonly Segment[], audioDir: string, ffmpeg: string) {
  const audioDurations: Record<string, number> = {};
  const audioPaths: Record<string, string> = {};
  for (const segment of segments) {
    const file = segment.audioPath ?? findAudioFile(audioDir, segment.id);
    if (!file || !fs.existsSync(file)) {
      console.error(`  [compose] No audio for '${segment.id}' in ${audioDir}`);
      continue;
    }
    audioPaths[segment.id] = file;
    audioDurations[segment.id] = probeDurationSeconds(file, ffmpeg);
  }
  return { audioDurations, audioPaths };
}

// ---------------------------------------------------------------------------
//  distribute: place narration clips onto the video
// ---------------------------------------------------------------------------

export interface DistributeOptions {
  videoPath: string;
  audioDir: string;
  outputPath: string;
  segments: readonly Segment[];
  conditionalSegments?: readonly ConditionalSegment[];
  markers: MarkerMap;
  timeMap?: readonly Breakpoint[];
  options: TimelineOptions;
}

export type DistributeResult =
  | (NarrationPlan & { success: true; video: string; videoDurationSec: number })
  | (Failure & { plan?: NarrationPlan });

export function distributeNarration(opts: DistributeOptions): DistributeResult {
  const ffmpeg = opts.options.ffmpegPath;
  try {
    if (!fs.existsSync(opts.videoPath)) {
      return { success: false, error: `Video not found: ${opts.videoPath}`, code: "FILE_NOT_FOUND" };
    }

    // Fillers need audio too, so look up every id the plan could use.
    const candidates = injectConditionalSegments(
      opts.segments,
      opts.conditionalSegments ?? [],
      opts.markers,
      { tailSec: opts.options.fillerTailSec },
    ).segments;
    const { audioDurations, audioPaths } = collectAudio(candidates, opts.audioDir, ffmpeg);

    const plan = planNarration({
      segments: opts.segments,
      conditionalSegments: opts.conditionalSegments,
      markers: opts.markers,
      audioDurations,
      audioPaths,
      timeMap: opts.timeMap,
      overlapGapSec: opts.options.overlapGapSec,
      fillerTailSec: opts.options.fillerTailSec,
    });
    if (!plan.success) {
      return { success: false, error: plan.reason ?? "Nothing to place", code: "VALIDATION", plan };
    }

    if (plan.mode === "lenient") {
      console.error(`  [compose] Strict placement failed; lenient fallback missed: ${plan.missingMarkers.join(", ") || "none"}`);
    }
    for (const fix of plan.overlapsFixed) {
      console.error(
        `  [compose] ${fix.segmentId}: delayed ${fix.delaySec.toFixed(1)}s ` +
          `(${fix.originalStartSec.toFixed(1)}s → ${fix.newStartSec.toFixed(1)}s)`,
      );
    }

    const placements = plan.placements.flatMap((p) =>
      p.audioPath ? [{ startSec: p.startSec, audioPath: p.audioPath }] : [],
    );
    const videoDurationSec = probeDurationSeconds(opts.videoPath, ffmpeg);

    fs.mkdirSync(path.dirname(opts.outputPath), { recursive: true });
    console.error(`  [compose] Mixing ${placements.length} narration clip(s) into ${path.basename(opts.videoPath)}`);
    runFfmpeg(ffmpeg, buildAudioPlacementArgs({
      videoPath: opts.videoPath,
      placements,
      videoDurationSec,
      outputPath: opts.outputPath,
    }));

    return { ...plan, success: true, video: opts.outputPath, videoDurationSec };
  } catch (err) {
    return failure(err);
  }
}

// ---------------------------------------------------------------------------
//  speed-gaps: compress silence between narration clips
// ---------------------------------------------------------------------------

export interface SpeedGapsOptions {
  videoPath: string;
  outputPath: string;
  placements: ReadonlyArray<{ id?: string; startSec: number; durationSec: number }>;
  factor: number;
  minGapSec: number;
  ffmpegPath: string;
}

export interface SpeedGapsSuccess {
  success: true;
  video: string;
  originalDurationSec: number;
  durationSec: number;
  gaps: Interval[];
  gapsTotalSec: number;
  factor: number;
  timeMap: Breakpoint[];
  /** Rough linear alternative to `timeMap`. */
  scaleFactor: number;
  note?: string;
}

export function speedGaps(opts: SpeedGapsOptions): SpeedGapsSuccess | Failure {
  const ffmpeg = opts.ffmpegPath;
  try {
    if (!fs.existsSync(opts.videoPath)) {
      return { success: false, error: `Video not found: ${opts.videoPath}`, code: "FILE_NOT_FOUND" };
    }
    const originalDurationSec = probeDurationSeconds(opts.videoPath, ffmpeg);
    if (!(originalDurationSec > 0)) {
      return { success: false, error: "Could not determine video duration", code: "VALIDATION" };
    }
    const plan = planSpeedGaps({
      protectedRanges: toProtectedRanges(opts.placements),
      videoDurationSec: originalDurationSec,
      factor: opts.factor,
      minGapSec: opts.minGapSec,
    });

    fs.mkdirSync(path.dirname(opts.outputPath), { recursive: true });

    if (plan.gaps.length === 0) {
      fs.copyFileSync(opts.videoPath, opts.outputPath);
      return {
        success: true,
        video: opts.outputPath,
        originalDurationSec,
        durationSec: originalDurationSec,
        gaps: [],
        gapsTotalSec: 0,
        factor: opts.factor,
        timeMap: plan.mapping.breakpoints,
        scaleFactor: 1,
        note: "No gaps long enough to speed up; video unchanged",
      };
    }

    console.error(
      `  [edit] ${plan.gaps.length} gap(s), ${plan.totalGapSec.toFixed(1)}s at ${opts.factor}x ` +
        `→ expected ${plan.expectedDurationSec.toFixed(1)}s (saving ${plan.expectedSavingsSec.toFixed(1)}s)`,
    );
    runFfmpeg(ffmpeg, buildSpeedArgs({
      inputPath: opts.videoPath,
      outputPath: opts.outputPath,
      sections: plan.speedSections,
      durationSec: originalDurationSec,
      withAudio: hasAudioStream(opts.videoPath, ffmpeg),
    }));

    const durationSec = probeDurationSeconds(opts.outputPath, ffmpeg) || plan.mapping.newDurationSec;
    return {
      success: true,
      video: opts.outputPath,
      originalDurationSec,
      durationSec,
      gaps: plan.gaps,
      gapsTotalSec: plan.totalGapSec,
      factor: opts.factor,
      timeMap: plan.mapping.breakpoints,
      scaleFactor: originalDurationSec > 0 ? durationSec / originalDurationSec : 1,
    };
  } catch (err) {
    return failure(err);
  }
}

// ---------------------------------------------------------------------------
//  captions: SRT / VTT files
// ---------------------------------------------------------------------------

export interface CaptionFilesOptions {
  segments: readonly Segment[];
  markers: MarkerMap;
  audioDurations: Readonly<Record<string, number>>;
  outDir: string;
  edits?: CaptionEdits;
  /** Emit short word groups instead of whole sentences. */
  wordsPerGroup?: number;
  maxGapSec?: number;
  maxCharsPerSec?: number;
}

export interface CaptionFilesSuccess {
  success: true;
  srtPath: string;
  vttPath: string;
  captions: CaptionEntry[];
  validation: CaptionValidation;
  skipped: SkippedCaption[];
}

export function buildCaptionFiles(opts: CaptionFilesOptions): CaptionFilesSuccess | Failure {
  try {
    const skipped: SkippedCaption[] = [];
    const raw = calculateCaptionTimes(opts.segments, opts.markers, opts.audioDurations, {
      onSkip: (skip) => {
        skipped.push(skip);
        console.error(`  [captions] Skipping '${skip.segmentId}': ${skip.detail}`);
      },
    });
    const adjusted = adjustCaptionTimesForEdits(raw, opts.edits);
    const validation = validateCaptionTiming(adjusted, {
      maxGapSec: opts.maxGapSec,
      maxCharsPerSec: opts.maxCharsPerSec,
    });
    for (const issue of validation.issues) console.error(`  [captions] ${issue}`);

    const captions = opts.wordsPerGroup ? groupWordCaptions(adjusted, opts.wordsPerGroup) : adjusted;
    fs.mkdirSync(opts.outDir, { recursive: true });
    const srtPath = path.join(opts.outDir, "captions.srt");
    const vttPath = path.join(opts.outDir, "captions.vtt");
    fs.writeFileSync(srtPath, formatSrt(captions), "utf-8");
    fs.writeFileSync(vttPath, formatVtt(captions), "utf-8");

    return { success: true, srtPath, vttPath, captions, validation, skipped };
  } catch (err) {
    return failure(err);
  }
}
