/**
 * @description Caption timing: derives one caption per narration segment,
 * checks pacing, and re-times captions after trim / speed edits.
 */
import type { MarkerMap, SpeedSection } from "./schemas/timeline.ts";
import type { Segment } from "./schemas/segment.ts";
import type { CaptionEdits, CaptionEntry, CaptionValidation } from "./schemas/caption.ts";
import { getMarkerTime } from "./markers.ts";

export type { CaptionEntry, CaptionValidation } from "./schemas/caption.ts";

export interface SkippedCaption {
  segmentId: string;
  reason: "missing_audio" | "missing_marker";
  detail: string;
}

/**
 * One caption per segment, spanning the segment's audio.
 * Segments without audio or with an unknown anchor are skipped and reported
 * through `onSkip`; the rest of the batch still gets captions.
 */
export function calculateCaptionTimes(
  segments: readonly Segment[],
  markers: MarkerMap,
  audioDurations: Readonly<Record<string, number>>,
  opts: { onSkip?: (skip: SkippedCaption) => void } = {},
): CaptionEntry[] {
  const captions: CaptionEntry[] = [];

  for (const segment of segments) {
    if (!segment.id || !segment.anchor || !segment.text) continue;

    const duration = audioDurations[segment.id];
    if (duration === undefined || !(duration > 0)) {
      opts.onSkip?.({
        segmentId: segment.id,
        reason: "missing_audio",
        detail: `no narration audio for '${segment.id}'`,
      });
      continue;
    }

    const anchorSec = getMarkerTime(markers, segment.anchor);
    if (anchorSec === undefined) {
      opts.onSkip?.({
        segmentId: segment.id,
        reason: "missing_marker",
        detail: `anchor marker '${segment.anchor}' not found in timeline`,
      });
      continue;
    }

    const startSec = anchorSec + segment.offsetSec;
    captions.push({ startSec, endSec: startSec + duration, text: segment.text, segmentId: segment.id });
  }

  return captions.sort((a, b) => a.startSec - b.startSec);
}

/**
 * Report overlaps (issues) plus long gaps and fast reading speed (warnings).
 * Timing is never changed.
 */
export function validateCaptionTiming(
  captions: readonly CaptionEntry[],
  opts: { maxGapSec?: number; maxCharsPerSec?: number } = {},
): CaptionValidation {
  const maxGapSec = opts.maxGapSec ?? 5;
  const maxCharsPerSec = opts.maxCharsPerSec ?? 20;
  const issues: string[] = [];
  const warnings: string[] = [];

  captions.forEach((caption, i) => {
    const duration = caption.endSec - caption.startSec;
    const charsPerSec = duration > 0 ? caption.text.length / duration : 0;
    if (charsPerSec > maxCharsPerSec) {
      warnings.push(
        `Caption ${i + 1} ('${caption.text.slice(0, 30)}...') is too fast: ${charsPerSec.toFixed(1)} chars/sec`,
      );
    }

    const next = captions[i + 1];
    if (!next) return;

    if (caption.endSec > next.startSec) {
      issues.push(`Caption ${i + 1} overlaps with ${i + 2} by ${(caption.endSec - next.startSec).toFixed(2)}s`);
    }
    const gap = next.startSec - caption.endSec;
    if (gap > maxGapSec) {
      warnings.push(`Large gap (${gap.toFixed(1)}s) between caption ${i + 1} and ${i + 2}`);
    }
  });

  const first = captions[0];
  const last = captions[captions.length - 1];
  return {
    valid: issues.length === 0,
    issues,
    warnings,
    totalCaptions: captions.length,
    totalDurationSec: first && last ? last.endSec - first.startSec : 0,
  };
}

/**
 * Move one timestamp through a list of speed sections. Each section only
 * compresses the part of the timestamp that falls inside it; the time saved
 * by earlier sections is carried forward.
 */
export function adjustTimeForSpeed(sec: number, speedSections: readonly SpeedSection[]): number {
  let shift = 0;
  for (const section of [...speedSections].sort((a, b) => a.startSec - b.startSec)) {
    if (sec < section.startSec) break;

    const length = section.endSec - section.startSec;
    if (sec <= section.endSec) {
      const inside = sec - section.startSec;
      return sec - shift - (inside - inside / section.speed);
    }
    shift += length - length / section.speed;
  }
  return sec - shift;
}

/**
 * Re-time captions after the video was trimmed and/or sped up.
 * Captions that end inside the trimmed head are dropped; the input is not mutated.
 */
export function adjustCaptionTimesForEdits(
  captions: readonly CaptionEntry[],
  edits: CaptionEdits = {},
): CaptionEntry[] {
  const trimStartSec = edits.trimStartSec ?? 0;
  const speedSections = edits.speedSections ?? [];
  const adjusted: CaptionEntry[] = [];

  for (const caption of captions) {
    const endSec = caption.endSec - trimStartSec;
    if (endSec <= 0) continue;
    const startSec = Math.max(0, caption.startSec - trimStartSec);

    adjusted.push({
      ...caption,
      startSec: speedSections.length ? adjustTimeForSpeed(startSec, speedSections) : startSec,
      endSec: speedSections.length ? adjustTimeForSpeed(endSec, speedSections) : endSec,
    });
  }
  return adjusted;
}
