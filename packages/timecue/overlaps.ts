/**
 * @description Overlap resolver: pushes narration clips later until none
 * overlap, leaving a short breath after every clip that had to move.
 */
import type { PositionedSegment } from "./schemas/segment.ts";

export const DEFAULT_OVERLAP_GAP_SEC = 0.3;

export interface OverlapAdjustment {
  segmentId: string;
  originalStartSec: number;
  newStartSec: number;
  delaySec: number;
}

export interface OverlapFixResult {
  segments: PositionedSegment[];
  adjustments: OverlapAdjustment[];
}

/**
 * Single left-to-right pass over segments sorted by `startSec`.
 * A segment starting before the previous one ends is moved to
 * `prevEnd + gapSec`. Segments only ever move later; inputs are not mutated.
 */
export function fixOverlapsCascading(
  segments: readonly PositionedSegment[],
  opts: { gapSec?: number } = {},
): OverlapFixResult {
  const gapSec = opts.gapSec ?? DEFAULT_OVERLAP_GAP_SEC;
  if (segments.length < 2) return { segments: [...segments], adjustments: [] };

  const fixed: PositionedSegment[] = [segments[0]];
  const adjustments: OverlapAdjustment[] = [];

  for (const segment of segments.slice(1)) {
    const prev = fixed[fixed.length - 1];
    const prevEnd = prev.startSec + prev.durationSec;

    if (segment.startSec < prevEnd) {
      const newStartSec = prevEnd + gapSec;
      fixed.push({ ...segment, startSec: newStartSec });
      adjustments.push({
        segmentId: segment.id,
        originalStartSec: segment.startSec,
        newStartSec,
        delaySec: newStartSec - segment.startSec,
      });
    } else {
      fixed.push(segment);
    }
  }

  return { segments: fixed, adjustments };
}

export interface OverlapReport {
  firstId: string;
  firstEndSec: number;
  secondId: string;
  secondStartSec: number;
  overlapSec: number;
}

/** Report overlapping neighbours (after sorting by start). Empty when clean. */
export function checkOverlaps(
  placements: ReadonlyArray<Pick<PositionedSegment, "id" | "startSec" | "durationSec">>,
): OverlapReport[] {
  const sorted = [...placements].sort((a, b) => a.startSec - b.startSec);
  const overlaps: OverlapReport[] = [];

  for (let i = 0; i < sorted.length - 1; i++) {
    const current = sorted[i];
    const next = sorted[i + 1];
    const currentEnd = current.startSec + current.durationSec;
    if (currentEnd > next.startSec) {
      overlaps.push({
        firstId: current.id,
        firstEndSec: currentEnd,
        secondId: next.id,
        secondStartSec: next.startSec,
        overlapSec: currentEnd - next.startSec,
      });
    }
  }
  return overlaps;
}
