/**
 * @description Gap speed-up planning and piecewise-linear time mapping.
 *
 * Narration-bearing ranges play at 1x; silent gaps between them are sped up
 * by a constant factor. The resulting breakpoint list projects any time on
 * the original recording onto the sped-up video.
 */
import type { Breakpoint, Interval, SpeedSection, TimeMapping } from "./schemas/timeline.ts";

export interface SpeedGapsPlan {
  gaps: Interval[];
  totalGapSec: number;
  expectedSavingsSec: number;
  expectedDurationSec: number;
  mapping: TimeMapping;
  speedSections: SpeedSection[];
}

function byStart(a: Interval, b: Interval): number {
  return a.startSec - b.startSec;
}

/** Protected ranges covered by placed narration clips, sorted by start. */
export function toProtectedRanges(
  placements: ReadonlyArray<{ startSec: number; durationSec: number }>,
): Interval[] {
  return placements
    .filter((p) => p.durationSec > 0)
    .map((p) => ({ startSec: p.startSec, endSec: p.startSec + p.durationSec }))
    .sort(byStart);
}

/** Union of overlapping or touching intervals. */
export function mergeIntervals(ranges: readonly Interval[]): Interval[] {
  const merged: Interval[] = [];
  for (const range of [...ranges].sort(byStart)) {
    const last = merged[merged.length - 1];
    if (last && range.startSec <= last.endSec) {
      merged[merged.length - 1] = { startSec: last.startSec, endSec: Math.max(last.endSec, range.endSec) };
    } else {
      merged.push({ ...range });
    }
  }
  return merged;
}

/**
 * Silent intervals around the protected ranges that are long enough to be
 * worth compressing. Overlapping ranges are merged first. Leading and
 * trailing gaps must exceed `minGapSec`; gaps between ranges qualify at
 * exactly `minGapSec`.
 */
export function findGaps(
  protectedRanges: readonly Interval[],
  videoDurationSec: number,
  minGapSec: number,
): Interval[] {
  const ranges = mergeIntervals(protectedRanges);
  if (ranges.length === 0) return [];

  const gaps: Interval[] = [];
  const first = ranges[0];
  if (first.startSec > minGapSec) {
    gaps.push({ startSec: 0, endSec: first.startSec });
  }

  for (let i = 0; i < ranges.length - 1; i++) {
    const currentEnd = ranges[i].endSec;
    const nextStart = ranges[i + 1].startSec;
    if (nextStart - currentEnd >= minGapSec && nextStart > currentEnd) {
      gaps.push({ startSec: currentEnd, endSec: nextStart });
    }
  }

  const lastEnd = ranges[ranges.length - 1].endSec;
  if (videoDurationSec - lastEnd > minGapSec) {
    gaps.push({ startSec: lastEnd, endSec: videoDurationSec });
  }
  return gaps;
}

/**
 * Breakpoints from the sorted union of all boundaries. Sub-intervals that
 * lie inside a gap shrink by `factor`; everything else keeps its length.
 */
export function buildTimeMapping(
  gaps: readonly Interval[],
  protectedRanges: readonly Interval[],
  videoDurationSec: number,
  factor: number,
): TimeMapping {
  const clamp = (t: number) => Math.min(videoDurationSec, Math.max(0, t));
  const boundaries = new Set<number>([0, videoDurationSec]);
  for (const iv of [...gaps, ...protectedRanges]) {
    boundaries.add(clamp(iv.startSec));
    boundaries.add(clamp(iv.endSec));
  }
  const times = [...boundaries].sort((a, b) => a - b);

  const breakpoints: Breakpoint[] = [[0, 0]];
  let newTime = 0;

  for (let i = 0; i < times.length - 1; i++) {
    const origStart = times[i];
    const origEnd = times[i + 1];
    const span = origEnd - origStart;
    if (span <= 0) continue;

    const inGap = gaps.some((g) => g.startSec <= origStart && g.endSec >= origEnd);
    newTime += inGap ? span / factor : span;
    breakpoints.push([origEnd, newTime]);
  }

  return {
    breakpoints,
    originalDurationSec: videoDurationSec,
    newDurationSec: newTime,
    factor,
  };
}

export function identityMapping(videoDurationSec: number): TimeMapping {
  const breakpoints: Breakpoint[] = videoDurationSec > 0
    ? [[0, 0], [videoDurationSec, videoDurationSec]]
    : [[0, 0]];
  return { breakpoints, originalDurationSec: videoDurationSec, newDurationSec: videoDurationSec, factor: 1 };
}

/**
 * Project an original timestamp onto the sped-up timeline by linear
 * interpolation between the bracketing breakpoints. Times outside the
 * mapped range extrapolate along the nearest segment.
 */
export function mapTime(originalSec: number, breakpoints: readonly Breakpoint[]): number {
  if (breakpoints.length === 0) return originalSec;
  if (breakpoints.length === 1) return originalSec - breakpoints[0][0] + breakpoints[0][1];

  let [prevOrig, prevNew] = breakpoints[0];
  for (const [orig, next] of breakpoints.slice(1)) {
    if (originalSec <= orig) {
      if (orig === prevOrig) return next;
      return prevNew + ((originalSec - prevOrig) / (orig - prevOrig)) * (next - prevNew);
    }
    [prevOrig, prevNew] = [orig, next];
  }

  const [beforeOrig, beforeNew] = breakpoints[breakpoints.length - 2];
  const slope = prevOrig === beforeOrig ? 1 : (prevNew - beforeNew) / (prevOrig - beforeOrig);
  return prevNew + (originalSec - prevOrig) * slope;
}

/**
 * Work out which gaps to compress and the mapping that results.
 * No qualifying gap is a no-op: identity mapping, no speed sections.
 */
export function planSpeedGaps(opts: {
  protectedRanges: readonly Interval[];
  videoDurationSec: number;
  factor: number;
  minGapSec: number;
}): SpeedGapsPlan {
  const { videoDurationSec, factor, minGapSec } = opts;
  const protectedRanges = mergeIntervals(opts.protectedRanges);
  const gaps = findGaps(protectedRanges, videoDurationSec, minGapSec);

  if (gaps.length === 0) {
    return {
      gaps,
      totalGapSec: 0,
      expectedSavingsSec: 0,
      expectedDurationSec: videoDurationSec,
      mapping: identityMapping(videoDurationSec),
      speedSections: [],
    };
  }

  const totalGapSec = gaps.reduce((sum, g) => sum + (g.endSec - g.startSec), 0);
  const expectedSavingsSec = totalGapSec * (1 - 1 / factor);
  return {
    gaps,
    totalGapSec,
    expectedSavingsSec,
    expectedDurationSec: videoDurationSec - expectedSavingsSec,
    mapping: buildTimeMapping(gaps, protectedRanges, videoDurationSec, factor),
    speedSections: gaps.map((g) => ({ startSec: g.startSec, endSec: g.endSec, speed: factor })),
  };
}

/** Re-express placement start times on the sped-up timeline. */
export function remapPlacements<T extends { startSec: number }>(
  placements: readonly T[],
  breakpoints: readonly Breakpoint[],
): T[] {
  return placements.map((p) => ({ ...p, startSec: mapTime(p.startSec, breakpoints) }));
}

/** Shift placements after a trim (negative offset), clamping at zero. */
export function applyOffset<T extends { startSec: number }>(placements: readonly T[], offsetSec: number): T[] {
  return placements.map((p) => ({ ...p, startSec: Math.max(0, p.startSec + offsetSec) }));
}
