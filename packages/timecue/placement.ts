/**
 * @description Placement resolver: turns anchored narration segments into
 * absolute start times on the recording timeline.
 *
 * Two flavours:
 * - strict: every anchor must be an exact marker name, otherwise nothing is placed;
 * - lenient: ranked fallback matchers, reporting what could not be placed.
 */
import type { MarkerMap } from "./schemas/timeline.ts";
import type { PositionedSegment, Segment } from "./schemas/segment.ts";
import { MissingMarkerError } from "./errors.ts";
import { getMarkerTime, sortedMarkers } from "./markers.ts";

export type MatchStrategy = "exact" | "fuzzy" | "inferred";

export interface MarkerMatch {
  segmentId: string;
  anchor: string;
  marker: string;
  strategy: MatchStrategy;
}

export interface LenientPlacement {
  segments: PositionedSegment[];
  /** Anchors (or `(segment: id)`) that no matcher could place. */
  missing: string[];
  /** Non-exact matches, for the run report. */
  matches: MarkerMatch[];
}

export interface PlacementResult extends LenientPlacement {
  mode: "strict" | "lenient";
}

type Matcher = (segment: Segment, markers: MarkerMap) => string | undefined;

const ANCHOR_SUFFIXES = ["_view", "_loaded", "_ready"];

// ---------------------------------------------------------------------------
//  Matchers: tried in order, first hit wins
// ---------------------------------------------------------------------------

const exactMatch: Matcher = (segment, markers) =>
  segment.anchor && getMarkerTime(markers, segment.anchor) !== undefined ? segment.anchor : undefined;

/** `t_dashboards_view` → any marker containing `t_dashboards`, or contained in the anchor. */
const fuzzyMatch: Matcher = (segment, markers) => {
  const anchor = segment.anchor;
  if (!anchor) return undefined;
  const base = ANCHOR_SUFFIXES.reduce((acc, suffix) => acc.replaceAll(suffix, ""), anchor);
  const hit = sortedMarkers(markers).find(([name]) => name.includes(base) || anchor.includes(name));
  return hit?.[0];
};

/** Segment `dashboards` → first marker whose name mentions it. */
const inferFromId: Matcher = (segment, markers) => {
  const id = segment.id.toLowerCase();
  if (!id) return undefined;
  const hit = sortedMarkers(markers).find(([name]) => name.toLowerCase().includes(id));
  return hit?.[0];
};

const MATCHERS: ReadonlyArray<[MatchStrategy, Matcher]> = [
  ["exact", exactMatch],
  ["fuzzy", fuzzyMatch],
  ["inferred", inferFromId],
];

// ---------------------------------------------------------------------------
//  Resolution
// ---------------------------------------------------------------------------

function position(segment: Segment, markerSec: number): PositionedSegment {
  return {
    id: segment.id,
    text: segment.text,
    startSec: Math.max(0, markerSec + segment.offsetSec),
    durationSec: segment.durationSec ?? 0,
    ...(segment.audioPath !== undefined ? { audioPath: segment.audioPath } : {}),
  };
}

function byStart(a: PositionedSegment, b: PositionedSegment): number {
  return a.startSec - b.startSec;
}

/**
 * Place every segment at `max(0, markers[anchor] + offset)`.
 * Throws `MissingMarkerError` on the first unknown anchor; no partial result.
 */
export function resolveStrict(segments: readonly Segment[], markers: MarkerMap): PositionedSegment[] {
  const positioned = segments.map((segment) => {
    const sec = getMarkerTime(markers, segment.anchor);
    if (sec === undefined) {
      throw new MissingMarkerError(segment.anchor, segment.id, Object.keys(markers));
    }
    return position(segment, sec);
  });
  return positioned.sort(byStart);
}

/** Best-effort placement. Never throws; unplaceable segments are reported in `missing`. */
export function resolveLenient(segments: readonly Segment[], markers: MarkerMap): LenientPlacement {
  const positioned: PositionedSegment[] = [];
  const missing: string[] = [];
  const matches: MarkerMatch[] = [];

  for (const segment of segments) {
    let placed = false;
    for (const [strategy, matcher] of MATCHERS) {
      const marker = matcher(segment, markers);
      const sec = marker === undefined ? undefined : getMarkerTime(markers, marker);
      if (marker === undefined || sec === undefined) continue;

      positioned.push(position(segment, sec));
      if (strategy !== "exact") {
        matches.push({ segmentId: segment.id, anchor: segment.anchor, marker, strategy });
      }
      placed = true;
      break;
    }
    if (!placed) missing.push(segment.anchor || `(segment: ${segment.id})`);
  }

  return { segments: positioned.sort(byStart), missing, matches };
}

/** Strict placement, degrading to lenient when an anchor is missing. */
export function resolvePlacements(segments: readonly Segment[], markers: MarkerMap): PlacementResult {
  try {
    return { mode: "strict", segments: resolveStrict(segments, markers), missing: [], matches: [] };
  } catch (err) {
    if (!(err instanceof MissingMarkerError)) throw err;
    return { mode: "lenient", ...resolveLenient(segments, markers) };
  }
}
