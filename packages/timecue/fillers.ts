/**
 * @description Conditional filler injection: adds narration lines when a
 * monitored marker-to-marker window runs longer than the script covers.
 */
import type { MarkerMap } from "./schemas/timeline.ts";
import type { ConditionalSegment, SegmentCondition, Segment } from "./schemas/segment.ts";
import { getMarkerTime } from "./markers.ts";

export const DEFAULT_FILLER_TAIL_SEC = 0.5;

export interface FillerInjection {
  /** Base segments followed by the added fillers. */
  segments: Segment[];
  added: Segment[];
}

export interface MonitoredWindow {
  startMarker: string;
  durationSec: number;
}

/**
 * The window a condition opens, or `undefined` when it does not hold.
 * `marker_exists` windows are open-ended.
 */
export function evaluateCondition(condition: SegmentCondition, markers: MarkerMap): MonitoredWindow | undefined {
  if (condition.type === "marker_exists") {
    return getMarkerTime(markers, condition.marker) === undefined
      ? undefined
      : { startMarker: condition.marker, durationSec: Infinity };
  }

  const start = getMarkerTime(markers, condition.startMarker);
  const end = getMarkerTime(markers, condition.endMarker);
  if (start === undefined || end === undefined) return undefined;

  const durationSec = end - start;
  if (durationSec < condition.minDurationSec) return undefined;
  if (condition.maxDurationSec !== undefined && durationSec > condition.maxDurationSec) return undefined;
  return { startMarker: condition.startMarker, durationSec };
}

function materialize(
  conditional: ConditionalSegment,
  window: MonitoredWindow,
  tailSec: number,
): Segment[] {
  const { offsetSec, repeatIntervalSec } = conditional;
  const latestStart = window.durationSec - tailSec;
  if (offsetSec >= latestStart) return [];

  let repeats = 1;
  if (conditional.repeatable && repeatIntervalSec > 0) {
    const fitByTime = Math.floor((window.durationSec - offsetSec) / repeatIntervalSec) + 1;
    repeats = Math.min(conditional.maxRepeats, fitByTime);
  }

  const out: Segment[] = [];
  for (let i = 0; i < repeats; i++) {
    const segOffset = offsetSec + i * repeatIntervalSec;
    if (segOffset >= latestStart) continue;
    out.push({
      id: repeats > 1 ? `${conditional.id}_${i + 1}` : conditional.id,
      anchor: window.startMarker,
      offsetSec: segOffset,
      text: conditional.text,
    });
  }
  return out;
}

/**
 * Evaluate every conditional definition once against the frozen markers and
 * append the fillers that apply. Ids already taken are never inserted twice.
 */
export function injectConditionalSegments(
  segments: readonly Segment[],
  conditionals: readonly ConditionalSegment[],
  markers: MarkerMap,
  opts: { tailSec?: number } = {},
): FillerInjection {
  const tailSec = opts.tailSec ?? DEFAULT_FILLER_TAIL_SEC;
  const taken = new Set(segments.map((s) => s.id));
  const added: Segment[] = [];

  for (const conditional of conditionals) {
    const window = evaluateCondition(conditional.condition, markers);
    if (!window) continue;

    for (const filler of materialize(conditional, window, tailSec)) {
      if (taken.has(filler.id)) continue;
      taken.add(filler.id);
      added.push(filler);
    }
  }

  return { segments: [...segments, ...added], added };
}
