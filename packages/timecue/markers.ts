/**
 * @description Timeline marker store: records named events while a session
 * runs, freezes them into a read-only snapshot, and persists that snapshot as
 * a Markdown table (or JSON) for the downstream stages.
 */
import fs from "fs";
import path from "path";
import type { Page } from "playwright";
import { MarkerMapSchema, type MarkerMap } from "./schemas/timeline.ts";
import { TimelineFrozenError } from "./errors.ts";

export type { MarkerMap } from "./schemas/timeline.ts";

const BLOCK_START = "<!-- TIMELINE_MARKERS_START -->";
const BLOCK_END = "<!-- TIMELINE_MARKERS_END -->";
const TABLE_HEADER = ["| Marker | Time (s) |", "|--------|----------|"];

/** Name of the function exposed to recorded pages by `TimelineRecorder.bindToPage`. */
export const PAGE_MARK_BINDING = "__timecueMark";

// ---------------------------------------------------------------------------
//  TimelineRecorder: collects markers during a live session
// ---------------------------------------------------------------------------

export interface MarkerEvent {
  name: string;
  sec: number;
}

export class TimelineRecorder {
  private markers = new Map<string, number>();
  private frozen: MarkerMap | null = null;
  private readonly now: () => number;
  private readonly startedAt: number;

  /** Real-time callback: invoked synchronously for every new marker */
  onMark: ((event: MarkerEvent) => void) | null = null;

  constructor(opts: { now?: () => number; startedAt?: number } = {}) {
    this.now = opts.now ?? Date.now;
    this.startedAt = opts.startedAt ?? this.now();
  }

  /** Record `name` at the current clock time. A repeated name keeps its first time. */
  mark(name: string): number {
    return this.set(name, (this.now() - this.startedAt) / 1000);
  }

  /** Record `name` at an explicit time in seconds. */
  set(name: string, sec: number): number {
    if (this.frozen) throw new TimelineFrozenError(name);
    const existing = this.markers.get(name);
    if (existing !== undefined) return existing;

    const value = Math.max(0, sec);
    this.markers.set(name, value);
    this.onMark?.({ name, sec: value });
    return value;
  }

  has(name: string): boolean {
    return this.markers.has(name);
  }

  get isFrozen(): boolean {
    return this.frozen !== null;
  }

  /** Stop recording and return the read-only snapshot. Idempotent. */
  freeze(): MarkerMap {
    if (!this.frozen) {
      this.frozen = Object.freeze(Object.fromEntries(this.markers));
    }
    return this.frozen;
  }

  /**
   * Let in-page code drop markers: `await window.__timecueMark("t_upload_start")`.
   */
  async bindToPage(page: Pick<Page, "exposeFunction">): Promise<void> {
    await page.exposeFunction(PAGE_MARK_BINDING, (name: string) => this.mark(name));
  }
}

// ---------------------------------------------------------------------------
//  Markdown table format
// ---------------------------------------------------------------------------

/** Markers in ascending time order (ties keep insertion order). */
export function sortedMarkers(markers: MarkerMap): Array<[string, number]> {
  return Object.entries(markers).sort((a, b) => a[1] - b[1]);
}

export function formatMarkersMarkdown(
  markers: MarkerMap,
  opts: { excludeInternal?: boolean } = {},
): string {
  const excludeInternal = opts.excludeInternal ?? true;
  const lines = [BLOCK_START, ...TABLE_HEADER];
  for (const [name, sec] of sortedMarkers(markers)) {
    if (excludeInternal && name.startsWith("_")) continue;
    lines.push(`| ${name} | ${sec.toFixed(2)} |`);
  }
  lines.push(BLOCK_END);
  return lines.join("\n");
}

/**
 * Read markers from a Markdown document. Uses the delimited block when
 * present, otherwise any `| name | time |` rows in the document.
 */
export function parseMarkersMarkdown(text: string): Record<string, number> {
  const startIdx = text.indexOf(BLOCK_START);
  const endIdx = startIdx >= 0 ? text.indexOf(BLOCK_END, startIdx) : -1;
  const body = startIdx >= 0 && endIdx > startIdx
    ? text.slice(startIdx + BLOCK_START.length, endIdx)
    : text;

  const markers: Record<string, number> = {};
  for (const raw of body.split("\n")) {
    const line = raw.trim();
    if (!line.includes("|") || line.startsWith("|--") || line.startsWith("| Marker")) continue;

    const cells = line.split("|").map((c) => c.trim()).filter(Boolean);
    if (cells.length < 2) continue;

    const value = parseFloat(cells[1].replace(/[^0-9.-]+/g, ""));
    if (Number.isFinite(value)) markers[cells[0]] = value;
  }
  return markers;
}

// ---------------------------------------------------------------------------
//  Files
// ---------------------------------------------------------------------------

/** Load markers from a `.md` table or a JSON object file. */
export function loadMarkers(filePath: string): MarkerMap {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Timeline not found: ${filePath}`);
  }
  const text = fs.readFileSync(filePath, "utf-8");
  if (path.extname(filePath).toLowerCase() === ".md") {
    return Object.freeze(parseMarkersMarkdown(text));
  }
  return Object.freeze(MarkerMapSchema.parse(JSON.parse(text)));
}

export function writeMarkers(
  filePath: string,
  markers: MarkerMap,
  opts: { excludeInternal?: boolean } = {},
): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = path.extname(filePath).toLowerCase() === ".md"
    ? formatMarkersMarkdown(markers, opts) + "\n"
    : JSON.stringify(Object.fromEntries(sortedMarkers(markers)), null, 2) + "\n";
  fs.writeFileSync(filePath, content, "utf-8");
  return filePath;
}

// ---------------------------------------------------------------------------
//  Queries
// ---------------------------------------------------------------------------

export function getMarkerTime(markers: MarkerMap, name: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(markers, name) ? markers[name] : undefined;
}

/** Markers whose name contains `pattern`, case-insensitively. */
export function findMarkersContaining(markers: MarkerMap, pattern: string): Record<string, number> {
  const needle = pattern.toLowerCase();
  return Object.fromEntries(
    Object.entries(markers).filter(([name]) => name.toLowerCase().includes(needle)),
  );
}

export interface TimelineSummary {
  markerNames: string[];
  markerCount: number;
  firstMarker: MarkerEvent | null;
  lastMarker: MarkerEvent | null;
  /** Time of the last marker: a lower bound on the recording length. */
  estimatedDurationSec: number;
}

export function summarizeTimeline(markers: MarkerMap): TimelineSummary {
  const sorted = sortedMarkers(markers);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  return {
    markerNames: sorted.map(([name]) => name),
    markerCount: sorted.length,
    firstMarker: first ? { name: first[0], sec: first[1] } : null,
    lastMarker: last ? { name: last[0], sec: last[1] } : null,
    estimatedDurationSec: last ? last[1] : 0,
  };
}

export interface CompletenessReport {
  valid: boolean;
  missingMarkers: string[];
  availableMarkers: string[];
  markerCount: number;
}

export function validateTimelineCompleteness(
  required: readonly string[],
  markers: MarkerMap,
): CompletenessReport {
  const missingMarkers = required.filter((name) => getMarkerTime(markers, name) === undefined);
  return {
    valid: missingMarkers.length === 0,
    missingMarkers,
    availableMarkers: Object.keys(markers),
    markerCount: Object.keys(markers).length,
  };
}
