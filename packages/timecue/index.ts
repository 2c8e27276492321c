/**
 * @description Public API of timecue: markers, placement, overlap fixing,
 * gap speed-up mapping, captions and conditional fillers.
 */

// Schemas
export * from "./schemas/timeline.ts";
export * from "./schemas/segment.ts";
export * from "./schemas/caption.ts";
export * from "./schemas/options.ts";

// Errors
export { MissingMarkerError, TimelineFrozenError, FfmpegError, errorCode, errorMessage } from "./errors.ts";

// Markers
export {
  TimelineRecorder,
  PAGE_MARK_BINDING,
  sortedMarkers,
  formatMarkersMarkdown,
  parseMarkersMarkdown,
  loadMarkers,
  writeMarkers,
  getMarkerTime,
  findMarkersContaining,
  summarizeTimeline,
  validateTimelineCompleteness,
} from "./markers.ts";
export type { MarkerEvent, TimelineSummary, CompletenessReport } from "./markers.ts";

// Placement & overlaps
export { resolveStrict, resolveLenient, resolvePlacements } from "./placement.ts";
export type { MatchStrategy, MarkerMatch, LenientPlacement, PlacementResult } from "./placement.ts";
export { fixOverlapsCascading, checkOverlaps, DEFAULT_OVERLAP_GAP_SEC } from "./overlaps.ts";
export type { OverlapAdjustment, OverlapFixResult, OverlapReport } from "./overlaps.ts";

// Time mapping
export {
  toProtectedRanges,
  mergeIntervals,
  findGaps,
  buildTimeMapping,
  identityMapping,
  mapTime,
  planSpeedGaps,
  remapPlacements,
  applyOffset,
} from "./time-map.ts";
export type { SpeedGapsPlan } from "./time-map.ts";

// Captions
export {
  calculateCaptionTimes,
  validateCaptionTiming,
  adjustTimeForSpeed,
  adjustCaptionTimesForEdits,
} from "./captions.ts";
export type { SkippedCaption } from "./captions.ts";
export {
  formatSrt,
  formatVtt,
  formatTimestamp,
  wrapCaptionText,
  calculateWordTimings,
  groupWordCaptions,
} from "./subtitles.ts";
export type { WordTiming } from "./subtitles.ts";

// Fillers
export { injectConditionalSegments, evaluateCondition, DEFAULT_FILLER_TAIL_SEC } from "./fillers.ts";
export type { FillerInjection, MonitoredWindow } from "./fillers.ts";

// Composition (ffmpeg-backed)
export { planNarration, findAudioFile, distributeNarration, speedGaps, buildCaptionFiles } from "./compose.ts";
export type {
  NarrationPlan,
  NarrationPlanInput,
  DistributeOptions,
  DistributeResult,
  SpeedGapsOptions,
  SpeedGapsSuccess,
  CaptionFilesOptions,
  CaptionFilesSuccess,
  Failure,
} from "./compose.ts";
export { buildAudioPlacementArgs, buildSpeedArgs, buildSpeedSectionFilter, atempoChain, probeDurationSeconds } from "./ffmpeg.ts";

// Operation registry
export { defineOp } from "./define-op.ts";
export type { OpDef, OpExample } from "./define-op.ts";
export { ops, getOpsByCategory, formatOpsHelp } from "./registry.ts";
