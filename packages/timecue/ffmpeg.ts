/**
 * @description ffmpeg glue: duration probing, the delayed-track narration
 * mix, and the trim/setpts/atempo graph used for gap speed-ups.
 * Argument builders are pure; only `probe*` and `runFfmpeg` spawn processes.
 */
import fs from "fs";
import path from "path";
import { execFileSync, spawnSync } from "child_process";
import type { PositionedSegment } from "./schemas/segment.ts";
import type { SpeedSection } from "./schemas/timeline.ts";
import { FfmpegError, errorMessage } from "./errors.ts";

// ---------------------------------------------------------------------------
//  Probing
// ---------------------------------------------------------------------------

/** ffprobe is co-located with ffmpeg when it sits next to the given binary. */
export function resolveFfprobe(ffmpegPath?: string): string {
  if (ffmpegPath) {
    const probePath = path.join(path.dirname(ffmpegPath), `ffprobe${path.extname(ffmpegPath)}`);
    if (fs.existsSync(probePath)) return probePath;
  }
  return "ffprobe";
}

function probeText(file: string, ffmpeg: string): string {
  const res = spawnSync(ffmpeg, ["-hide_banner", "-i", file], { encoding: "utf-8" });
  return String(res.stderr ?? "") + String(res.stdout ?? "");
}

/** Parse the `Duration: HH:MM:SS.ff` line ffmpeg prints for an input. */
export function parseDurationLine(text: string): number | undefined {
  const m = text.match(/Duration:\s*(\d{2}):(\d{2}):(\d{2})\.(\d+)/);
  if (!m) return undefined;
  const frac = parseInt(m[4], 10) / Math.pow(10, m[4].length);
  return parseInt(m[1], 10) * 3600 + parseInt(m[2], 10) * 60 + parseInt(m[3], 10) + frac;
}

/** Media duration in seconds: ffprobe first, then ffmpeg's banner. 0 when unknown. */
export function probeDurationSeconds(file: string, ffmpeg: string): number {
  try {
    const out = execFileSync(
      resolveFfprobe(ffmpeg),
      ["-v", "error", "-show_entries", "format=duration", "-of", "csv=p=0", file],
      { encoding: "utf-8", stdio: ["pipe", "pipe", "pipe"] },
    ).trim();
    const seconds = parseFloat(out);
    if (Number.isFinite(seconds)) return seconds;
  } catch (err) {
    console.error(`    [ffmpeg] ffprobe unavailable for ${path.basename(file)}: ${errorMessage(err)}`);
  }
  return parseDurationLine(probeText(file, ffmpeg)) ?? 0;
}

export function hasAudioStream(file: string, ffmpeg: string): boolean {
  return /Stream.*Audio:/.test(probeText(file, ffmpeg));
}

// ---------------------------------------------------------------------------
//  Narration mix
// ---------------------------------------------------------------------------

export interface AudioPlacementInput {
  videoPath: string;
  placements: ReadonlyArray<Pick<PositionedSegment, "startSec"> & { audioPath: string }>;
  videoDurationSec: number;
  outputPath: string;
}

/**
 * One input per clip, each delayed to its start and padded to the video
 * length, mixed without normalisation (clips never overlap).
 * WebM sources are re-encoded to H.264; everything else copies the video stream.
 */
export function buildAudioPlacementArgs(input: AudioPlacementInput): string[] {
  const { videoPath, placements, videoDurationSec, outputPath } = input;
  if (placements.length === 0) throw new Error("buildAudioPlacementArgs: no placements");

  const args: string[] = ["-y", "-i", videoPath];
  const filterParts: string[] = [];
  const mixInputs: string[] = [];
  const single = placements.length === 1;

  placements.forEach((p, i) => {
    args.push("-i", p.audioPath);
    const delayMs = Math.max(0, Math.round(p.startSec * 1000));
    const label = single ? "aout" : `a${i}`;
    filterParts.push(`[${i + 1}:a]adelay=${delayMs}|${delayMs},apad=pad_dur=${fmt(videoDurationSec)}[${label}]`);
    mixInputs.push(`[${label}]`);
  });

  if (!single) {
    filterParts.push(`${mixInputs.join("")}amix=inputs=${placements.length}:duration=longest:normalize=0[aout]`);
  }

  const videoCodec = path.extname(videoPath).toLowerCase() === ".webm"
    ? ["-c:v", "libx264", "-preset", "medium", "-crf", "20", "-pix_fmt", "yuv420p"]
    : ["-c:v", "copy"];

  args.push(
    "-filter_complex", filterParts.join(";"),
    "-map", "0:v",
    "-map", "[aout]",
    ...videoCodec,
    "-c:a", "aac", "-b:a", "128k",
    "-shortest",
    "-movflags", "+faststart",
    outputPath,
  );
  return args;
}

// ---------------------------------------------------------------------------
//  Speed sections
// ---------------------------------------------------------------------------

function fmt(n: number): string {
  return String(Number(n.toFixed(3)));
}

/** atempo only accepts 0.5–2.0 per stage, so larger changes are chained. */
export function atempoChain(speed: number): string {
  const stages: string[] = [];
  let remaining = speed;
  while (remaining > 2) {
    stages.push("atempo=2.0");
    remaining /= 2;
  }
  while (remaining < 0.5) {
    stages.push("atempo=0.5");
    remaining /= 0.5;
  }
  stages.push(`atempo=${String(Number(remaining.toFixed(6)))}`);
  return stages.join(",");
}

export interface SpeedPiece {
  startSec: number;
  endSec: number;
  speed: number;
}

/** Cover `[0, duration]` with the given sections plus 1x pieces in between. */
export function speedPieces(sections: readonly SpeedSection[], durationSec: number): SpeedPiece[] {
  const pieces: SpeedPiece[] = [];
  let cursor = 0;
  for (const s of [...sections].sort((a, b) => a.startSec - b.startSec)) {
    const start = Math.max(cursor, s.startSec);
    const end = Math.min(durationSec, s.endSec);
    if (end <= start) continue;
    if (start > cursor) pieces.push({ startSec: cursor, endSec: start, speed: 1 });
    pieces.push({ startSec: start, endSec: end, speed: s.speed });
    cursor = end;
  }
  if (cursor < durationSec) pieces.push({ startSec: cursor, endSec: durationSec, speed: 1 });
  return pieces;
}

export function buildSpeedSectionFilter(
  sections: readonly SpeedSection[],
  durationSec: number,
  opts: { withAudio: boolean },
): string {
  const pieces = speedPieces(sections, durationSec);
  const parts: string[] = [];
  const concatInputs: string[] = [];

  pieces.forEach((p, i) => {
    const range = `start=${fmt(p.startSec)}:end=${fmt(p.endSec)}`;
    const setpts = p.speed === 1 ? "setpts=PTS-STARTPTS" : `setpts=(PTS-STARTPTS)/${fmt(p.speed)}`;
    parts.push(`[0:v]trim=${range},${setpts}[v${i}]`);
    concatInputs.push(`[v${i}]`);
    if (opts.withAudio) {
      const tempo = p.speed === 1 ? "" : `,${atempoChain(p.speed)}`;
      parts.push(`[0:a]atrim=${range},asetpts=PTS-STARTPTS${tempo}[a${i}]`);
      concatInputs.push(`[a${i}]`);
    }
  });

  const outputs = opts.withAudio ? "[vout][aout]" : "[vout]";
  parts.push(`${concatInputs.join("")}concat=n=${pieces.length}:v=1:a=${opts.withAudio ? 1 : 0}${outputs}`);
  return parts.join(";");
}

export function buildSpeedArgs(opts: {
  inputPath: string;
  outputPath: string;
  sections: readonly SpeedSection[];
  durationSec: number;
  withAudio: boolean;
}): string[] {
  const filter = buildSpeedSectionFilter(opts.sections, opts.durationSec, { withAudio: opts.withAudio });
  return [
    "-y", "-i", opts.inputPath,
    "-filter_complex", filter,
    "-map", "[vout]",
    ...(opts.withAudio ? ["-map", "[aout]", "-c:a", "aac", "-b:a", "128k"] : []),
    "-c:v", "libx264", "-preset", "veryfast", "-crf", "18", "-pix_fmt", "yuv420p",
    "-movflags", "+faststart",
    opts.outputPath,
  ];
}

// ---------------------------------------------------------------------------
//  Execution
// ---------------------------------------------------------------------------

export function runFfmpeg(ffmpeg: string, args: readonly string[]): void {
  try {
    execFileSync(ffmpeg, [...args], { stdio: "pipe", maxBuffer: 64 * 1024 * 1024 });
  } catch (err) {
    const stderr = err instanceof Error && "stderr" in err ? String(err.stderr ?? "") : "";
    throw new FfmpegError(`${path.basename(ffmpeg)} exited with an error`, stderr.slice(-2000));
  }
}
