/**
 * @description Domain errors. Everything else the core reports through
 * result fields rather than exceptions.
 */
import { ZodError } from "zod";

export class MissingMarkerError extends Error {
  constructor(
    public readonly anchor: string,
    public readonly segmentId: string,
    public readonly availableMarkers: readonly string[],
  ) {
    super(
      `Required timeline marker '${anchor}' not found (segment '${segmentId}'). ` +
        `Available markers: ${availableMarkers.length ? availableMarkers.join(", ") : "(none)"}`,
    );
    this.name = "MissingMarkerError";
  }
}

export class TimelineFrozenError extends Error {
  constructor(public readonly marker: string) {
    super(`Cannot record marker '${marker}': the timeline is frozen.`);
    this.name = "TimelineFrozenError";
  }
}

export class FfmpegError extends Error {
  constructor(message: string, public readonly stderr: string) {
    super(`[ffmpeg] ${message}`);
    this.name = "FfmpegError";
  }
}

/** Short machine-readable code for a failure, used in `{ success: false }` results. */
export function errorCode(err: unknown): string {
  if (err instanceof MissingMarkerError) return "MISSING_MARKER";
  if (err instanceof TimelineFrozenError) return "TIMELINE_FROZEN";
  if (err instanceof FfmpegError) return "FFMPEG_ERROR";
  if (err instanceof Error && "code" in err && err.code === "ENOENT") return "FILE_NOT_FOUND";
  if (err instanceof ZodError) return "VALIDATION";
  return "UNEXPECTED_ERROR";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
