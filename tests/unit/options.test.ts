import { test, expect } from "@playwright/test";
import { ZodError } from "zod";
import { resolveOptions } from "../../packages/timecue/schemas/options.ts";
import {
  errorCode,
  errorMessage,
  FfmpegError,
  MissingMarkerError,
  TimelineFrozenError,
} from "../../packages/timecue/errors.ts";

test.describe("resolveOptions", () => {
  test("fills in defaults", () => {
    expect(resolveOptions({}, {})).toEqual({
      overlapGapSec: 0.3,
      minGapSec: 2,
      speedFactor: 3,
      maxCaptionGapSec: 5,
      maxCharsPerSec: 20,
      fillerTailSec: 0.5,
      ffmpegPath: "ffmpeg",
    });
  });

  test("takes the ffmpeg binary from the environment unless given", () => {
    expect(resolveOptions({}, { TIMECUE_FFMPEG: "/opt/ffmpeg/bin/ffmpeg" }).ffmpegPath).toBe("/opt/ffmpeg/bin/ffmpeg");
    expect(resolveOptions({ ffmpegPath: "ffmpeg6" }, { TIMECUE_FFMPEG: "/opt/ffmpeg/bin/ffmpeg" }).ffmpegPath).toBe("ffmpeg6");
  });

  test("rejects a speed factor that would not speed anything up", () => {
    expect(() => resolveOptions({ speedFactor: 1 }, {})).toThrow(ZodError);
  });
});

test("errorCode classifies failures", () => {
  expect(errorCode(new MissingMarkerError("t_x", "s", []))).toBe("MISSING_MARKER");
  expect(errorCode(new TimelineFrozenError("t_x"))).toBe("TIMELINE_FROZEN");
  expect(errorCode(new FfmpegError("boom", "stderr"))).toBe("FFMPEG_ERROR");
  expect(errorCode(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe("FILE_NOT_FOUND");
  expect(errorCode(new Error("other"))).toBe("UNEXPECTED_ERROR");

  let zodFailure: unknown;
  try {
    resolveOptions({ minGapSec: -1 }, {});
  } catch (err) {
    zodFailure = err;
  }
  expect(errorCode(zodFailure)).toBe("VALIDATION");
});

test("error messages carry their context", () => {
  expect(new MissingMarkerError("t_x", "intro", []).message).toBe(
    "Required timeline marker 't_x' not found (segment 'intro'). Available markers: (none)",
  );
  expect(new FfmpegError("ffmpeg exited with an error", "").message).toBe("[ffmpeg] ffmpeg exited with an error");
  expect(errorMessage("plain")).toBe("plain");
});
