/**
 * @description SRT / WebVTT serialization and word-level streaming captions.
 */
import type { CaptionEntry } from "./schemas/caption.ts";

export const MAX_LINE_CHARS = 42;
const MIN_WORD_SEC = 0.15;

/** Greedy word wrap; text that already fits is returned unchanged. */
export function wrapCaptionText(text: string, maxChars = MAX_LINE_CHARS): string {
  if (text.length <= maxChars) return text;

  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars && current) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) lines.push(current);
  return lines.join("\n");
}

function pad(n: number, size = 2): string {
  return String(n).padStart(size, "0");
}

/** `HH:MM:SS,mmm` (SRT) or `HH:MM:SS.mmm` (WebVTT). */
export function formatTimestamp(sec: number, separator: "," | "." = ","): string {
  const totalMs = Math.max(0, Math.round(sec * 1000));
  const totalSec = Math.floor(totalMs / 1000);
  const h = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec % 3600) / 60);
  const s = totalSec % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(totalMs % 1000, 3)}`;
}

export function formatSrt(captions: readonly CaptionEntry[]): string {
  return captions
    .map((c, i) =>
      `${i + 1}\n${formatTimestamp(c.startSec)} --> ${formatTimestamp(c.endSec)}\n${wrapCaptionText(c.text)}\n`,
    )
    .join("\n");
}

export function formatVtt(captions: readonly CaptionEntry[]): string {
  let vtt = "WEBVTT\n\n";
  for (const c of captions) {
    vtt += `${formatTimestamp(c.startSec, ".")} --> ${formatTimestamp(c.endSec, ".")}\n`;
    vtt += `${wrapCaptionText(c.text)}\n\n`;
  }
  return vtt;
}

// ---------------------------------------------------------------------------
//  Word-level captions
// ---------------------------------------------------------------------------

export interface WordTiming {
  word: string;
  startSec: number;
  endSec: number;
}

/**
 * Spread `durationSec` over the words in proportion to their length
 * (trailing space included), with a floor per word. Timings are clamped
 * to `startSec + durationSec`.
 */
export function calculateWordTimings(text: string, startSec: number, durationSec: number): WordTiming[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [];

  const totalChars = words.reduce((sum, w) => sum + w.length, 0) + words.length - 1;
  const endSec = startSec + durationSec;
  const timings: WordTiming[] = [];
  let cursor = startSec;

  // The per-word floor can overrun the caption.
  words.forEach((word, i) => {
    const chars = word.length + (i < words.length - 1 ? 1 : 0);
    const length = Math.max(MIN_WORD_SEC, (chars / totalChars) * durationSec);
    timings.push({ word, startSec: Math.min(cursor, endSec), endSec: Math.min(cursor + length, endSec) });
    cursor += length;
  });
  return timings;
}

/** Break each caption into short groups of words that appear one after another. */
export function groupWordCaptions(captions: readonly CaptionEntry[], wordsPerGroup = 4): CaptionEntry[] {
  const groups: CaptionEntry[] = [];
  for (const caption of captions) {
    const words = calculateWordTimings(caption.text, caption.startSec, caption.endSec - caption.startSec);
    for (let i = 0; i < words.length; i += wordsPerGroup) {
      const chunk = words.slice(i, i + wordsPerGroup);
      groups.push({
        startSec: chunk[0].startSec,
        endSec: chunk[chunk.length - 1].endSec,
        text: chunk.map((w) => w.word).join(" "),
        ...(caption.segmentId !== undefined ? { segmentId: caption.segmentId } : {}),
      });
    }
  }
  return groups;
}
