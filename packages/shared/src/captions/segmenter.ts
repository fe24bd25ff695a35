import { InvalidArgumentError } from "../errors";
import type { Caption } from "../types";

export type SegmentOptions = {
  wordsPerSegment?: number;
  maxCharsPerLine?: number;
  gapSec?: number;
};

export const DEFAULT_WORDS_PER_SEGMENT = 4;
export const DEFAULT_MAX_CHARS_PER_LINE = 35;
export const DEFAULT_CAPTION_GAP_SEC = 0.05;

export function normalizeCaptionText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Greedy line wrap. A word joins the current line while the line plus one
 * space plus the word still fits; a word longer than the budget sits alone.
 */
export function wrapCaptionText(text: string, maxCharsPerLine: number): string {
  if (!Number.isInteger(maxCharsPerLine) || maxCharsPerLine < 1) {
    throw new InvalidArgumentError(`maxCharsPerLine must be a positive integer, got ${maxCharsPerLine}`);
  }
  const words = normalizeCaptionText(text).split(" ").filter(Boolean);
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    if (!current) {
      current = word;
      continue;
    }
    if (current.length + word.length + 1 <= maxCharsPerLine) {
      current = `${current} ${word}`;
      continue;
    }
    lines.push(current);
    current = word;
  }
  if (current) {
    lines.push(current);
  }
  return lines.join("\n");
}

/**
 * Splits narration text into timed captions spread evenly over `durationSec`.
 *
 * Every word gets `durationSec / wordCount` seconds. Captions after the first
 * start `gapSec` later than their word offset; the gap is dropped for a
 * caption whose window is too short to hold it, so `startTime <= endTime`
 * always holds. The gap can make a caption start after the previous one ends,
 * never before.
 */
export function segmentCaptions(
  text: string,
  durationSec: number,
  options: SegmentOptions = {}
): readonly Caption[] {
  const wordsPerSegment = options.wordsPerSegment ?? DEFAULT_WORDS_PER_SEGMENT;
  const maxCharsPerLine = options.maxCharsPerLine ?? DEFAULT_MAX_CHARS_PER_LINE;
  const gapSec = options.gapSec ?? DEFAULT_CAPTION_GAP_SEC;

  if (!Number.isFinite(durationSec) || durationSec < 0) {
    throw new InvalidArgumentError(`duration must be a non-negative number of seconds, got ${durationSec}`);
  }
  if (!Number.isInteger(wordsPerSegment) || wordsPerSegment < 1) {
    throw new InvalidArgumentError(`wordsPerSegment must be a positive integer, got ${wordsPerSegment}`);
  }
  if (!Number.isInteger(maxCharsPerLine) || maxCharsPerLine < 1) {
    throw new InvalidArgumentError(`maxCharsPerLine must be a positive integer, got ${maxCharsPerLine}`);
  }
  if (!Number.isFinite(gapSec) || gapSec < 0) {
    throw new InvalidArgumentError(`gapSec must be a non-negative number, got ${gapSec}`);
  }

  const normalized = normalizeCaptionText(text);
  if (!normalized) {
    return [];
  }
  const words = normalized.split(" ");
  const timePerWord = durationSec / words.length;
  const captions: Caption[] = [];

  for (let offset = 0; offset < words.length; offset += wordsPerSegment) {
    const window = words.slice(offset, offset + wordsPerSegment);
    const index = captions.length + 1;
    const endTime = Math.min((offset + window.length) * timePerWord, durationSec);
    let startTime = offset * timePerWord;
    if (index > 1 && startTime + gapSec < endTime) {
      startTime += gapSec;
    }
    captions.push({
      index,
      startTime,
      endTime,
      text: wrapCaptionText(window.join(" "), maxCharsPerLine)
    });
  }

  return captions;
}
