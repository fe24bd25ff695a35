import { InvalidArgumentError } from "../errors";
import type { Caption } from "../types";

function pad2(value: number) {
  return value.toString().padStart(2, "0");
}

function pad3(value: number) {
  return value.toString().padStart(3, "0");
}

export function formatSrtTimestamp(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError(`timestamp must be a non-negative number of seconds, got ${seconds}`);
  }
  const totalMs = Math.round(seconds * 1000);
  const totalSeconds = Math.floor(totalMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;
  const millis = totalMs % 1000;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)},${pad3(millis)}`;
}

export function parseSrtTimestamp(value: string): number {
  const match = /^(\d{2,}):(\d{2}):(\d{2}),(\d{3})$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`invalid SRT timestamp: ${value}`);
  }
  const [, hours, minutes, secs, millis] = match;
  const totalMs =
    Number(hours) * 3_600_000 + Number(minutes) * 60_000 + Number(secs) * 1000 + Number(millis);
  return totalMs / 1000;
}

export function toSrt(captions: readonly Caption[]): string {
  return [...captions]
    .sort((a, b) => a.index - b.index)
    .map(
      (caption) =>
        `${caption.index}\n${formatSrtTimestamp(caption.startTime)} --> ${formatSrtTimestamp(
          caption.endTime
        )}\n${caption.text}\n\n`
    )
    .join("");
}

export function parseSrt(content: string): Caption[] {
  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").trim();
  if (!normalized) {
    return [];
  }
  return normalized.split(/\n{2,}/).map((block) => {
    const lines = block.split("\n");
    const index = Number(lines[0]);
    if (!Number.isInteger(index) || index < 1) {
      throw new InvalidArgumentError(`invalid SRT index: ${lines[0]}`);
    }
    const timing = (lines[1] ?? "").split("-->");
    if (timing.length !== 2) {
      throw new InvalidArgumentError(`invalid SRT timing line for caption ${index}`);
    }
    return {
      index,
      startTime: parseSrtTimestamp(timing[0]),
      endTime: parseSrtTimestamp(timing[1]),
      text: lines.slice(2).join("\n")
    };
  });
}
