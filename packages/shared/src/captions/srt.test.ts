import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../errors";
import { segmentCaptions } from "./segmenter";
import { formatSrtTimestamp, parseSrt, parseSrtTimestamp, toSrt } from "./srt";

describe("formatSrtTimestamp", () => {
  it("formats zero-padded hours, minutes, seconds and millis", () => {
    expect(formatSrtTimestamp(0)).toBe("00:00:00,000");
    expect(formatSrtTimestamp(3661.5)).toBe("01:01:01,500");
    expect(formatSrtTimestamp(2.05)).toBe("00:00:02,050");
  });

  it("carries rounded milliseconds into the seconds field", () => {
    expect(formatSrtTimestamp(1.9996)).toBe("00:00:02,000");
  });

  it("rejects negative values", () => {
    expect(() => formatSrtTimestamp(-0.5)).toThrow(InvalidArgumentError);
  });
});

describe("toSrt", () => {
  it("serializes captions with a blank line after every entry", () => {
    const captions = segmentCaptions("one two three four five six seven eight", 4.0);
    expect(toSrt(captions)).toBe(
      "1\n00:00:00,000 --> 00:00:02,000\none two three four\n\n" +
        "2\n00:00:02,050 --> 00:00:04,000\nfive six seven eight\n\n"
    );
  });

  it("returns an empty string for an empty track", () => {
    expect(toSrt([])).toBe("");
  });

  it("writes entries in index order", () => {
    const srt = toSrt([
      { index: 2, startTime: 1, endTime: 2, text: "second" },
      { index: 1, startTime: 0, endTime: 1, text: "first" }
    ]);
    expect(srt.startsWith("1\n00:00:00,000 --> 00:00:01,000\nfirst\n\n2\n")).toBe(true);
  });
});

describe("parseSrt", () => {
  it("reads back what toSrt writes, including wrapped lines", () => {
    const captions = [
      { index: 1, startTime: 0, endTime: 1.25, text: "first line\nsecond line" },
      { index: 2, startTime: 1.3, endTime: 2.5, text: "next" }
    ];
    expect(parseSrt(toSrt(captions))).toEqual(captions);
  });

  it("reads segmenter output back within a millisecond", () => {
    const text = "so this happened at work last week and nobody believed me until the manager showed up";
    for (const duration of [7.77, 13.3333, 2.0004, 95.123456]) {
      const captions = segmentCaptions(text, duration, { wordsPerSegment: 3 });
      const parsed = parseSrt(toSrt(captions));
      expect(parsed).toHaveLength(captions.length);
      parsed.forEach((caption, i) => {
        expect(caption.index).toBe(captions[i].index);
        expect(caption.text).toBe(captions[i].text);
        expect(Math.abs(caption.startTime - captions[i].startTime)).toBeLessThanOrEqual(0.001);
        expect(Math.abs(caption.endTime - captions[i].endTime)).toBeLessThanOrEqual(0.001);
      });
    }
  });

  it("accepts CRLF line endings", () => {
    const parsed = parseSrt("1\r\n00:00:01,000 --> 00:00:02,500\r\nhello\r\n\r\n");
    expect(parsed).toEqual([{ index: 1, startTime: 1, endTime: 2.5, text: "hello" }]);
  });

  it("returns an empty list for empty content", () => {
    expect(parseSrt("")).toEqual([]);
  });

  it("rejects malformed blocks", () => {
    expect(() => parseSrt("x\n00:00:00,000 --> 00:00:01,000\nhi")).toThrow(InvalidArgumentError);
    expect(() => parseSrt("1\nnot a timing line\nhi")).toThrow(InvalidArgumentError);
    expect(() => parseSrtTimestamp("0:0:1.5")).toThrow(InvalidArgumentError);
  });
});
