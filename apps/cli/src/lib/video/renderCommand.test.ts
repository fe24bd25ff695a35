import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@storyreel/shared";
import type { RenderRequest } from "@storyreel/shared";
import { buildRenderCommand, buildScaleCropFilter } from "./renderCommand";

const request: RenderRequest = {
  backgroundPath: "/media/bg.mp4",
  audioPath: "/media/story.wav",
  outputPath: "/out/story.mp4",
  durationSec: 42.5,
  width: 1080,
  height: 1920,
  fps: 30,
  videoCodec: "libx264",
  audioCodec: "aac",
  crf: 23
};

describe("buildRenderCommand", () => {
  it("loops the background, crops to the frame and maps narration audio", () => {
    expect(buildRenderCommand(request, { ffmpegPath: "ffmpeg" })).toEqual([
      "ffmpeg",
      "-y",
      "-stream_loop",
      "-1",
      "-i",
      "/media/bg.mp4",
      "-i",
      "/media/story.wav",
      "-t",
      "42.5",
      "-filter_complex",
      "scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920",
      "-map",
      "0:v",
      "-map",
      "1:a",
      "-c:v",
      "libx264",
      "-preset",
      "medium",
      "-crf",
      "23",
      "-c:a",
      "aac",
      "-b:a",
      "192k",
      "-r",
      "30",
      "-pix_fmt",
      "yuv420p",
      "-shortest",
      "/out/story.mp4"
    ]);
  });

  it("appends the subtitle filter to the filter graph", () => {
    const command = buildRenderCommand(request, {
      ffmpegPath: "/usr/local/bin/ffmpeg",
      subtitleFilter: "subtitles='/out/story.srt'"
    });
    expect(command[0]).toBe("/usr/local/bin/ffmpeg");
    expect(command[command.indexOf("-filter_complex") + 1]).toBe(
      "scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,subtitles='/out/story.srt'"
    );
  });

  it("rejects impossible frame sizes and durations", () => {
    expect(() => buildRenderCommand({ ...request, width: 0 }, { ffmpegPath: "ffmpeg" })).toThrow(
      InvalidArgumentError
    );
    expect(() => buildRenderCommand({ ...request, fps: -30 }, { ffmpegPath: "ffmpeg" })).toThrow(
      InvalidArgumentError
    );
    expect(() => buildRenderCommand({ ...request, durationSec: -1 }, { ffmpegPath: "ffmpeg" })).toThrow(
      InvalidArgumentError
    );
  });
});

describe("buildScaleCropFilter", () => {
  it("scales to cover then crops to the exact frame", () => {
    expect(buildScaleCropFilter(720, 1280)).toBe(
      "scale=720:1280:force_original_aspect_ratio=increase,crop=720:1280"
    );
  });
});
