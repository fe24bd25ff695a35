import { InvalidArgumentError } from "@storyreel/shared";
import type { RenderCommand, RenderRequest } from "@storyreel/shared";

export const AUDIO_BITRATE = "192k";
export const ENCODER_PRESET = "medium";
export const PIXEL_FORMAT = "yuv420p";

function assertPositive(label: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidArgumentError(`${label} must be a positive number, got ${value}`);
  }
}

export function buildScaleCropFilter(width: number, height: number): string {
  assertPositive("width", width);
  assertPositive("height", height);
  return `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height}`;
}

/**
 * ffmpeg argv for one short: loop the background for the narration length,
 * cover-scale and centre-crop it to the frame, burn in captions when a
 * subtitle filter is given, and mux the narration as the only audio track.
 */
export function buildRenderCommand(
  request: RenderRequest,
  options: { ffmpegPath: string; subtitleFilter?: string }
): RenderCommand {
  assertPositive("fps", request.fps);
  if (!Number.isFinite(request.durationSec) || request.durationSec < 0) {
    throw new InvalidArgumentError(`duration must be a non-negative number, got ${request.durationSec}`);
  }
  const filters = [buildScaleCropFilter(request.width, request.height)];
  if (options.subtitleFilter) {
    filters.push(options.subtitleFilter);
  }
  return [
    options.ffmpegPath,
    "-y",
    "-stream_loop",
    "-1",
    "-i",
    request.backgroundPath,
    "-i",
    request.audioPath,
    "-t",
    String(request.durationSec),
    "-filter_complex",
    filters.join(","),
    "-map",
    "0:v",
    "-map",
    "1:a",
    "-c:v",
    request.videoCodec,
    "-preset",
    ENCODER_PRESET,
    "-crf",
    String(request.crf),
    "-c:a",
    request.audioCodec,
    "-b:a",
    AUDIO_BITRATE,
    "-r",
    String(request.fps),
    "-pix_fmt",
    PIXEL_FORMAT,
    "-shortest",
    request.outputPath
  ];
}
