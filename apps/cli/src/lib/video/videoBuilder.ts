import fs from "node:fs";
import path from "node:path";
import {
  ExternalToolError,
  PostconditionError,
  ResourceMissingError,
  ToolUnavailableError,
  segmentCaptions,
  toErrorMessage
} from "@storyreel/shared";
import type { BuildResult, SubtitleSettings, VideoSettings } from "@storyreel/shared";
import type { Logger } from "../logger";
import {
  FFMPEG_INSTALL_HINT,
  createSpawnRunner,
  probeMediaDuration,
  probeVideoDimensions
} from "../media/mediaTools";
import type { MediaToolRunner } from "../media/mediaTools";
import { buildRenderCommand } from "./renderCommand";
import { subtitlePathFor, writeSrtFile } from "./subtitleFile";
import { buildSubtitleFilter } from "./subtitleFilter";

const VERSION_CHECK_TIMEOUT_MS = 10_000;
const PROBE_TIMEOUT_MS = 30_000;

export type VideoBuilderDeps = {
  video: VideoSettings;
  subtitles: SubtitleSettings;
  logger: Logger;
  tools?: MediaToolRunner;
};

export type BuildVideoInput = {
  audioPath: string;
  outputPath: string;
  subtitleText?: string;
  /** Where the SRT goes; defaults to the output path with an .srt extension. */
  subtitlePath?: string;
  backgroundVideoPath?: string;
};

export type BatchBuildResult = {
  successful: BuildResult[];
  failed: Array<{ outputPath: string; error: string }>;
};

export type VideoBuilder = {
  checkFfmpeg(): Promise<void>;
  getMediaDuration(filePath: string): Promise<number>;
  getVideoDimensions(filePath: string): Promise<{ width: number; height: number }>;
  buildVideo(input: BuildVideoInput): Promise<BuildResult>;
  buildVideoBatch(items: readonly BuildVideoInput[]): Promise<BatchBuildResult>;
};

export function createVideoBuilder(deps: VideoBuilderDeps): VideoBuilder {
  const { video, subtitles } = deps;
  const logger = deps.logger.child("video");
  const tools = deps.tools ?? createSpawnRunner();

  const checkFfmpeg = async () => {
    const result = await tools.run(video.ffmpegPath, ["-version"], {
      timeoutMs: VERSION_CHECK_TIMEOUT_MS
    });
    if (result.code !== 0) {
      throw new ToolUnavailableError(video.ffmpegPath, FFMPEG_INSTALL_HINT);
    }
    logger.debug(`ffmpeg ok ${result.stdout.split("\n")[0] ?? ""}`.trim());
  };

  const getMediaDuration = (filePath: string) =>
    probeMediaDuration(tools, video.ffprobePath, filePath, PROBE_TIMEOUT_MS);

  const getVideoDimensions = (filePath: string) =>
    probeVideoDimensions(tools, video.ffprobePath, filePath, PROBE_TIMEOUT_MS);

  const buildVideo = async (input: BuildVideoInput): Promise<BuildResult> => {
    await checkFfmpeg();

    const backgroundPath = input.backgroundVideoPath ?? video.backgroundVideoPath;
    if (!fs.existsSync(backgroundPath)) {
      throw new ResourceMissingError("Background video", backgroundPath);
    }
    if (!fs.existsSync(input.audioPath)) {
      throw new ResourceMissingError("Audio file", input.audioPath);
    }

    await fs.promises.mkdir(path.dirname(input.outputPath), { recursive: true });

    const durationSec = await getMediaDuration(input.audioPath);
    logger.info(`audio=${input.audioPath} duration=${durationSec.toFixed(2)}s`);

    let subtitlePath: string | undefined;
    let subtitleFilter: string | undefined;
    if (subtitles.enabled && input.subtitleText && input.subtitleText.trim()) {
      const captions = segmentCaptions(input.subtitleText, durationSec, {
        wordsPerSegment: subtitles.wordsPerSegment,
        maxCharsPerLine: subtitles.maxCharsPerLine
      });
      subtitlePath = await writeSrtFile(captions, input.subtitlePath ?? subtitlePathFor(input.outputPath));
      subtitleFilter = buildSubtitleFilter(subtitlePath, subtitles);
      logger.info(`subtitles=${subtitlePath} captions=${captions.length}`);
    }

    const command = buildRenderCommand(
      {
        backgroundPath,
        audioPath: input.audioPath,
        outputPath: input.outputPath,
        durationSec,
        width: video.width,
        height: video.height,
        fps: video.fps,
        videoCodec: video.videoCodec,
        audioCodec: video.audioCodec,
        crf: video.crf
      },
      { ffmpegPath: video.ffmpegPath, subtitleFilter }
    );
    logger.debug(`ffmpeg argv: ${command.join(" ")}`);
    logger.info(`rendering ${input.outputPath}`);

    const result = await tools.run(video.ffmpegPath, command.slice(1), { timeoutMs: video.timeoutMs });
    if (result.code !== 0) {
      throw new ExternalToolError(video.ffmpegPath, `ffmpeg exited with code ${result.code}`, {
        exitCode: result.code,
        stderr: result.stderr
      });
    }
    if (!fs.existsSync(input.outputPath)) {
      throw new PostconditionError(`ffmpeg finished but no video was written to ${input.outputPath}`);
    }

    const stats = await fs.promises.stat(input.outputPath);
    const outputDuration = await getMediaDuration(input.outputPath);
    logger.info(
      `video=${input.outputPath} duration=${outputDuration.toFixed(2)}s size=${(stats.size / 1024 / 1024).toFixed(
        2
      )}MB`
    );
    return {
      videoPath: input.outputPath,
      subtitlePath,
      durationSec: outputDuration,
      fileSizeBytes: stats.size,
      command
    };
  };

  const buildVideoBatch = async (items: readonly BuildVideoInput[]): Promise<BatchBuildResult> => {
    const outcome: BatchBuildResult = { successful: [], failed: [] };
    for (const [index, item] of items.entries()) {
      logger.info(`batch ${index + 1}/${items.length} ${item.outputPath}`);
      try {
        outcome.successful.push(await buildVideo(item));
      } catch (err) {
        const message = toErrorMessage(err);
        logger.error(`batch item failed output=${item.outputPath} error=${message}`);
        outcome.failed.push({ outputPath: item.outputPath, error: message });
      }
    }
    logger.info(`batch done ok=${outcome.successful.length} failed=${outcome.failed.length}`);
    return outcome;
  };

  return {
    checkFfmpeg,
    getMediaDuration,
    getVideoDimensions,
    buildVideo,
    buildVideoBatch
  };
}
