import fs from "node:fs";
import path from "node:path";
import {
  countWords,
  emptyProcessingResult,
  exportText,
  hasRewrite,
  toErrorMessage,
  truncateToWords
} from "@storyreel/shared";
import type { AppConfig, GeneratedVideo, ProcessingResult, Story } from "@storyreel/shared";
import { getOutputPaths } from "../lib/config";
import type { Logger } from "../lib/logger";
import type { VideoBuilder } from "../lib/video/videoBuilder";
import type { StoryRewriter } from "../providers/rewriter/types";
import type { NarrationSynthesizer } from "../providers/tts/types";
import type { FilterStats, StoryFilter } from "../reddit/storyFilter";

export type StoryPipelineDeps = {
  config: AppConfig;
  rewriter: StoryRewriter;
  synthesizer: NarrationSynthesizer;
  videoBuilder: VideoBuilder;
  logger: Logger;
  now?: () => Date;
};

export type BatchOptions = {
  filter?: StoryFilter;
  stats?: FilterStats;
  /** Stop once this many stories have been attempted. */
  limit?: number;
};

/**
 * Rewrites a story (unless it already carries a rewrite), caps the script at
 * `rewriter.maxWordCount`, saves it, narrates it and renders the video.
 * Never throws: failures come back as a GeneratedVideo with `success: false`.
 */
export async function processStory(story: Story, deps: StoryPipelineDeps): Promise<GeneratedVideo> {
  const { config } = deps;
  const logger = deps.logger.child("pipeline");
  const now = deps.now ?? (() => new Date());
  const paths = getOutputPaths(config, story.id);

  try {
    let current = story;
    if (!hasRewrite(current)) {
      logger.info(`rewriting story ${story.id} provider=${deps.rewriter.kind}`);
      let rewrittenText = await deps.rewriter.rewrite(story.originalText, config.rewriter.targetWordCount);
      const words = countWords(rewrittenText);
      if (words > config.rewriter.maxWordCount) {
        logger.warn(`rewrite has ${words} words, trimming to ${config.rewriter.maxWordCount}`);
        rewrittenText = truncateToWords(rewrittenText, config.rewriter.maxWordCount);
      }
      current = { ...current, rewrittenText, isProcessed: true };
    }
    const script = exportText(current);

    await fs.promises.mkdir(path.dirname(paths.script), { recursive: true });
    await fs.promises.writeFile(paths.script, script, "utf8");
    logger.info(`script=${paths.script}`);

    logger.info(`narrating story ${story.id} provider=${deps.synthesizer.kind}`);
    const audioPath = await deps.synthesizer.synthesize(script, paths.audio);

    logger.info(`building video for story ${story.id}`);
    const built = await deps.videoBuilder.buildVideo({
      audioPath,
      outputPath: paths.video,
      subtitleText: script,
      subtitlePath: paths.subtitle
    });

    return {
      storyId: story.id,
      videoId: story.id,
      videoPath: built.videoPath,
      audioPath,
      subtitlePath: built.subtitlePath,
      scriptPath: paths.script,
      durationSeconds: built.durationSec,
      fileSizeBytes: built.fileSizeBytes,
      generatedAt: now().toISOString(),
      success: true
    };
  } catch (err) {
    const message = toErrorMessage(err);
    logger.error(`failed to process story ${story.id}: ${message}`);
    return {
      storyId: story.id,
      videoId: story.id,
      videoPath: paths.video,
      audioPath: paths.audio,
      durationSeconds: 0,
      fileSizeBytes: 0,
      generatedAt: now().toISOString(),
      success: false,
      errorMessage: message
    };
  }
}

export async function processBatch(
  stories: readonly Story[],
  deps: StoryPipelineDeps,
  options: BatchOptions = {}
): Promise<ProcessingResult> {
  const logger = deps.logger.child("batch");
  const result = emptyProcessingResult();

  for (const story of stories) {
    if (options.limit !== undefined && result.totalAttempted >= options.limit) {
      break;
    }
    if (options.filter) {
      const check = options.filter.checkStory(story);
      options.stats?.record(check);
      if (!check.passed) {
        logger.info(`story ${story.id} filtered out: ${check.reason}`);
        result.filteredOut.push({ storyId: story.id, reason: check.reason });
        continue;
      }
    }

    result.totalAttempted += 1;
    logger.info(`processing ${result.totalAttempted}${options.limit ? `/${options.limit}` : ""} story=${story.id}`);
    const video = await processStory(story, deps);
    if (video.success) {
      result.successful.push(video);
    } else {
      result.failed.push({ storyId: story.id, error: video.errorMessage ?? "unknown error" });
    }
  }
  return result;
}
