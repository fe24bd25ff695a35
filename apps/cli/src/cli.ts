import fs from "node:fs";
import path from "node:path";
import {
  InvalidArgumentError,
  countWords,
  storyWordCount,
  summarizeProcessing,
  toErrorMessage
} from "@storyreel/shared";
import type { AppConfig, RedditSettings, Story } from "@storyreel/shared";
import {
  SORT_MODES,
  TIME_FILTERS,
  ensureOutputDirectories,
  loadConfig,
  requireRedditCredentials
} from "./lib/config";
import { createLogger } from "./lib/logger";
import type { LogSink, Logger } from "./lib/logger";
import type { MediaToolRunner } from "./lib/media/mediaTools";
import { createVideoBuilder } from "./lib/video/videoBuilder";
import { processBatch, processStory } from "./pipeline/processStory";
import type { StoryPipelineDeps } from "./pipeline/processStory";
import { createRewriter } from "./providers/rewriter/rewriterFactory";
import { createSynthesizer } from "./providers/tts/synthesizerFactory";
import { createRedditClient } from "./reddit/redditClient";
import type { RedditClient } from "./reddit/redditClient";
import { createFilterStats, createStoryFilter } from "./reddit/storyFilter";

export const USAGE = [
  "Usage: storyreel [--config <path>] [--verbose] <command> [options]",
  "",
  "Commands:",
  "  single --post-id <id> | --subreddit <name>   Generate one video",
  "  batch [--subreddit <name>] [--limit 5] [--sort top] [--time week]",
  "                                               Generate several videos",
  "  rewrite-only --post-id <id> [--output <file>] Rewrite a post without rendering",
  "  render --audio <file> --output <file> [--text-file <file>] [--background <file>]",
  "                                               Render local narration into a video",
  "  list-subreddits                              Show configured subreddits",
  "  test-connection                              Check Reddit API credentials",
  "  list-voices                                  Show voices of the configured tts provider"
].join("\n");

const SHORT_FLAGS = new Map([
  ["c", "config"],
  ["v", "verbose"],
  ["p", "post-id"],
  ["s", "subreddit"],
  ["l", "limit"],
  ["o", "output"],
  ["h", "help"]
]);

const BOOLEAN_FLAGS = new Set(["verbose", "help"]);

export type ParsedArgs = {
  command?: string;
  options: Record<string, string>;
  flags: Set<string>;
};

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { options: {}, flags: new Set() };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("-") || arg === "-") {
      if (parsed.command) {
        throw new InvalidArgumentError(`Unexpected argument: ${arg}`);
      }
      parsed.command = arg;
      continue;
    }
    const [rawName, inlineValue] = arg.replace(/^-{1,2}/, "").split(/=(.*)/s, 2);
    const name = arg.startsWith("--") ? rawName : SHORT_FLAGS.get(rawName) ?? rawName;
    if (BOOLEAN_FLAGS.has(name)) {
      parsed.flags.add(name);
      continue;
    }
    const value = inlineValue ?? argv[i + 1];
    if (value === undefined || (inlineValue === undefined && value.startsWith("-"))) {
      throw new InvalidArgumentError(`--${name} requires a value`);
    }
    if (inlineValue === undefined) {
      i += 1;
    }
    parsed.options[name] = value;
  }
  return parsed;
}

export type CliOutput = {
  out(line: string): void;
  err(line: string): void;
};

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  output?: CliOutput;
  logSink?: LogSink;
  tools?: MediaToolRunner;
  platform?: NodeJS.Platform;
  createRedditClient?: (settings: RedditSettings, logger: Logger) => RedditClient;
};

type CommandContext = {
  config: AppConfig;
  logger: Logger;
  options: Record<string, string>;
  output: CliOutput;
  deps: CliDeps;
  cwd: string;
};

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

function preview(text: string, max = 500) {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function parseLimit(value: string | undefined, fallback: number) {
  if (value === undefined) {
    return fallback;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError(`--limit must be a positive integer, got ${value}`);
  }
  return limit;
}

function parseChoice<T extends string>(flag: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (value === undefined) {
    return fallback;
  }
  const match = allowed.find((item) => item === value.toLowerCase());
  if (!match) {
    throw new InvalidArgumentError(`--${flag} must be one of ${allowed.join(", ")}, got ${value}`);
  }
  return match;
}

function redditFor(ctx: CommandContext): RedditClient {
  const settings = requireRedditCredentials(ctx.config);
  const factory =
    ctx.deps.createRedditClient ?? ((redditSettings, logger) => createRedditClient({ settings: redditSettings, logger }));
  return factory(settings, ctx.logger);
}

function pipelineFor(ctx: CommandContext): StoryPipelineDeps {
  const { config, logger, deps } = ctx;
  return {
    config,
    logger,
    rewriter: createRewriter(config.rewriter, { logger }),
    synthesizer: createSynthesizer(config.tts, {
      ffmpegPath: config.video.ffmpegPath,
      logger,
      tools: deps.tools,
      platform: deps.platform
    }),
    videoBuilder: createVideoBuilder({ video: config.video, subtitles: config.subtitles, logger, tools: deps.tools })
  };
}

async function runSingle(ctx: CommandContext): Promise<number> {
  const { options, output } = ctx;
  const postId = options["post-id"];
  const subreddit = options.subreddit;
  if (!postId && !subreddit) {
    output.err("Error: Either --post-id or --subreddit is required");
    return 1;
  }
  const reddit = redditFor(ctx);

  let story: Story | null = null;
  if (postId) {
    output.out(`Fetching post: ${postId}`);
    story = await reddit.fetchPostById(postId);
  } else if (subreddit) {
    output.out(`Fetching top post from r/${subreddit}`);
    const [first] = await reddit.fetchPosts(subreddit, { limit: 1 });
    story = first ?? null;
  }
  if (!story) {
    output.err("Error: Could not fetch the story");
    return 1;
  }

  const check = createStoryFilter(ctx.config.filtering, ctx.logger).checkStory(story);
  if (!check.passed) {
    output.err(`Story filtered out: ${check.reason}`);
    output.err("Use a different story or adjust filter settings.");
    return 1;
  }

  output.out(`Processing story: ${story.title.slice(0, 50)}...`);
  output.out(`  - Subreddit: r/${story.subreddit}`);
  output.out(`  - Length: ${storyWordCount(story)} words`);

  const video = await processStory(story, pipelineFor(ctx));
  if (!video.success) {
    output.err(`Failed: ${video.errorMessage ?? "Unknown error"}`);
    return 1;
  }
  output.out("Success!");
  output.out(`  - Video: ${video.videoPath}`);
  output.out(`  - Audio: ${video.audioPath}`);
  output.out(`  - Script: ${video.scriptPath ?? "-"}`);
  output.out(`  - Duration: ${video.durationSeconds.toFixed(1)}s`);
  return 0;
}

async function runBatch(ctx: CommandContext): Promise<number> {
  const { options, output, config } = ctx;
  const limit = parseLimit(options.limit, 5);
  const sortMode = parseChoice("sort", options.sort, SORT_MODES, "top");
  const timeFilter = parseChoice("time", options.time, TIME_FILTERS, "week");
  const subreddits = options.subreddit ? [options.subreddit] : config.subreddits;

  output.out(`Batch processing up to ${limit} videos`);
  output.out(`Subreddits: ${subreddits.join(", ")}`);
  output.out(`Sort: ${sortMode}, Time: ${timeFilter}`);

  const reddit = redditFor(ctx);
  const filter = createStoryFilter(config.filtering, ctx.logger);
  const candidates: Story[] = [];
  let passing = 0;
  for (const subreddit of subreddits) {
    if (passing >= limit) {
      break;
    }
    output.out(`Fetching from r/${subreddit}...`);
    const stories = await reddit.fetchFromMultipleSubreddits([subreddit], { sortMode, timeFilter, limit: limit * 2 });
    for (const { story, result } of filter.filterStories(stories, limit - passing)) {
      candidates.push(story);
      if (result.passed) {
        passing += 1;
      }
    }
  }
  output.out(`Found ${passing} valid stories after filtering`);
  if (passing === 0) {
    output.err("No valid stories found. Try different subreddits or filter settings.");
    return 1;
  }

  const stats = createFilterStats();
  const result = await processBatch(candidates, pipelineFor(ctx), { filter, stats, limit });
  output.out(stats.summary());
  output.out("=".repeat(50));
  output.out(summarizeProcessing(result));
  for (const failure of result.failed) {
    output.out(`  - Failed ${failure.storyId}: ${failure.error}`);
  }
  if (result.successful.length > 0) {
    output.out("Generated videos:");
    for (const video of result.successful) {
      output.out(`  - ${video.videoPath}`);
    }
  }
  return result.successful.length > 0 ? 0 : 1;
}

async function runRewriteOnly(ctx: CommandContext): Promise<number> {
  const { options, output, config } = ctx;
  const postId = options["post-id"];
  if (!postId) {
    output.err("Error: --post-id is required");
    return 1;
  }
  output.out(`Fetching post: ${postId}`);
  const story = await redditFor(ctx).fetchPostById(postId);
  if (!story) {
    output.err("Error: Could not fetch the story");
    return 1;
  }
  output.out(`Original (${storyWordCount(story)} words):`);
  output.out("-".repeat(40));
  output.out(preview(story.originalText));
  output.out("-".repeat(40));

  const rewriter = createRewriter(config.rewriter, { logger: ctx.logger });
  const rewritten = await rewriter.rewrite(story.originalText, config.rewriter.targetWordCount);
  output.out(`Rewritten (${countWords(rewritten)} words):`);
  output.out("-".repeat(40));
  output.out(rewritten);
  output.out("-".repeat(40));

  if (options.output) {
    const target = path.resolve(ctx.cwd, options.output);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, rewritten, "utf8");
    output.out(`Saved to: ${target}`);
  }
  return 0;
}

async function runRender(ctx: CommandContext): Promise<number> {
  const { options, output, config, cwd } = ctx;
  if (!options.audio || !options.output) {
    output.err("Error: --audio and --output are required");
    return 1;
  }
  const subtitleText = options["text-file"]
    ? await fs.promises.readFile(path.resolve(cwd, options["text-file"]), "utf8")
    : undefined;
  const builder = createVideoBuilder({
    video: config.video,
    subtitles: config.subtitles,
    logger: ctx.logger,
    tools: ctx.deps.tools
  });
  const result = await builder.buildVideo({
    audioPath: path.resolve(cwd, options.audio),
    outputPath: path.resolve(cwd, options.output),
    subtitleText,
    backgroundVideoPath: options.background ? path.resolve(cwd, options.background) : undefined
  });
  output.out(`Video: ${result.videoPath}`);
  if (result.subtitlePath) {
    output.out(`Subtitles: ${result.subtitlePath}`);
  }
  output.out(`Duration: ${result.durationSec.toFixed(1)}s`);
  output.out(`Size: ${(result.fileSizeBytes / 1024 / 1024).toFixed(2)} MB`);
  return 0;
}

async function runTestConnection(ctx: CommandContext): Promise<number> {
  ctx.output.out("Testing Reddit API connection...");
  if (await redditFor(ctx).testConnection()) {
    ctx.output.out("Connection successful!");
    return 0;
  }
  ctx.output.err("Connection failed. Check your credentials.");
  return 1;
}

async function runListVoices(ctx: CommandContext): Promise<number> {
  const synthesizer = createSynthesizer(ctx.config.tts, {
    ffmpegPath: ctx.config.video.ffmpegPath,
    logger: ctx.logger,
    tools: ctx.deps.tools,
    platform: ctx.deps.platform
  });
  ctx.output.out(`Available TTS voices (${synthesizer.kind}):`);
  const voices = await synthesizer.listVoices();
  if (voices.length === 0) {
    ctx.output.out("  (none found)");
  }
  for (const voice of voices) {
    ctx.output.out(`  - ${voice.name} (ID: ${voice.id})`);
  }
  return 0;
}

const COMMANDS = new Map<string, (ctx: CommandContext) => Promise<number>>([
  ["single", runSingle],
  ["batch", runBatch],
  ["rewrite-only", runRewriteOnly],
  ["render", runRender],
  ["test-connection", runTestConnection],
  ["list-voices", runListVoices],
  [
    "list-subreddits",
    async (ctx) => {
      ctx.output.out("Configured subreddits:");
      for (const subreddit of ctx.config.subreddits) {
        ctx.output.out(`  - r/${subreddit}`);
      }
      return 0;
    }
  ]
]);

export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const cwd = deps.cwd ?? process.cwd();

  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    output.err(`Error: ${toErrorMessage(err)}`);
    output.err(USAGE);
    return 1;
  }
  if (args.flags.has("help")) {
    output.out(USAGE);
    return 0;
  }
  if (!args.command) {
    output.err(USAGE);
    return 1;
  }
  const command = COMMANDS.get(args.command);
  if (!command) {
    output.err(`Error: Unknown command ${args.command}`);
    output.err(USAGE);
    return 1;
  }

  let config: AppConfig;
  try {
    config = await loadConfig({ configPath: args.options.config, env: deps.env, cwd });
    await ensureOutputDirectories(config);
  } catch (err) {
    output.err(`Error loading configuration: ${toErrorMessage(err)}`);
    return 1;
  }

  const logger = createLogger({
    level: args.flags.has("verbose") ? "debug" : config.logging.level,
    file: config.logging.file,
    sink: deps.logSink
  });

  try {
    return await command({ config, logger, options: args.options, output, deps, cwd });
  } catch (err) {
    logger.debug(err instanceof Error && err.stack ? err.stack : toErrorMessage(err));
    output.err(`Error: ${toErrorMessage(err)}`);
    return 1;
  }
}
