import fs from "node:fs";
import path from "node:path";
import { parse } from "yaml";
import {
  ConfigError,
  DEFAULT_FILTERING_SETTINGS,
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_REDDIT_SETTINGS,
  DEFAULT_REWRITER_SETTINGS,
  DEFAULT_SUBREDDITS,
  DEFAULT_SUBTITLE_SETTINGS,
  DEFAULT_TTS_SETTINGS,
  DEFAULT_VIDEO_SETTINGS,
  toErrorMessage
} from "@storyreel/shared";
import type {
  AppConfig,
  OutputPaths,
  RedditSettings,
  RedditSortMode,
  RedditTimeFilter
} from "@storyreel/shared";
import { parseLogLevel } from "./logger";

export const CONFIG_FILE_NAME = "config.yaml";

export const SORT_MODES: readonly RedditSortMode[] = ["hot", "new", "top", "rising", "controversial"];
export const TIME_FILTERS: readonly RedditTimeFilter[] = ["hour", "day", "week", "month", "year", "all"];

type Section = Record<string, unknown>;

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseEnvNumber(value: string | undefined, fallback: number) {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readSection(root: Section, key: string): Section {
  const value = root[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`);
  }
  return value;
}

function readString(section: Section, label: string, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${label}.${key} must be a string (quote hex colours such as "000000")`);
  }
  return value;
}

function readNumber(
  section: Section,
  label: string,
  key: string,
  fallback: number,
  options: { min?: number; integer?: boolean } = {}
): number {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${label}.${key} must be a number`);
  }
  if (options.integer && !Number.isInteger(value)) {
    throw new ConfigError(`${label}.${key} must be an integer`);
  }
  if (options.min !== undefined && value < options.min) {
    throw new ConfigError(`${label}.${key} must be >= ${options.min}`);
  }
  return value;
}

function readBoolean(section: Section, label: string, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${label}.${key} must be true or false`);
  }
  return value;
}

function readStringList(section: Section, label: string, key: string, fallback: string[]): string[] {
  const value = section[key];
  if (value === undefined || value === null) {
    return [...fallback];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`${label}.${key} must be a list`);
  }
  return value.map((item, index) => {
    if (typeof item !== "string") {
      throw new ConfigError(`${label}.${key}[${index}] must be a string`);
    }
    return item;
  });
}

function readChoice<T extends string>(
  section: Section,
  label: string,
  key: string,
  allowed: readonly T[],
  fallback: T
): T {
  const raw = readString(section, label, key, fallback).trim().toLowerCase();
  const match = allowed.find((item) => item === raw);
  if (!match) {
    throw new ConfigError(`${label}.${key} must be one of ${allowed.join(", ")}, got ${raw}`);
  }
  return match;
}

function optionalEnv(env: NodeJS.ProcessEnv, key: string) {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function findConfigFile(cwd: string): string | null {
  let dir = path.resolve(cwd);
  for (let depth = 0; depth < 3; depth += 1) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }
  return null;
}

/**
 * Builds the app configuration from parsed YAML plus the environment.
 * Relative paths resolve against `baseDir`, normally the directory holding
 * config.yaml. Secrets are only read from `env`.
 */
export function buildConfig(raw: unknown, env: NodeJS.ProcessEnv, baseDir: string): AppConfig {
  let root: Section = {};
  if (isRecord(raw)) {
    root = raw;
  } else if (raw !== undefined && raw !== null) {
    throw new ConfigError(`${CONFIG_FILE_NAME} must contain a mapping at the top level`);
  }
  const resolvePath = (value: string) => (path.isAbsolute(value) ? value : path.resolve(baseDir, value));

  const redditYaml = readSection(root, "reddit");
  const filterYaml = readSection(root, "filtering");
  const videoYaml = readSection(root, "video");
  const ttsYaml = readSection(root, "tts");
  const localTts = readSection(ttsYaml, "local");
  const apiTts = readSection(ttsYaml, "api");
  const rewriterYaml = readSection(root, "rewriter");
  const subtitleYaml = readSection(root, "subtitles");
  const loggingYaml = readSection(root, "logging");

  const yamlLevel = readString(loggingYaml, "logging", "level", DEFAULT_LOGGING_SETTINGS.level);
  const levelSource = optionalEnv(env, "STORYREEL_LOG_LEVEL") ?? yamlLevel;
  const level = parseLogLevel(levelSource);
  if (!level) {
    throw new ConfigError(`Unknown log level: ${levelSource}`);
  }
  const logFile = readString(loggingYaml, "logging", "file", "");

  return {
    subreddits: readStringList(root, "config", "subreddits", DEFAULT_SUBREDDITS),
    reddit: {
      clientId: optionalEnv(env, "REDDIT_CLIENT_ID") ?? "",
      clientSecret: optionalEnv(env, "REDDIT_CLIENT_SECRET") ?? "",
      userAgent: optionalEnv(env, "REDDIT_USER_AGENT") ?? DEFAULT_REDDIT_SETTINGS.userAgent,
      sortMode: readChoice(redditYaml, "reddit", "sort_mode", SORT_MODES, DEFAULT_REDDIT_SETTINGS.sortMode),
      timeFilter: readChoice(
        redditYaml,
        "reddit",
        "time_filter",
        TIME_FILTERS,
        DEFAULT_REDDIT_SETTINGS.timeFilter
      ),
      fetchLimit: readNumber(redditYaml, "reddit", "fetch_limit", DEFAULT_REDDIT_SETTINGS.fetchLimit, {
        min: 1,
        integer: true
      })
    },
    filtering: {
      minStoryLength: readNumber(
        filterYaml,
        "filtering",
        "min_story_length",
        DEFAULT_FILTERING_SETTINGS.minStoryLength,
        { min: 0, integer: true }
      ),
      maxStoryLength: readNumber(
        filterYaml,
        "filtering",
        "max_story_length",
        DEFAULT_FILTERING_SETTINGS.maxStoryLength,
        { min: 0, integer: true }
      ),
      allowNsfw: readBoolean(filterYaml, "filtering", "allow_nsfw", DEFAULT_FILTERING_SETTINGS.allowNsfw),
      bannedKeywords: readStringList(
        filterYaml,
        "filtering",
        "banned_keywords",
        DEFAULT_FILTERING_SETTINGS.bannedKeywords
      )
    },
    video: {
      backgroundVideoPath: resolvePath(
        readString(videoYaml, "video", "background_video_path", DEFAULT_VIDEO_SETTINGS.backgroundVideoPath)
      ),
      outputDirectory: resolvePath(
        readString(videoYaml, "video", "output_directory", DEFAULT_VIDEO_SETTINGS.outputDirectory)
      ),
      width: readNumber(videoYaml, "video", "width", DEFAULT_VIDEO_SETTINGS.width, { min: 1, integer: true }),
      height: readNumber(videoYaml, "video", "height", DEFAULT_VIDEO_SETTINGS.height, {
        min: 1,
        integer: true
      }),
      fps: readNumber(videoYaml, "video", "fps", DEFAULT_VIDEO_SETTINGS.fps, { min: 1 }),
      videoCodec: readString(videoYaml, "video", "video_codec", DEFAULT_VIDEO_SETTINGS.videoCodec),
      audioCodec: readString(videoYaml, "video", "audio_codec", DEFAULT_VIDEO_SETTINGS.audioCodec),
      crf: readNumber(videoYaml, "video", "crf", DEFAULT_VIDEO_SETTINGS.crf, { min: 0, integer: true }),
      ffmpegPath: optionalEnv(env, "STORYREEL_FFMPEG_PATH") ?? DEFAULT_VIDEO_SETTINGS.ffmpegPath,
      ffprobePath: optionalEnv(env, "STORYREEL_FFPROBE_PATH") ?? DEFAULT_VIDEO_SETTINGS.ffprobePath,
      timeoutMs: Math.max(
        1000,
        parseEnvNumber(
          env.STORYREEL_RENDER_TIMEOUT_MS,
          readNumber(videoYaml, "video", "timeout_ms", DEFAULT_VIDEO_SETTINGS.timeoutMs, { min: 1 })
        )
      )
    },
    tts: {
      provider: readString(ttsYaml, "tts", "provider", DEFAULT_TTS_SETTINGS.provider).trim().toLowerCase(),
      speechRate: readNumber(ttsYaml, "tts", "speech_rate", DEFAULT_TTS_SETTINGS.speechRate, { min: 1 }),
      localVoiceId: readString(localTts, "tts.local", "voice_id", DEFAULT_TTS_SETTINGS.localVoiceId),
      localRate: readNumber(localTts, "tts.local", "rate", DEFAULT_TTS_SETTINGS.localRate, { min: 0 }),
      localVolume: readNumber(localTts, "tts.local", "volume", DEFAULT_TTS_SETTINGS.localVolume, { min: 0 }),
      apiKey: optionalEnv(env, "TTS_API_KEY"),
      apiUrl: optionalEnv(env, "TTS_API_URL"),
      apiVoice: readString(apiTts, "tts.api", "voice", DEFAULT_TTS_SETTINGS.apiVoice),
      apiFormat: readString(apiTts, "tts.api", "format", DEFAULT_TTS_SETTINGS.apiFormat),
      timeoutMs: Math.max(1000, parseEnvNumber(env.STORYREEL_TTS_TIMEOUT_MS, DEFAULT_TTS_SETTINGS.timeoutMs))
    },
    rewriter: {
      provider: readString(rewriterYaml, "rewriter", "provider", DEFAULT_REWRITER_SETTINGS.provider)
        .trim()
        .toLowerCase(),
      targetWordCount: readNumber(
        rewriterYaml,
        "rewriter",
        "target_word_count",
        DEFAULT_REWRITER_SETTINGS.targetWordCount,
        { min: 1, integer: true }
      ),
      maxWordCount: readNumber(
        rewriterYaml,
        "rewriter",
        "max_word_count",
        DEFAULT_REWRITER_SETTINGS.maxWordCount,
        { min: 1, integer: true }
      ),
      anthropicApiKey: optionalEnv(env, "ANTHROPIC_API_KEY"),
      anthropicModel: readString(
        rewriterYaml,
        "rewriter",
        "anthropic_model",
        DEFAULT_REWRITER_SETTINGS.anthropicModel
      ),
      openaiApiKey: optionalEnv(env, "OPENAI_API_KEY"),
      openaiModel: readString(rewriterYaml, "rewriter", "openai_model", DEFAULT_REWRITER_SETTINGS.openaiModel)
    },
    subtitles: {
      enabled: readBoolean(subtitleYaml, "subtitles", "enabled", DEFAULT_SUBTITLE_SETTINGS.enabled),
      fontName: readString(subtitleYaml, "subtitles", "font_name", DEFAULT_SUBTITLE_SETTINGS.fontName),
      fontSize: readNumber(subtitleYaml, "subtitles", "font_size", DEFAULT_SUBTITLE_SETTINGS.fontSize, {
        min: 1
      }),
      fontColor: readString(subtitleYaml, "subtitles", "font_color", DEFAULT_SUBTITLE_SETTINGS.fontColor),
      outlineColor: readString(
        subtitleYaml,
        "subtitles",
        "outline_color",
        DEFAULT_SUBTITLE_SETTINGS.outlineColor
      ),
      outlineWidth: readNumber(
        subtitleYaml,
        "subtitles",
        "outline_width",
        DEFAULT_SUBTITLE_SETTINGS.outlineWidth,
        { min: 0 }
      ),
      marginBottom: readNumber(
        subtitleYaml,
        "subtitles",
        "margin_bottom",
        DEFAULT_SUBTITLE_SETTINGS.marginBottom,
        { min: 0, integer: true }
      ),
      maxCharsPerLine: readNumber(
        subtitleYaml,
        "subtitles",
        "max_chars_per_line",
        DEFAULT_SUBTITLE_SETTINGS.maxCharsPerLine,
        { min: 1, integer: true }
      ),
      wordsPerSegment: readNumber(
        subtitleYaml,
        "subtitles",
        "words_per_segment",
        DEFAULT_SUBTITLE_SETTINGS.wordsPerSegment,
        { min: 1, integer: true }
      )
    },
    logging: {
      level,
      file: logFile ? resolvePath(logFile) : undefined
    }
  };
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);
  if (!configPath || !fs.existsSync(configPath)) {
    throw new ConfigError(
      `Configuration file not found: ${configPath ?? CONFIG_FILE_NAME}. ` +
        `Create ${CONFIG_FILE_NAME} or pass --config <path>.`
    );
  }
  const text = await fs.promises.readFile(configPath, "utf8");
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${toErrorMessage(err)}`);
  }
  return buildConfig(raw, env, path.dirname(configPath));
}

export function requireRedditCredentials(config: AppConfig): RedditSettings {
  if (!config.reddit.clientId || !config.reddit.clientSecret) {
    throw new ConfigError(
      "Reddit API credentials not found. Set REDDIT_CLIENT_ID and REDDIT_CLIENT_SECRET."
    );
  }
  return config.reddit;
}

export function getOutputPaths(config: AppConfig, storyId: string): OutputPaths {
  const base = config.video.outputDirectory;
  const name = `story_${storyId}`;
  return {
    audio: path.join(base, "audio", `${name}.wav`),
    video: path.join(base, "video", `${name}.mp4`),
    script: path.join(base, "scripts", `${name}.txt`),
    subtitle: path.join(base, "subtitles", `${name}.srt`)
  };
}

export async function ensureOutputDirectories(config: AppConfig): Promise<void> {
  const base = config.video.outputDirectory;
  for (const dir of ["audio", "video", "scripts", "subtitles"]) {
    await fs.promises.mkdir(path.join(base, dir), { recursive: true });
  }
}
