import type {
  FilteringSettings,
  LoggingSettings,
  RedditSettings,
  RewriterSettings,
  SubtitleSettings,
  TtsSettings,
  VideoSettings
} from "./types";

export const DEFAULT_SUBREDDITS = ["AmItheAsshole"];

export const DEFAULT_SUBTITLE_SETTINGS: SubtitleSettings = {
  enabled: true,
  fontName: "Arial",
  fontSize: 48,
  fontColor: "FFFFFF",
  outlineColor: "000000",
  outlineWidth: 3,
  marginBottom: 150,
  maxCharsPerLine: 35,
  wordsPerSegment: 4
};

export const DEFAULT_VIDEO_SETTINGS: VideoSettings = {
  backgroundVideoPath: "assets/background.mp4",
  outputDirectory: "output",
  width: 1080,
  height: 1920,
  fps: 30,
  videoCodec: "libx264",
  audioCodec: "aac",
  crf: 23,
  ffmpegPath: "ffmpeg",
  ffprobePath: "ffprobe",
  timeoutMs: 600_000
};

export const DEFAULT_REDDIT_SETTINGS: RedditSettings = {
  clientId: "",
  clientSecret: "",
  userAgent: "storyreel/0.1.0",
  sortMode: "top",
  timeFilter: "week",
  fetchLimit: 25
};

export const DEFAULT_FILTERING_SETTINGS: FilteringSettings = {
  minStoryLength: 500,
  maxStoryLength: 5000,
  allowNsfw: false,
  bannedKeywords: []
};

export const DEFAULT_TTS_SETTINGS: TtsSettings = {
  provider: "local",
  speechRate: 150,
  localVoiceId: "",
  localRate: 0,
  localVolume: 1,
  apiVoice: "default",
  apiFormat: "wav",
  timeoutMs: 120_000
};

export const DEFAULT_REWRITER_SETTINGS: RewriterSettings = {
  provider: "anthropic",
  targetWordCount: 200,
  maxWordCount: 300,
  anthropicModel: "claude-3-haiku-20240307",
  openaiModel: "gpt-3.5-turbo"
};

export const DEFAULT_LOGGING_SETTINGS: LoggingSettings = {
  level: "info"
};
