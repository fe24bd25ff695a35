export type LogLevel = "debug" | "info" | "warn" | "error";

export type RedditSortMode = "hot" | "new" | "top" | "rising" | "controversial";

export type RedditTimeFilter = "hour" | "day" | "week" | "month" | "year" | "all";

export type TtsProviderName = "local" | "api" | "dummy";

export type RewriterProviderName = "anthropic" | "openai" | "dummy";

export interface Caption {
  readonly index: number;
  readonly startTime: number;
  readonly endTime: number;
  readonly text: string;
}

export type CaptionTrack = readonly Caption[];

export interface SubtitleSettings {
  enabled: boolean;
  fontName: string;
  fontSize: number;
  fontColor: string;
  outlineColor: string;
  outlineWidth: number;
  marginBottom: number;
  maxCharsPerLine: number;
  wordsPerSegment: number;
}

export interface VideoSettings {
  backgroundVideoPath: string;
  outputDirectory: string;
  width: number;
  height: number;
  fps: number;
  videoCodec: string;
  audioCodec: string;
  crf: number;
  ffmpegPath: string;
  ffprobePath: string;
  timeoutMs: number;
}

export interface RedditSettings {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  sortMode: RedditSortMode;
  timeFilter: RedditTimeFilter;
  fetchLimit: number;
}

export interface FilteringSettings {
  minStoryLength: number;
  maxStoryLength: number;
  allowNsfw: boolean;
  bannedKeywords: string[];
}

export interface TtsSettings {
  provider: string;
  speechRate: number;
  localVoiceId: string;
  localRate: number;
  localVolume: number;
  apiKey?: string;
  apiUrl?: string;
  apiVoice: string;
  apiFormat: string;
  timeoutMs: number;
}

export interface RewriterSettings {
  provider: string;
  targetWordCount: number;
  maxWordCount: number;
  anthropicApiKey?: string;
  anthropicModel: string;
  openaiApiKey?: string;
  openaiModel: string;
}

export interface LoggingSettings {
  level: LogLevel;
  file?: string;
}

export interface AppConfig {
  subreddits: string[];
  reddit: RedditSettings;
  filtering: FilteringSettings;
  video: VideoSettings;
  tts: TtsSettings;
  rewriter: RewriterSettings;
  subtitles: SubtitleSettings;
  logging: LoggingSettings;
}

export interface RenderRequest {
  backgroundPath: string;
  audioPath: string;
  outputPath: string;
  durationSec: number;
  width: number;
  height: number;
  fps: number;
  videoCodec: string;
  audioCodec: string;
  crf: number;
}

export type RenderCommand = readonly string[];

export interface BuildResult {
  videoPath: string;
  subtitlePath?: string;
  durationSec: number;
  fileSizeBytes: number;
  command: RenderCommand;
}

export interface Story {
  id: string;
  subreddit: string;
  title: string;
  originalText: string;
  url: string;
  author: string;
  score: number;
  numComments: number;
  isNsfw: boolean;
  createdUtc: number;
  rewrittenText?: string;
  isProcessed: boolean;
  fetchedAt: string;
}

export interface GeneratedVideo {
  storyId: string;
  videoId: string;
  videoPath: string;
  audioPath: string;
  subtitlePath?: string;
  scriptPath?: string;
  durationSeconds: number;
  fileSizeBytes: number;
  generatedAt: string;
  success: boolean;
  errorMessage?: string;
}

export interface ProcessingResult {
  totalAttempted: number;
  successful: GeneratedVideo[];
  failed: Array<{ storyId: string; error: string }>;
  filteredOut: Array<{ storyId: string; reason: string }>;
}

export type OutputPaths = {
  audio: string;
  video: string;
  script: string;
  subtitle: string;
};
