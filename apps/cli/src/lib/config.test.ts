import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_SUBTITLE_SETTINGS } from "@storyreel/shared";
import {
  buildConfig,
  ensureOutputDirectories,
  getOutputPaths,
  loadConfig,
  requireRedditCredentials
} from "./config";

describe("config", () => {
  const tempDirs: string[] = [];

  const makeTempDir = () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "storyreel-config-"));
    tempDirs.push(dir);
    return dir;
  };

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("fills every section with defaults for an empty document", () => {
    const config = buildConfig(null, {}, "/srv/reels");
    expect(config.subreddits).toEqual(["AmItheAsshole"]);
    expect(config.video.width).toBe(1080);
    expect(config.video.height).toBe(1920);
    expect(config.video.backgroundVideoPath).toBe(path.resolve("/srv/reels", "assets/background.mp4"));
    expect(config.video.outputDirectory).toBe(path.resolve("/srv/reels", "output"));
    expect(config.video.ffmpegPath).toBe("ffmpeg");
    expect(config.video.timeoutMs).toBe(600000);
    expect(config.subtitles).toEqual(DEFAULT_SUBTITLE_SETTINGS);
    expect(config.rewriter.provider).toBe("anthropic");
    expect(config.tts.provider).toBe("local");
    expect(config.reddit.sortMode).toBe("top");
    expect(config.reddit.clientId).toBe("");
    expect(config.logging).toEqual({ level: "info", file: undefined });
  });

  it("finds config.yaml in a grandparent directory and reads its sections", async () => {
    const root = makeTempDir();
    const nested = path.join(root, "a", "b");
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(
      path.join(root, "config.yaml"),
      [
        "subreddits:",
        "  - tifu",
        "  - confession",
        "video:",
        "  width: 720",
        "  height: 1280",
        "  output_directory: renders",
        "subtitles:",
        '  font_color: "00FFFF"',
        "  words_per_segment: 3",
        "filtering:",
        "  banned_keywords: [spoiler]",
        "logging:",
        "  level: WARNING"
      ].join("\n")
    );
    const config = await loadConfig({ cwd: nested, env: {} });
    expect(config.subreddits).toEqual(["tifu", "confession"]);
    expect(config.video.width).toBe(720);
    expect(config.video.height).toBe(1280);
    expect(config.video.outputDirectory).toBe(path.join(root, "renders"));
    expect(config.subtitles.fontColor).toBe("00FFFF");
    expect(config.subtitles.wordsPerSegment).toBe(3);
    expect(config.filtering.bannedKeywords).toEqual(["spoiler"]);
    expect(config.logging.level).toBe("warn");
  });

  it("reads secrets and tool overrides from the environment only", () => {
    const config = buildConfig(
      { rewriter: { provider: "OpenAI" } },
      {
        REDDIT_CLIENT_ID: "test-client",
        REDDIT_CLIENT_SECRET: "test-secret",
        OPENAI_API_KEY: "test-key",
        STORYREEL_FFMPEG_PATH: "/opt/ffmpeg/bin/ffmpeg",
        STORYREEL_LOG_LEVEL: "DEBUG"
      },
      "/srv/reels"
    );
    expect(config.reddit.clientId).toBe("test-client");
    expect(config.reddit.clientSecret).toBe("test-secret");
    expect(config.rewriter.provider).toBe("openai");
    expect(config.rewriter.openaiApiKey).toBe("test-key");
    expect(config.rewriter.anthropicApiKey).toBeUndefined();
    expect(config.video.ffmpegPath).toBe("/opt/ffmpeg/bin/ffmpeg");
    expect(config.video.ffprobePath).toBe("ffprobe");
    expect(config.logging.level).toBe("debug");
  });

  it("fails when no config file can be found", async () => {
    const root = makeTempDir();
    const nested = path.join(root, "x", "y");
    fs.mkdirSync(nested, { recursive: true });
    await expect(loadConfig({ cwd: nested, env: {} })).rejects.toBeInstanceOf(ConfigError);
    await expect(loadConfig({ cwd: root, configPath: "missing.yaml", env: {} })).rejects.toThrow(
      "Configuration file not found"
    );
  });

  it("rejects values of the wrong type", () => {
    expect(() => buildConfig({ subtitles: { font_color: 0 } }, {}, "/srv")).toThrow(ConfigError);
    expect(() => buildConfig({ video: { fps: "fast" } }, {}, "/srv")).toThrow("video.fps must be a number");
    expect(() => buildConfig({ reddit: { sort_mode: "best" } }, {}, "/srv")).toThrow(
      "reddit.sort_mode must be one of hot, new, top, rising, controversial, got best"
    );
    expect(() => buildConfig(["not", "a", "mapping"], {}, "/srv")).toThrow(ConfigError);
  });

  it("requires reddit credentials only on demand", () => {
    const config = buildConfig({}, {}, "/srv");
    expect(() => requireRedditCredentials(config)).toThrow(ConfigError);
    const withCreds = buildConfig({}, { REDDIT_CLIENT_ID: "id", REDDIT_CLIENT_SECRET: "test-secret" }, "/srv");
    expect(requireRedditCredentials(withCreds).clientId).toBe("id");
  });

  it("derives per-story output paths and creates their directories", async () => {
    const root = makeTempDir();
    const config = buildConfig({ video: { output_directory: "out" } }, {}, root);
    expect(getOutputPaths(config, "abc")).toEqual({
      audio: path.join(root, "out", "audio", "story_abc.wav"),
      video: path.join(root, "out", "video", "story_abc.mp4"),
      script: path.join(root, "out", "scripts", "story_abc.txt"),
      subtitle: path.join(root, "out", "subtitles", "story_abc.srt")
    });
    await ensureOutputDirectories(config);
    expect(fs.existsSync(path.join(root, "out", "subtitles"))).toBe(true);
  });
});
