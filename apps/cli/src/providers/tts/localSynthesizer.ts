import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ExternalToolError, InvalidArgumentError, PostconditionError } from "@storyreel/shared";
import type { TtsSettings } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { createSpawnRunner } from "../../lib/media/mediaTools";
import type { MediaToolRunner } from "../../lib/media/mediaTools";
import type { NarrationSynthesizer, VoiceInfo } from "./types";

const LIST_VOICES_TIMEOUT_MS = 15_000;

export type SpeechEngine = "say" | "espeak-ng";

export type LocalSynthesizerConfig = {
  settings: TtsSettings;
  ffmpegPath: string;
  logger: Logger;
  tools?: MediaToolRunner;
  platform?: NodeJS.Platform;
};

export function speechEngineFor(platform: NodeJS.Platform): SpeechEngine {
  return platform === "darwin" ? "say" : "espeak-ng";
}

/** Parses `say -v ?` lines such as `Alex   en_US   # Most people recognize me by my voice.` */
export function parseSayVoices(stdout: string): VoiceInfo[] {
  const voices: VoiceInfo[] = [];
  for (const line of stdout.split("\n")) {
    const match = /^(.+?)\s+([a-z]{2,3}[_-][A-Za-z0-9]+)\s+#/.exec(line);
    if (match) {
      const name = match[1].trim();
      voices.push({ id: name, name, language: match[2] });
    }
  }
  return voices;
}

/** Parses the `espeak-ng --voices` table (Pty Language Age/Gender VoiceName File ...). */
export function parseEspeakVoices(stdout: string): VoiceInfo[] {
  const voices: VoiceInfo[] = [];
  for (const line of stdout.split("\n")) {
    const columns = line.trim().split(/\s+/);
    if (columns.length < 4 || columns[0] === "Pty" || !/^\d+$/.test(columns[0])) {
      continue;
    }
    voices.push({ id: columns[1], name: columns[3], language: columns[1] });
  }
  return voices;
}

function engineArgs(engine: SpeechEngine, settings: TtsSettings, textFile: string, rawPath: string) {
  const args: string[] = [];
  if (engine === "say") {
    args.push("-o", rawPath);
    if (settings.localVoiceId) {
      args.push("-v", settings.localVoiceId);
    }
    if (settings.localRate > 0) {
      args.push("-r", String(Math.round(settings.localRate)));
    }
  } else {
    const rate = settings.localRate > 0 ? settings.localRate : settings.speechRate;
    args.push("-w", rawPath, "-s", String(Math.round(rate)), "-a", String(Math.round(settings.localVolume * 100)));
    if (settings.localVoiceId) {
      args.push("-v", settings.localVoiceId);
    }
  }
  args.push("-f", textFile);
  return args;
}

/**
 * Narration from the operating system's speech engine, converted by ffmpeg to
 * mono 44.1 kHz 16-bit WAV. The engine's own output lives in a temp directory
 * that is removed whatever the outcome.
 */
export function createLocalSynthesizer(config: LocalSynthesizerConfig): NarrationSynthesizer {
  const { settings } = config;
  const logger = config.logger.child("tts:local");
  const tools = config.tools ?? createSpawnRunner();
  const engine = speechEngineFor(config.platform ?? process.platform);
  const rawExtension = engine === "say" ? "aiff" : "wav";

  const runChecked = async (binary: string, args: string[]) => {
    const result = await tools.run(binary, args, { timeoutMs: settings.timeoutMs });
    if (result.code !== 0) {
      throw new ExternalToolError(binary, `${binary} exited with code ${result.code}`, {
        exitCode: result.code,
        stderr: result.stderr
      });
    }
  };

  return {
    kind: "local",
    async synthesize(text, outputPath) {
      if (!text.trim()) {
        throw new InvalidArgumentError("narration text is empty");
      }
      const tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "storyreel-tts-"));
      try {
        const textFile = path.join(tmpDir, "narration.txt");
        const rawPath = path.join(tmpDir, `narration.${rawExtension}`);
        await fs.promises.writeFile(textFile, text, "utf8");

        logger.info(`engine=${engine} voice=${settings.localVoiceId || "default"} chars=${text.length}`);
        await runChecked(engine, engineArgs(engine, settings, textFile, rawPath));
        if (!fs.existsSync(rawPath)) {
          throw new PostconditionError(`${engine} finished but wrote no audio`);
        }

        await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
        await runChecked(config.ffmpegPath, [
          "-y",
          "-i",
          rawPath,
          "-acodec",
          "pcm_s16le",
          "-ar",
          "44100",
          "-ac",
          "1",
          outputPath
        ]);
        if (!fs.existsSync(outputPath)) {
          throw new PostconditionError(`ffmpeg finished but no audio was written to ${outputPath}`);
        }
        logger.info(`narration=${outputPath}`);
        return outputPath;
      } finally {
        await fs.promises.rm(tmpDir, { recursive: true, force: true });
      }
    },
    async listVoices() {
      const args = engine === "say" ? ["-v", "?"] : ["--voices"];
      const result = await tools.run(engine, args, { timeoutMs: LIST_VOICES_TIMEOUT_MS });
      if (result.code !== 0) {
        throw new ExternalToolError(engine, `${engine} could not list voices`, {
          exitCode: result.code,
          stderr: result.stderr
        });
      }
      return engine === "say" ? parseSayVoices(result.stdout) : parseEspeakVoices(result.stdout);
    }
  };
}
