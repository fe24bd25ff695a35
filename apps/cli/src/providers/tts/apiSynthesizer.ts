import fs from "node:fs";
import path from "node:path";
import { ConfigError, InvalidArgumentError, ProviderError } from "@storyreel/shared";
import type { TtsSettings } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { isRecord, joinUrl, makeBodySnippet, parseJsonBody, requestBuffer } from "../../lib/http";
import type { HttpResult } from "../../lib/http";
import type { NarrationSynthesizer, VoiceInfo } from "./types";

const PROVIDER = "tts-api";
const AUDIO_FIELDS = ["audio", "audioContent", "audio_content", "data"] as const;

function describeFailure(result: HttpResult) {
  const text = result.body.toString("utf8");
  let detail = "";
  try {
    const payload: unknown = JSON.parse(text);
    if (isRecord(payload) && payload.error !== undefined) {
      detail = typeof payload.error === "string" ? payload.error : JSON.stringify(payload.error);
    }
  } catch {
    detail = makeBodySnippet(text);
  }
  return `API returned status ${result.status}${detail ? `: ${detail}` : ""}`;
}

export function extractAudio(result: HttpResult): Buffer {
  if (!result.contentType.includes("application/json")) {
    return result.body;
  }
  const payload = parseJsonBody(PROVIDER, result);
  if (isRecord(payload)) {
    for (const field of AUDIO_FIELDS) {
      const value = payload[field];
      if (typeof value === "string") {
        return Buffer.from(value, "base64");
      }
    }
  }
  throw new ProviderError(PROVIDER, "No audio data found in API response");
}

function toVoiceInfo(entry: unknown): VoiceInfo | null {
  if (typeof entry === "string") {
    return { id: entry, name: entry };
  }
  if (!isRecord(entry)) {
    return null;
  }
  const id = typeof entry.id === "string" ? entry.id : typeof entry.voice_id === "string" ? entry.voice_id : "";
  if (!id) {
    return null;
  }
  const name = typeof entry.name === "string" ? entry.name : id;
  const language = typeof entry.language === "string" ? entry.language : undefined;
  return { id, name, language };
}

/**
 * Generic HTTP speech service: `POST {url}/synthesize` with a bearer key.
 * The body may be raw audio or JSON carrying base64 audio.
 */
export function createApiSynthesizer(options: {
  settings: TtsSettings;
  logger: Logger;
}): NarrationSynthesizer {
  const { settings } = options;
  const logger = options.logger.child("tts:api");
  if (!settings.apiKey) {
    throw new ConfigError("TTS API key not configured. Set TTS_API_KEY.");
  }
  if (!settings.apiUrl) {
    throw new ConfigError("TTS API URL not configured. Set TTS_API_URL.");
  }
  const apiKey = settings.apiKey;
  const apiUrl = settings.apiUrl;
  const headers = {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
    Accept: `audio/${settings.apiFormat}`
  };

  return {
    kind: "api",
    async synthesize(text, outputPath) {
      if (!text.trim()) {
        throw new InvalidArgumentError("narration text is empty");
      }
      logger.info(`request voice=${settings.apiVoice} format=${settings.apiFormat} chars=${text.length}`);
      const result = await requestBuffer(
        PROVIDER,
        joinUrl(apiUrl, "/synthesize"),
        {
          method: "POST",
          headers,
          body: JSON.stringify({
            text,
            voice: settings.apiVoice,
            format: settings.apiFormat,
            speed: 1.0,
            pitch: 1.0
          })
        },
        settings.timeoutMs
      );
      if (result.status !== 200) {
        throw new ProviderError(PROVIDER, describeFailure(result));
      }
      const audio = extractAudio(result);
      if (audio.length === 0) {
        throw new ProviderError(PROVIDER, "API returned empty audio");
      }
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, audio);
      logger.info(`narration=${outputPath} bytes=${audio.length}`);
      return outputPath;
    },
    async listVoices() {
      const result = await requestBuffer(
        PROVIDER,
        joinUrl(apiUrl, "/voices"),
        { method: "GET", headers },
        settings.timeoutMs
      );
      if (result.status !== 200) {
        logger.warn(`voice listing failed status=${result.status}`);
        return [];
      }
      const payload = parseJsonBody(PROVIDER, result);
      const entries = isRecord(payload) && Array.isArray(payload.voices) ? payload.voices : [];
      return entries.map(toVoiceInfo).filter((voice): voice is VoiceInfo => voice !== null);
    }
  };
}
