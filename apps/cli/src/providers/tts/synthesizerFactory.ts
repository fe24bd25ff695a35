import type { TtsSettings } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import type { MediaToolRunner } from "../../lib/media/mediaTools";
import { createApiSynthesizer } from "./apiSynthesizer";
import { createDummySynthesizer } from "./dummySynthesizer";
import { createLocalSynthesizer } from "./localSynthesizer";
import type { NarrationSynthesizer } from "./types";

const supportedSynthesizers = ["local", "api", "dummy"] as const;

export type SynthesizerFactoryOptions = {
  ffmpegPath: string;
  logger: Logger;
  tools?: MediaToolRunner;
  platform?: NodeJS.Platform;
};

export function createSynthesizer(settings: TtsSettings, options: SynthesizerFactoryOptions): NarrationSynthesizer {
  const { logger } = options;
  const provider = settings.provider.trim().toLowerCase();

  if (provider === "api") {
    return createApiSynthesizer({ settings, logger });
  }
  if (provider === "dummy") {
    return createDummySynthesizer({ speechRate: settings.speechRate, logger });
  }
  if (provider !== "local") {
    logger.warn(`tts=${provider} unsupported (supported: ${supportedSynthesizers.join(", ")}), using local`);
  }
  return createLocalSynthesizer({
    settings,
    ffmpegPath: options.ffmpegPath,
    logger,
    tools: options.tools,
    platform: options.platform
  });
}
