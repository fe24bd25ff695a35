import type { RewriterSettings } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { createAnthropicRewriter } from "./anthropicRewriter";
import { createDummyRewriter } from "./dummyRewriter";
import { createOpenAiRewriter } from "./openaiRewriter";
import type { HookPicker, StoryRewriter } from "./types";

const supportedRewriters = ["anthropic", "openai", "dummy"] as const;

export type RewriterFactoryOptions = {
  logger: Logger;
  anthropicBaseUrl?: string;
  openaiBaseUrl?: string;
  pickHook?: HookPicker;
};

export function createRewriter(settings: RewriterSettings, options: RewriterFactoryOptions): StoryRewriter {
  const { logger } = options;
  const provider = settings.provider.trim().toLowerCase();
  const dummy = () => createDummyRewriter({ logger, pickHook: options.pickHook });

  if (provider === "anthropic") {
    if (!settings.anthropicApiKey) {
      logger.warn("rewriter=anthropic missing ANTHROPIC_API_KEY, falling back to dummy");
      return dummy();
    }
    return createAnthropicRewriter({
      apiKey: settings.anthropicApiKey,
      model: settings.anthropicModel,
      logger,
      baseUrl: options.anthropicBaseUrl
    });
  }
  if (provider === "openai") {
    if (!settings.openaiApiKey) {
      logger.warn("rewriter=openai missing OPENAI_API_KEY, falling back to dummy");
      return dummy();
    }
    return createOpenAiRewriter({
      apiKey: settings.openaiApiKey,
      model: settings.openaiModel,
      logger,
      baseUrl: options.openaiBaseUrl
    });
  }
  if (provider !== "dummy") {
    logger.warn(`rewriter=${provider} unsupported (supported: ${supportedRewriters.join(", ")}), using dummy`);
  }
  return dummy();
}
