import { ProviderError, countWords } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { isRecord, joinUrl, requestJson } from "../../lib/http";
import { REWRITE_MAX_TOKENS, buildRewritePrompt } from "./prompt";
import type { StoryRewriter } from "./types";

export const ANTHROPIC_BASE_URL = "https://api.anthropic.com";
export const ANTHROPIC_VERSION = "2023-06-01";

export type AnthropicRewriterConfig = {
  apiKey: string;
  model: string;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
};

function extractText(payload: unknown): string {
  const content = isRecord(payload) && Array.isArray(payload.content) ? payload.content : [];
  const parts: string[] = [];
  for (const block of content) {
    if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
      parts.push(block.text);
    }
  }
  return parts.join("").trim();
}

export function createAnthropicRewriter(config: AnthropicRewriterConfig): StoryRewriter {
  const logger = config.logger.child("rewriter:anthropic");
  const url = joinUrl(config.baseUrl ?? ANTHROPIC_BASE_URL, "/v1/messages");
  const timeoutMs = Math.max(1000, config.timeoutMs ?? 120000);

  return {
    kind: "anthropic",
    model: config.model,
    async rewrite(originalText, targetWordCount) {
      logger.info(`request model=${config.model} target=${targetWordCount}`);
      const payload = await requestJson(
        "anthropic",
        url,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-api-key": config.apiKey,
            "anthropic-version": ANTHROPIC_VERSION
          },
          body: JSON.stringify({
            model: config.model,
            max_tokens: REWRITE_MAX_TOKENS,
            messages: [{ role: "user", content: buildRewritePrompt(originalText, targetWordCount) }]
          })
        },
        timeoutMs
      );
      const rewritten = extractText(payload);
      if (!rewritten) {
        throw new ProviderError("anthropic", "empty completion");
      }
      logger.info(`received words=${countWords(rewritten)} target=${targetWordCount}`);
      return rewritten;
    }
  };
}
