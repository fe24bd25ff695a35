import { ProviderError, countWords } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { isRecord, joinUrl, requestJson } from "../../lib/http";
import { REWRITE_MAX_TOKENS, buildRewritePrompt } from "./prompt";
import type { StoryRewriter } from "./types";

export const OPENAI_BASE_URL = "https://api.openai.com";

export type OpenAiRewriterConfig = {
  apiKey: string;
  model: string;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
};

function extractContent(payload: unknown): string {
  const choices = isRecord(payload) && Array.isArray(payload.choices) ? payload.choices : [];
  const first: unknown = choices[0];
  const message = isRecord(first) ? first.message : undefined;
  const content = isRecord(message) ? message.content : undefined;
  return typeof content === "string" ? content.trim() : "";
}

export function createOpenAiRewriter(config: OpenAiRewriterConfig): StoryRewriter {
  const logger = config.logger.child("rewriter:openai");
  const url = joinUrl(config.baseUrl ?? OPENAI_BASE_URL, "/v1/chat/completions");
  const timeoutMs = Math.max(1000, config.timeoutMs ?? 120000);

  return {
    kind: "openai",
    model: config.model,
    async rewrite(originalText, targetWordCount) {
      logger.info(`request model=${config.model} target=${targetWordCount}`);
      const payload = await requestJson(
        "openai",
        url,
        {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${config.apiKey}`
          },
          body: JSON.stringify({
            model: config.model,
            messages: [{ role: "user", content: buildRewritePrompt(originalText, targetWordCount) }],
            max_tokens: REWRITE_MAX_TOKENS
          })
        },
        timeoutMs
      );
      const rewritten = extractContent(payload);
      if (!rewritten) {
        throw new ProviderError("openai", "empty completion");
      }
      logger.info(`received words=${countWords(rewritten)} target=${targetWordCount}`);
      return rewritten;
    }
  };
}
