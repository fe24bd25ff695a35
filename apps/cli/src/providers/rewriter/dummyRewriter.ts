import { ensureSentenceEnding, stripRedditMarkup, truncateToWords } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import type { HookPicker, StoryRewriter } from "./types";

export const REPLACEMENTS: Readonly<Record<string, string>> = {
  said: "told me",
  asked: "wanted to know",
  told: "mentioned to",
  went: "headed",
  got: "ended up with",
  was: "seemed",
  were: "appeared to be",
  because: "since",
  but: "however",
  and: "plus",
  very: "really",
  really: "totally",
  just: "literally",
  think: "believe",
  know: "realize",
  want: "need",
  need: "have to have",
  like: "similar to",
  good: "great",
  bad: "terrible",
  big: "huge",
  small: "tiny"
};

export const HOOKS: readonly string[] = [
  "You won't believe what happened to me.",
  "So this is absolutely insane.",
  "Let me tell you about the craziest thing.",
  "Okay so this story is wild.",
  "I still can't believe this actually happened."
];

export const CLOSING_QUESTION = "What would you have done?";

const WORD_PATTERN = new RegExp(`\\b(${Object.keys(REPLACEMENTS).join("|")})\\b`, "gi");

export const pickRandomHook: HookPicker = (hooks) => hooks[Math.floor(Math.random() * hooks.length)] ?? "";

function applyCase(original: string, replacement: string) {
  if (original.length > 1 && original.toUpperCase() === original) {
    return replacement.toUpperCase();
  }
  if (original[0] !== original[0].toLowerCase()) {
    return replacement[0].toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

/**
 * Word swaps in a single pass, so a replacement is never replaced again.
 * Sentence-opening "I" becomes "So I".
 */
export function paraphraseWords(text: string): string {
  return text
    .replace(/(^|[.!?]\s+)I\s/g, "$1So I ")
    .replace(WORD_PATTERN, (match) => applyCase(match, REPLACEMENTS[match.toLowerCase()] ?? match));
}

export function createDummyRewriter(options: { logger: Logger; pickHook?: HookPicker }): StoryRewriter {
  const logger = options.logger.child("rewriter:dummy");
  const pickHook = options.pickHook ?? pickRandomHook;

  return {
    kind: "dummy",
    async rewrite(originalText, targetWordCount) {
      logger.warn("Using dummy rewriter - results will be lower quality.");
      const cleaned = paraphraseWords(stripRedditMarkup(originalText));
      const body = truncateToWords(cleaned, targetWordCount);
      const script = ensureSentenceEnding(`${pickHook(HOOKS)} ${body}`.trim());
      return `${script} ${CLOSING_QUESTION}`;
    }
  };
}
