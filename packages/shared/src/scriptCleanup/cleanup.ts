const REDDIT_MARKUP_PATTERNS: RegExp[] = [
  /^AITA\s+(for|if|when)\s+/gim,
  /^WIBTA\s+(for|if|when)\s+/gim,
  /^TIFU\s+by\s+/gim,
  /\[.*?\]/g,
  /edit:.*$/gim,
  /update:.*$/gim,
  /throwaway\s+because.*?\./gi,
  /using\s+a\s+throwaway.*?\./gi,
  /tldr:.*$/gim,
  /tl;dr:.*$/gim,
  /https?:\/\/\S+/gi,
  /\bu\/\w+/gi,
  /\br\/\w+/gi
];

export function normalizeSpacing(input: string) {
  let text = input.replace(/\s+/g, " ").trim();
  text = text.replace(/\s+([,.;:!?])/g, "$1");
  text = text.replace(/\s+\)/g, ")");
  text = text.replace(/\(\s+/g, "(");
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Removes Reddit-only furniture from a post before it is paraphrased:
 * AITA/WIBTA/TIFU title prefixes, bracketed tags like [M25], edit/update/tldr
 * trailers, throwaway disclaimers, links and u/ or r/ mentions.
 */
export function stripRedditMarkup(input: string): string {
  let text = input.replace(/\r\n/g, "\n");
  for (const pattern of REDDIT_MARKUP_PATTERNS) {
    text = text.replace(pattern, "");
  }
  return normalizeSpacing(text);
}

export function countWords(text: string): number {
  const normalized = text.trim();
  if (!normalized) {
    return 0;
  }
  return normalized.split(/\s+/).length;
}

/**
 * Keeps the first `maxWords` words. When the cut lands past 70% of the kept
 * text with a period behind it, the text is shortened to end on that period.
 */
export function truncateToWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) {
    return words.join(" ");
  }
  const truncated = words.slice(0, Math.max(0, maxWords)).join(" ");
  const lastPeriod = truncated.lastIndexOf(".");
  if (lastPeriod > truncated.length * 0.7) {
    return truncated.slice(0, lastPeriod + 1);
  }
  return truncated;
}

export function ensureSentenceEnding(line: string) {
  const trimmed = line.trimEnd();
  if (!trimmed) {
    return trimmed;
  }
  if (/[.!?]$/.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed}.`;
}
