import { InvalidArgumentError } from "./errors";
import { countWords } from "./scriptCleanup/cleanup";
import type { ProcessingResult, Story } from "./types";

export function hasRewrite(story: Story): boolean {
  return Boolean(story.rewrittenText && story.rewrittenText.trim());
}

/**
 * Text that may leave the pipeline. The original post is never exported;
 * a story without a rewrite is rejected.
 */
export function exportText(story: Story): string {
  if (!story.rewrittenText || !story.rewrittenText.trim()) {
    throw new InvalidArgumentError(`story ${story.id} has not been rewritten; original text cannot be exported`);
  }
  return story.rewrittenText;
}

export function storyWordCount(story: Story): number {
  return countWords(story.rewrittenText ?? story.originalText);
}

export function emptyProcessingResult(): ProcessingResult {
  return { totalAttempted: 0, successful: [], failed: [], filteredOut: [] };
}

export function summarizeProcessing(result: ProcessingResult): string {
  return (
    `Processing complete: ${result.successful.length}/${result.totalAttempted} successful, ` +
    `${result.failed.length} failed, ${result.filteredOut.length} filtered out`
  );
}
