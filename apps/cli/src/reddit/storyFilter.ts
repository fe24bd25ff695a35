import type { FilteringSettings, Story } from "@storyreel/shared";
import type { Logger } from "../lib/logger";

export type RejectionCategory = "nsfw" | "tooShort" | "tooLong" | "bannedKeyword" | "removed";

export type FilterResult =
  | { passed: true }
  | { passed: false; category: RejectionCategory; reason: string };

export type FilteredStory = { story: Story; result: FilterResult };

const REMOVED_MARKERS = new Set(["[removed]", "[deleted]"]);

export function createStoryFilter(settings: FilteringSettings, logger?: Logger) {
  const log = logger?.child("filter");
  const bannedKeywords = settings.bannedKeywords.filter((keyword) => keyword.trim());

  const checkStory = (story: Story): FilterResult => {
    const charCount = [...story.originalText].length;
    if (story.isNsfw && !settings.allowNsfw) {
      return { passed: false, category: "nsfw", reason: "NSFW content not allowed" };
    }
    if (charCount < settings.minStoryLength) {
      return {
        passed: false,
        category: "tooShort",
        reason: `Too short (${charCount} chars < ${settings.minStoryLength})`
      };
    }
    if (charCount > settings.maxStoryLength) {
      return {
        passed: false,
        category: "tooLong",
        reason: `Too long (${charCount} chars > ${settings.maxStoryLength})`
      };
    }
    const combined = `${story.title} ${story.originalText}`.toLowerCase();
    const banned = bannedKeywords.find((keyword) => combined.includes(keyword.toLowerCase()));
    if (banned) {
      return { passed: false, category: "bannedKeyword", reason: `Contains banned keyword: ${banned}` };
    }
    if (REMOVED_MARKERS.has(story.originalText.trim().toLowerCase())) {
      return { passed: false, category: "removed", reason: "Content has been removed or deleted" };
    }
    return { passed: true };
  };

  /**
   * Checks stories in order and stops once `maxPassing` have passed.
   */
  const filterStories = (stories: readonly Story[], maxPassing?: number): FilteredStory[] => {
    const checked: FilteredStory[] = [];
    let passedCount = 0;
    for (const story of stories) {
      const result = checkStory(story);
      if (result.passed) {
        passedCount += 1;
        log?.debug(`story ${story.id} passed`);
      } else {
        log?.debug(`story ${story.id} filtered out: ${result.reason}`);
      }
      checked.push({ story, result });
      if (maxPassing && passedCount >= maxPassing) {
        break;
      }
    }
    return checked;
  };

  return {
    checkStory,
    filterStories,
    validStories: (stories: readonly Story[], maxPassing?: number) =>
      filterStories(stories, maxPassing)
        .filter((item) => item.result.passed)
        .map((item) => item.story)
  };
}

export type StoryFilter = ReturnType<typeof createStoryFilter>;

export type FilterStats = {
  totalProcessed: number;
  passed: number;
  rejected: Record<RejectionCategory, number>;
  record(result: FilterResult): void;
  summary(): string;
};

export function createFilterStats(): FilterStats {
  const stats: FilterStats = {
    totalProcessed: 0,
    passed: 0,
    rejected: { nsfw: 0, tooShort: 0, tooLong: 0, bannedKeyword: 0, removed: 0 },
    record(result) {
      stats.totalProcessed += 1;
      if (result.passed) {
        stats.passed += 1;
      } else {
        stats.rejected[result.category] += 1;
      }
    },
    summary() {
      if (stats.totalProcessed === 0) {
        return "No stories processed";
      }
      const passRate = ((stats.passed / stats.totalProcessed) * 100).toFixed(1);
      return [
        `Filter stats: ${stats.passed}/${stats.totalProcessed} passed (${passRate}%)`,
        `  - NSFW rejected: ${stats.rejected.nsfw}`,
        `  - Too short: ${stats.rejected.tooShort}`,
        `  - Too long: ${stats.rejected.tooLong}`,
        `  - Banned keywords: ${stats.rejected.bannedKeyword}`,
        `  - Removed/deleted: ${stats.rejected.removed}`
      ].join("\n");
    }
  };
  return stats;
}
