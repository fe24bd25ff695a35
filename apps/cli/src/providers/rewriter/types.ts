import type { RewriterProviderName } from "@storyreel/shared";

export type StoryRewriter = {
  kind: RewriterProviderName;
  model?: string;
  rewrite(originalText: string, targetWordCount: number): Promise<string>;
};

export type HookPicker = (hooks: readonly string[]) => string;
