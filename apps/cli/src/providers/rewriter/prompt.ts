export const REWRITE_MAX_TOKENS = 1024;

export function buildRewritePrompt(originalText: string, targetWordCount: number): string {
  return [
    "You are a professional content writer who turns stories into engaging short-form video scripts.",
    "",
    "Rewrite the following story for a vertical short video. The script should be:",
    "1. Completely paraphrased - use different words and sentence structures",
    "2. Engaging, with a strong hook at the very beginning",
    "3. Conversational and easy to listen to",
    "4. Suitable for text-to-speech narration",
    `5. Around ${targetWordCount} words (roughly 30-60 seconds when spoken)`,
    "",
    "Rules:",
    '- Start with an attention-grabbing hook line (e.g. "You won\'t believe what happened...")',
    "- Use simple, conversational language",
    "- Keep the core story events but change ALL wording",
    '- Remove any Reddit-specific references (like "AITA", "throwaway", "edit:")',
    "- Don't include any URLs or usernames",
    "- Make it flow naturally for spoken narration",
    "- End with something memorable or a question to engage viewers",
    "",
    "Original story:",
    "---",
    originalText,
    "---",
    "",
    "Write only the rewritten script, nothing else. Do not include any commentary or explanations."
  ].join("\n");
}
