import type { TtsProviderName } from "@storyreel/shared";

export type VoiceInfo = {
  id: string;
  name: string;
  language?: string;
};

export type NarrationSynthesizer = {
  kind: TtsProviderName;
  /** Writes narration for `text` to `outputPath` and returns that path. */
  synthesize(text: string, outputPath: string): Promise<string>;
  listVoices(): Promise<VoiceInfo[]>;
};
