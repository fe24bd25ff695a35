import fs from "node:fs";
import path from "node:path";
import { countWords } from "@storyreel/shared";
import type { Logger } from "../../lib/logger";
import { buildPlaceholderWav, estimateNarrationSec, estimateSentenceStartsSec } from "./placeholderWav";
import type { NarrationSynthesizer } from "./types";

export function createDummySynthesizer(options: { speechRate: number; logger: Logger }): NarrationSynthesizer {
  const logger = options.logger.child("tts:dummy");

  return {
    kind: "dummy",
    async synthesize(text, outputPath) {
      const durationSec = estimateNarrationSec(countWords(text), options.speechRate);
      const wav = buildPlaceholderWav({
        durationSec,
        cueStartsSec: estimateSentenceStartsSec(text, options.speechRate)
      });
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(outputPath, wav);
      logger.warn(`placeholder narration ${durationSec.toFixed(2)}s written to ${outputPath}`);
      return outputPath;
    },
    async listVoices() {
      return [{ id: "placeholder", name: "Placeholder tone" }];
    }
  };
}
