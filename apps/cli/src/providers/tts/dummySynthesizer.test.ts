import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_TTS_SETTINGS } from "@storyreel/shared";
import { createLogger, createSilentLogger } from "../../lib/logger";
import { createFakeMediaTools } from "../../lib/media/__testutils__/fakeMediaTools";
import { createDummySynthesizer } from "./dummySynthesizer";
import { buildPlaceholderWav, estimateNarrationSec, estimateSentenceStartsSec } from "./placeholderWav";
import { createSynthesizer } from "./synthesizerFactory";

describe("placeholder narration", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("estimates reading time with a one second floor", () => {
    expect(estimateNarrationSec(300, 150)).toBe(120);
    expect(estimateNarrationSec(1, 150)).toBe(1);
    expect(estimateSentenceStartsSec("One two three. Four five! Six", 60)).toEqual([0, 3, 5]);
  });

  it("builds a mono 16-bit wav of the requested length", () => {
    const wav = buildPlaceholderWav({ durationSec: 0.5, sampleRate: 8000 });
    expect(wav.toString("ascii", 0, 4)).toBe("RIFF");
    expect(wav.toString("ascii", 8, 12)).toBe("WAVE");
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(8000);
    expect(wav.readUInt32LE(40)).toBe(8000);
    expect(wav.length).toBe(44 + 8000);
  });

  it("writes a placeholder sized by the speech rate", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "storyreel-dummy-tts-"));
    dirs.push(dir);
    const output = path.join(dir, "audio", "story.wav");
    const synthesizer = createDummySynthesizer({ speechRate: 120, logger: createSilentLogger() });

    await synthesizer.synthesize("one two three four", output);
    const wav = fs.readFileSync(output);
    expect(wav.readUInt32LE(40)).toBe(2 * 44100 * 2);
  });

  it("selects providers and falls back to local for unknown names", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", sink: (_level, line) => lines.push(line) });
    const options = { ffmpegPath: "ffmpeg", logger, tools: createFakeMediaTools() };

    expect(createSynthesizer({ ...DEFAULT_TTS_SETTINGS, provider: "dummy" }, options).kind).toBe("dummy");
    expect(createSynthesizer(DEFAULT_TTS_SETTINGS, options).kind).toBe("local");
    expect(createSynthesizer({ ...DEFAULT_TTS_SETTINGS, provider: "polly" }, options).kind).toBe("local");
    expect(lines).toEqual(["[storyreel] tts=polly unsupported (supported: local, api, dummy), using local"]);
  });
});
