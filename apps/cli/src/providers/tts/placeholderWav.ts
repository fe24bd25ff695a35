export const PLACEHOLDER_SAMPLE_RATE = 44100;

const CUE_BEEP_SEC = 0.08;

export function estimateNarrationSec(wordCount: number, wordsPerMinute: number) {
  return Math.max(1, (wordCount / wordsPerMinute) * 60);
}

/**
 * Start offsets of each sentence when `text` is read at `wordsPerMinute`.
 */
export function estimateSentenceStartsSec(text: string, wordsPerMinute: number): number[] {
  const sentences = text
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
  const starts: number[] = [];
  let cursor = 0;
  for (const sentence of sentences) {
    starts.push(cursor);
    cursor += (sentence.split(/\s+/).length / wordsPerMinute) * 60;
  }
  return starts;
}

/**
 * 16-bit mono PCM WAV: a quiet 220 Hz tone with a short 880 Hz beep at every
 * cue start.
 */
export function buildPlaceholderWav({
  durationSec,
  cueStartsSec = [],
  sampleRate = PLACEHOLDER_SAMPLE_RATE
}: {
  durationSec: number;
  cueStartsSec?: readonly number[];
  sampleRate?: number;
}): Buffer {
  const totalSamples = Math.max(1, Math.ceil(durationSec * sampleRate));
  const beepSamples = Math.floor(CUE_BEEP_SEC * sampleRate);
  const beepRanges = cueStartsSec.map((start) => {
    const first = Math.floor(start * sampleRate);
    return [first, first + beepSamples] as const;
  });

  const data = Buffer.alloc(totalSamples * 2);
  let beepIndex = 0;
  for (let i = 0; i < totalSamples; i += 1) {
    const t = i / sampleRate;
    const base = Math.sin(2 * Math.PI * 220 * t) * 0.12;
    let beep = 0;
    let range = beepRanges[beepIndex];
    while (range && i > range[1]) {
      beepIndex += 1;
      range = beepRanges[beepIndex];
    }
    if (range && i >= range[0]) {
      beep = Math.sin(2 * Math.PI * 880 * t) * 0.5;
    }
    const sample = Math.max(-1, Math.min(1, base + beep));
    data.writeInt16LE(Math.floor(sample * 32767), i * 2);
  }

  const header = Buffer.alloc(44);
  header.write("RIFF", 0);
  header.writeUInt32LE(36 + data.length, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36);
  header.writeUInt32LE(data.length, 40);

  return Buffer.concat([header, data]);
}
