import fs from "node:fs";
import path from "node:path";
import { toSrt } from "@storyreel/shared";
import type { Caption } from "@storyreel/shared";

export function subtitlePathFor(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}.srt`);
}

export async function writeSrtFile(captions: readonly Caption[], filePath: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, toSrt(captions), "utf8");
  return filePath;
}
