import fs from "node:fs";
import path from "node:path";
import { ToolUnavailableError } from "@storyreel/shared";
import type { MediaToolRunner, ToolResult } from "../mediaTools";
import { installHintFor } from "../mediaTools";

export type FakeCall = { binary: string; args: string[] };

export type FakeMediaTools = MediaToolRunner & { calls: FakeCall[] };

export const FAKE_VIDEO_BYTES = "fake video";

/**
 * Stand-in for ffmpeg, ffprobe and the system speech engines. Answers
 * `-version`, returns ffprobe JSON and "renders" by writing the output path.
 * Speech engines called without an output flag return `voiceListing`.
 */
export function createFakeMediaTools(options?: {
  missing?: string[];
  audioDurationSec?: number;
  outputDurationSec?: number;
  probeExitCode?: number;
  renderExitCode?: number;
  renderStderr?: string;
  writeOutput?: boolean;
  dimensions?: { width: number; height: number };
  engineExitCode?: number;
  voiceListing?: string;
}): FakeMediaTools {
  const calls: FakeCall[] = [];
  const rendered = new Set<string>();
  const missing = new Set(options?.missing ?? []);

  const ok = (stdout = ""): ToolResult => ({ code: 0, stdout, stderr: "" });

  const writeFile = (target: string | undefined) => {
    if (!target || options?.writeOutput === false) {
      return;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, FAKE_VIDEO_BYTES);
    rendered.add(target);
  };

  return {
    calls,
    async run(binary, args) {
      calls.push({ binary, args: [...args] });
      if (missing.has(binary)) {
        throw new ToolUnavailableError(binary, installHintFor(binary));
      }
      if (args[0] === "-version") {
        return ok(`${binary} version 6.1-test`);
      }
      if (path.basename(binary) === "ffprobe") {
        if (options?.probeExitCode) {
          return { code: options.probeExitCode, stdout: "", stderr: "Invalid data found when processing input" };
        }
        const target = args[args.length - 1];
        if (args.includes("-show_streams")) {
          const dims = options?.dimensions ?? { width: 1080, height: 1920 };
          return ok(JSON.stringify({ streams: [{ codec_type: "video", ...dims }] }));
        }
        const duration = rendered.has(target)
          ? options?.outputDurationSec ?? options?.audioDurationSec ?? 4
          : options?.audioDurationSec ?? 4;
        return ok(JSON.stringify({ format: { duration: duration.toFixed(6) } }));
      }
      if (binary === "say" || binary === "espeak-ng") {
        const flagIndex = args.indexOf(binary === "say" ? "-o" : "-w");
        if (flagIndex < 0) {
          return ok(options?.voiceListing ?? "");
        }
        if (options?.engineExitCode) {
          return { code: options.engineExitCode, stdout: "", stderr: `${binary}: synthesis failed` };
        }
        writeFile(args[flagIndex + 1]);
        return ok();
      }
      const exitCode = options?.renderExitCode ?? 0;
      if (exitCode !== 0) {
        return { code: exitCode, stdout: "", stderr: options?.renderStderr ?? "render failed" };
      }
      writeFile(args[args.length - 1]);
      return ok();
    }
  };
}
