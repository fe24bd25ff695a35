import { spawn } from "node:child_process";
import path from "node:path";
import { ExternalToolError, ToolUnavailableError } from "@storyreel/shared";

export type ToolResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

export type ToolRunOptions = {
  timeoutMs: number;
};

export interface MediaToolRunner {
  run(binary: string, args: readonly string[], options: ToolRunOptions): Promise<ToolResult>;
}

export const FFMPEG_INSTALL_HINT =
  "Install ffmpeg (macOS: brew install ffmpeg, Debian/Ubuntu: apt install ffmpeg) " +
  "or set STORYREEL_FFMPEG_PATH.";

export function installHintFor(binary: string): string {
  const name = path.basename(binary).replace(/\.exe$/i, "");
  if (name === "ffmpeg" || name === "ffprobe") {
    return FFMPEG_INSTALL_HINT;
  }
  if (name === "espeak-ng") {
    return "Install espeak-ng (Debian/Ubuntu: apt install espeak-ng) or use another tts provider.";
  }
  return `Make sure ${binary} is installed and on PATH.`;
}

function isMissingBinary(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function createSpawnRunner(): MediaToolRunner {
  return {
    run(binary, args, options) {
      return new Promise<ToolResult>((resolve, reject) => {
        const child = spawn(binary, [...args], { windowsHide: true });
        let stdout = "";
        let stderr = "";
        let timedOut = false;

        const timer = setTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, options.timeoutMs);

        child.stdout.on("data", (chunk: Buffer) => {
          stdout += chunk.toString();
        });

        child.stderr.on("data", (chunk: Buffer) => {
          stderr += chunk.toString();
        });

        child.on("error", (err) => {
          clearTimeout(timer);
          if (isMissingBinary(err)) {
            reject(new ToolUnavailableError(binary, installHintFor(binary)));
            return;
          }
          reject(err);
        });

        child.on("close", (code) => {
          clearTimeout(timer);
          if (timedOut) {
            reject(
              new ExternalToolError(binary, `${binary} timed out after ${options.timeoutMs}ms`, {
                exitCode: code,
                stderr
              })
            );
            return;
          }
          resolve({ code, stdout, stderr });
        });
      });
    }
  };
}

function parseJson(tool: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ExternalToolError(tool, `${tool} returned invalid JSON`, {
      exitCode: 0,
      stderr: ""
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function probeMediaDuration(
  runner: MediaToolRunner,
  ffprobePath: string,
  filePath: string,
  timeoutMs: number
): Promise<number> {
  const result = await runner.run(
    ffprobePath,
    ["-v", "quiet", "-print_format", "json", "-show_format", filePath],
    { timeoutMs }
  );
  if (result.code !== 0) {
    throw new ExternalToolError(ffprobePath, `ffprobe failed for ${filePath}`, {
      exitCode: result.code,
      stderr: result.stderr
    });
  }
  const parsed = parseJson(ffprobePath, result.stdout);
  const format = isRecord(parsed) ? parsed.format : undefined;
  const rawDuration = isRecord(format) ? format.duration : undefined;
  const duration =
    typeof rawDuration === "string" || typeof rawDuration === "number" ? Number(rawDuration) : Number.NaN;
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ExternalToolError(ffprobePath, `ffprobe reported no usable duration for ${filePath}`, {
      exitCode: result.code,
      stderr: result.stderr
    });
  }
  return duration;
}

export async function probeVideoDimensions(
  runner: MediaToolRunner,
  ffprobePath: string,
  filePath: string,
  timeoutMs: number
): Promise<{ width: number; height: number }> {
  const result = await runner.run(
    ffprobePath,
    ["-v", "quiet", "-print_format", "json", "-show_streams", "-select_streams", "v:0", filePath],
    { timeoutMs }
  );
  if (result.code !== 0) {
    throw new ExternalToolError(ffprobePath, `ffprobe failed for ${filePath}`, {
      exitCode: result.code,
      stderr: result.stderr
    });
  }
  const parsed = parseJson(ffprobePath, result.stdout);
  const streams = isRecord(parsed) && Array.isArray(parsed.streams) ? parsed.streams : [];
  const stream: unknown = streams[0];
  if (!isRecord(stream) || typeof stream.width !== "number" || typeof stream.height !== "number") {
    throw new ExternalToolError(ffprobePath, `no video stream found in ${filePath}`, {
      exitCode: result.code,
      stderr: ""
    });
  }
  return { width: stream.width, height: stream.height };
}
