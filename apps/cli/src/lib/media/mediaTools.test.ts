import { describe, expect, it } from "vitest";
import { ExternalToolError, ToolUnavailableError } from "@storyreel/shared";
import type { MediaToolRunner, ToolResult } from "./mediaTools";
import {
  FFMPEG_INSTALL_HINT,
  createSpawnRunner,
  installHintFor,
  probeMediaDuration,
  probeVideoDimensions
} from "./mediaTools";

function staticRunner(result: ToolResult): MediaToolRunner & { args: string[][] } {
  const args: string[][] = [];
  return {
    args,
    async run(_binary, runArgs) {
      args.push([...runArgs]);
      return result;
    }
  };
}

describe("probeMediaDuration", () => {
  it("reads format.duration from ffprobe JSON", async () => {
    const runner = staticRunner({
      code: 0,
      stdout: JSON.stringify({ format: { duration: "12.480000" } }),
      stderr: ""
    });
    await expect(probeMediaDuration(runner, "ffprobe", "/a.wav", 1000)).resolves.toBe(12.48);
    expect(runner.args[0]).toEqual(["-v", "quiet", "-print_format", "json", "-show_format", "/a.wav"]);
  });

  it("surfaces ffprobe stderr on a non-zero exit", async () => {
    const runner = staticRunner({ code: 1, stdout: "", stderr: "/a.wav: No such file or directory" });
    const error = await probeMediaDuration(runner, "ffprobe", "/a.wav", 1000).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExternalToolError);
    if (error instanceof ExternalToolError) {
      expect(error.stderr).toBe("/a.wav: No such file or directory");
      expect(error.exitCode).toBe(1);
    }
  });

  it("rejects output without a usable duration", async () => {
    await expect(
      probeMediaDuration(staticRunner({ code: 0, stdout: "not json", stderr: "" }), "ffprobe", "/a", 1000)
    ).rejects.toThrow("ffprobe returned invalid JSON");
    await expect(
      probeMediaDuration(staticRunner({ code: 0, stdout: '{"format":{}}', stderr: "" }), "ffprobe", "/a", 1000)
    ).rejects.toThrow("ffprobe reported no usable duration for /a");
  });
});

describe("probeVideoDimensions", () => {
  it("reads the first video stream", async () => {
    const runner = staticRunner({
      code: 0,
      stdout: JSON.stringify({ streams: [{ width: 1920, height: 1080 }] }),
      stderr: ""
    });
    await expect(probeVideoDimensions(runner, "ffprobe", "/bg.mp4", 1000)).resolves.toEqual({
      width: 1920,
      height: 1080
    });
  });

  it("fails when no video stream is reported", async () => {
    const runner = staticRunner({ code: 0, stdout: '{"streams":[]}', stderr: "" });
    await expect(probeVideoDimensions(runner, "ffprobe", "/song.mp3", 1000)).rejects.toBeInstanceOf(
      ExternalToolError
    );
  });
});

describe("createSpawnRunner", () => {
  const runner = createSpawnRunner();

  it("collects stdout, stderr and the exit code", async () => {
    const result = await runner.run(
      process.execPath,
      ["-e", "process.stdout.write('hi'); process.stderr.write('warn'); process.exit(3)"],
      { timeoutMs: 10_000 }
    );
    expect(result).toEqual({ code: 3, stdout: "hi", stderr: "warn" });
  });

  it("maps a missing binary to ToolUnavailableError", async () => {
    await expect(
      runner.run("/nonexistent/storyreel-test/ffmpeg", ["-version"], { timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(ToolUnavailableError);
  });

  it("kills processes that outlive the timeout", async () => {
    await expect(
      runner.run(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 100 })
    ).rejects.toThrow("timed out after 100ms");
  });
});

describe("installHintFor", () => {
  it("points ffmpeg tools at the ffmpeg install hint", () => {
    expect(installHintFor("/usr/bin/ffprobe")).toBe(FFMPEG_INSTALL_HINT);
    expect(installHintFor("say")).toBe("Make sure say is installed and on PATH.");
  });
});
