import { describe, expect, it } from "vitest";
import { ExternalToolError, PipelineError, ResourceMissingError } from "./errors";

describe("ExternalToolError", () => {
  it("carries the whole stderr in its message", () => {
    const stderr = ["line 1", "line 2", "line 3", "line 4", "line 5", "Conversion failed!", ""].join("\n");
    const error = new ExternalToolError("ffmpeg", "ffmpeg exited with code 1", { exitCode: 1, stderr });
    expect(error.message).toBe(
      "ffmpeg exited with code 1: line 1\nline 2\nline 3\nline 4\nline 5\nConversion failed!"
    );
    expect(error.stderr).toBe(stderr);
    expect(error.code).toBe("EXTERNAL_TOOL_FAILURE");
    expect(error).toBeInstanceOf(PipelineError);
  });

  it("keeps the bare message when stderr is blank", () => {
    const error = new ExternalToolError("ffprobe", "ffprobe failed for /a.wav", { exitCode: 1, stderr: "  \n" });
    expect(error.message).toBe("ffprobe failed for /a.wav");
  });
});

describe("ResourceMissingError", () => {
  it("names the label and path", () => {
    const error = new ResourceMissingError("Audio file", "/tmp/a.wav");
    expect(error.message).toBe("Audio file not found: /tmp/a.wav");
    expect(error.path).toBe("/tmp/a.wav");
  });
});
