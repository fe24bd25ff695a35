import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_TTS_SETTINGS, ProviderError } from "@storyreel/shared";
import type { TtsSettings } from "@storyreel/shared";
import { createSilentLogger } from "../../lib/logger";
import { sendJson, startTestServer } from "../../lib/__testutils__/httpTestServer";
import type { TestServer } from "../../lib/__testutils__/httpTestServer";
import { createApiSynthesizer } from "./apiSynthesizer";

describe("api synthesizer", () => {
  let dir = "";
  let server: TestServer | null = null;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "storyreel-api-tts-"));
  });

  afterEach(async () => {
    await server?.close();
    server = null;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const settingsFor = (url: string): TtsSettings => ({
    ...DEFAULT_TTS_SETTINGS,
    provider: "api",
    apiKey: "test-key",
    apiUrl: `${url}/`,
    apiVoice: "narrator"
  });

  it("writes a binary audio response", async () => {
    server = await startTestServer((_req, res) => {
      res.setHeader("Content-Type", "audio/wav");
      res.end(Buffer.from("RIFFdata"));
    });
    const output = path.join(dir, "audio", "narration.wav");
    const synthesizer = createApiSynthesizer({ settings: settingsFor(server.url), logger: createSilentLogger() });

    await expect(synthesizer.synthesize("Read this.", output)).resolves.toBe(output);
    expect(fs.readFileSync(output, "utf8")).toBe("RIFFdata");

    const [request] = server.requests;
    expect(request.url).toBe("/synthesize");
    expect(request.headers.authorization).toBe("Bearer test-key");
    expect(request.headers.accept).toBe("audio/wav");
    expect(JSON.parse(request.body)).toEqual({
      text: "Read this.",
      voice: "narrator",
      format: "wav",
      speed: 1,
      pitch: 1
    });
  });

  it("decodes base64 audio from a JSON response", async () => {
    server = await startTestServer((_req, res) =>
      sendJson(res, 200, { audioContent: Buffer.from("decoded audio").toString("base64") })
    );
    const output = path.join(dir, "narration.wav");
    const synthesizer = createApiSynthesizer({ settings: settingsFor(server.url), logger: createSilentLogger() });
    await synthesizer.synthesize("Read this.", output);
    expect(fs.readFileSync(output, "utf8")).toBe("decoded audio");
  });

  it("fails when JSON carries no audio", async () => {
    server = await startTestServer((_req, res) => sendJson(res, 200, { status: "ok" }));
    const synthesizer = createApiSynthesizer({ settings: settingsFor(server.url), logger: createSilentLogger() });
    await expect(synthesizer.synthesize("Read this.", path.join(dir, "n.wav"))).rejects.toThrow(
      "tts-api: No audio data found in API response"
    );
  });

  it("includes the API error field in failures", async () => {
    server = await startTestServer((_req, res) => sendJson(res, 429, { error: "rate limited" }));
    const synthesizer = createApiSynthesizer({ settings: settingsFor(server.url), logger: createSilentLogger() });
    const error = await synthesizer.synthesize("Read this.", path.join(dir, "n.wav")).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.message).toBe("tts-api: API returned status 429: rate limited");
    }
    expect(fs.existsSync(path.join(dir, "n.wav"))).toBe(false);
  });

  it("lists voices and tolerates a failing listing", async () => {
    server = await startTestServer((req, res) => {
      if (req.url === "/voices") {
        sendJson(res, 200, { voices: [{ id: "v1", name: "Calm" }, "v2", { nope: true }] });
        return;
      }
      sendJson(res, 500, {});
    });
    const synthesizer = createApiSynthesizer({ settings: settingsFor(server.url), logger: createSilentLogger() });
    await expect(synthesizer.listVoices()).resolves.toEqual([
      { id: "v1", name: "Calm", language: undefined },
      { id: "v2", name: "v2" }
    ]);
  });

  it("requires both a key and a url", () => {
    expect(() =>
      createApiSynthesizer({ settings: { ...DEFAULT_TTS_SETTINGS, apiUrl: "http://127.0.0.1:1" }, logger: createSilentLogger() })
    ).toThrow(ConfigError);
    expect(() =>
      createApiSynthesizer({ settings: { ...DEFAULT_TTS_SETTINGS, apiKey: "test-key" }, logger: createSilentLogger() })
    ).toThrow("TTS API URL not configured. Set TTS_API_URL.");
  });
});
