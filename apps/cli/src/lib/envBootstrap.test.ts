import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { envFileCandidates, findProjectRoot, loadEnvFiles } from "./envBootstrap";

describe("envBootstrap", () => {
  let root = "";

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "storyreel-env-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("keeps values exported in the shell", () => {
    const envPath = path.join(root, ".env");
    fs.writeFileSync(envPath, "OPENAI_API_KEY=from-dotenv\nTTS_API_URL=http://localhost:9000\n");
    const env: NodeJS.ProcessEnv = { OPENAI_API_KEY: "from-shell" };

    expect(loadEnvFiles([envPath], env)).toEqual([envPath]);
    expect(env).toEqual({ OPENAI_API_KEY: "from-shell", TTS_API_URL: "http://localhost:9000" });
  });

  it("lets the first file that sets a variable win and skips missing files", () => {
    const local = path.join(root, ".env.local");
    const shared = path.join(root, ".env");
    fs.writeFileSync(local, "STORYREEL_LOG_LEVEL=debug\n");
    fs.writeFileSync(shared, "STORYREEL_LOG_LEVEL=warning\nREDDIT_USER_AGENT=storyreel/test\n");
    const env: NodeJS.ProcessEnv = {};

    const loaded = loadEnvFiles([path.join(root, "missing.env"), local, shared], env);
    expect(loaded).toEqual([local, shared]);
    expect(env).toEqual({ STORYREEL_LOG_LEVEL: "debug", REDDIT_USER_AGENT: "storyreel/test" });
  });

  it("looks in the working directory before the checkout holding config.yaml", () => {
    const checkout = path.join(root, "checkout");
    const installDir = path.join(checkout, "apps", "cli", "src", "lib");
    const workDir = path.join(root, "work");
    fs.mkdirSync(installDir, { recursive: true });
    fs.mkdirSync(workDir);
    fs.writeFileSync(path.join(checkout, "config.yaml"), "subreddits: [tifu]\n");

    expect(findProjectRoot(installDir)).toBe(checkout);
    expect(envFileCandidates(workDir, installDir)).toEqual([
      path.join(workDir, ".env.local"),
      path.join(workDir, ".env"),
      path.join(checkout, ".env.local"),
      path.join(checkout, ".env")
    ]);
    expect(envFileCandidates(checkout, installDir)).toEqual([
      path.join(checkout, ".env.local"),
      path.join(checkout, ".env")
    ]);
  });
});
