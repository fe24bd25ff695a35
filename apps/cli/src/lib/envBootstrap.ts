import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { CONFIG_FILE_NAME } from "./config";

/** Nearest directory at or above `start` holding config.yaml. */
export function findProjectRoot(start: string): string | null {
  let dir = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(dir, CONFIG_FILE_NAME))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * `.env.local` then `.env`, first in the working directory and then in the
 * checkout the CLI runs from.
 */
export function envFileCandidates(cwd: string, installDir: string = __dirname): string[] {
  const dirs = [path.resolve(cwd)];
  const projectRoot = findProjectRoot(installDir);
  if (projectRoot) {
    dirs.push(projectRoot);
  }
  return [...new Set(dirs.flatMap((dir) => [path.join(dir, ".env.local"), path.join(dir, ".env")]))];
}

/**
 * Copies variables from each existing file into `env`. A variable that is
 * already set, by the shell or by an earlier file, keeps its value.
 */
export function loadEnvFiles(files: readonly string[], env: NodeJS.ProcessEnv = process.env): string[] {
  const loaded: string[] = [];
  for (const file of files) {
    if (!fs.existsSync(file)) continue;
    const parsed = dotenv.parse(fs.readFileSync(file));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    loaded.push(file);
  }
  return loaded;
}

const loaded = loadEnvFiles(envFileCandidates(process.cwd()));

if (process.env.STORYREEL_DEBUG_ENV_BOOTSTRAP === "1") {
  console.log(`[storyreel] env files: ${loaded.join(", ") || "<none>"}`);
}
