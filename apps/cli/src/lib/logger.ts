import fs from "node:fs";
import path from "node:path";
import type { LogLevel } from "@storyreel/shared";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogSink = (level: LogLevel, line: string) => void;

export type Logger = {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
};

export type LoggerOptions = {
  level: LogLevel;
  scope?: string;
  sink?: LogSink;
  file?: string;
};

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null;
  }
  const lower = value.trim().toLowerCase();
  if (lower === "warning") {
    return "warn";
  }
  if (lower === "critical") {
    return "error";
  }
  return LOG_LEVELS.find((level) => level === lower) ?? null;
}

export const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function fileSink(filePath: string): LogSink {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  return (level, line) => {
    fs.appendFileSync(filePath, `${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`);
  };
}

function formatPrefix(scope: string) {
  return scope ? `[storyreel:${scope}]` : "[storyreel]";
}

function build(level: LogLevel, scope: string, sinks: LogSink[]): Logger {
  const threshold = LEVEL_RANK[level];
  const emit = (messageLevel: LogLevel, message: string) => {
    if (LEVEL_RANK[messageLevel] < threshold) {
      return;
    }
    const line = `${formatPrefix(scope)} ${message}`;
    for (const sink of sinks) {
      sink(messageLevel, line);
    }
  };
  return {
    scope,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childScope) => build(level, scope ? `${scope}:${childScope}` : childScope, sinks)
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const sinks = [options.sink ?? consoleSink];
  if (options.file) {
    sinks.push(fileSink(options.file));
  }
  return build(options.level, options.scope ?? "", sinks);
}

export function createSilentLogger(): Logger {
  return createLogger({ level: "error", sink: () => undefined });
}
