export type PipelineErrorCode =
  | "INVALID_ARGUMENT"
  | "RESOURCE_MISSING"
  | "TOOL_UNAVAILABLE"
  | "EXTERNAL_TOOL_FAILURE"
  | "POSTCONDITION_FAILURE"
  | "PROVIDER_FAILURE"
  | "CONFIG_ERROR";

export class PipelineError extends Error {
  code: PipelineErrorCode;
  details?: unknown;

  constructor(code: PipelineErrorCode, message: string, options?: { details?: unknown }) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.details = options?.details;
  }
}

export class InvalidArgumentError extends PipelineError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class ResourceMissingError extends PipelineError {
  path: string;

  constructor(label: string, path: string) {
    super("RESOURCE_MISSING", `${label} not found: ${path}`);
    this.name = "ResourceMissingError";
    this.path = path;
  }
}

export class ToolUnavailableError extends PipelineError {
  tool: string;
  hint: string;

  constructor(tool: string, hint: string) {
    super("TOOL_UNAVAILABLE", `${tool} is not available. ${hint}`);
    this.name = "ToolUnavailableError";
    this.tool = tool;
    this.hint = hint;
  }
}

export class ExternalToolError extends PipelineError {
  tool: string;
  exitCode: number | null;
  stderr: string;

  constructor(tool: string, message: string, options: { exitCode: number | null; stderr: string }) {
    const stderr = options.stderr.trim();
    super("EXTERNAL_TOOL_FAILURE", stderr ? `${message}: ${stderr}` : message);
    this.name = "ExternalToolError";
    this.tool = tool;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

export class PostconditionError extends PipelineError {
  constructor(message: string) {
    super("POSTCONDITION_FAILURE", message);
    this.name = "PostconditionError";
  }
}

export class ProviderError extends PipelineError {
  provider: string;

  constructor(provider: string, message: string, options?: { details?: unknown }) {
    super("PROVIDER_FAILURE", `${provider}: ${message}`, options);
    this.name = "ProviderError";
    this.provider = provider;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
