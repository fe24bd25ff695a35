import { ProviderError } from "@storyreel/shared";

export type HttpResult = {
  status: number;
  ok: boolean;
  contentType: string;
  body: Buffer;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function makeBodySnippet(text: string, max = 300) {
  const trimmed = text.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}...` : trimmed;
}

export function joinUrl(baseUrl: string, pathname: string) {
  return `${baseUrl.replace(/\/+$/, "")}/${pathname.replace(/^\/+/, "")}`;
}

/**
 * fetch with an abort timeout. Network failures and timeouts become
 * ProviderError tagged with `provider`; HTTP status is left to the caller.
 */
export async function requestBuffer(
  provider: string,
  url: string,
  options: RequestInit,
  timeoutMs: number
): Promise<HttpResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      ...options,
      signal: controller.signal
    });
    const body = Buffer.from(await res.arrayBuffer());
    return {
      status: res.status,
      ok: res.ok,
      contentType: res.headers.get("content-type") ?? "",
      body
    };
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") {
      throw new ProviderError(provider, `request timed out after ${timeoutMs}ms`);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ProviderError(provider, `network error: ${message}`);
  } finally {
    clearTimeout(timeout);
  }
}

export function parseJsonBody(provider: string, result: HttpResult): unknown {
  const text = result.body.toString("utf8");
  try {
    return JSON.parse(text);
  } catch {
    throw new ProviderError(provider, "response was not valid JSON", {
      details: makeBodySnippet(text)
    });
  }
}

export async function requestJson(
  provider: string,
  url: string,
  options: RequestInit,
  timeoutMs: number
): Promise<unknown> {
  const result = await requestBuffer(provider, url, options, timeoutMs);
  if (!result.ok) {
    const snippet = makeBodySnippet(result.body.toString("utf8"));
    throw new ProviderError(provider, `HTTP ${result.status}${snippet ? `: ${snippet}` : ""}`, {
      details: { status: result.status }
    });
  }
  return parseJsonBody(provider, result);
}
