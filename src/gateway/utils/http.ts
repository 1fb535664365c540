// ============================================================================
// HTTP Client Helpers
// ============================================================================

import {
  NetworkError,
  RequestTimeoutError,
  errorFromStatusCode,
} from "../types.js";
import { AbortError } from "../../errors.js";

export interface HttpRequestOptions {
  url: string;
  provider: string;
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  body: unknown;
  text: string;
}

export async function httpRequest(opts: HttpRequestOptions): Promise<HttpResponse> {
  const { url, provider, method = "POST", headers = {}, body, timeout = 120_000, signal } = opts;

  const controller = new AbortController();
  const combinedSignal = signal
    ? AbortSignal.any([signal, controller.signal])
    : controller.signal;

  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method,
      headers: {
        "Content-Type": "application/json",
        ...headers,
      },
      body: body != null ? JSON.stringify(body) : undefined,
      signal: combinedSignal,
    });

    const text = await response.text();
    return {
      status: response.status,
      headers: response.headers,
      body: parseBody(text),
      text,
    };
  } catch (err: unknown) {
    if (err instanceof Error && err.name === "AbortError") {
      if (signal?.aborted) {
        throw new AbortError(`Request to ${url} was aborted`);
      }
      throw new RequestTimeoutError({
        message: `Request to ${url} timed out after ${timeout}ms`,
        provider,
      });
    }
    throw new NetworkError({
      message: `Network error requesting ${url}: ${err instanceof Error ? err.message : String(err)}`,
      provider,
      cause: err instanceof Error ? err : undefined,
    });
  } finally {
    clearTimeout(timer);
  }
}

/** JSON when the body parses, the raw text otherwise. */
function parseBody(text: string): unknown {
  if (text.trim() === "") return text;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Retry-After in seconds. Accepts delta-seconds or an HTTP date; a date in
 * the past yields 0.
 */
export function parseRetryAfter(header: string | null, now: Date = new Date()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header.trim());
  if (header.trim() !== "" && Number.isFinite(seconds)) return Math.max(0, seconds);
  const at = Date.parse(header);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, (at - now.getTime()) / 1000);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = obj?.[key];
  return typeof value === "string" ? value : undefined;
}

export function raiseForStatus(
  status: number,
  headers: Headers,
  body: unknown,
  provider: string,
): void {
  if (status >= 200 && status < 300) return;

  const bodyObj = isRecord(body) ? body : undefined;
  const rawError = bodyObj?.error;
  const errorBody = isRecord(rawError) ? rawError : undefined;
  const message =
    stringField(errorBody, "message") ??
    stringField(bodyObj, "message") ??
    (typeof body === "string" ? body : JSON.stringify(body));
  const errorCode = stringField(errorBody, "code") ?? stringField(errorBody, "type");

  throw errorFromStatusCode(status, message, provider, errorCode, bodyObj, parseRetryAfter(headers.get("retry-after")));
}
