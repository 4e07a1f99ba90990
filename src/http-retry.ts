import {
  HttpStatusError,
  RetriesExhaustedError,
  UnauthorizedError,
  errorMessage,
} from "./errors.js";
import type { Logger } from "./logger.js";
import {
  HTTP_BACKOFF,
  nextBackoff,
  sleep as defaultSleep,
  truncate,
  withJitter,
  type RandomFn,
  type SleepFn,
} from "./utils.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const RETRYABLE_STATUS: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const DEFAULT_MAX_ATTEMPTS = 5;
const DEFAULT_TIMEOUT_MS = 30_000;

/** A response whose body has been read in full under the request timeout. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: Headers;
  body: string;
}

export interface FetchWithRetryOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  random?: RandomFn;
  logger?: Logger;
}

/** Numeric `Retry-After` seconds as milliseconds. HTTP-dates are ignored. */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || !/^\d+(\.\d+)?$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseFloat(value) * 1000;
}

export function buildUrl(url: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  if (!query) {
    return url;
  }
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

const ABORT_NAMES = new Set(["AbortError", "TimeoutError"]);
const SOCKET_CODE = /^(E[A-Z]+|UND_ERR_[A-Z_]+)$/;

/** Timeouts and connection failures, as opposed to errors in the request itself. */
export function isTransportError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if (ABORT_NAMES.has(current.name)) return true;
    const code = "code" in current ? current.code : undefined;
    if (typeof code === "string" && SOCKET_CODE.test(code)) return true;
    if (
      current instanceof TypeError &&
      (current.message === "fetch failed" || current.message === "terminated")
    ) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

async function request(
  fetchFn: FetchFn,
  target: string,
  timeoutMs: number
): Promise<HttpResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchFn(target, { signal: controller.signal });
    const body = await response.text();
    return { ok: response.ok, status: response.status, headers: response.headers, body };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET with bounded retries. The timeout covers the body as well as the headers.
 * 401 and other non-retryable statuses throw at once; 429/5xx, timeouts and
 * connection failures back off and try again until `maxAttempts` is spent.
 */
export async function fetchWithRetry(
  url: string,
  params: Record<string, string>,
  options: FetchWithRetryOptions = {}
): Promise<HttpResponse> {
  const {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchFn = fetch,
    sleep = defaultSleep,
    random = Math.random,
    logger,
  } = options;

  const target = buildUrl(url, params);
  let backoffMs = HTTP_BACKOFF.initialMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    let response: HttpResponse;
    try {
      response = await request(fetchFn, target, timeoutMs);
    } catch (error) {
      if (!isTransportError(error)) {
        logger?.error("Request failed", error, { attempt });
        throw error;
      }
      lastError = error;
      if (attempt === maxAttempts) break;

      const delayMs = withJitter(backoffMs, HTTP_BACKOFF, random);
      logger?.warn("Network error, retrying", {
        reason: errorMessage(error),
        delayMs: Math.round(delayMs),
        attempt,
        maxAttempts,
      });
      await sleep(delayMs);
      backoffMs = nextBackoff(backoffMs, HTTP_BACKOFF);
      continue;
    }

    if (response.ok) {
      return response;
    }

    const body = truncate(response.body);
    if (response.status === 401) {
      logger?.error("Unauthorized (401), check VC_API_KEY", undefined, { status: 401, body });
      throw new UnauthorizedError(body);
    }

    if (RETRYABLE_STATUS.has(response.status)) {
      lastError = new HttpStatusError(response.status, body);
      if (attempt === maxAttempts) break;

      const delayMs =
        parseRetryAfter(response.headers.get("Retry-After")) ??
        withJitter(backoffMs, HTTP_BACKOFF, random);
      logger?.warn("Retryable HTTP status, retrying", {
        status: response.status,
        delayMs: Math.round(delayMs),
        attempt,
        maxAttempts,
      });
      await sleep(delayMs);
      backoffMs = nextBackoff(backoffMs, HTTP_BACKOFF);
      continue;
    }

    logger?.error("Non-retryable HTTP status", undefined, {
      status: response.status,
      body,
      attempt,
    });
    throw new HttpStatusError(response.status, body);
  }

  logger?.error("HTTP retries exhausted", lastError, { attempts: maxAttempts });
  throw new RetriesExhaustedError("HTTP GET", maxAttempts, lastError);
}
