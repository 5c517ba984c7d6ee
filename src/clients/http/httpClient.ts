/**
 * Shared JSON HTTP client over native fetch
 *
 * One request function with a timeout, query strings and a bounded retry
 * loop. Bodies come back as `unknown`; each caller validates the shape it
 * expects.
 */

import type { HttpRequest, HttpRetryConfig } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_RETRY_POLICY,
  JSON_REQUEST_HEADERS,
  RETRYABLE_ERROR_NAMES,
  RETRYABLE_STATUS_CODES,
  RETRY_AFTER_STATUS_CODES,
  SAFE_HTTP_METHODS,
} from "@/constants/clients/http";
import * as logger from "@/logger";

type RetryPolicy = Required<HttpRetryConfig>;

function resolveRetryPolicy(overrides?: HttpRetryConfig): RetryPolicy {
  return {
    maxAttempts: overrides?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: overrides?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: overrides?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    maxRetryAfterMs:
      overrides?.maxRetryAfterMs ?? DEFAULT_RETRY_POLICY.maxRetryAfterMs,
  };
}

function withQuery(baseUrl: string, query: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      url.searchParams.append(key, String(item));
    }
  }
  return url.toString();
}

/**
 * Milliseconds requested by a Retry-After header (delay-seconds or an
 * HTTP date), or null when absent, unparseable or already past
 */
function parseRetryAfter(header: string | undefined): number | null {
  if (!header) {
    return null;
  }

  const seconds = Number.parseInt(header, 10);
  if (Number.isFinite(seconds) && seconds > 0) {
    return seconds * 1000;
  }

  const at = Date.parse(header);
  if (Number.isNaN(at)) {
    return null;
  }
  const delayMs = at - Date.now();
  return delayMs > 0 ? delayMs : null;
}

/**
 * How long to wait before the next attempt, or null when the failure is
 * final. Only safe methods and requests marked idempotent are retried.
 */
function retryDelayFor(
  error: unknown,
  req: HttpRequest,
  attempt: number,
  policy: RetryPolicy,
): number | null {
  if (attempt >= policy.maxAttempts) {
    return null;
  }
  if (req.idempotent !== true && !SAFE_HTTP_METHODS.has(req.method)) {
    return null;
  }

  if (error instanceof HttpError) {
    if (!RETRYABLE_STATUS_CODES.has(error.status)) {
      return null;
    }
    const requested = RETRY_AFTER_STATUS_CODES.has(error.status)
      ? parseRetryAfter(error.retryAfter)
      : null;
    if (requested !== null) {
      return Math.min(requested, policy.maxRetryAfterMs);
    }
  } else if (!(error instanceof Error) || !RETRYABLE_ERROR_NAMES.has(error.name)) {
    return null;
  }

  // Exponential backoff with jitter in [0.5, 1.0)
  const backoff = Math.min(
    policy.baseDelayMs * 2 ** (attempt - 1),
    policy.maxDelayMs,
  );
  return Math.floor(backoff * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function readBody(response: Response, req: HttpRequest, url: string): Promise<unknown> {
  if (response.status === 204) {
    return undefined;
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (!contentType.includes("application/json") && !contentType.includes("+json")) {
    logger.warn("Non-JSON response received", {
      method: req.method,
      url,
      status: response.status,
      contentType: contentType || "none",
    });
    return response.text();
  }

  try {
    const data: unknown = await response.json();
    return data;
  } catch (err) {
    logger.warn("JSON parse failed", {
      method: req.method,
      url,
      status: response.status,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
}

async function sendOnce(req: HttpRequest, url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const hasBody = req.json !== undefined;
    const response = await fetch(url, {
      method: req.method,
      headers: { ...(hasBody ? JSON_REQUEST_HEADERS : {}), ...req.headers },
      body: hasBody ? JSON.stringify(req.json) : undefined,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw await HttpError.fromResponse(response, url);
    }
    return await readBody(response, req, url);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Perform an HTTP request, retrying transient failures
 *
 * Retries network errors, timeouts, 408, 429 and 5xx for GET, HEAD and
 * requests with `idempotent: true`. A Retry-After header on 429/503 takes
 * precedence over backoff, capped by `maxRetryAfterMs`.
 *
 * @returns Parsed JSON, the text of a non-JSON body, or undefined for 204
 * @throws {HttpError} Non-2xx response once retries are exhausted
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const url = withQuery(req.url, req.query);
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const policy = resolveRetryPolicy(req.retry);

  for (let attempt = 1; ; attempt++) {
    try {
      return await sendOnce(req, url, timeoutMs);
    } catch (error) {
      const delayMs = retryDelayFor(error, req, attempt, policy);
      if (delayMs === null) {
        throw error;
      }

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : String(error),
      });
      await sleep(delayMs);
    }
  }
}
