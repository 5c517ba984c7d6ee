/**
 * HTTP client constants
 */

export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/** Sent with every request that carries a JSON body */
export const JSON_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/** Longest response body excerpt kept on an HttpError */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Retry policy defaults. Attempts include the first request, so 3 means
 * two retries.
 */
export const DEFAULT_RETRY_POLICY = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  maxRetryAfterMs: 60_000,
} as const;

/** Methods retried without the caller opting in */
export const SAFE_HTTP_METHODS: ReadonlySet<string> = new Set(["GET", "HEAD"]);

/** 408, 429 and transient 5xx */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);

/** Statuses whose Retry-After header is honoured */
export const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([429, 503]);

/** Error names fetch raises for timeouts and dropped connections */
export const RETRYABLE_ERROR_NAMES: ReadonlySet<string> = new Set([
  "AbortError",
  "TimeoutError",
  "TypeError",
]);
