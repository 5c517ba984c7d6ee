/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * Per-request overrides of the retry policy; unset fields use the defaults
 */
export interface HttpRetryConfig {
  /** Attempts including the first request */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Upper bound on a server-requested Retry-After wait */
  maxRetryAfterMs?: number;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | Array<string | number | boolean>>;
  json?: unknown;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  /** Allow retries for a non-GET request whose repetition has no side effects */
  idempotent?: boolean;
}

/**
 * HTTP request function type for dependency injection
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  /** Raw Retry-After header, when the server sent one */
  retryAfter?: string;
}
