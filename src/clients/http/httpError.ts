/**
 * HttpError: a non-2xx response from a remote API
 */

import type { HttpErrorDetails } from "@/types";
import { ERROR_BODY_SNIPPET_MAX_LENGTH } from "@/constants/clients/http";

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly retryAfter?: string;

  constructor(details: HttpErrorDetails) {
    const suffix = details.bodySnippet ? ` - ${details.bodySnippet}` : "";
    super(`HTTP ${details.status} ${details.statusText} - ${details.url}${suffix}`);
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.retryAfter = details.retryAfter;
  }

  /**
   * Build the error from a failed response, keeping a short excerpt of its
   * body. An unreadable body leaves the excerpt out.
   */
  static async fromResponse(response: Response, url: string): Promise<HttpError> {
    let bodySnippet: string | undefined;
    try {
      const text = await response.text();
      if (text) {
        bodySnippet =
          text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
            ? `${text.slice(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
            : text;
      }
    } catch (err) {
      bodySnippet = `<unreadable body: ${err instanceof Error ? err.message : String(err)}>`;
    }

    return new HttpError({
      status: response.status,
      statusText: response.statusText,
      url,
      bodySnippet,
      retryAfter: response.headers.get("retry-after") ?? undefined,
    });
  }
}
