/**
 * Unit tests for the shared HTTP client
 *
 * fetch is stubbed; no network
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { httpRequest, HttpError } from "@/clients/http";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("httpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send JSON and return the parsed body", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ ok: 1 }));
    vi.stubGlobal("fetch", fetchMock);

    const body = await httpRequest({
      method: "POST",
      url: "http://api.test/items",
      json: { name: "x" },
    });

    expect(body).toEqual({ ok: 1 });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://api.test/items");
    expect(init?.body).toBe('{"name":"x"}');
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
    });
  });

  it("should append query parameters, repeating array values", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([]));
    vi.stubGlobal("fetch", fetchMock);

    await httpRequest({
      method: "GET",
      url: "http://api.test/search",
      query: { q: "contador", page: 2, tag: ["a", "b"] },
    });

    expect(fetchMock.mock.calls[0][0]).toBe("http://api.test/search?q=contador&page=2&tag=a&tag=b");
  });

  it("should retry an idempotent POST on a retryable status", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ error: "busy" }, 503))
      .mockResolvedValueOnce(jsonResponse({ data: [] }));
    vi.stubGlobal("fetch", fetchMock);

    const body = await httpRequest({
      method: "POST",
      url: "http://api.test/embeddings",
      json: {},
      idempotent: true,
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1 },
    });

    expect(body).toEqual({ data: [] });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry a plain POST", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 503));
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      httpRequest({
        method: "POST",
        url: "http://api.test/items",
        json: {},
        retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
      }),
    ).rejects.toThrow(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should not retry a client error", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("missing", { status: 404, statusText: "Not Found" }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      httpRequest({ method: "GET", url: "http://api.test/missing", retry: { baseDelayMs: 1 } }),
    ).rejects.toThrow("HTTP 404 Not Found - http://api.test/missing - missing");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should return text for a non-JSON body", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn<typeof fetch>().mockResolvedValue(
        new Response("plain", { status: 200, headers: { "content-type": "text/plain" } }),
      ),
    );

    expect(await httpRequest({ method: "GET", url: "http://api.test/text" })).toBe("plain");
  });
});
