/**
 * Unit tests for EmbeddingsClient (offline)
 *
 * HTTP is injected through the mock harness; no network
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EmbeddingsClient } from "@/clients/embeddings";
import { HttpError } from "@/clients/http";
import type { HttpRequest } from "@/types";
import { createMockHttp } from "../helpers/mockHttp";

const BASE_URL = "http://embeddings.test/v1/";
const EMBEDDINGS_URL = "http://embeddings.test/v1/embeddings";

function inputsOf(req: HttpRequest): string[] {
  const body = req.json;
  if (typeof body === "object" && body !== null && "input" in body && Array.isArray(body.input)) {
    return body.input.map(String);
  }
  return [];
}

describe("EmbeddingsClient", () => {
  const mock = createMockHttp();

  beforeEach(() => {
    mock.reset();
  });

  it("should batch inputs and return vectors in input order", async () => {
    // Items come back reversed; the client re-orders them by index
    mock.onCustom("POST", EMBEDDINGS_URL, (req) => ({
      status: 200,
      body: {
        data: inputsOf(req)
          .map((text, index) => ({ index, embedding: [text.length, index] }))
          .reverse(),
      },
    }));
    const client = new EmbeddingsClient(
      { baseUrl: BASE_URL, model: "test-model", apiKey: "test-secret", batchSize: 2 },
      mock.request,
    );

    const vectors = await client.embed(["a", "bb", "ccc"]);

    expect(vectors).toEqual([
      [1, 0],
      [2, 1],
      [3, 0],
    ]);
    expect(mock.getRecordedRequests().map(inputsOf)).toEqual([["a", "bb"], ["ccc"]]);
  });

  it("should send the model, bearer token and retry settings", async () => {
    mock.on("POST", EMBEDDINGS_URL, { data: [{ index: 0, embedding: [0.5] }] });
    const client = new EmbeddingsClient(
      { baseUrl: BASE_URL, model: "test-model", apiKey: "test-secret" },
      mock.request,
    );

    await client.embed(["contador"]);

    const [request] = mock.getRecordedRequests();
    expect(request).toMatchObject({
      method: "POST",
      url: EMBEDDINGS_URL,
      headers: { Authorization: "Bearer test-secret" },
      json: { model: "test-model", input: ["contador"] },
      retry: { maxAttempts: 3 },
      idempotent: true,
    });
    expect(client.name).toBe("embeddings:test-model");
  });

  it("should omit the authorization header without an API key", async () => {
    mock.on("POST", EMBEDDINGS_URL, { data: [{ index: 0, embedding: [1] }] });
    const client = new EmbeddingsClient({ baseUrl: BASE_URL, model: "m" }, mock.request);

    await client.embed(["x"]);

    expect(mock.getRecordedRequests()[0].headers).toEqual({});
  });

  it("should not call the API for an empty input list", async () => {
    const client = new EmbeddingsClient({ baseUrl: BASE_URL, model: "m" }, mock.request);

    expect(await client.embed([])).toEqual([]);
    expect(mock.getRecordedRequests()).toHaveLength(0);
  });

  it("should reject a response of the wrong shape", async () => {
    mock.on("POST", EMBEDDINGS_URL, { data: [{ index: 0 }] });
    const client = new EmbeddingsClient({ baseUrl: BASE_URL, model: "m" }, mock.request);

    await expect(client.embed(["x"])).rejects.toThrow(
      `Unexpected embeddings response shape from ${EMBEDDINGS_URL}`,
    );
  });

  it("should reject a response with the wrong number of vectors", async () => {
    mock.on("POST", EMBEDDINGS_URL, { data: [{ index: 0, embedding: [1] }] });
    const client = new EmbeddingsClient({ baseUrl: BASE_URL, model: "m" }, mock.request);

    await expect(client.embed(["x", "y"])).rejects.toThrow(
      "Embeddings response has 1 vectors for 2 inputs",
    );
  });

  it("should propagate HTTP errors", async () => {
    mock.onResponse("POST", EMBEDDINGS_URL, { status: 401, body: { error: "unauthorized" } });
    const client = new EmbeddingsClient({ baseUrl: BASE_URL, model: "m" }, mock.request);

    await expect(client.embed(["x"])).rejects.toThrow(HttpError);
  });
});
