/**
 * EmbeddingsClient: EmbeddingProvider backed by an OpenAI-compatible /embeddings API
 *
 * Texts are sent in batches; vectors come back in input order (the response
 * is re-ordered by `index`). Embedding the same text twice has no side
 * effects, so POSTs are retried like GETs.
 */

import type {
  EmbeddingProvider,
  EmbeddingsClientConfig,
  EmbeddingsResponse,
  EmbeddingsResponseItem,
  HttpRequestFn,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  EMBEDDINGS_BATCH_SIZE,
  EMBEDDINGS_HTTP_MAX_ATTEMPTS,
  EMBEDDINGS_HTTP_TIMEOUT_MS,
} from "@/constants";
import * as logger from "@/logger";

function isResponseItem(value: unknown): value is EmbeddingsResponseItem {
  return (
    typeof value === "object" &&
    value !== null &&
    "index" in value &&
    typeof value.index === "number" &&
    "embedding" in value &&
    Array.isArray(value.embedding) &&
    value.embedding.every((n: unknown) => typeof n === "number")
  );
}

function isEmbeddingsResponse(value: unknown): value is EmbeddingsResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "data" in value &&
    Array.isArray(value.data) &&
    value.data.every(isResponseItem)
  );
}

export class EmbeddingsClient implements EmbeddingProvider {
  readonly name: string;
  private readonly model: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: EmbeddingsClientConfig, httpRequest?: HttpRequestFn) {
    this.name = `embeddings:${config.model}`;
    this.url = `${config.baseUrl.replace(/\/+$/, "")}/embeddings`;
    this.headers = config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {};
    this.batchSize = config.batchSize ?? EMBEDDINGS_BATCH_SIZE;
    this.timeoutMs = config.timeoutMs ?? EMBEDDINGS_HTTP_TIMEOUT_MS;
    this.httpRequest = httpRequest ?? defaultHttpRequest;
    this.model = config.model;
  }

  private async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await this.httpRequest({
      method: "POST",
      url: this.url,
      headers: this.headers,
      json: { model: this.model, input: texts },
      timeoutMs: this.timeoutMs,
      retry: { maxAttempts: EMBEDDINGS_HTTP_MAX_ATTEMPTS },
      idempotent: true,
    });

    if (!isEmbeddingsResponse(response)) {
      throw new Error(`Unexpected embeddings response shape from ${this.url}`);
    }
    if (response.data.length !== texts.length) {
      throw new Error(
        `Embeddings response has ${response.data.length} vectors for ${texts.length} inputs`,
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      logger.debug("Requesting embeddings", {
        model: this.model,
        batchStart: start,
        batchSize: batch.length,
      });
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }
}
