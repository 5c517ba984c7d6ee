/**
 * Embeddings API type definitions
 *
 * OpenAI-compatible /embeddings request and response shapes.
 */

export type EmbeddingsClientConfig = {
  /** Base URL of the embeddings service (e.g., "http://localhost:8080/v1") */
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Texts sent per request (default from constants) */
  batchSize?: number;
  timeoutMs?: number;
};

export type EmbeddingsRequestBody = {
  model: string;
  input: string[];
};

export type EmbeddingsResponseItem = {
  index: number;
  embedding: number[];
};

export type EmbeddingsResponse = {
  data: EmbeddingsResponseItem[];
  model?: string;
};
