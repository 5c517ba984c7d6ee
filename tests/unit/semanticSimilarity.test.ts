/**
 * Unit tests for embedding similarity and the local hashed provider
 */

import { describe, it, expect } from "vitest";
import {
  cosineSimilarity,
  HashedNgramEmbeddingProvider,
  semanticScore,
} from "@/classification";
import { HASHED_EMBEDDING_DIMENSIONS } from "@/constants";

describe("cosineSimilarity", () => {
  it("should measure the angle between vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("should be 0 for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("should throw on a length mismatch", () => {
    expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow("Vector length mismatch: 2 vs 3");
  });
});

describe("semanticScore", () => {
  it("should map cosine to a 0-100 integer", () => {
    expect(semanticScore([1, 1], [1, 0])).toBe(71);
    expect(semanticScore([3, 4], [3, 4])).toBe(100);
  });

  it("should clamp negative similarity to 0", () => {
    expect(semanticScore([1, 0], [-1, 0])).toBe(0);
  });
});

describe("HashedNgramEmbeddingProvider", () => {
  const provider = new HashedNgramEmbeddingProvider();

  it("should produce unit vectors of the configured size", () => {
    const vector = provider.embedOne("Asistente administrativo");

    expect(vector).toHaveLength(HASHED_EMBEDDING_DIMENSIONS);
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it("should ignore case and diacritics", () => {
    expect(provider.embedOne("TÉCNICO")).toEqual(provider.embedOne("tecnico"));
  });

  it("should return a zero vector for text without letters or digits", () => {
    expect(provider.embedOne("--").every((value) => value === 0)).toBe(true);
  });

  it("should score shared word fragments above unrelated words", () => {
    const contador = provider.embedOne("contador");
    const related = provider.embedOne("contadora");
    const unrelated = provider.embedOne("enfermero");

    expect(cosineSimilarity(contador, related)).toBeGreaterThan(
      cosineSimilarity(contador, unrelated),
    );
  });

  it("should embed texts in order", async () => {
    const small = new HashedNgramEmbeddingProvider({ dimensions: 16 });

    const vectors = await small.embed(["abogado", "contador"]);

    expect(vectors).toHaveLength(2);
    expect(vectors[0]).toHaveLength(16);
    expect(vectors[1]).toEqual(small.embedOne("contador"));
  });
});
