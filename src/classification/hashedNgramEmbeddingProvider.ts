/**
 * HashedNgramEmbeddingProvider: local, deterministic text embeddings
 *
 * Each text is lowercased, stripped of diacritics and padded with spaces;
 * every character n-gram is hashed (FNV-1a) into a fixed-size vector, which
 * is then L2-normalized. Titles that share word fragments ("contador",
 * "contabilidad") score close together.
 */

import type { EmbeddingProvider } from "@/types";
import { HASHED_EMBEDDING_DIMENSIONS, HASHED_EMBEDDING_NGRAM } from "@/constants";
import { normalizeToTokens } from "@/utils";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export type HashedNgramEmbeddingOptions = {
  dimensions?: number;
  ngram?: number;
};

export class HashedNgramEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashed-ngram";
  private readonly dimensions: number;
  private readonly ngram: number;

  constructor(options?: HashedNgramEmbeddingOptions) {
    this.dimensions = options?.dimensions ?? HASHED_EMBEDDING_DIMENSIONS;
    this.ngram = options?.ngram ?? HASHED_EMBEDDING_NGRAM;
  }

  /**
   * Embed a single text (all-zero vector when it has no letters or digits)
   */
  embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);

    for (const token of normalizeToTokens(text)) {
      const padded = ` ${token} `;
      const grams =
        padded.length <= this.ngram
          ? [padded]
          : Array.from({ length: padded.length - this.ngram + 1 }, (_, i) =>
              padded.slice(i, i + this.ngram),
            );
      for (const gram of grams) {
        vector[fnv1a(gram) % this.dimensions] += 1;
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }
}
