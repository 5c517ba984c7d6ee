/**
 * Title classification type definitions
 */

/**
 * One category of the reference taxonomy
 */
export type TaxonomyEntry = {
  /** Category code (e.g., "ADM-01") */
  code: string;
  /** Category description matched against titles */
  label: string;
};

/**
 * Taxonomy JSON shape (as read from disk)
 */
export type TaxonomyRaw = {
  version: string;
  entries: TaxonomyEntry[];
};

export type Taxonomy = {
  version: string;
  entries: TaxonomyEntry[];
};

/**
 * Ranked classification candidate (ephemeral; persisted only on request)
 */
export type TitleCandidate = {
  categoryCode: string;
  categoryLabel: string;
  /** Embedding cosine similarity, 0-100 */
  semanticScore: number;
  /** Token-set string similarity, 0-100 */
  lexicalScore: number;
  /** max(lexicalScore, semanticScore) */
  combinedScore: number;
  /** 1-based */
  rank: number;
};

/**
 * Score of one taxonomy entry under a single ranker
 */
export type RankerScore = {
  code: string;
  score: number;
};

/**
 * Turns texts into fixed-length vectors (one per input, same order)
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

export type RunTitleClassificationResult = {
  processed: number;
  classified: number;
  skipped: number;
  failed: number;
};
