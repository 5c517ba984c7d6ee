/**
 * Title classification constants
 */

/**
 * Path to the taxonomy JSON file (relative to the working directory)
 */
export const TAXONOMY_PATH = "data/taxonomy.json";

/**
 * Candidates taken from each ranker before fusion
 */
export const RANKER_TOP_K = 5;

/**
 * Candidates returned per title
 */
export const CLASSIFIER_TOP_N = 3;

/**
 * Vector length of the local hashed n-gram embeddings
 */
export const HASHED_EMBEDDING_DIMENSIONS = 512;

/**
 * Character n-gram length of the local hashed embeddings
 */
export const HASHED_EMBEDDING_NGRAM = 3;
