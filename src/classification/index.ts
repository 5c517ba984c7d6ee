/**
 * Classification module barrel exports
 */

export { tokenSetRatio, indelRatio } from "./lexicalSimilarity";
export { cosineSimilarity, semanticScore } from "./semanticSimilarity";
export { HashedNgramEmbeddingProvider } from "./hashedNgramEmbeddingProvider";
export { loadTaxonomy } from "./taxonomyLoader";
export { TitleClassifier } from "./titleClassifier";
export type { TitleClassifierOptions } from "./titleClassifier";
export { runTitleClassification } from "./runTitleClassification";
