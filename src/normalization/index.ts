/**
 * Normalization module barrel exports
 */

export * from "./fields";
export { normalizePosting, routePosting } from "./recordNormalizer";
export { NormalizedPostingStore } from "./normalizedPostingStore";
export { runNormalization } from "./runNormalization";
