/**
 * Normalization stage type definitions
 */

import type { NormalizedPosting, RawPosting } from "./posting";
import type { RecordStore } from "./collection";

/**
 * Read side of the collected postings (both destinations)
 */
export interface CollectedPostingSource {
  listCollected(): RawPosting[];
}

export type RunNormalizationInput = {
  source: CollectedPostingSource;
  store: RecordStore<NormalizedPosting>;
};

export type RunNormalizationResult = {
  processed: number;
  savedComplete: number;
  savedIncomplete: number;
  duplicates: number;
  failed: number;
  errors: string[];
};
