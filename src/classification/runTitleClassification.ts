/**
 * Classification stage: attach title candidates to normalized postings
 *
 * Only complete normalized postings without candidates are classified.
 * A title the classifier cannot handle is counted and skipped.
 */

import type { Logger, RunAccumulator, RunTitleClassificationResult } from "@/types";
import { listUnclassifiedNormalizedPostings, replaceTitleCandidates } from "@/db";
import type { TitleClassifier } from "./titleClassifier";
import * as defaultLogger from "@/logger";

export async function runTitleClassification(
  classifier: TitleClassifier,
  acc?: RunAccumulator,
  logger: Logger = defaultLogger,
): Promise<RunTitleClassificationResult> {
  const result: RunTitleClassificationResult = {
    processed: 0,
    classified: 0,
    skipped: 0,
    failed: 0,
  };

  for (const posting of listUnclassifiedNormalizedPostings()) {
    result.processed++;

    const title = posting.job_title;
    if (!title) {
      result.skipped++;
      continue;
    }

    try {
      const candidates = await classifier.classify(title);
      if (candidates.length === 0) {
        result.skipped++;
        continue;
      }

      replaceTitleCandidates(posting.posting_id, title, candidates);
      result.classified++;
      logger.debug("Title classified", {
        postingId: posting.posting_id,
        title,
        top: candidates[0].categoryCode,
        combinedScore: candidates[0].combinedScore,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      result.failed++;
      acc?.counters.errors.push(`${posting.posting_id}: ${message}`);
      logger.warn("Title classification failed", {
        postingId: posting.posting_id,
        error: message,
      });
    }
  }

  if (acc) {
    acc.counters.items_encountered += result.processed;
    acc.counters.saved_complete += result.classified;
    acc.counters.failed += result.failed;
  }

  return result;
}
