/**
 * Normalization stage: normalize every collected posting not yet normalized
 *
 * Reads both collected destinations, so postings collected with missing fields
 * are normalized too (their missing fields simply fail). Per-record failures
 * are counted and returned, never thrown.
 */

import type {
  Logger,
  RunAccumulator,
  RunNormalizationInput,
  RunNormalizationResult,
} from "@/types";
import { normalizePosting, routePosting } from "./recordNormalizer";
import * as defaultLogger from "@/logger";

export function runNormalization(
  input: RunNormalizationInput,
  acc?: RunAccumulator,
  logger: Logger = defaultLogger,
): RunNormalizationResult {
  const { source, store } = input;
  const result: RunNormalizationResult = {
    processed: 0,
    savedComplete: 0,
    savedIncomplete: 0,
    duplicates: 0,
    failed: 0,
    errors: [],
  };

  for (const raw of source.listCollected()) {
    result.processed++;

    const normalized = normalizePosting(raw);
    if (!normalized.ok) {
      result.failed++;
      result.errors.push(`${raw.postingId ?? "(no identifier)"}: ${normalized.error}`);
      logger.debug("Posting rejected: unparseable identifier", {
        postingId: raw.postingId,
        error: normalized.error,
      });
      continue;
    }

    const { record } = normalized;
    if (store.exists(record.postingId)) {
      result.duplicates++;
      continue;
    }

    const destination = routePosting(record);
    const insert =
      destination === "complete"
        ? store.insertComplete(record)
        : store.insertIncomplete(record, record.failedFields);

    switch (insert.kind) {
      case "inserted":
        if (destination === "complete") {
          result.savedComplete++;
        } else {
          result.savedIncomplete++;
        }
        logger.debug("Posting normalized", {
          postingId: record.postingId,
          destination,
          failedFields: record.failedFields,
        });
        break;
      case "duplicate":
        result.duplicates++;
        break;
      case "error":
        result.failed++;
        result.errors.push(`${record.postingId}: ${insert.message}`);
        logger.warn("Failed to store normalized posting", {
          postingId: record.postingId,
          error: insert.message,
        });
        break;
    }
  }

  if (acc) {
    acc.counters.items_encountered += result.processed;
    acc.counters.saved_complete += result.savedComplete;
    acc.counters.saved_incomplete += result.savedIncomplete;
    acc.counters.duplicates += result.duplicates;
    acc.counters.failed += result.failed;
    acc.counters.errors.push(...result.errors);
  }

  return result;
}
