/**
 * Extract one listing item, retrying once when the result is unusable
 */

import type { ExtractionAttempt, Logger, PageSource, RawPosting, RunStatistics } from "@/types";
import { PageSourceTimeoutError } from "./errors";
import { validatePosting } from "./itemValidator";

/**
 * Extraction errors other than timeouts count as "nothing extracted"
 */
async function extractOnce(
  source: PageSource,
  index: number,
  logger: Logger,
): Promise<RawPosting | null> {
  try {
    return await source.extractItem(index);
  } catch (err) {
    if (err instanceof PageSourceTimeoutError) {
      throw err;
    }
    logger.warn("Item extraction threw", {
      index,
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}

/**
 * Up to `maxRetries` more attempts after a null or incomplete result
 *
 * The last attempt is taken as-is, even when it is still incomplete.
 */
export async function extractWithRetry(
  source: PageSource,
  index: number,
  maxRetries: number,
  stats: RunStatistics,
  logger: Logger,
): Promise<ExtractionAttempt> {
  let attempts = 0;

  for (;;) {
    attempts++;
    const posting = await extractOnce(source, index, logger);
    const validation = posting ? validatePosting(posting) : null;

    if ((posting && validation?.isComplete) || attempts > maxRetries) {
      return {
        posting,
        isComplete: validation?.isComplete ?? false,
        missingFields: validation?.missingFields ?? [],
        attempts,
      };
    }

    stats.retries++;
    logger.debug("Retrying item extraction", {
      index,
      attempt: attempts,
      missingFields: validation?.missingFields,
    });
  }
}
