/**
 * Collection orchestrator: walk the listing page by page and persist postings
 *
 * LoadListing -> (ProcessPage -> AdvancePage)* -> done | stopped_early | aborted
 *
 * The listing is one shared cursor, so pages and items are processed strictly
 * in sequence. Every saved posting is committed on its own; a run that ends
 * early (duplicates, navigation failure, timeout, cancellation) keeps
 * everything already written.
 */

import type {
  CollectPostingsOptions,
  CollectionRunResult,
  CollectionStatus,
  Logger,
  PageSource,
  RunStatistics,
} from "@/types";
import { DEFAULT_DUPLICATE_THRESHOLD, MAX_EXTRACTION_RETRIES } from "@/constants";
import {
  InvalidCollectionOptionError,
  PageSourceTimeoutError,
  PortalUnavailableError,
} from "./errors";
import { extractWithRetry } from "./extractWithRetry";
import { decideOutcome } from "./decideOutcome";
import {
  createRunStatistics,
  finishRunStatistics,
  recordError,
  recordOutcome,
  runDurationMs,
} from "./runStatistics";
import * as defaultLogger from "@/logger";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidCollectionOptionError(
      `${name} must be an integer >= ${min}, got ${value}`,
    );
  }
  return value;
}

/**
 * Initial page count; any failure means the listing is unusable
 */
async function loadListing(source: PageSource): Promise<number> {
  let totalPages: number;
  try {
    totalPages = await source.getTotalPageCount();
  } catch (err) {
    throw new PortalUnavailableError(`listing could not be loaded: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  if (!Number.isInteger(totalPages) || totalPages < 1) {
    throw new PortalUnavailableError(`listing reported ${totalPages} pages`);
  }
  return totalPages;
}

/**
 * Page count re-read at the top of each page; keeps the last bound on failure
 */
async function recheckTotalPages(
  source: PageSource,
  previous: number,
  logger: Logger,
): Promise<number> {
  try {
    const total = await source.getTotalPageCount();
    if (Number.isInteger(total) && total >= 1) {
      return total;
    }
    logger.warn("Page count re-check returned an invalid value", { total, previous });
  } catch (err) {
    if (err instanceof PageSourceTimeoutError) {
      throw err;
    }
    logger.warn("Page count re-check failed", { previous, error: errorMessage(err) });
  }
  return previous;
}

async function advance(source: PageSource, logger: Logger): Promise<boolean> {
  try {
    return await source.advanceToNextPage();
  } catch (err) {
    if (err instanceof PageSourceTimeoutError) {
      throw err;
    }
    logger.warn("Advancing to the next page threw", { error: errorMessage(err) });
    return false;
  }
}

/**
 * Collect postings from a paginated listing into a record store
 *
 * @throws {InvalidCollectionOptionError} When the threshold or retry count is out of range
 * @throws {PortalUnavailableError} When the listing cannot be loaded
 */
export async function collectPostings(
  options: CollectPostingsOptions,
): Promise<CollectionRunResult> {
  const { source, store, signal } = options;
  const logger = options.logger ?? defaultLogger;
  const threshold = requireInteger(
    "duplicateThreshold",
    options.duplicateThreshold ?? DEFAULT_DUPLICATE_THRESHOLD,
    1,
  );
  const maxRetries = requireInteger("maxRetries", options.maxRetries ?? MAX_EXTRACTION_RETRIES, 0);

  let totalPages = await loadListing(source);
  const stats: RunStatistics = createRunStatistics();
  let status: CollectionStatus = "done";
  let page = 1;

  logger.debug("Listing loaded", { totalPages, threshold, maxRetries });

  try {
    pages: for (;;) {
      totalPages = await recheckTotalPages(source, totalPages, logger);

      let itemCount: number;
      try {
        itemCount = await source.getItemCountOnCurrentPage();
      } catch (err) {
        if (err instanceof PageSourceTimeoutError) {
          throw err;
        }
        recordError(stats, `page ${page}: item count unavailable: ${errorMessage(err)}`);
        status = "aborted";
        break;
      }
      stats.pagesProcessed++;

      for (let index = 0; index < itemCount; index++) {
        if (signal?.aborted) {
          recordError(stats, "cancelled");
          logger.warn("Collection cancelled", { page, index });
          status = "aborted";
          break pages;
        }

        stats.itemsEncountered++;
        const attempt = await extractWithRetry(source, index, maxRetries, stats, logger);
        const outcome = decideOutcome(attempt, store);
        recordOutcome(stats, outcome, `page ${page} item ${index + 1}`);

        logger.debug("Item processed", {
          page,
          index,
          outcome: outcome.kind,
          postingId: outcome.postingId,
          attempts: attempt.attempts,
        });

        if (stats.consecutiveDuplicates >= threshold) {
          logger.debug("Duplicate threshold reached", {
            page,
            index,
            consecutiveDuplicates: stats.consecutiveDuplicates,
          });
          status = "stopped_early";
          break pages;
        }
      }

      if (page >= totalPages) {
        status = "done";
        break;
      }

      if (signal?.aborted) {
        recordError(stats, "cancelled");
        logger.warn("Collection cancelled", { page });
        status = "aborted";
        break;
      }

      if (!(await advance(source, logger))) {
        recordError(stats, `navigation to page ${page + 1} of ${totalPages} failed`);
        status = "aborted";
        break;
      }
      page++;
    }
  } catch (err) {
    if (!(err instanceof PageSourceTimeoutError)) {
      throw err;
    }
    recordError(stats, `page ${page}: ${err.message}`);
    status = "aborted";
  } finally {
    finishRunStatistics(stats);
  }

  const summary = {
    status,
    durationMs: runDurationMs(stats),
    pagesProcessed: stats.pagesProcessed,
    itemsEncountered: stats.itemsEncountered,
    savedComplete: stats.savedComplete,
    savedIncomplete: stats.savedIncomplete,
    duplicates: stats.duplicates,
    failed: stats.failed,
    retries: stats.retries,
  };
  if (status === "aborted") {
    logger.error("Collection run aborted", { ...summary, lastError: stats.errors.at(-1) });
  } else {
    logger.info("Collection run completed", summary);
  }

  return { status, stats };
}
