/**
 * Collection orchestrator constants
 */

/**
 * Consecutive duplicates that end a collection run early
 *
 * The listing is ordered newest-first, so a run of already-seen identifiers
 * means everything further back was collected by a previous run.
 */
export const DEFAULT_DUPLICATE_THRESHOLD = 10;

/**
 * Extra extraction attempts for an item whose first result was null or incomplete
 */
export const MAX_EXTRACTION_RETRIES = 1;

/**
 * Maximum number of error messages kept per run (older ones are kept, newer dropped)
 */
export const ERROR_LOG_CAP = 100;

/**
 * Number of errors printed in the operator run report
 */
export const REPORT_ERROR_PREVIEW = 10;
