/**
 * Collection module barrel exports
 */

export {
  InvalidCollectionOptionError,
  PortalUnavailableError,
  PageSourceTimeoutError,
} from "./errors";
export { validatePosting } from "./itemValidator";
export {
  createRunStatistics,
  recordError,
  recordOutcome,
  finishRunStatistics,
  runDurationMs,
} from "./runStatistics";
export { extractWithRetry } from "./extractWithRetry";
export { decideOutcome } from "./decideOutcome";
export { collectPostings } from "./collectPostings";
export { CollectedPostingStore } from "./collectedPostingStore";
export { formatRunReport } from "./runReport";
export {
  SnapshotPageSource,
  SnapshotFormatError,
  parseListingSnapshot,
} from "./snapshotPageSource";
