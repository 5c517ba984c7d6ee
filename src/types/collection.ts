/**
 * Collection type definitions
 *
 * Contracts of the page source and record store collaborators, plus the
 * per-item outcomes and per-run statistics of the collection orchestrator.
 */

import type { FieldName, RawPosting } from "./posting";
import type { Logger } from "./logger";

/**
 * Paginated listing seen through a single shared cursor (the current page)
 *
 * Implementations signal page-load timeouts by throwing
 * PageSourceTimeoutError, and an unusable listing by throwing from
 * getTotalPageCount() or returning a count below 1.
 */
export interface PageSource {
  getTotalPageCount(): Promise<number>;
  getItemCountOnCurrentPage(): Promise<number>;
  /** Zero-based index on the current page; null when nothing could be read */
  extractItem(index: number): Promise<RawPosting | null>;
  /** False when the next-page control is disabled */
  advanceToNextPage(): Promise<boolean>;
}

export type InsertResult =
  | { kind: "inserted" }
  | { kind: "duplicate" }
  | { kind: "error"; message: string };

/**
 * Keyed, append-only store with a complete and an incomplete destination
 *
 * Every insert is its own transaction. A uniqueness violation is reported as
 * `duplicate`, never as `error`.
 */
export interface RecordStore<TRecord> {
  /** True when the identifier is present in either destination */
  exists(postingId: string): boolean;
  insertComplete(record: TRecord): InsertResult;
  insertIncomplete(record: TRecord, missingFields: readonly FieldName[]): InsertResult;
  /** Total rows across both destinations (for run reports) */
  count(): number;
}

export type CollectionOutcome =
  | { kind: "saved_complete"; postingId: string }
  | { kind: "saved_incomplete"; postingId: string; missingFields: FieldName[] }
  | { kind: "duplicate"; postingId: string }
  | { kind: "failed"; reason: string; postingId?: string };

/**
 * Result of extract-with-retry for one item slot
 */
export type ExtractionAttempt = {
  posting: RawPosting | null;
  isComplete: boolean;
  missingFields: FieldName[];
  attempts: number;
};

export type CollectionStatus = "done" | "stopped_early" | "aborted";

/**
 * Mutable statistics owned by exactly one orchestrator run
 */
export type RunStatistics = {
  startedAt: Date;
  finishedAt: Date | null;
  pagesProcessed: number;
  itemsEncountered: number;
  savedComplete: number;
  savedIncomplete: number;
  duplicates: number;
  failed: number;
  retries: number;
  consecutiveDuplicates: number;
  errors: string[];
  /** Errors not kept because the error log reached its cap */
  errorsDropped: number;
};

export type CollectPostingsOptions = {
  source: PageSource;
  store: RecordStore<RawPosting>;
  /** Consecutive duplicates that end the run early (default from constants) */
  duplicateThreshold?: number;
  /** Retries after an incomplete first extraction (default from constants) */
  maxRetries?: number;
  /** Cancellation, checked between items */
  signal?: AbortSignal;
  logger?: Logger;
};

export type CollectionRunResult = {
  status: CollectionStatus;
  stats: RunStatistics;
};

/**
 * Store sizes before and after a run, for the operator report
 */
export type StoreCounts = {
  before: number;
  after: number;
};

/**
 * One item of a listing snapshot; absent fields read as null
 */
export type ListingSnapshotItem = Partial<Record<FieldName, string | null>>;

/**
 * Captured listing replayed by SnapshotPageSource
 *
 * A null item stands for a slot that could not be read.
 */
export type ListingSnapshot = {
  capturedAt?: string;
  pages: Array<Array<ListingSnapshotItem | null>>;
};
