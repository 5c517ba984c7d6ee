/**
 * Decide and persist the outcome of one extracted item
 *
 * Priority: nothing extracted, then missing identifier, then duplicate,
 * then complete or incomplete save.
 */

import type { CollectionOutcome, ExtractionAttempt, RawPosting, RecordStore } from "@/types";

export function decideOutcome(
  attempt: ExtractionAttempt,
  store: RecordStore<RawPosting>,
): CollectionOutcome {
  const { posting } = attempt;
  if (!posting) {
    return { kind: "failed", reason: "extraction returned nothing" };
  }

  const postingId = posting.postingId?.trim() ?? "";
  if (postingId.length === 0) {
    return { kind: "failed", reason: "missing identifier" };
  }

  if (store.exists(postingId)) {
    return { kind: "duplicate", postingId };
  }

  const record: RawPosting = { ...posting, postingId };
  const insert = attempt.isComplete
    ? store.insertComplete(record)
    : store.insertIncomplete(record, attempt.missingFields);

  switch (insert.kind) {
    case "inserted":
      return attempt.isComplete
        ? { kind: "saved_complete", postingId }
        : { kind: "saved_incomplete", postingId, missingFields: attempt.missingFields };
    case "duplicate":
      return { kind: "duplicate", postingId };
    case "error":
      return { kind: "failed", reason: `store error: ${insert.message}`, postingId };
  }
}
