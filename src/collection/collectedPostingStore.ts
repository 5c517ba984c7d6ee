/**
 * SQLite-backed record store for collected (raw) postings
 *
 * Also the read side the normalization stage consumes.
 */

import type {
  CollectedPostingSource,
  FieldName,
  RawPosting,
  RecordStore,
} from "@/types";
import {
  collectedPostingExists,
  countCollectedPostings,
  insertCollectedPosting,
  insertIncompleteCollectedPosting,
  listCollectedPostings,
} from "@/db";
import { classifyInsert } from "@/utils";

export class CollectedPostingStore
  implements RecordStore<RawPosting>, CollectedPostingSource
{
  exists(postingId: string): boolean {
    return collectedPostingExists(postingId);
  }

  insertComplete(posting: RawPosting) {
    return classifyInsert(() => insertCollectedPosting(posting));
  }

  insertIncomplete(posting: RawPosting, missingFields: readonly FieldName[]) {
    return classifyInsert(() => insertIncompleteCollectedPosting(posting, missingFields));
  }

  count(): number {
    return countCollectedPostings();
  }

  listCollected(): RawPosting[] {
    return listCollectedPostings();
  }
}
