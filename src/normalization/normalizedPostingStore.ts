/**
 * SQLite-backed record store for normalized postings
 */

import type { FieldName, NormalizedPosting, RecordStore } from "@/types";
import {
  countNormalizedPostings,
  insertIncompleteNormalizedPosting,
  insertNormalizedPosting,
  normalizedPostingExists,
} from "@/db";
import { classifyInsert } from "@/utils";

export class NormalizedPostingStore implements RecordStore<NormalizedPosting> {
  exists(postingId: string): boolean {
    return normalizedPostingExists(postingId);
  }

  insertComplete(record: NormalizedPosting) {
    return classifyInsert(() => insertNormalizedPosting(record));
  }

  insertIncomplete(record: NormalizedPosting, failedFields: readonly FieldName[]) {
    return classifyInsert(() => insertIncompleteNormalizedPosting(record, failedFields));
  }

  count(): number {
    return countNormalizedPostings();
  }
}
