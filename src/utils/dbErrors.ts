/**
 * Database error utilities
 *
 * Helpers for identifying and classifying database errors.
 */

import type { InsertResult } from "@/types";

/**
 * Check if an error is a SQLite UNIQUE constraint violation
 *
 * SQLite reports constraint violations with messages starting with:
 * "UNIQUE constraint failed: table_name.column_name"
 *
 * @param err - Error object to check
 * @returns true if error is a UNIQUE constraint violation
 */
export function isUniqueConstraintError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }

  return err.message.startsWith("UNIQUE constraint failed:");
}

/**
 * Run a single-row insert and classify its outcome
 *
 * A UNIQUE violation is a duplicate (another writer got there first);
 * any other failure is returned as an error, never thrown.
 */
export function classifyInsert(insert: () => unknown): InsertResult {
  try {
    insert();
    return { kind: "inserted" };
  } catch (err) {
    if (isUniqueConstraintError(err)) {
      return { kind: "duplicate" };
    }
    return {
      kind: "error",
      message: err instanceof Error ? err.message : String(err),
    };
  }
}
