/**
 * Shared input guard for field normalizers
 */

import type { FieldResult } from "@/types";
import { EMPTY_INPUT_ERROR } from "@/constants";

/**
 * Trim a raw field value, or fail when it is not a non-blank string
 */
export function readInput(raw: unknown): FieldResult<string> {
  if (typeof raw !== "string") {
    return { ok: false, error: EMPTY_INPUT_ERROR };
  }
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { ok: false, error: EMPTY_INPUT_ERROR };
  }
  return { ok: true, value: trimmed };
}

/**
 * Apply a string transformation until its output stops changing
 *
 * Every transformation used here only ever shortens or re-spaces its input,
 * so the loop ends; the bound guards against a rule that oscillates.
 */
export function untilStable(text: string, transform: (input: string) => string): string {
  let current = text;
  for (let i = 0; i <= text.length; i++) {
    const next = transform(current);
    if (next === current) {
      return current;
    }
    current = next;
  }
  return current;
}
