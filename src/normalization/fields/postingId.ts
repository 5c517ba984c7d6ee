/**
 * Posting identifier normalizer ("  738 213B " -> "738213B")
 */

import type { FieldResult } from "@/types";
import { readInput } from "./input";

const IDENTIFIER_PATTERN = /^[0-9A-Z-]+$/;

export function normalizePostingId(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const identifier = input.value.replace(/\s+/g, "");
  if (!IDENTIFIER_PATTERN.test(identifier) || !/\d/.test(identifier)) {
    return { ok: false, error: `unparseable posting identifier: "${input.value}"` };
  }

  return { ok: true, value: identifier };
}
