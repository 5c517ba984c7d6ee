/**
 * Vacancy count normalizer ("3" -> 3)
 */

import type { FieldResult } from "@/types";
import { readInput } from "./input";

const COUNT_PATTERN = /^\d+$/;

export function normalizeVacancyCount(raw: unknown): FieldResult<number> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  if (!COUNT_PATTERN.test(input.value)) {
    return { ok: false, error: `unparseable vacancy count: "${input.value}"` };
  }

  return { ok: true, value: parseInt(input.value, 10) };
}
