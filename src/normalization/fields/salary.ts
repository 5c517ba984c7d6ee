/**
 * Monthly salary normalizer
 *
 * "S/. 6,000.00" -> 6000
 */

import type { FieldResult } from "@/types";
import { CURRENCY_MARKERS } from "@/constants";
import { readInput } from "./input";

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

function stripCurrencyMarker(text: string): string {
  const upper = text.toUpperCase();
  for (const marker of CURRENCY_MARKERS) {
    if (upper.startsWith(marker)) {
      return text.slice(marker.length).trim();
    }
  }
  return text;
}

export function normalizeSalary(raw: unknown): FieldResult<number> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const amount = stripCurrencyMarker(input.value).replace(/,/g, "");
  if (!AMOUNT_PATTERN.test(amount)) {
    return { ok: false, error: `unparseable salary: "${input.value}"` };
  }

  const value = parseFloat(amount);
  if (!Number.isFinite(value)) {
    return { ok: false, error: `unparseable salary: "${input.value}"` };
  }

  return { ok: true, value };
}
