/**
 * Posting date normalizer
 *
 * Accepts day/month/year as shown on the listing ("5/1/2025", "19/12/2025")
 * and returns an ISO calendar date ("2025-01-05"). ISO input is rejected.
 */

import type { FieldResult } from "@/types";
import { readInput } from "./input";

const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function normalizeDate(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const match = DATE_PATTERN.exec(input.value);
  if (!match) {
    return { ok: false, error: `unparseable date: "${input.value}"` };
  }

  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);

  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return { ok: false, error: `invalid calendar date: "${input.value}"` };
  }

  const mm = String(month).padStart(2, "0");
  const dd = String(day).padStart(2, "0");
  return { ok: true, value: `${match[3]}-${mm}-${dd}` };
}
