/**
 * Free-text normalizers
 *
 * Scraped requirement text arrives with bullets, wrapping quotes, inverted
 * punctuation and ragged whitespace. Cleaning runs to a fixpoint, so
 * normalizing cleaned text is a no-op. Text that is empty once cleaned is
 * reported as NO_INFO_SENTINEL, not as a failure.
 */

import type { FieldResult } from "@/types";
import { NO_INFO_SENTINEL } from "@/constants";
import { readInput, untilStable } from "./input";

const WRAPPING_QUOTES = /^["'“”‘’«»]([\s\S]*)["'“”‘’«»]$/;
const INVERTED_PUNCTUATION = /[¿¡]/g;
const LEADING_BULLETS = /^[\s\-–—•·*.]+/;
const LIST_SEPARATOR = /\s*([,;])\s*/g;

function cleanOnce(text: string): string {
  const lines = text
    .replace(INVERTED_PUNCTUATION, "")
    .split(/\r?\n/)
    .map((line) => line.trim().replace(LEADING_BULLETS, ""))
    .filter((line) => line.length > 0);

  return lines
    .join(" ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(WRAPPING_QUOTES, "$1")
    .trim();
}

/**
 * Clean a free-text value; always succeeds for non-blank string input
 */
export function cleanFreeText(text: string): string {
  const cleaned = untilStable(text, cleanOnce);
  return cleaned.length > 0 ? cleaned : NO_INFO_SENTINEL;
}

export function normalizeFreeText(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }
  return { ok: true, value: cleanFreeText(input.value) };
}

/**
 * One space after each comma or semicolon, none before
 *
 * Digit groups ("1,500") are kept as they are.
 */
function spaceSeparators(text: string): string {
  return text
    .replace(LIST_SEPARATOR, (match: string, separator: string, offset: number) => {
      const before = text.charAt(offset - 1);
      const after = text.charAt(offset + match.length);
      if (match === "," && /\d/.test(before) && /\d/.test(after)) {
        return ",";
      }
      return `${separator} `;
    })
    .trim();
}

/**
 * Normalizer for comma/semicolon separated lists (knowledge, competencies, specialization)
 */
export function normalizeListText(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const value = untilStable(input.value, (text) => {
    const cleaned = cleanFreeText(text);
    return cleaned === NO_INFO_SENTINEL ? cleaned : spaceSeparators(cleaned);
  });

  return { ok: true, value };
}
