/**
 * Job title normalizer
 *
 * Generic free-text cleaning, then removal of the structural noise titles
 * carry on the listing: a leading quantity article ("UNA ASISTENTE"),
 * gender markers ("ASISTENTE (A)", "ABOGADO/A"), trailing seniority
 * grades ("ESPECIALISTA III") and the dashes left between removed tokens.
 *
 * "UNA ASISTENTE (A) II" -> "ASISTENTE"
 * "PROFESIONAL I – REGISTRADOR" -> "PROFESIONAL REGISTRADOR"
 */

import type { FieldResult } from "@/types";
import {
  NO_INFO_SENTINEL,
  ROMAN_NUMERALS,
  TITLE_DASH_TOKENS,
  TITLE_GENDER_MARKERS,
  TITLE_QUANTITY_PREFIX,
} from "@/constants";
import { readInput, untilStable } from "./input";
import { cleanFreeText } from "./freeText";

// A grade ends the title or precedes a standalone dash ("PROFESIONAL I – REGISTRADOR").
// Uppercase only: a lowercase "i" or "v" in a title is a word, not a grade.
const SENIORITY_GRADE = new RegExp(
  `(?<![\\p{L}\\p{N}])(?:${ROMAN_NUMERALS.join("|")})(?=\\s*$|\\s+[-–—]+(?:\\s|$))`,
  "gu",
);

function stripMarkersOnce(title: string): string {
  let result = title.replace(TITLE_QUANTITY_PREFIX, "");
  for (const marker of TITLE_GENDER_MARKERS) {
    result = result.replace(marker, "");
  }
  return result
    .replace(SENIORITY_GRADE, " ")
    .replace(TITLE_DASH_TOKENS, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function normalizeJobTitle(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const title = untilStable(input.value, (text) => {
    const cleaned = cleanFreeText(text);
    return cleaned === NO_INFO_SENTINEL ? "" : stripMarkersOnce(cleaned);
  });

  if (title.length === 0) {
    return { ok: false, error: `no title left after cleaning: "${input.value}"` };
  }

  return { ok: true, value: title };
}
