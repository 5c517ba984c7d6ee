/**
 * Field normalization constants
 */

import type { ContractDescription } from "@/types";

/**
 * Successful result for text that is empty after cleaning
 *
 * Distinct from a parse failure: the posting simply gave no information.
 */
export const NO_INFO_SENTINEL = "NO INFO";

/**
 * Error for null, non-string or whitespace-only input
 */
export const EMPTY_INPUT_ERROR = "empty or invalid type";

/**
 * Currency markers stripped from salary strings (longest first)
 */
export const CURRENCY_MARKERS = ["S/.", "S/", "PEN", "US$", "$"] as const;

/**
 * Contract code rules, evaluated in order; the first match wins
 */
export const CONTRACT_PATTERNS: ReadonlyArray<{ pattern: RegExp; canonical: string }> = [
  {
    pattern: /^D\.LEG 1057 - DETERMINADO \(NECESIDAD TRANSITORIA\)/,
    canonical: "D.LEG 1057 DETERMINADO NECESIDAD TRANSITORIA",
  },
  { pattern: /\(SUPLENCIA\)/, canonical: "D.LEG 1057 DETERMINADO SUPLENCIA" },
  { pattern: /^D\.LEG 1057 - INDETERMINADO/, canonical: "D.LEG 1057 INDETERMINADO" },
  { pattern: /^728/, canonical: "D.LEG 728" },
  { pattern: /^276/, canonical: "D.LEG 276" },
  { pattern: /^DOCENTES UNIVERSITARIOS/, canonical: "DOCENTES UNIVERSITARIOS LEY 30220" },
  { pattern: /^LEY 30220/, canonical: "DOCENTES UNIVERSITARIOS LEY 30220" },
  { pattern: /^LEY 30057/, canonical: "LEY 30057" },
];

/**
 * Canonical contract category -> legal regime and temporal nature
 */
export const CONTRACT_CLASSIFICATIONS: Record<string, ContractDescription> = {
  "D.LEG 1057 DETERMINADO NECESIDAD TRANSITORIA": {
    regime: "D.LEG 1057",
    temporalNature: "TEMPORARY",
  },
  "D.LEG 1057 DETERMINADO SUPLENCIA": {
    regime: "D.LEG 1057",
    temporalNature: "REPLACEMENT",
  },
  "D.LEG 1057 INDETERMINADO": {
    regime: "D.LEG 1057",
    temporalNature: "INDETERMINATE",
  },
  "D.LEG 728": { regime: "D.LEG 728", temporalNature: "PERMANENT" },
  "D.LEG 276": { regime: "D.LEG 276", temporalNature: "PERMANENT" },
  "DOCENTES UNIVERSITARIOS LEY 30220": {
    regime: "LEY 30220",
    temporalNature: "PERMANENT",
  },
  "LEY 30057": { regime: "LEY 30057", temporalNature: "PERMANENT" },
};

/**
 * Leading quantity articles stripped from job titles (case-insensitive)
 *
 * Order matters: "UN/A" before "UN", "UNAS" before "UNA".
 */
export const TITLE_QUANTITY_PREFIX = /^(?:UN\/A|UNAS|UNOS|UNA|UN)\s+/i;

/**
 * Gender markers: "(A)", "(O)", "(AS)", "(OS)" and a trailing "/A" or "/O"
 */
export const TITLE_GENDER_MARKERS: readonly RegExp[] = [
  /\s*\((?:AS|OS|A|O)\)/gi,
  /\/[AO](?![\p{L}\p{N}])/giu,
];

/**
 * Roman numeral seniority grades, longest first so "VIII" is never read as "V" + "III".
 * A bare "X" is left out: at the end of a title it is part of the name ("RAYOS X").
 */
export const ROMAN_NUMERALS: readonly string[] = [
  "XVIII",
  "XVII",
  "VIII",
  "XIII",
  "XIV",
  "XVI",
  "XIX",
  "XII",
  "III",
  "VII",
  "XV",
  "XI",
  "XX",
  "II",
  "IV",
  "VI",
  "IX",
  "I",
  "V",
];

/**
 * Standalone dash separators left behind once tokens are stripped
 */
export const TITLE_DASH_TOKENS = /(^|\s)[-–—]+(?=\s|$)/g;
