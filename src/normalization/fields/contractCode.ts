/**
 * Contract code normalizer
 *
 * Maps the contract regime shown on the listing to one of the canonical
 * categories in CONTRACT_CLASSIFICATIONS. Rules are tried in order and the
 * first match wins; canonical values map to themselves.
 */

import type { ContractDescription, FieldResult } from "@/types";
import { CONTRACT_CLASSIFICATIONS, CONTRACT_PATTERNS } from "@/constants";
import { readInput } from "./input";

export function normalizeContractCode(raw: unknown): FieldResult<string> {
  const input = readInput(raw);
  if (!input.ok) {
    return input;
  }

  const text = input.value.replace(/\s+/g, " ");
  if (Object.hasOwn(CONTRACT_CLASSIFICATIONS, text)) {
    return { ok: true, value: text };
  }

  for (const rule of CONTRACT_PATTERNS) {
    if (rule.pattern.test(text)) {
      return { ok: true, value: rule.canonical };
    }
  }

  return { ok: false, error: `unknown contract code: "${input.value}"` };
}

/**
 * Legal regime and temporal nature of a canonical contract category
 *
 * Returns null for values that are not canonical.
 */
export function describeContract(canonical: string): ContractDescription | null {
  return Object.hasOwn(CONTRACT_CLASSIFICATIONS, canonical)
    ? CONTRACT_CLASSIFICATIONS[canonical]
    : null;
}
