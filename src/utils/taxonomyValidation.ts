/**
 * Taxonomy validation module
 *
 * Validates taxonomy JSON structure and enforces invariants:
 * - Non-empty version and entries
 * - Every entry has a non-empty code and label
 * - No duplicate codes
 *
 * Validation is fail-fast: throws on the first problem found.
 */

import type { TaxonomyEntry, TaxonomyRaw } from "@/types";

/**
 * Error thrown when taxonomy validation fails.
 */
export class TaxonomyValidationError extends Error {
  constructor(message: string) {
    super(`Taxonomy validation failed: ${message}`);
    this.name = "TaxonomyValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a non-empty string.
 *
 * @param fieldPath - Field path for error messages (e.g., "entries[0].code")
 * @throws {TaxonomyValidationError} If value is not a non-empty string
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new TaxonomyValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new TaxonomyValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

function validateEntry(entry: unknown, index: number): TaxonomyEntry {
  const prefix = `entries[${index}]`;
  if (!isRecord(entry)) {
    throw new TaxonomyValidationError(`${prefix} must be an object`);
  }

  const { code, label } = entry;
  validateNonEmptyString(code, `${prefix}.code`);
  validateNonEmptyString(label, `${prefix}.label`);

  return { code: code.trim(), label: label.trim() };
}

/**
 * Validates raw taxonomy data from JSON.
 *
 * @returns The validated taxonomy with trimmed codes and labels
 * @throws {TaxonomyValidationError} On the first validation failure
 *
 * @example
 * const taxonomy = validateTaxonomyRaw(JSON.parse(jsonString));
 */
export function validateTaxonomyRaw(raw: unknown): TaxonomyRaw {
  if (!isRecord(raw)) {
    throw new TaxonomyValidationError("Taxonomy must be an object");
  }

  const { version, entries } = raw;
  validateNonEmptyString(version, "version");

  if (!Array.isArray(entries)) {
    throw new TaxonomyValidationError(
      `entries must be an array, got ${typeof entries}`,
    );
  }
  if (entries.length === 0) {
    throw new TaxonomyValidationError("entries cannot be empty");
  }

  const rawEntries: unknown[] = entries;
  const validated = rawEntries.map((entry, index) => validateEntry(entry, index));

  const seen = new Set<string>();
  for (const entry of validated) {
    if (seen.has(entry.code)) {
      throw new TaxonomyValidationError(`Duplicate entry code: "${entry.code}"`);
    }
    seen.add(entry.code);
  }

  return { version, entries: validated };
}
