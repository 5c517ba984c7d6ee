/**
 * Item validator: completeness of a raw posting
 */

import type { RawPosting, ValidationResult } from "@/types";
import { REQUIRED_FIELDS } from "@/constants";

function isPresent(value: unknown): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Report which required fields are missing, in declared field order
 */
export function validatePosting(raw: RawPosting): ValidationResult {
  const missingFields = REQUIRED_FIELDS.filter((field) => !isPresent(raw[field]));
  return {
    isComplete: missingFields.length === 0,
    missingFields,
  };
}
