/**
 * Record normalizer: turns one raw posting into a typed, immutable record
 *
 * Field failures never fail the record: the field is left null and listed in
 * `failedFields`, and the record is routed to the incomplete destination.
 * Only an identifier that cannot be parsed rejects the record outright.
 */

import type {
  FieldName,
  FieldResult,
  NormalizePostingResult,
  NormalizedPosting,
  PostingDestination,
  RawPosting,
} from "@/types";
import { FIELD_ORDER } from "@/constants";
import {
  describeContract,
  normalizeContractCode,
  normalizeDate,
  normalizeFreeText,
  normalizeJobTitle,
  normalizeListText,
  normalizePostingId,
  normalizeSalary,
  normalizeVacancyCount,
} from "./fields";

export function normalizePosting(raw: RawPosting): NormalizePostingResult {
  const postingId = normalizePostingId(raw.postingId);
  if (!postingId.ok) {
    return { ok: false, reason: "unparseable_identifier", error: postingId.error };
  }

  const fieldErrors: Partial<Record<FieldName, string>> = {};
  function take<T>(field: FieldName, result: FieldResult<T>): T | null {
    if (result.ok) {
      return result.value;
    }
    fieldErrors[field] = result.error;
    return null;
  }

  const contractCode = take("contractCode", normalizeContractCode(raw.contractCode));
  const contract = contractCode === null ? null : describeContract(contractCode);

  const institution = take("institution", normalizeFreeText(raw.institution));
  const jobTitle = take("jobTitle", normalizeJobTitle(raw.jobTitle));
  const postingStartDate = take("postingStartDate", normalizeDate(raw.postingStartDate));
  const postingEndDate = take("postingEndDate", normalizeDate(raw.postingEndDate));
  const monthlySalary = take("monthlySalary", normalizeSalary(raw.monthlySalary));
  const vacancyCount = take("vacancyCount", normalizeVacancyCount(raw.vacancyCount));
  const experienceRequirements = take(
    "experienceRequirements",
    normalizeFreeText(raw.experienceRequirements),
  );
  const academicProfile = take("academicProfile", normalizeFreeText(raw.academicProfile));
  const specialization = take("specialization", normalizeListText(raw.specialization));
  const knowledge = take("knowledge", normalizeListText(raw.knowledge));
  const competencies = take("competencies", normalizeListText(raw.competencies));

  const failedFields = FIELD_ORDER.filter((field) => field in fieldErrors);

  const record: NormalizedPosting = Object.freeze({
    postingId: postingId.value,
    institution,
    jobTitle,
    postingStartDate,
    postingEndDate,
    monthlySalary,
    vacancyCount,
    contractCode,
    contractRegime: contract?.regime ?? null,
    contractTemporalNature: contract?.temporalNature ?? null,
    experienceRequirements,
    academicProfile,
    specialization,
    knowledge,
    competencies,
    failedFields: Object.freeze(failedFields),
    fieldErrors: Object.freeze(fieldErrors),
    capturedAt: raw.capturedAt,
  });

  return { ok: true, record };
}

/**
 * Destination of a normalized record: complete only when no field failed
 */
export function routePosting(record: NormalizedPosting): PostingDestination {
  return record.failedFields.length === 0 ? "complete" : "incomplete";
}
