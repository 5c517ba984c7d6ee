/**
 * Normalized postings repository
 *
 * Data access layer for normalized_postings and normalized_postings_incomplete.
 */

import type { FieldName, NormalizedPosting, NormalizedPostingRow } from "@/types";
import { getDb } from "../connection";

type NormalizedPostingParams = {
  posting_id: string;
  institution: string | null;
  job_title: string | null;
  posting_start_date: string | null;
  posting_end_date: string | null;
  monthly_salary: number | null;
  vacancy_count: number | null;
  contract_code: string | null;
  contract_regime: string | null;
  contract_temporal_nature: string | null;
  experience_requirements: string | null;
  academic_profile: string | null;
  specialization: string | null;
  knowledge: string | null;
  competencies: string | null;
  captured_at: string;
};

const POSTING_COLUMNS = `posting_id, institution, job_title, posting_start_date, posting_end_date,
  monthly_salary, vacancy_count, contract_code, contract_regime, contract_temporal_nature,
  experience_requirements, academic_profile, specialization, knowledge, competencies, captured_at`;

const POSTING_VALUES = `@posting_id, @institution, @job_title, @posting_start_date, @posting_end_date,
  @monthly_salary, @vacancy_count, @contract_code, @contract_regime, @contract_temporal_nature,
  @experience_requirements, @academic_profile, @specialization, @knowledge, @competencies, @captured_at`;

function toParams(record: NormalizedPosting): NormalizedPostingParams {
  return {
    posting_id: record.postingId,
    institution: record.institution,
    job_title: record.jobTitle,
    posting_start_date: record.postingStartDate,
    posting_end_date: record.postingEndDate,
    monthly_salary: record.monthlySalary,
    vacancy_count: record.vacancyCount,
    contract_code: record.contractCode,
    contract_regime: record.contractRegime,
    contract_temporal_nature: record.contractTemporalNature,
    experience_requirements: record.experienceRequirements,
    academic_profile: record.academicProfile,
    specialization: record.specialization,
    knowledge: record.knowledge,
    competencies: record.competencies,
    captured_at: record.capturedAt,
  };
}

/**
 * True when the identifier is stored in either table
 */
export function normalizedPostingExists(postingId: string): boolean {
  const db = getDb();
  const row = db
    .prepare<[string, string], { found: number }>(
      `
    SELECT 1 AS found FROM normalized_postings WHERE posting_id = ?
    UNION ALL
    SELECT 1 AS found FROM normalized_postings_incomplete WHERE posting_id = ?
    LIMIT 1
  `,
    )
    .get(postingId, postingId);
  return row !== undefined;
}

/**
 * Insert a posting whose every field normalized
 *
 * Throws on UNIQUE violation.
 */
export function insertNormalizedPosting(record: NormalizedPosting): number {
  const db = getDb();
  const result = db
    .prepare<NormalizedPostingParams>(
      `INSERT INTO normalized_postings (${POSTING_COLUMNS}) VALUES (${POSTING_VALUES})`,
    )
    .run(toParams(record));
  return Number(result.lastInsertRowid);
}

/**
 * Insert a posting with failed fields, keeping the reasons for review
 *
 * Throws on UNIQUE violation.
 */
export function insertIncompleteNormalizedPosting(
  record: NormalizedPosting,
  failedFields: readonly FieldName[],
): number {
  const db = getDb();
  const result = db
    .prepare<NormalizedPostingParams & { failed_fields: string; field_errors_json: string }>(
      `INSERT INTO normalized_postings_incomplete (${POSTING_COLUMNS}, failed_fields, field_errors_json)
       VALUES (${POSTING_VALUES}, @failed_fields, @field_errors_json)`,
    )
    .run({
      ...toParams(record),
      failed_fields: failedFields.join(","),
      field_errors_json: JSON.stringify(record.fieldErrors),
    });
  return Number(result.lastInsertRowid);
}

/**
 * List complete normalized postings that have no title candidates yet
 */
export function listUnclassifiedNormalizedPostings(): NormalizedPostingRow[] {
  const db = getDb();
  return db
    .prepare<[], NormalizedPostingRow>(
      `
    SELECT np.* FROM normalized_postings np
    WHERE NOT EXISTS (
      SELECT 1 FROM title_candidates tc WHERE tc.posting_id = np.posting_id
    )
    ORDER BY np.id
  `,
    )
    .all();
}

/**
 * Get a complete normalized posting by identifier
 */
export function getNormalizedPostingById(postingId: string): NormalizedPostingRow | undefined {
  const db = getDb();
  return db
    .prepare<[string], NormalizedPostingRow>(
      "SELECT * FROM normalized_postings WHERE posting_id = ?",
    )
    .get(postingId);
}

/**
 * Total rows across both tables
 */
export function countNormalizedPostings(): number {
  const db = getDb();
  const row = db
    .prepare<[], { total: number }>(
      `SELECT (SELECT COUNT(*) FROM normalized_postings) +
              (SELECT COUNT(*) FROM normalized_postings_incomplete) AS total`,
    )
    .get();
  return row?.total ?? 0;
}
