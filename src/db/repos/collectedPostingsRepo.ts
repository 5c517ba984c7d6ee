/**
 * Collected postings repository
 *
 * Data access layer for collected_postings and collected_postings_incomplete.
 * Both tables share one identifier space; lookups check both.
 */

import type {
  CollectedPostingRow,
  CollectedPostingIncompleteRow,
  FieldName,
  RawPosting,
} from "@/types";
import { getDb } from "../connection";

type CollectedPostingParams = {
  posting_id: string | null;
  institution: string | null;
  job_title: string | null;
  posting_start_date: string | null;
  posting_end_date: string | null;
  monthly_salary: string | null;
  vacancy_count: string | null;
  contract_code: string | null;
  experience_requirements: string | null;
  academic_profile: string | null;
  specialization: string | null;
  knowledge: string | null;
  competencies: string | null;
  captured_at: string;
};

const POSTING_COLUMNS = `posting_id, institution, job_title, posting_start_date, posting_end_date,
  monthly_salary, vacancy_count, contract_code, experience_requirements,
  academic_profile, specialization, knowledge, competencies, captured_at`;

const POSTING_VALUES = `@posting_id, @institution, @job_title, @posting_start_date, @posting_end_date,
  @monthly_salary, @vacancy_count, @contract_code, @experience_requirements,
  @academic_profile, @specialization, @knowledge, @competencies, @captured_at`;

function toParams(posting: RawPosting): CollectedPostingParams {
  return {
    posting_id: posting.postingId,
    institution: posting.institution,
    job_title: posting.jobTitle,
    posting_start_date: posting.postingStartDate,
    posting_end_date: posting.postingEndDate,
    monthly_salary: posting.monthlySalary,
    vacancy_count: posting.vacancyCount,
    contract_code: posting.contractCode,
    experience_requirements: posting.experienceRequirements,
    academic_profile: posting.academicProfile,
    specialization: posting.specialization,
    knowledge: posting.knowledge,
    competencies: posting.competencies,
    captured_at: posting.capturedAt,
  };
}

/**
 * Map a stored row back to the raw posting it was saved from
 */
export function rowToRawPosting(row: CollectedPostingRow): RawPosting {
  return {
    postingId: row.posting_id,
    institution: row.institution,
    jobTitle: row.job_title,
    postingStartDate: row.posting_start_date,
    postingEndDate: row.posting_end_date,
    monthlySalary: row.monthly_salary,
    vacancyCount: row.vacancy_count,
    contractCode: row.contract_code,
    experienceRequirements: row.experience_requirements,
    academicProfile: row.academic_profile,
    specialization: row.specialization,
    knowledge: row.knowledge,
    competencies: row.competencies,
    capturedAt: row.captured_at,
  };
}

/**
 * True when the identifier is stored in either table
 */
export function collectedPostingExists(postingId: string): boolean {
  const db = getDb();
  const row = db
    .prepare<[string, string], { found: number }>(
      `
    SELECT 1 AS found FROM collected_postings WHERE posting_id = ?
    UNION ALL
    SELECT 1 AS found FROM collected_postings_incomplete WHERE posting_id = ?
    LIMIT 1
  `,
    )
    .get(postingId, postingId);
  return row !== undefined;
}

/**
 * Insert a complete posting
 *
 * Throws on UNIQUE violation (callers map it to a duplicate outcome).
 */
export function insertCollectedPosting(posting: RawPosting): number {
  const db = getDb();
  const result = db
    .prepare<CollectedPostingParams>(
      `INSERT INTO collected_postings (${POSTING_COLUMNS}) VALUES (${POSTING_VALUES})`,
    )
    .run(toParams(posting));
  return Number(result.lastInsertRowid);
}

/**
 * Insert an incomplete posting tagged with its missing fields
 *
 * Throws on UNIQUE violation (callers map it to a duplicate outcome).
 */
export function insertIncompleteCollectedPosting(
  posting: RawPosting,
  missingFields: readonly FieldName[],
): number {
  const db = getDb();
  const result = db
    .prepare<CollectedPostingParams & { missing_fields: string }>(
      `INSERT INTO collected_postings_incomplete (${POSTING_COLUMNS}, missing_fields)
       VALUES (${POSTING_VALUES}, @missing_fields)`,
    )
    .run({ ...toParams(posting), missing_fields: missingFields.join(",") });
  return Number(result.lastInsertRowid);
}

/**
 * List every collected posting, complete ones first, each in insertion order
 */
export function listCollectedPostings(): RawPosting[] {
  const db = getDb();
  const complete = db
    .prepare<[], CollectedPostingRow>("SELECT * FROM collected_postings ORDER BY id")
    .all();
  const incomplete = db
    .prepare<[], CollectedPostingIncompleteRow>(
      "SELECT * FROM collected_postings_incomplete ORDER BY id",
    )
    .all();
  return [...complete, ...incomplete].map(rowToRawPosting);
}

/**
 * Total rows across both tables
 */
export function countCollectedPostings(): number {
  const db = getDb();
  const row = db
    .prepare<[], { total: number }>(
      `SELECT (SELECT COUNT(*) FROM collected_postings) +
              (SELECT COUNT(*) FROM collected_postings_incomplete) AS total`,
    )
    .get();
  return row?.total ?? 0;
}
