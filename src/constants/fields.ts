/**
 * Posting field constants
 */

import type { FieldName } from "@/types";

/**
 * Posting fields in declared order
 *
 * Missing-field and failed-field lists are always reported in this order.
 */
export const FIELD_ORDER: readonly FieldName[] = [
  "postingId",
  "institution",
  "jobTitle",
  "postingStartDate",
  "postingEndDate",
  "monthlySalary",
  "vacancyCount",
  "contractCode",
  "experienceRequirements",
  "academicProfile",
  "specialization",
  "knowledge",
  "competencies",
];

/**
 * Fields a raw posting needs to be considered complete
 */
export const REQUIRED_FIELDS: readonly FieldName[] = FIELD_ORDER;

/**
 * Raw field name -> column name in the collected/normalized tables
 */
export const FIELD_COLUMNS: Record<FieldName, string> = {
  postingId: "posting_id",
  institution: "institution",
  jobTitle: "job_title",
  postingStartDate: "posting_start_date",
  postingEndDate: "posting_end_date",
  monthlySalary: "monthly_salary",
  vacancyCount: "vacancy_count",
  contractCode: "contract_code",
  experienceRequirements: "experience_requirements",
  academicProfile: "academic_profile",
  specialization: "specialization",
  knowledge: "knowledge",
  competencies: "competencies",
};
