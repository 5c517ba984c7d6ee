/**
 * Database row type definitions
 *
 * Aligned with the schema in migrations/.
 */

/**
 * Row of collected_postings / collected_postings_incomplete
 */
export type CollectedPostingRow = {
  id: number;
  posting_id: string;
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
  stored_at: string;
};

export type CollectedPostingIncompleteRow = CollectedPostingRow & {
  /** Comma-separated field names */
  missing_fields: string;
  reviewed: number;
  notes: string | null;
};

/**
 * Row of normalized_postings / normalized_postings_incomplete
 */
export type NormalizedPostingRow = {
  id: number;
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
  normalized_at: string;
};

export type NormalizedPostingIncompleteRow = NormalizedPostingRow & {
  /** Comma-separated field names */
  failed_fields: string;
  /** JSON: { [field]: reason } */
  field_errors_json: string;
  reviewed: number;
  notes: string | null;
};

export type RunStage = "collect" | "normalize" | "classify";

export type RunStatus = "running" | "done" | "stopped_early" | "aborted" | "failure" | "success";

/**
 * Row of pipeline_runs
 */
export type PipelineRun = {
  id: number;
  stage: RunStage;
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  pages_processed: number | null;
  items_encountered: number | null;
  saved_complete: number | null;
  saved_incomplete: number | null;
  duplicates: number | null;
  failed: number | null;
  /** JSON array of error messages */
  errors_json: string | null;
};

/**
 * Counters persisted when a run finishes
 */
export type RunCounters = {
  pages_processed: number;
  items_encountered: number;
  saved_complete: number;
  saved_incomplete: number;
  duplicates: number;
  failed: number;
  errors: string[];
};

export type PipelineRunUpdate = Partial<RunCounters> & {
  finished_at: string;
  status: RunStatus;
};

/**
 * Row of title_candidates
 */
export type TitleCandidateRow = {
  id: number;
  posting_id: string;
  job_title: string;
  category_code: string;
  category_label: string;
  semantic_score: number;
  lexical_score: number;
  combined_score: number;
  rank: number;
  validated: number;
  created_at: string;
};

/**
 * Mutable counters filled in during a run and persisted when it finishes
 */
export type RunAccumulator = {
  counters: RunCounters;
  /** Final status when the stage completes without throwing (default "success") */
  status?: RunStatus;
};
