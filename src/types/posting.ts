/**
 * Posting type definitions
 *
 * Raw postings come straight from the page source (every field is the text
 * shown next to its label, or null). Normalized postings carry typed values
 * plus the list of fields whose normalizer failed.
 */

/**
 * Names of the thirteen posting fields, in declared order.
 */
export type FieldName =
  | "postingId"
  | "institution"
  | "jobTitle"
  | "postingStartDate"
  | "postingEndDate"
  | "monthlySalary"
  | "vacancyCount"
  | "contractCode"
  | "experienceRequirements"
  | "academicProfile"
  | "specialization"
  | "knowledge"
  | "competencies";

/**
 * Raw posting as extracted from one listing item
 *
 * `capturedAt` is the ISO timestamp of the extraction attempt.
 */
export type RawPosting = { [K in FieldName]: string | null } & {
  capturedAt: string;
};

/**
 * Completeness of a raw posting against the required field set
 */
export type ValidationResult = {
  isComplete: boolean;
  missingFields: FieldName[];
};

/**
 * Result of one field normalizer: a typed value or the reason it failed
 */
export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export type ContractTemporalNature =
  | "TEMPORARY"
  | "REPLACEMENT"
  | "INDETERMINATE"
  | "PERMANENT";

/**
 * Legal regime and temporal nature of a canonical contract category
 */
export type ContractDescription = {
  regime: string;
  temporalNature: ContractTemporalNature;
};

/**
 * Normalized posting (immutable once produced)
 *
 * Every field other than `postingId` is null when its normalizer failed;
 * the failing field names are listed in `failedFields` (declared order) and
 * the reasons in `fieldErrors`.
 */
export type NormalizedPosting = Readonly<{
  postingId: string;
  institution: string | null;
  jobTitle: string | null;
  postingStartDate: string | null;
  postingEndDate: string | null;
  monthlySalary: number | null;
  vacancyCount: number | null;
  contractCode: string | null;
  contractRegime: string | null;
  contractTemporalNature: ContractTemporalNature | null;
  experienceRequirements: string | null;
  academicProfile: string | null;
  specialization: string | null;
  knowledge: string | null;
  competencies: string | null;
  failedFields: readonly FieldName[];
  fieldErrors: Readonly<Partial<Record<FieldName, string>>>;
  capturedAt: string;
}>;

/**
 * Outcome of normalizing one raw posting
 */
export type NormalizePostingResult =
  | { ok: true; record: NormalizedPosting }
  | { ok: false; reason: "unparseable_identifier"; error: string };

export type PostingDestination = "complete" | "incomplete";
