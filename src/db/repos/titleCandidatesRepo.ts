/**
 * Title candidates repository
 *
 * Data access layer for title_candidates table.
 */

import type { TitleCandidate, TitleCandidateRow } from "@/types";
import { getDb } from "../connection";

type TitleCandidateParams = {
  posting_id: string;
  job_title: string;
  category_code: string;
  category_label: string;
  semantic_score: number;
  lexical_score: number;
  combined_score: number;
  rank: number;
};

/**
 * Replace the candidates of one posting (single transaction)
 */
export function replaceTitleCandidates(
  postingId: string,
  jobTitle: string,
  candidates: readonly TitleCandidate[],
): void {
  const db = getDb();
  const remove = db.prepare<[string]>("DELETE FROM title_candidates WHERE posting_id = ?");
  const insert = db.prepare<TitleCandidateParams>(`
    INSERT INTO title_candidates (
      posting_id, job_title, category_code, category_label,
      semantic_score, lexical_score, combined_score, rank
    ) VALUES (
      @posting_id, @job_title, @category_code, @category_label,
      @semantic_score, @lexical_score, @combined_score, @rank
    )
  `);

  const transaction = db.transaction(() => {
    remove.run(postingId);
    for (const candidate of candidates) {
      insert.run({
        posting_id: postingId,
        job_title: jobTitle,
        category_code: candidate.categoryCode,
        category_label: candidate.categoryLabel,
        semantic_score: candidate.semanticScore,
        lexical_score: candidate.lexicalScore,
        combined_score: candidate.combinedScore,
        rank: candidate.rank,
      });
    }
  });

  transaction();
}

/**
 * List candidates of one posting ordered by rank
 */
export function listTitleCandidates(postingId: string): TitleCandidateRow[] {
  const db = getDb();
  return db
    .prepare<[string], TitleCandidateRow>(
      "SELECT * FROM title_candidates WHERE posting_id = ? ORDER BY rank",
    )
    .all(postingId);
}
