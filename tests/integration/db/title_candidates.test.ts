/**
 * Integration Test: title candidates repository
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { listTitleCandidates, replaceTitleCandidates } from "@/db";
import type { TitleCandidate } from "@/types";

function candidate(categoryCode: string, rank: number, combinedScore: number): TitleCandidate {
  return {
    categoryCode,
    categoryLabel: `Label ${categoryCode}`,
    semanticScore: combinedScore,
    lexicalScore: 40,
    combinedScore,
    rank,
  };
}

describe("titleCandidatesRepo", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should store candidates ordered by rank", () => {
    harness = createTestDbSync();

    replaceTitleCandidates("500100", "CONTADOR", [
      candidate("FIN-02", 2, 80),
      candidate("FIN-01", 1, 100),
    ]);

    const rows = listTitleCandidates("500100");
    expect(rows.map((row) => [row.rank, row.category_code, row.combined_score])).toEqual([
      [1, "FIN-01", 100],
      [2, "FIN-02", 80],
    ]);
    expect(rows[0]).toMatchObject({
      job_title: "CONTADOR",
      category_label: "Label FIN-01",
      lexical_score: 40,
      validated: 0,
    });
  });

  it("should replace earlier candidates of the same posting only", () => {
    harness = createTestDbSync();
    replaceTitleCandidates("500100", "CONTADOR", [candidate("FIN-01", 1, 100)]);
    replaceTitleCandidates("500200", "ABOGADO", [candidate("LEG-01", 1, 100)]);

    replaceTitleCandidates("500100", "CONTADOR", [candidate("FIN-03", 1, 90)]);

    expect(listTitleCandidates("500100").map((row) => row.category_code)).toEqual(["FIN-03"]);
    expect(listTitleCandidates("500200").map((row) => row.category_code)).toEqual(["LEG-01"]);
  });

  it("should roll back when a rank repeats", () => {
    harness = createTestDbSync();
    replaceTitleCandidates("500100", "CONTADOR", [candidate("FIN-01", 1, 100)]);

    expect(() =>
      replaceTitleCandidates("500100", "CONTADOR", [
        candidate("FIN-02", 1, 90),
        candidate("FIN-03", 1, 80),
      ]),
    ).toThrow("UNIQUE constraint failed");

    expect(listTitleCandidates("500100").map((row) => row.category_code)).toEqual(["FIN-01"]);
  });
});
