/**
 * Integration Test: SQLite record stores
 *
 * Collected and normalized posting stores against a real migrated database.
 *
 * Verifies:
 * 1. Inserts land in the complete or incomplete table
 * 2. exists() sees both tables
 * 3. UNIQUE violations come back as duplicates, other failures as errors
 * 4. An identifier held by one destination is a duplicate for the other
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { makeRawPosting } from "../../helpers/postings";
import { CollectedPostingStore } from "@/collection";
import { NormalizedPostingStore, normalizePosting } from "@/normalization";
import { getNormalizedPostingById } from "@/db";
import type { CollectedPostingIncompleteRow, NormalizedPosting, RawPosting } from "@/types";

function normalized(overrides: Partial<RawPosting> = {}): NormalizedPosting {
  const result = normalizePosting(makeRawPosting(overrides));
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.record;
}

describe("CollectedPostingStore", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should insert complete and incomplete postings and see both", () => {
    harness = createTestDbSync();
    const store = new CollectedPostingStore();

    expect(store.insertComplete(makeRawPosting({ postingId: "100" }))).toEqual({
      kind: "inserted",
    });
    expect(
      store.insertIncomplete(makeRawPosting({ postingId: "101", knowledge: null }), [
        "knowledge",
        "competencies",
      ]),
    ).toEqual({ kind: "inserted" });

    expect(store.exists("100")).toBe(true);
    expect(store.exists("101")).toBe(true);
    expect(store.exists("102")).toBe(false);
    expect(store.count()).toBe(2);

    const row = harness.db
      .prepare<[string], CollectedPostingIncompleteRow>(
        "SELECT * FROM collected_postings_incomplete WHERE posting_id = ?",
      )
      .get("101");
    expect(row?.missing_fields).toBe("knowledge,competencies");
    expect(row?.knowledge).toBeNull();
    expect(row?.reviewed).toBe(0);
  });

  it("should report a second insert of the same identifier as a duplicate", () => {
    harness = createTestDbSync();
    const store = new CollectedPostingStore();

    store.insertComplete(makeRawPosting({ postingId: "100" }));

    expect(store.insertComplete(makeRawPosting({ postingId: "100" }))).toEqual({
      kind: "duplicate",
    });
    expect(store.count()).toBe(1);
  });

  it("should reject an identifier already held by the other destination", () => {
    harness = createTestDbSync();
    const store = new CollectedPostingStore();

    expect(store.insertComplete(makeRawPosting({ postingId: "900" }))).toEqual({
      kind: "inserted",
    });
    expect(
      store.insertIncomplete(makeRawPosting({ postingId: "900", knowledge: null }), ["knowledge"]),
    ).toEqual({ kind: "duplicate" });

    expect(
      store.insertIncomplete(makeRawPosting({ postingId: "901", knowledge: null }), ["knowledge"]),
    ).toEqual({ kind: "inserted" });
    expect(store.insertComplete(makeRawPosting({ postingId: "901" }))).toEqual({
      kind: "duplicate",
    });
    expect(store.count()).toBe(2);
  });

  it("should report other constraint failures as errors", () => {
    harness = createTestDbSync();
    const store = new CollectedPostingStore();

    const result = store.insertComplete(makeRawPosting({ postingId: null }));

    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.message).toContain("NOT NULL constraint failed");
    }
  });

  it("should list complete postings first, then incomplete ones, round-tripping fields", () => {
    harness = createTestDbSync();
    const store = new CollectedPostingStore();

    store.insertIncomplete(makeRawPosting({ postingId: "200", knowledge: null }), ["knowledge"]);
    store.insertComplete(makeRawPosting({ postingId: "201" }));
    store.insertComplete(makeRawPosting({ postingId: "202" }));

    const listed = store.listCollected();

    expect(listed.map((posting) => posting.postingId)).toEqual(["201", "202", "200"]);
    expect(listed[0]).toEqual(makeRawPosting({ postingId: "201" }));
    expect(listed[2].knowledge).toBeNull();
  });
});

describe("NormalizedPostingStore", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should store typed values of a complete record", () => {
    harness = createTestDbSync();
    const store = new NormalizedPostingStore();

    expect(store.insertComplete(normalized())).toEqual({ kind: "inserted" });

    const row = getNormalizedPostingById("500100");
    expect(row).toMatchObject({
      posting_id: "500100",
      job_title: "ASISTENTE",
      posting_start_date: "2025-06-02",
      monthly_salary: 2500,
      vacancy_count: 1,
      contract_code: "D.LEG 1057 DETERMINADO NECESIDAD TRANSITORIA",
      contract_regime: "D.LEG 1057",
      contract_temporal_nature: "TEMPORARY",
      knowledge: "Ofimática; Gestión documental",
    });
  });

  it("should keep failed fields and reasons of an incomplete record", () => {
    harness = createTestDbSync();
    const store = new NormalizedPostingStore();
    const record = normalized({ postingId: "500101", monthlySalary: "A TRATAR" });

    store.insertIncomplete(record, record.failedFields);

    const row = harness.db
      .prepare<[string], { failed_fields: string; field_errors_json: string; monthly_salary: number | null }>(
        "SELECT failed_fields, field_errors_json, monthly_salary FROM normalized_postings_incomplete WHERE posting_id = ?",
      )
      .get("500101");
    expect(row?.failed_fields).toBe("monthlySalary");
    expect(row?.monthly_salary).toBeNull();
    expect(JSON.parse(row?.field_errors_json ?? "{}")).toEqual({
      monthlySalary: 'unparseable salary: "A TRATAR"',
    });
    expect(store.exists("500101")).toBe(true);
    expect(getNormalizedPostingById("500101")).toBeUndefined();
  });

  it("should report a duplicate insert", () => {
    harness = createTestDbSync();
    const store = new NormalizedPostingStore();

    store.insertComplete(normalized());

    expect(store.insertComplete(normalized())).toEqual({ kind: "duplicate" });
  });

  it("should treat an identifier in the other destination as a duplicate", () => {
    harness = createTestDbSync();
    const store = new NormalizedPostingStore();
    const complete = normalized({ postingId: "900" });
    const incomplete = normalized({ postingId: "900", monthlySalary: "A TRATAR" });

    expect(store.insertComplete(complete)).toEqual({ kind: "inserted" });
    expect(store.insertIncomplete(incomplete, incomplete.failedFields)).toEqual({
      kind: "duplicate",
    });
    expect(store.count()).toBe(1);
  });
});
