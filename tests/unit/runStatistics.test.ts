/**
 * Unit tests for run statistics and the run report
 */

import { describe, it, expect } from "vitest";
import {
  createRunStatistics,
  finishRunStatistics,
  formatRunReport,
  recordError,
  recordOutcome,
  runDurationMs,
} from "@/collection";
import { ERROR_LOG_CAP } from "@/constants";

const STARTED_AT = new Date("2025-06-05T14:00:00.000Z");

describe("run statistics", () => {
  it("should start with zeroed counters", () => {
    const stats = createRunStatistics(STARTED_AT);

    expect(stats).toEqual({
      startedAt: STARTED_AT,
      finishedAt: null,
      pagesProcessed: 0,
      itemsEncountered: 0,
      savedComplete: 0,
      savedIncomplete: 0,
      duplicates: 0,
      failed: 0,
      retries: 0,
      consecutiveDuplicates: 0,
      errors: [],
      errorsDropped: 0,
    });
  });

  it("should cap the error log and count what it drops", () => {
    const stats = createRunStatistics(STARTED_AT);
    for (let i = 0; i < ERROR_LOG_CAP + 5; i++) {
      recordError(stats, `error ${i}`);
    }

    expect(stats.errors).toHaveLength(ERROR_LOG_CAP);
    expect(stats.errors[0]).toBe("error 0");
    expect(stats.errors[ERROR_LOG_CAP - 1]).toBe(`error ${ERROR_LOG_CAP - 1}`);
    expect(stats.errorsDropped).toBe(5);
  });

  it("should reset consecutive duplicates on a save but not on a failure", () => {
    const stats = createRunStatistics(STARTED_AT);

    recordOutcome(stats, { kind: "duplicate", postingId: "1" }, "page 1 item 1");
    recordOutcome(stats, { kind: "failed", reason: "missing identifier" }, "page 1 item 2");
    recordOutcome(stats, { kind: "duplicate", postingId: "2" }, "page 1 item 3");
    expect(stats.consecutiveDuplicates).toBe(2);

    recordOutcome(
      stats,
      { kind: "saved_incomplete", postingId: "3", missingFields: ["knowledge"] },
      "page 1 item 4",
    );
    expect(stats.consecutiveDuplicates).toBe(0);
    expect(stats.duplicates).toBe(2);
    expect(stats.failed).toBe(1);
    expect(stats.savedIncomplete).toBe(1);
  });

  it("should log failures with their location and identifier", () => {
    const stats = createRunStatistics(STARTED_AT);

    recordOutcome(stats, { kind: "failed", reason: "missing identifier" }, "page 1 item 2");
    recordOutcome(
      stats,
      { kind: "failed", reason: "store error: disk full", postingId: "123" },
      "page 2 item 1",
    );

    expect(stats.errors).toEqual([
      "page 1 item 2: missing identifier",
      "page 2 item 1 (123): store error: disk full",
    ]);
  });

  it("should measure duration up to the finish time", () => {
    const stats = createRunStatistics(STARTED_AT);
    expect(runDurationMs(stats, new Date("2025-06-05T14:00:02.000Z"))).toBe(2000);

    finishRunStatistics(stats, new Date("2025-06-05T14:00:01.500Z"));
    expect(runDurationMs(stats, new Date("2025-06-05T14:05:00.000Z"))).toBe(1500);
  });
});

describe("formatRunReport", () => {
  it("should render counters, store size and errors", () => {
    const stats = createRunStatistics(STARTED_AT);
    Object.assign(stats, {
      pagesProcessed: 3,
      itemsEncountered: 10,
      savedComplete: 6,
      savedIncomplete: 1,
      duplicates: 2,
      failed: 1,
      retries: 2,
    });
    recordError(stats, "page 2 item 4: missing identifier");
    finishRunStatistics(stats, new Date("2025-06-05T14:00:12.300Z"));

    const report = formatRunReport(stats, "stopped_early", { before: 20, after: 27 });

    expect(report.split("\n")).toEqual([
      "Collection run report",
      "  Status: stopped_early",
      "  Duration: 12.3s",
      "  Pages processed: 3",
      "  Items encountered: 10",
      "  Saved (complete): 6",
      "  Saved (incomplete): 1",
      "  Duplicates: 2",
      "  Failed: 1",
      "  Retries: 2",
      "  Store size: 20 -> 27 (+7)",
      "  Errors (1):",
      "    - page 2 item 4: missing identifier",
    ]);
  });

  it("should show only the first errors and count the rest, dropped ones included", () => {
    const stats = createRunStatistics(STARTED_AT);
    for (let i = 1; i <= ERROR_LOG_CAP + 5; i++) {
      recordError(stats, `error ${i}`);
    }
    finishRunStatistics(stats, STARTED_AT);

    const lines = formatRunReport(stats).split("\n");
    const errorsAt = lines.indexOf(`  Errors (${ERROR_LOG_CAP + 5}):`);

    expect(errorsAt).toBeGreaterThan(0);
    expect(lines[errorsAt + 1]).toBe("    - error 1");
    expect(lines[errorsAt + 10]).toBe("    - error 10");
    expect(lines[errorsAt + 11]).toBe(`    ... and ${ERROR_LOG_CAP - 5} more`);
    expect(lines).toHaveLength(errorsAt + 12);
  });

  it("should omit status, store size and errors when there are none", () => {
    const stats = createRunStatistics(STARTED_AT);
    finishRunStatistics(stats, STARTED_AT);

    const report = formatRunReport(stats);

    expect(report).not.toContain("Status:");
    expect(report).not.toContain("Store size:");
    expect(report).not.toContain("Errors");
    expect(report.split("\n")[1]).toBe("  Duration: 0.0s");
  });
});
