/**
 * Operator-facing report of a collection run
 */

import type { CollectionStatus, RunStatistics, StoreCounts } from "@/types";
import { REPORT_ERROR_PREVIEW } from "@/constants";
import { runDurationMs } from "./runStatistics";

function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatRunReport(
  stats: RunStatistics,
  status?: CollectionStatus,
  storeCounts?: StoreCounts,
): string {
  const lines: string[] = ["Collection run report"];

  if (status) {
    lines.push(`  Status: ${status}`);
  }
  lines.push(
    `  Duration: ${formatDuration(runDurationMs(stats))}`,
    `  Pages processed: ${stats.pagesProcessed}`,
    `  Items encountered: ${stats.itemsEncountered}`,
    `  Saved (complete): ${stats.savedComplete}`,
    `  Saved (incomplete): ${stats.savedIncomplete}`,
    `  Duplicates: ${stats.duplicates}`,
    `  Failed: ${stats.failed}`,
    `  Retries: ${stats.retries}`,
  );

  if (storeCounts) {
    const delta = storeCounts.after - storeCounts.before;
    lines.push(
      `  Store size: ${storeCounts.before} -> ${storeCounts.after} (${delta >= 0 ? "+" : ""}${delta})`,
    );
  }

  const totalErrors = stats.errors.length + stats.errorsDropped;
  if (totalErrors > 0) {
    lines.push(`  Errors (${totalErrors}):`);
    for (const message of stats.errors.slice(0, REPORT_ERROR_PREVIEW)) {
      lines.push(`    - ${message}`);
    }
    if (totalErrors > REPORT_ERROR_PREVIEW) {
      lines.push(`    ... and ${totalErrors - REPORT_ERROR_PREVIEW} more`);
    }
  }

  return lines.join("\n");
}
