import type { CatalogStore } from "../catalog/catalogStore";
import { isPermanentlyFailed, type RetryPolicy } from "../catalog/transitions";
import { keyOf } from "../catalog/types";
import type { RunRepository } from "../db/runRepository";

/**
 * Prints a health report of recent runs, one row per catalog and day.
 * Status icons: 🟢 every item that needed work succeeded, 🟡 at least 80%, 🔴 below.
 * @param days - The lookback period in days
 */
export async function printRunHistory(repo: RunRepository, days: number): Promise<void> {
  const stats = await repo.getLastDaysSummary(days);

  if (stats.length === 0) {
    console.log(`\n--- No run data found for the last ${days} days ---`);
    return;
  }

  console.log(`\n=== INGEST RUN SUMMARY (Last ${days} Days) ===`);

  const formattedStats = stats.map((s) => {
    const needWork = s.total_success + s.total_failures;

    // If no work was needed, it's a success (100%)
    const successVal = needWork === 0 ? 100 : (s.total_success / needWork) * 100;

    let icon = "🔴";
    if (successVal === 100) icon = "🟢";
    else if (successVal >= 80) icon = "🟡";

    return {
      " ": icon,
      Catalog: s.run_label,
      Date: new Date(s.run_date).toISOString().split("T")[0],
      Runs: s.runs_count,
      Found: s.total_found,
      Selected: s.total_selected,
      Done: s.total_success,
      Fail: s.total_failures,
      "Success %": `${successVal.toFixed(1)}%`
    };
  });

  console.table(formattedStats);
  console.log(`Legend: 🟢 100% | 🟡 >=80% | 🔴 <80% \n`);
}

/**
 * Lists catalog entries that will not be retried automatically: permanent errors
 * and entries whose attempt budget is used up.
 * @returns How many entries were listed
 */
export function printAbandonedReport(store: CatalogStore, policy: RetryPolicy): number {
  const abandoned = store.list().filter((entry) => isPermanentlyFailed(entry, policy));

  if (abandoned.length === 0) {
    console.log(`\n--- No abandoned entries in ${store.filePath} ---`);
    return 0;
  }

  console.log(`\n=== ABANDONED ENTRIES (${abandoned.length}) ===`);
  console.table(
    abandoned.map((entry) => ({
      Item: keyOf(entry),
      Title: entry.title.slice(0, 40),
      Reason: entry.failure_reason ?? "",
      Attempts: `${entry.attempt_count}/${policy.maxAttempts}`,
      "Last Error": (entry.last_error ?? "").slice(0, 60),
      Updated: entry.updated_at
    }))
  );
  return abandoned.length;
}
