import type { ExportOutcome, RunConfig, RunSummary } from "./types.js";
import { formatCount, formatSeconds } from "./utils.js";

const RULE = "=".repeat(70);

export function summarizeOutcomes(outcomes: readonly ExportOutcome[]): RunSummary {
  const summary: RunSummary = {
    tablesProcessed: outcomes.length,
    successCount: 0,
    errorCount: 0,
    totalRecords: 0,
    totalSizeMb: 0,
    totalDurationSeconds: 0,
    failures: [],
  };

  for (const outcome of outcomes) {
    if (outcome.kind === "error") {
      summary.errorCount++;
      summary.failures.push({ table: outcome.table, error: outcome.error });
      continue;
    }
    summary.successCount++;
    summary.totalRecords += outcome.records;
    summary.totalSizeMb += outcome.sizeMb;
    summary.totalDurationSeconds += outcome.durationSeconds;
  }

  return summary;
}

export function renderReport(
  summary: RunSummary,
  config: Pick<RunConfig, "scaleFactor" | "outputDir">
): string[] {
  const lines = [
    "",
    RULE,
    "FINAL REPORT - TPC-DS GENERATION",
    RULE,
    `Scale Factor: ${String(config.scaleFactor)}`,
    `Tables processed: ${String(summary.tablesProcessed)}`,
    `  • Success: ${String(summary.successCount)}`,
    `  • Error: ${String(summary.errorCount)}`,
    `Total records: ${formatCount(summary.totalRecords)}`,
    `Total size: ${summary.totalSizeMb.toFixed(2)} MB`,
    `Total time: ${formatSeconds(summary.totalDurationSeconds)}`,
    `Directory: ${config.outputDir}/`,
  ];

  if (summary.errorCount > 0) {
    lines.push("", "⚠ Tables with errors:");
    for (const failure of summary.failures) {
      lines.push(`  • ${failure.table}: ${failure.error}`);
    }
  }

  lines.push(RULE, "");
  return lines;
}

export function printReport(
  summary: RunSummary,
  config: Pick<RunConfig, "scaleFactor" | "outputDir">
): void {
  for (const line of renderReport(summary, config)) {
    console.log(line);
  }
}
