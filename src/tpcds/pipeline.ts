import type { BenchmarkEngine, ExportOutcome, RunConfig, RunResult } from "./types.js";
import { logProgress } from "./logger.js";
import { prepareWorkspace } from "./workspace.js";
import { printReport, summarizeOutcomes } from "./report.js";
import { errorMessage, formatDuration } from "./utils.js";

const SEPARATOR = "-".repeat(70);

/**
 * Generate the TPC-DS tables and export each one to Parquet.
 * The engine is always disconnected before this returns or throws.
 */
export async function runGeneration(
  engine: BenchmarkEngine,
  config: RunConfig
): Promise<RunResult> {
  const startTime = Date.now();
  logProgress("Starting TPC-DS data generation");
  logProgress(
    `Settings: SF=${String(config.scaleFactor)}, DIR=${config.outputDir}, COMP=${config.compression}`
  );

  prepareWorkspace(config.outputDir);

  try {
    await engine.connect();
    const tables = await engine.generateSchema(config.scaleFactor);
    if (tables.length === 0) {
      logProgress("No tables found in TPC-DS schema", "WARNING");
      return { status: "empty" };
    }

    logProgress(`Starting export of ${String(tables.length)} tables...`);
    console.log(SEPARATOR);

    const outcomes: ExportOutcome[] = [];
    for (const [index, table] of tables.entries()) {
      logProgress(
        `[${String(index + 1)}/${String(tables.length)}] Processing '${table}'...`
      );
      outcomes.push(await engine.exportTable(table, config));
      console.log(SEPARATOR);
    }

    const summary = summarizeOutcomes(outcomes);
    printReport(summary, config);

    logProgress(
      `✓ TPC-DS generation completed successfully! (${formatDuration(Date.now() - startTime)})`
    );
    return { status: "completed", outcomes, summary };
  } catch (err) {
    logProgress(`Fatal error during execution: ${errorMessage(err)}`, "ERROR");
    throw err;
  } finally {
    await engine.disconnect();
    logProgress(`${engine.name} connection closed`);
  }
}
