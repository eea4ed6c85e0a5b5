import {
  DuckDBBenchmarkEngine,
  collectScaleFactor,
  createConsolePromptIO,
  createRunConfig,
  runGeneration,
  type ScaleFactorPromptResult,
} from "../src/index.js";

// Run: npx tsx scripts/generate-tpcds.ts
// Writes one Parquet file per TPC-DS table into ./tpcds_data

async function promptForScaleFactor(): Promise<ScaleFactorPromptResult> {
  const io = createConsolePromptIO();
  try {
    return await collectScaleFactor(io);
  } finally {
    io.close();
  }
}

async function main(): Promise<void> {
  const result = await promptForScaleFactor();
  if (result.kind === "cancelled") {
    console.log("\n\nOperation cancelled by user.");
    process.exit(0);
  }

  const config = createRunConfig(result.scaleFactor);
  await runGeneration(new DuckDBBenchmarkEngine(), config);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
