export type {
  BenchmarkEngine,
  RunConfig,
  ExportOutcome,
  ExportSuccess,
  ExportFailure,
  RunSummary,
  RunResult,
  PromptIO,
  ScaleFactorPromptResult,
} from "./types.js";

export {
  createRunConfig,
  isSupportedCompression,
  DEFAULT_SCALE_FACTOR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_COMPRESSION,
  SCALE_FACTOR_CONFIRM_THRESHOLD,
  SUPPORTED_COMPRESSIONS,
  type Compression,
  type RunConfigOverrides,
} from "./config.js";

export { logProgress, formatLogLine, formatTimestamp, type LogLevel } from "./logger.js";
export {
  bytesToMegabytes,
  errorMessage,
  formatCount,
  formatDuration,
  formatSeconds,
} from "./utils.js";
export { escapeDuckDBIdentifier, escapeDuckDBLiteral } from "./escape.js";

export {
  collectScaleFactor,
  createConsolePromptIO,
  parseScaleFactor,
  type CollectScaleFactorOptions,
  type ConsolePromptOptions,
  type ParsedScaleFactor,
} from "./prompt.js";
export { prepareWorkspace } from "./workspace.js";
export { summarizeOutcomes, renderReport, printReport } from "./report.js";
export { runGeneration } from "./pipeline.js";

export { BaseBenchmarkEngine, parquetPathFor, TPCDS_EXTENSION } from "./base-engine.js";
export { DuckDBBenchmarkEngine, type DuckDBConfig } from "./duckdb-engine.js";
