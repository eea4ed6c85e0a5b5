// Run configuration

export interface RunConfig {
  /** TPC-DS scale factor (roughly the dataset size in GB) */
  readonly scaleFactor: number;
  /** Directory that receives one Parquet file per table */
  readonly outputDir: string;
  /** Parquet compression codec passed to COPY ... TO */
  readonly compression: string;
  /** Re-count rows in each written file and fail the table on mismatch */
  readonly verifyRowCounts: boolean;
}

// Export outcomes

export interface ExportSuccess {
  kind: "success";
  table: string;
  records: number;
  /** File size in binary megabytes (bytes / 1024 / 1024) */
  sizeMb: number;
  durationSeconds: number;
}

export interface ExportFailure {
  kind: "error";
  table: string;
  error: string;
}

export type ExportOutcome = ExportSuccess | ExportFailure;

/**
 * Totals over the successful outcomes of one run.
 * Failed tables contribute nothing to the sums and are listed in `failures`.
 */
export interface RunSummary {
  tablesProcessed: number;
  successCount: number;
  errorCount: number;
  totalRecords: number;
  totalSizeMb: number;
  totalDurationSeconds: number;
  failures: { table: string; error: string }[];
}

export type RunResult =
  | { status: "completed"; outcomes: ExportOutcome[]; summary: RunSummary }
  | { status: "empty" };

// Prompting

export type ScaleFactorPromptResult =
  | { kind: "accepted"; scaleFactor: number }
  | { kind: "cancelled" };

/**
 * Line-oriented terminal access used by the scale factor prompt.
 * `ask` resolves to null when the operator cancels (Ctrl+C or end of input).
 */
export interface PromptIO {
  ask(question: string): Promise<string | null>;
  print(line: string): void;
}

// Main interface that all engine implementations must follow
export interface BenchmarkEngine {
  readonly name: string;

  /**
   * Open the engine session
   */
  connect(): Promise<void>;

  /**
   * Close the engine session. Safe to call when not connected.
   */
  disconnect(): Promise<void>;

  /**
   * Load the TPC-DS extension, generate all benchmark tables at the given
   * scale factor and return their names in ascending order.
   * Failures are logged and re-thrown.
   */
  generateSchema(scaleFactor: number): Promise<string[]>;

  /**
   * Export one table to `<outputDir>/<table>.parquet`.
   * Never rejects: failures come back as an error outcome.
   */
  exportTable(table: string, config: RunConfig): Promise<ExportOutcome>;
}
