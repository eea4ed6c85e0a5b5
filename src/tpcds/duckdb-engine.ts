import {
  DuckDBInstance,
  type DuckDBConnection,
  type DuckDBValue,
} from "@duckdb/node-api";
import { BaseBenchmarkEngine } from "./base-engine.js";
import { escapeDuckDBIdentifier, escapeDuckDBLiteral } from "./escape.js";

export interface DuckDBConfig {
  /** Database path; ":memory:" keeps everything in process memory */
  path: string;
  /** Schema whose tables are exported */
  schema: string;
}

const DEFAULT_DUCKDB_CONFIG: DuckDBConfig = { path: ":memory:", schema: "main" };

export function buildLoadExtensionStatements(extension: string): string[] {
  if (!/^[a-z][a-z0-9_]*$/.test(extension)) {
    throw new Error(`Invalid extension name: ${extension}`);
  }
  return [`INSTALL ${extension}`, `LOAD ${extension}`];
}

export function buildGeneratorStatement(scaleFactor: number): string {
  if (!Number.isSafeInteger(scaleFactor) || scaleFactor < 1) {
    throw new Error(`Invalid scale factor: ${String(scaleFactor)}`);
  }
  return `CALL dsdgen(sf = ${String(scaleFactor)})`;
}

export function buildListTablesStatement(schema: string): string {
  return `SELECT table_name FROM information_schema.tables WHERE table_schema = ${escapeDuckDBLiteral(schema)} ORDER BY table_name`;
}

export function buildCountStatement(tableName: string): string {
  return `SELECT COUNT(*) AS count FROM ${escapeDuckDBIdentifier(tableName)}`;
}

export function buildCopyStatement(
  tableName: string,
  filePath: string,
  compression: string
): string {
  return `COPY ${escapeDuckDBIdentifier(tableName)} TO ${escapeDuckDBLiteral(filePath)} (FORMAT PARQUET, COMPRESSION ${escapeDuckDBLiteral(compression)})`;
}

export function buildFileCountStatement(filePath: string): string {
  return `SELECT COUNT(*) AS count FROM read_parquet(${escapeDuckDBLiteral(filePath)})`;
}

/**
 * COUNT(*) comes back as a BIGINT
 */
function toCount(value: DuckDBValue | undefined): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  throw new Error(`Expected a row count, got ${String(value)}`);
}

export class DuckDBBenchmarkEngine extends BaseBenchmarkEngine {
  readonly name = "DuckDB";
  private instance: DuckDBInstance | null = null;
  private connection: DuckDBConnection | null = null;
  private config: DuckDBConfig;

  constructor(config: Partial<DuckDBConfig> = {}) {
    super();
    this.config = { ...DEFAULT_DUCKDB_CONFIG, ...config };
  }

  async connect(): Promise<void> {
    this.instance = await DuckDBInstance.create(this.config.path);
    this.connection = await this.instance.connect();
  }

  disconnect(): Promise<void> {
    if (this.connection) {
      this.connection.closeSync();
      this.connection = null;
    }
    if (this.instance) {
      this.instance.closeSync();
      this.instance = null;
    }
    return Promise.resolve();
  }

  private getConnection(): DuckDBConnection {
    if (!this.connection) {
      throw new Error("Not connected to DuckDB");
    }
    return this.connection;
  }

  /**
   * Run a statement and discard its result
   */
  async execute(sql: string): Promise<void> {
    await this.getConnection().run(sql);
  }

  private async queryRows(sql: string): Promise<DuckDBValue[][]> {
    const reader = await this.getConnection().runAndReadAll(sql);
    return reader.getRows();
  }

  protected async loadExtension(extension: string): Promise<void> {
    for (const statement of buildLoadExtensionStatements(extension)) {
      await this.execute(statement);
    }
  }

  protected async runGenerator(scaleFactor: number): Promise<void> {
    await this.execute(buildGeneratorStatement(scaleFactor));
  }

  protected async listTables(): Promise<string[]> {
    const rows = await this.queryRows(
      buildListTablesStatement(this.config.schema)
    );
    return rows.map((row) => {
      const tableName = row[0];
      if (typeof tableName !== "string") {
        throw new Error(`Unexpected table name: ${String(tableName)}`);
      }
      return tableName;
    });
  }

  async countRows(tableName: string): Promise<number> {
    const rows = await this.queryRows(buildCountStatement(tableName));
    return toCount(rows[0]?.[0]);
  }

  protected async copyToParquet(
    tableName: string,
    filePath: string,
    compression: string
  ): Promise<void> {
    await this.execute(buildCopyStatement(tableName, filePath, compression));
  }

  protected async countFileRows(filePath: string): Promise<number> {
    const rows = await this.queryRows(buildFileCountStatement(filePath));
    return toCount(rows[0]?.[0]);
  }
}
