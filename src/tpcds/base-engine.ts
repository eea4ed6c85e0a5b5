import * as fs from "fs";
import * as path from "path";
import type { BenchmarkEngine, ExportOutcome, RunConfig } from "./types.js";
import { logProgress } from "./logger.js";
import {
  bytesToMegabytes,
  errorMessage,
  formatCount,
  formatSeconds,
} from "./utils.js";

export const TPCDS_EXTENSION = "tpcds";

/**
 * Destination of a table export: `<outputDir>/<table>.parquet`
 */
export function parquetPathFor(outputDir: string, table: string): string {
  return path.join(outputDir, `${table}.parquet`);
}

export abstract class BaseBenchmarkEngine implements BenchmarkEngine {
  abstract readonly name: string;

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;

  /**
   * Install (if needed) and load an engine extension
   */
  protected abstract loadExtension(extension: string): Promise<void>;

  /**
   * Populate the catalog with the TPC-DS tables at the given scale factor
   */
  protected abstract runGenerator(scaleFactor: number): Promise<void>;

  /**
   * Names of the tables in the default schema, ascending
   */
  protected abstract listTables(): Promise<string[]>;

  abstract countRows(tableName: string): Promise<number>;

  /**
   * Write the whole table to a compressed Parquet file, replacing any
   * existing file at that path
   */
  protected abstract copyToParquet(
    tableName: string,
    filePath: string,
    compression: string
  ): Promise<void>;

  /**
   * Count the rows stored in a Parquet file
   */
  protected abstract countFileRows(filePath: string): Promise<number>;

  protected getFileSize(filePath: string): number {
    return fs.statSync(filePath).size;
  }

  async generateSchema(scaleFactor: number): Promise<string[]> {
    try {
      logProgress("Installing TPC-DS extension...");
      await this.loadExtension(TPCDS_EXTENSION);
      logProgress("✓ TPC-DS extension loaded successfully");
    } catch (err) {
      logProgress(`Error loading TPC-DS extension: ${errorMessage(err)}`, "ERROR");
      throw err;
    }

    try {
      logProgress(
        `Generating TPC-DS schema with scale_factor=${String(scaleFactor)}...`
      );
      await this.runGenerator(scaleFactor);
      const tables = await this.listTables();
      logProgress(`✓ Schema generated: ${String(tables.length)} tables found`);
      return tables;
    } catch (err) {
      logProgress(`Error listing TPC-DS tables: ${errorMessage(err)}`, "ERROR");
      throw err;
    }
  }

  async exportTable(table: string, config: RunConfig): Promise<ExportOutcome> {
    try {
      const filePath = parquetPathFor(config.outputDir, table);
      const records = await this.countRows(table);

      logProgress(`Exporting '${table}' (${formatCount(records)} records)...`);

      const startTime = Date.now();
      await this.copyToParquet(table, filePath, config.compression);
      const durationSeconds = (Date.now() - startTime) / 1000;

      if (config.verifyRowCounts) {
        const fileRecords = await this.countFileRows(filePath);
        if (fileRecords !== records) {
          throw new Error(
            `Row count mismatch: table has ${formatCount(records)} rows, file has ${formatCount(fileRecords)}`
          );
        }
      }

      const sizeMb = bytesToMegabytes(this.getFileSize(filePath));

      logProgress(
        `✓ '${table}' exported: ${sizeMb.toFixed(2)} MB in ${formatSeconds(durationSeconds)} (${formatCount(records)} records)`
      );

      return { kind: "success", table, records, sizeMb, durationSeconds };
    } catch (err) {
      const message = errorMessage(err);
      logProgress(`✗ Error exporting '${table}': ${message}`, "ERROR");
      return { kind: "error", table, error: message };
    }
  }
}
