import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { runGeneration } from "../src/tpcds/pipeline.js";
import { createRunConfig } from "../src/tpcds/config.js";
import type { RunConfig } from "../src/tpcds/types.js";
import { FakeBenchmarkEngine, captureConsole } from "./helpers/fake-engine.js";

const MB = 1024 * 1024;

describe("runGeneration", () => {
  let root: string;
  let config: RunConfig;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    root = fs.mkdtempSync(path.join(os.tmpdir(), "tpcds-pipeline-"));
    config = createRunConfig(2, { outputDir: path.join(root, "tpcds_data") });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("should export every table in name order and report totals", async () => {
    const engine = new FakeBenchmarkEngine([
      { name: "store", rows: 12, bytes: MB / 4 },
      { name: "date_dim", rows: 73_049, bytes: MB },
    ]);

    const result = await runGeneration(engine, config);

    expect(result.status).toBe("completed");
    if (result.status !== "completed") throw new Error("expected completed");
    expect(result.outcomes.map((o) => o.table)).toEqual(["date_dim", "store"]);
    expect(result.summary).toMatchObject({
      tablesProcessed: 2,
      successCount: 2,
      errorCount: 0,
      totalRecords: 73_061,
      totalSizeMb: 1.25,
      failures: [],
    });
    expect(fs.readdirSync(config.outputDir).sort()).toEqual([
      "date_dim.parquet",
      "store.parquet",
    ]);
    expect(engine.calls).toEqual([
      "connect",
      "load:tpcds",
      "generate:2",
      "copy:date_dim:snappy",
      "copy:store:snappy",
      "disconnect",
    ]);

    const lines = captureConsole(vi.mocked(console.log));
    expect(lines).toContain("Total records: 73,061");
    expect(lines).toContainEqual(
      expect.stringMatching(/\[INFO\] \[1\/2\] Processing 'date_dim'\.\.\.$/)
    );
    expect(lines).toContainEqual(
      expect.stringMatching(/\[INFO\] \[2\/2\] Processing 'store'\.\.\.$/)
    );
    expect(lines).toContainEqual(
      expect.stringMatching(/\[INFO\] Settings: SF=2, DIR=.*tpcds_data, COMP=snappy$/)
    );
    expect(lines[lines.length - 1]).toMatch(/\[INFO\] Fake connection closed$/);
  });

  it("should keep going after a table fails", async () => {
    const engine = new FakeBenchmarkEngine(
      [
        { name: "a", rows: 10, bytes: MB },
        { name: "b", rows: 5, bytes: MB },
        { name: "c", rows: 1, bytes: MB },
      ],
      { copyErrors: { b: new Error("boom") } }
    );

    const result = await runGeneration(engine, config);

    if (result.status !== "completed") throw new Error("expected completed");
    expect(result.outcomes.map((o) => o.kind)).toEqual(["success", "error", "success"]);
    expect(result.summary.successCount).toBe(2);
    expect(result.summary.errorCount).toBe(1);
    expect(result.summary.totalRecords).toBe(11);
    expect(result.summary.failures).toEqual([{ table: "b", error: "boom" }]);
    expect(captureConsole(vi.mocked(console.log))).toContain("  • b: boom");
    expect(engine.disconnectCount).toBe(1);
  });

  it("should stop without files or report when no tables were generated", async () => {
    const engine = new FakeBenchmarkEngine([]);

    const result = await runGeneration(engine, config);

    expect(result).toEqual({ status: "empty" });
    expect(fs.readdirSync(config.outputDir)).toEqual([]);
    const lines = captureConsole(vi.mocked(console.log));
    expect(lines).toContainEqual(
      expect.stringMatching(/\[WARNING\] No tables found in TPC-DS schema$/)
    );
    expect(lines).not.toContain("FINAL REPORT - TPC-DS GENERATION");
    expect(engine.disconnectCount).toBe(1);
  });

  it("should close the session and re-throw on a setup failure", async () => {
    const engine = new FakeBenchmarkEngine([{ name: "a", rows: 1, bytes: 1 }], {
      extensionError: new Error("extension unavailable"),
    });

    await expect(runGeneration(engine, config)).rejects.toThrow(
      "extension unavailable"
    );
    expect(engine.disconnectCount).toBe(1);
    expect(engine.connected).toBe(false);
    expect(captureConsole(vi.mocked(console.log))).toContainEqual(
      expect.stringMatching(
        /\[ERROR\] Fatal error during execution: extension unavailable$/
      )
    );
  });

  it("should close the session when connecting fails", async () => {
    const engine = new FakeBenchmarkEngine([], {
      connectError: new Error("cannot open database"),
    });

    await expect(runGeneration(engine, config)).rejects.toThrow(
      "cannot open database"
    );
    expect(engine.calls).toEqual(["connect", "disconnect"]);
  });

  it("should create the output directory before connecting", async () => {
    const engine = new FakeBenchmarkEngine([], {
      connectError: new Error("cannot open database"),
    });

    await expect(runGeneration(engine, config)).rejects.toThrow();
    expect(fs.statSync(config.outputDir).isDirectory()).toBe(true);
  });
});
