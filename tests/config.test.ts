import { describe, it, expect } from "vitest";
import {
  createRunConfig,
  isSupportedCompression,
  DEFAULT_COMPRESSION,
  DEFAULT_OUTPUT_DIR,
} from "../src/tpcds/config.js";

describe("createRunConfig", () => {
  it("should apply defaults", () => {
    expect(createRunConfig(1)).toEqual({
      scaleFactor: 1,
      outputDir: DEFAULT_OUTPUT_DIR,
      compression: DEFAULT_COMPRESSION,
      verifyRowCounts: true,
    });
    expect(DEFAULT_OUTPUT_DIR).toBe("tpcds_data");
    expect(DEFAULT_COMPRESSION).toBe("snappy");
  });

  it("should accept overrides", () => {
    const config = createRunConfig(10, {
      outputDir: "/tmp/out",
      compression: "zstd",
      verifyRowCounts: false,
    });
    expect(config).toEqual({
      scaleFactor: 10,
      outputDir: "/tmp/out",
      compression: "zstd",
      verifyRowCounts: false,
    });
  });

  it("should normalize codec case", () => {
    expect(createRunConfig(1, { compression: "ZSTD" }).compression).toBe(
      "zstd"
    );
  });

  it("should be frozen", () => {
    expect(Object.isFrozen(createRunConfig(1))).toBe(true);
  });

  it("should reject scale factors below 1 or non-integers", () => {
    expect(() => createRunConfig(0)).toThrow(
      "Scale factor must be a positive integer, got 0"
    );
    expect(() => createRunConfig(-5)).toThrow(/positive integer/);
    expect(() => createRunConfig(1.5)).toThrow(/positive integer/);
    expect(() => createRunConfig(Number.NaN)).toThrow(/positive integer/);
  });

  it("should reject an empty output directory", () => {
    expect(() => createRunConfig(1, { outputDir: "  " })).toThrow(
      "Output directory must not be empty"
    );
  });

  it("should reject unknown codecs", () => {
    expect(() => createRunConfig(1, { compression: "rar" })).toThrow(
      /^Unsupported compression: rar\. Valid options: uncompressed, snappy/
    );
  });
});

describe("isSupportedCompression", () => {
  it("should know DuckDB's Parquet codecs", () => {
    for (const codec of ["uncompressed", "snappy", "gzip", "zstd", "brotli", "lz4", "lz4_raw"]) {
      expect(isSupportedCompression(codec)).toBe(true);
    }
    expect(isSupportedCompression("SNAPPY")).toBe(false);
    expect(isSupportedCompression("lzo")).toBe(false);
  });
});
