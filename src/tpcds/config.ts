import type { RunConfig } from "./types.js";

export const DEFAULT_SCALE_FACTOR = 1;
export const DEFAULT_OUTPUT_DIR = "tpcds_data";
export const DEFAULT_COMPRESSION = "snappy";

/** Scale factors above this need an explicit "y" at the prompt */
export const SCALE_FACTOR_CONFIRM_THRESHOLD = 10_000;

/** Codecs accepted by DuckDB's Parquet writer */
export const SUPPORTED_COMPRESSIONS = [
  "uncompressed",
  "snappy",
  "gzip",
  "zstd",
  "brotli",
  "lz4",
  "lz4_raw",
] as const;

export type Compression = (typeof SUPPORTED_COMPRESSIONS)[number];

export function isSupportedCompression(value: string): value is Compression {
  return SUPPORTED_COMPRESSIONS.some((codec) => codec === value);
}

export interface RunConfigOverrides {
  outputDir?: string;
  compression?: string;
  verifyRowCounts?: boolean;
}

/**
 * Build the immutable configuration for one run
 */
export function createRunConfig(
  scaleFactor: number,
  overrides: RunConfigOverrides = {}
): RunConfig {
  const {
    outputDir = DEFAULT_OUTPUT_DIR,
    compression = DEFAULT_COMPRESSION,
    verifyRowCounts = true,
  } = overrides;

  if (!Number.isSafeInteger(scaleFactor) || scaleFactor < 1) {
    throw new Error(
      `Scale factor must be a positive integer, got ${String(scaleFactor)}`
    );
  }
  if (outputDir.trim() === "") {
    throw new Error("Output directory must not be empty");
  }
  const codec = compression.toLowerCase();
  if (!isSupportedCompression(codec)) {
    throw new Error(
      `Unsupported compression: ${compression}. Valid options: ${SUPPORTED_COMPRESSIONS.join(", ")}`
    );
  }

  return Object.freeze({
    scaleFactor,
    outputDir,
    compression: codec,
    verifyRowCounts,
  });
}
