export function bytesToMegabytes(bytes: number): number {
  return bytes / 1024 / 1024;
}

/**
 * Group digits with commas, independent of the host locale
 */
export function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

/**
 * Format seconds with two decimals, e.g. "1.50s"
 */
export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(2)}s`;
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
  if (ms < 3600_000) {
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${String(minutes)}m ${String(seconds)}s`;
  }
  const hours = Math.floor(ms / 3600_000);
  const minutes = Math.floor((ms % 3600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  return `${String(hours)}h ${String(minutes)}m ${String(seconds)}s`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
