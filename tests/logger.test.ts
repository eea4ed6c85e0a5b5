import { describe, it, expect, vi, afterEach } from "vitest";
import {
  formatLogLine,
  formatTimestamp,
  logProgress,
} from "../src/tpcds/logger.js";

describe("formatTimestamp", () => {
  it("should pad every field to two digits", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe(
      "2024-01-05 09:03:07"
    );
  });

  it("should drop milliseconds", () => {
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59, 999))).toBe(
      "2023-12-31 23:59:59"
    );
  });
});

describe("formatLogLine", () => {
  it("should include timestamp, level and message", () => {
    const date = new Date(2024, 5, 1, 12, 0, 0);
    expect(formatLogLine(date, "WARNING", "No tables found")).toBe(
      "[2024-06-01 12:00:00] [WARNING] No tables found"
    );
  });
});

describe("logProgress", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should default to INFO and write one line to stdout", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    logProgress("hello");
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0]?.[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[INFO\] hello$/
    );
  });

  it("should use the given level", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    logProgress("bad", "ERROR");
    expect(spy.mock.calls[0]?.[0]).toMatch(/\] \[ERROR\] bad$/);
  });
});
