import * as readline from "node:readline";
import type { PromptIO, ScaleFactorPromptResult } from "./types.js";
import {
  DEFAULT_SCALE_FACTOR,
  SCALE_FACTOR_CONFIRM_THRESHOLD,
} from "./config.js";

const RULE = "=".repeat(70);

export const SCALE_FACTOR_QUESTION = `\nEnter TPC-DS Scale Factor (default: ${String(DEFAULT_SCALE_FACTOR)}): `;
export const INVALID_INPUT_MESSAGE = "⚠ Invalid input. Please enter a number.";
export const NON_POSITIVE_MESSAGE =
  "⚠ Scale factor must be positive. Please try again.";

export type ParsedScaleFactor =
  | { kind: "default" }
  | { kind: "invalid" }
  | { kind: "nonPositive"; value: number }
  | { kind: "value"; value: number };

/**
 * Classify one line of operator input. Only an optional sign followed by
 * digits is an integer; "1.5" and "1e3" are invalid.
 */
export function parseScaleFactor(input: string): ParsedScaleFactor {
  const text = input.trim();
  if (text === "") return { kind: "default" };
  if (!/^[+-]?\d+$/.test(text)) return { kind: "invalid" };
  const value = Number(text);
  if (!Number.isSafeInteger(value)) return { kind: "invalid" };
  if (value < 1) return { kind: "nonPositive", value };
  return { kind: "value", value };
}

export function confirmationQuestion(scaleFactor: number): string {
  return `⚠ Scale factor ${String(scaleFactor)} will generate ~${String(scaleFactor)} GB. Continue? (y/n): `;
}

export function bannerLines(): string[] {
  return [
    "",
    RULE,
    "TPC-DS DATA GENERATOR",
    RULE,
    "",
    "Scale Factor Reference:",
    "  1    = ~1 GB    (Development/Testing)",
    "  10   = ~10 GB   (Small benchmarks)",
    "  100  = ~100 GB  (Medium benchmarks)",
    "  1000 = ~1 TB    (Large benchmarks)",
    RULE,
  ];
}

export interface CollectScaleFactorOptions {
  /** Values above this need confirmation (default: 10000) */
  confirmThreshold?: number;
  /** Print the banner before the first question (default: true) */
  showBanner?: boolean;
}

/**
 * Ask for a scale factor until a usable one is given or the operator cancels
 */
export async function collectScaleFactor(
  io: PromptIO,
  options: CollectScaleFactorOptions = {}
): Promise<ScaleFactorPromptResult> {
  const {
    confirmThreshold = SCALE_FACTOR_CONFIRM_THRESHOLD,
    showBanner = true,
  } = options;

  if (showBanner) {
    for (const line of bannerLines()) {
      io.print(line);
    }
  }

  for (;;) {
    const answer = await io.ask(SCALE_FACTOR_QUESTION);
    if (answer === null) return { kind: "cancelled" };

    const parsed = parseScaleFactor(answer);
    if (parsed.kind === "default") {
      return { kind: "accepted", scaleFactor: DEFAULT_SCALE_FACTOR };
    }
    if (parsed.kind === "invalid") {
      io.print(INVALID_INPUT_MESSAGE);
      continue;
    }
    if (parsed.kind === "nonPositive") {
      io.print(NON_POSITIVE_MESSAGE);
      continue;
    }

    if (parsed.value > confirmThreshold) {
      const confirm = await io.ask(confirmationQuestion(parsed.value));
      if (confirm === null) return { kind: "cancelled" };
      if (confirm.toLowerCase() !== "y") continue;
    }
    return { kind: "accepted", scaleFactor: parsed.value };
  }
}

export interface ConsolePromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat input as a TTY (raw mode, Ctrl+C via readline); detected when omitted */
  terminal?: boolean;
  /** Where a process-level SIGINT is delivered (default: process) */
  signals?: Pick<NodeJS.EventEmitter, "once" | "removeListener">;
}

/**
 * PromptIO on a readline interface (stdin/stdout by default).
 * Lines that arrive before a question is asked are queued, so piped input
 * is answered in order. Ctrl+C turns every further question into a null
 * answer; end of input does the same once the queue is drained.
 */
export function createConsolePromptIO(
  options: ConsolePromptOptions = {}
): PromptIO & { close(): void } {
  const {
    input = process.stdin,
    output = process.stdout,
    terminal,
    signals = process,
  } = options;
  const rl = readline.createInterface({ input, output, terminal });

  const queued: string[] = [];
  let pending: ((answer: string | null) => void) | null = null;
  let ended = false;
  let cancelled = false;

  const settle = (answer: string | null): void => {
    if (!pending) return;
    const resolve = pending;
    pending = null;
    resolve(answer);
  };
  const cancel = (): void => {
    cancelled = true;
    settle(null);
  };

  rl.on("line", (line) => {
    if (pending) {
      settle(line);
    } else {
      queued.push(line);
    }
  });
  rl.on("close", () => {
    ended = true;
    settle(null);
  });
  rl.on("SIGINT", cancel);
  signals.once("SIGINT", cancel);

  return {
    ask(question: string): Promise<string | null> {
      if (cancelled) return Promise.resolve(null);
      const next = queued.shift();
      if (next === undefined && ended) return Promise.resolve(null);

      if (ended) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }
      if (next !== undefined) return Promise.resolve(next);
      return new Promise((resolve) => {
        pending = resolve;
      });
    },
    print(line: string): void {
      console.log(line);
    },
    close(): void {
      signals.removeListener("SIGINT", cancel);
      rl.close();
    },
  };
}
