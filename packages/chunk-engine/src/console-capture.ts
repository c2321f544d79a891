/**
 * Console Capture
 *
 * Creates a proxy console that captures all output while optionally
 * forwarding to the real console for debugging, and formats captured entries
 * as the text a terminal would have shown.
 */

import type { ConsoleCapture, ConsoleEntry } from "./types.js";

export interface ConsoleCaptureOptions {
  /** Forward captured output to real console */
  forward?: boolean;
}

const LEVEL_PREFIX: Record<ConsoleEntry["level"], string> = {
  log: "",
  info: "[INFO] ",
  warn: "[WARN] ",
  error: "[ERROR] ",
  debug: "[DEBUG] ",
};

/**
 * Create a console capture proxy that collects all console output.
 */
export function createConsoleCapture(options: ConsoleCaptureOptions = {}): ConsoleCapture {
  const { forward = false } = options;
  const output: ConsoleEntry[] = [];

  const counters = new Map<string, number>();
  const timers = new Map<string, number>();
  let groupDepth = 0;

  const capture =
    (level: ConsoleEntry["level"]) =>
    (...args: unknown[]) => {
      const indent = "  ".repeat(groupDepth);
      const indentedArgs =
        groupDepth > 0 ? [indent + (args.length > 0 ? formatConsoleArg(args[0]) : ""), ...args.slice(1)] : args;
      output.push({ level, args: indentedArgs, timestamp: Date.now() });
      if (forward) {
        // eslint-disable-next-line no-console
        console[level](...args);
      }
    };

  const proxy: ConsoleCapture["proxy"] = {
    log: capture("log"),
    warn: capture("warn"),
    error: capture("error"),
    info: capture("info"),
    debug: capture("debug"),

    table: (data: unknown, columns?: readonly string[]) => {
      if (columns && Array.isArray(data)) {
        capture("log")(data.map((row: unknown) => pickColumns(row, columns)));
      } else if (columns) {
        capture("log")(pickColumns(data, columns));
      } else {
        capture("log")(data);
      }
    },

    count: (label = "default") => {
      const count = (counters.get(label) ?? 0) + 1;
      counters.set(label, count);
      capture("log")(`${label}: ${count}`);
    },
    countReset: (label = "default") => {
      counters.delete(label);
    },

    group: (...args: unknown[]) => {
      if (args.length > 0) {
        capture("log")(...args);
      }
      groupDepth++;
    },
    groupEnd: () => {
      if (groupDepth > 0) {
        groupDepth--;
      }
    },

    time: (label = "default") => {
      if (timers.has(label)) {
        capture("warn")(`Timer '${label}' already exists`);
        return;
      }
      timers.set(label, performance.now());
    },
    timeEnd: (label = "default") => {
      const start = timers.get(label);
      if (start === undefined) {
        capture("warn")(`Timer '${label}' does not exist`);
        return;
      }
      timers.delete(label);
      capture("log")(`${label}: ${(performance.now() - start).toFixed(3)}ms`);
    },

    assert: (condition?: unknown, ...args: unknown[]) => {
      if (!condition) {
        capture("error")("Assertion failed:", ...args);
      }
    },
  };

  return {
    proxy,
    getOutput: () => [...output],
    clear: () => {
      output.length = 0;
      counters.clear();
      timers.clear();
      groupDepth = 0;
    },
  };
}

function pickColumns(row: unknown, columns: readonly string[]): unknown {
  if (typeof row !== "object" || row === null) return row;
  const filtered: Record<string, unknown> = {};
  for (const col of columns) {
    if (col in row) {
      filtered[col] = Reflect.get(row, col);
    }
  }
  return filtered;
}

/**
 * Rebuild a value as plain JSON data. Only a reference back to an enclosing
 * object counts as circular; Maps become objects and Sets arrays.
 */
function toJsonValue(value: unknown, ancestors: readonly object[]): unknown {
  if (typeof value === "bigint") return `${value}n`;
  if (typeof value !== "object" || value === null) return value;
  if (ancestors.includes(value)) return "[Circular]";

  const chain = [...ancestors, value];
  if (value instanceof Map) {
    const entries: Record<string, unknown> = {};
    for (const [key, item] of value) {
      entries[typeof key === "string" ? key : formatConsoleArg(key)] = toJsonValue(item, chain);
    }
    return entries;
  }
  if (value instanceof Set) return [...value].map((item) => toJsonValue(item, chain));
  if (Array.isArray(value)) return value.map((item: unknown) => toJsonValue(item, chain));
  if ("toJSON" in value && typeof value.toJSON === "function") return value;

  const record: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    record[key] = toJsonValue(item, chain);
  }
  return record;
}

/**
 * Format one console argument. Objects are shown as indented JSON.
 */
export function formatConsoleArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  if (typeof arg === "function") return `[Function: ${arg.name || "anonymous"}]`;
  if (typeof arg === "bigint") return `${arg}n`;
  if (typeof arg === "object" && arg !== null) {
    return JSON.stringify(toJsonValue(arg, []), null, 2);
  }
  return String(arg);
}

/**
 * Format a console entry as a single line, prefixed by level except for log.
 */
export function formatConsoleEntry(entry: ConsoleEntry): string {
  return LEVEL_PREFIX[entry.level] + entry.args.map(formatConsoleArg).join(" ");
}

/**
 * Format entries as stdout text: one line per entry, each newline-terminated.
 */
export function formatConsoleOutput(entries: readonly ConsoleEntry[]): string {
  return entries.map((entry) => formatConsoleEntry(entry) + "\n").join("");
}
