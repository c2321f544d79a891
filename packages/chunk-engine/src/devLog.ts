/**
 * Leveled development logging for the engine.
 *
 * CHUNKWEAVE_LOG_LEVEL selects the lowest level written:
 *   - "verbose" - per-unit execution, sink attach/release
 *   - "info" - interpreter start-up (default)
 *   - "warn" - coerced chunk options, interpreter mismatches
 *   - "error"
 *   - "silent"
 *
 * The variable is read on every call so tests can change it at run time.
 */

export type LogLevel = "verbose" | "info" | "warn" | "error" | "silent";

type WritableLevel = Exclude<LogLevel, "silent">;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  verbose: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const WRITERS: Record<WritableLevel, (...data: unknown[]) => void> = {
  verbose: (...data) => console.log(...data),
  info: (...data) => console.log(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

function currentLevel(): LogLevel {
  const level = process.env["CHUNKWEAVE_LOG_LEVEL"]?.toLowerCase();
  return isLogLevel(level) ? level : "info";
}

function enabled(level: WritableLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel()];
}

function emit(level: WritableLevel, tag: string, message: string, args: unknown[]): void {
  if (enabled(level)) {
    WRITERS[level](`[${tag}] ${message}`, ...args);
  }
}

export function isVerbose(): boolean {
  return enabled("verbose");
}

export interface DevLogger {
  verbose: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  isVerbose: () => boolean;
}

/**
 * Create a logger whose lines are prefixed with `[tag]`.
 */
export function createDevLogger(tag: string): DevLogger {
  return {
    verbose: (message, ...args) => emit("verbose", tag, message, args),
    info: (message, ...args) => emit("info", tag, message, args),
    warn: (message, ...args) => emit("warn", tag, message, args),
    error: (message, ...args) => emit("error", tag, message, args),
    isVerbose,
  };
}
