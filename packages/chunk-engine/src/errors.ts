/**
 * Error taxonomy for chunk execution.
 *
 * Configuration problems and interpreter mismatches are not errors: they are
 * recorded as diagnostics on the chunk result.
 */

/** Thrown when chunk source fails to parse; no unit has run */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** Thrown when a unit fails and errors are not being captured */
export class RuntimeError extends Error {
  constructor(
    message: string,
    public readonly startLine: number,
    public readonly endLine: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RuntimeError";
  }
}

/** Thrown when process-level engine configuration is invalid */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Normalize an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format an error the way it is shown inline in chunk output.
 */
export function formatErrorMessage(error: Error): string {
  return `${error.name}: ${error.message}`;
}
