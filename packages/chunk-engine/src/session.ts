/**
 * Execution Session
 *
 * Runs one unit at a time against an interpreter and reports what it
 * produced: console text, a displayed value when the unit made a new one, or
 * a captured failure.
 */

import { createDevLogger } from "./devLog.js";
import { RuntimeError, formatErrorMessage } from "./errors.js";
import type { CompileMode, ExecutionResult, Interpreter, SourceUnit, ValueHandle } from "./types.js";

const log = createDevLogger("ExecutionSession");

export interface ExecutionSessionOptions {
  /** Turn failures into error results instead of throwing */
  captureErrors: boolean;
  /** Drop console.warn output */
  suppressWarnings?: boolean;
}

/**
 * Handle equality of two value markers. Equal content under different
 * handles counts as different.
 */
export function sameHandle(a: ValueHandle | undefined, b: ValueHandle | undefined): boolean {
  return a?.handle === b?.handle;
}

/**
 * A trailing semicolon suppresses display of the unit's value.
 */
export function compileModeFor(text: string): CompileMode {
  return /;\s*$/.test(text) ? "exec" : "single";
}

export class ExecutionSession {
  constructor(
    private readonly interpreter: Interpreter,
    private readonly options: ExecutionSessionOptions
  ) {}

  /**
   * Execute one unit.
   *
   * @throws RuntimeError when the unit fails and errors are not captured
   */
  async run(unit: SourceUnit): Promise<ExecutionResult> {
    const mode = compileModeFor(unit.text);
    log.verbose(`Running lines ${unit.startLine}-${unit.endLine} in ${mode} mode`);

    const previous = this.interpreter.lastValue();
    const evaluation = await this.interpreter.evalUnit(unit.text, mode, {
      suppressWarnings: this.options.suppressWarnings,
    });
    const current = this.interpreter.lastValue();
    const valueChanged = !sameHandle(previous, current);
    const consoleText = evaluation.capturedText;

    if (evaluation.error) {
      return { ...this.fail(unit, evaluation.error, consoleText), valueChanged };
    }

    if (valueChanged && current) {
      return {
        text: consoleText + this.interpreter.formatValue(current.value) + "\n",
        consoleText,
        valueChanged,
        isError: false,
        value: current.value,
      };
    }

    return { text: consoleText, consoleText, valueChanged, isError: false };
  }

  /**
   * Record a failure of a unit, including one raised after it ran such as a
   * graphic that could not be rendered.
   *
   * @throws RuntimeError when errors are not captured
   */
  fail(unit: SourceUnit, error: Error, text: string): ExecutionResult {
    const message = formatErrorMessage(error);
    if (!this.options.captureErrors) {
      throw new RuntimeError(`${message} (lines ${unit.startLine}-${unit.endLine})`, unit.startLine, unit.endLine, {
        cause: error,
      });
    }
    log.verbose(`Captured failure: ${message}`);
    return { text, consoleText: text, valueChanged: false, isError: true, error: message };
  }
}
