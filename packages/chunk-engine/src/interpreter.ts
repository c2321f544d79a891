/**
 * JavaScript Interpreter
 *
 * Owns one persistent session: the scope every unit reads and writes, the
 * mutable-binding bookkeeping, the last produced value and the graphics
 * surface exposed to guest code as `plt`.
 */

import { randomUUID } from "node:crypto";
import { createConsoleCapture, formatConsoleArg, formatConsoleOutput } from "./console-capture.js";
import { createDevLogger } from "./devLog.js";
import { executeUnit, isValidIdentifier } from "./executor.js";
import { GraphicsSurface } from "./figure.js";
import { createImportModule } from "./imports.js";
import type {
  CompileMode,
  EvalUnitOptions,
  Interpreter,
  UnitEvaluation,
  ValueHandle,
} from "./types.js";

const log = createDevLogger("JsInterpreter");

/** Default interpreter path */
export const DEFAULT_ENGINE_PATH = "node";

/** Persistent interpreter state, shared by every chunk of a document */
export interface JsSession {
  id: string;
  scope: Record<string, unknown>;
  /** Track which scope keys are mutable (let/var/function/class) vs const */
  mutableKeys: Set<string>;
  lastValue?: ValueHandle;
  /** Last handle issued */
  generation: number;
}

export interface JsInterpreterOptions {
  /** Name this interpreter answers to in `engine.path` (default: "node") */
  path?: string;
  /** Initial bindings to inject into scope */
  bindings?: Record<string, unknown>;
  /** Directory relative imports resolve against */
  baseDir?: string;
  /** Per-unit timeout in milliseconds (0 = no timeout) */
  timeout?: number;
  /** Forward console output to real console for debugging */
  forwardConsole?: boolean;
}

export class JsInterpreter implements Interpreter {
  readonly path: string;
  readonly surface = new GraphicsSurface();
  private readonly session: JsSession;
  private readonly importModule: (specifier: string) => Promise<unknown>;
  private readonly options: JsInterpreterOptions;

  constructor(options: JsInterpreterOptions = {}) {
    this.options = options;
    this.path = options.path ?? DEFAULT_ENGINE_PATH;
    this.session = {
      id: randomUUID(),
      scope: {},
      mutableKeys: new Set(),
      generation: 0,
    };
    this.importModule = createImportModule({ baseDir: options.baseDir });
    if (options.bindings) {
      this.injectBindings(options.bindings);
    }
    log.verbose(`Created session ${this.session.id} for ${this.path}`);
  }

  async evalUnit(text: string, mode: CompileMode, options: EvalUnitOptions = {}): Promise<UnitEvaluation> {
    const consoleCapture = createConsoleCapture({ forward: this.options.forwardConsole });

    const result = await executeUnit(
      text,
      mode,
      this.session.scope,
      this.session.mutableKeys,
      {
        console: consoleCapture,
        importModule: this.importModule,
        globals: { plt: this.surface.api() },
      },
      { timeout: this.options.timeout ?? 0 }
    );

    for (const name of result.constNames) {
      this.session.mutableKeys.delete(name);
    }
    for (const name of result.mutableNames) {
      this.session.mutableKeys.add(name);
    }

    if (result.success && result.returnsValue && result.result !== undefined) {
      this.session.generation += 1;
      this.session.lastValue = { handle: this.session.generation, value: result.result };
    }

    const entries = options.suppressWarnings
      ? result.output.filter((entry) => entry.level !== "warn")
      : result.output;
    const capturedText = formatConsoleOutput(entries);

    return result.error ? { capturedText, error: result.error } : { capturedText };
  }

  lastValue(): ValueHandle | undefined {
    return this.session.lastValue;
  }

  /**
   * Inject bindings into the session scope as mutable bindings.
   *
   * @throws Error if any binding name is not a valid JavaScript identifier
   */
  injectBindings(bindings: Record<string, unknown>): void {
    const invalidNames = Object.keys(bindings).filter((name) => !isValidIdentifier(name));
    if (invalidNames.length > 0) {
      throw new Error(
        `Invalid binding name(s): ${invalidNames.join(", ")}. Binding names must be valid JavaScript identifiers.`
      );
    }

    Object.assign(this.session.scope, bindings);
    for (const name of Object.keys(bindings)) {
      this.session.mutableKeys.add(name);
    }
  }

  /** Strings are shown quoted; everything else as console.log would show it */
  formatValue(value: unknown): string {
    return typeof value === "string" ? JSON.stringify(value) : formatConsoleArg(value);
  }

  /**
   * Get a shallow copy of the session scope.
   */
  getScope(): Record<string, unknown> {
    return { ...this.session.scope };
  }
}
