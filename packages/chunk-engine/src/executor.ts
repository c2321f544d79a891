/**
 * Unit Executor
 *
 * Executes unit code in a persistent scope context using AsyncFunction.
 * Supports mutable vs const variable tracking and execution timeouts.
 */

import { toError } from "./errors.js";
import { SCOPE_PARAM, transformUnit, type TransformResult } from "./transformer.js";
import type { CompileMode, ConsoleCapture, ConsoleEntry } from "./types.js";

// Get the AsyncFunction constructor
const AsyncFunction = Object.getPrototypeOf(async function () {}).constructor as new (
  ...args: string[]
) => (...args: unknown[]) => Promise<unknown>;

/** Injected parameter names for unit execution context */
const CONSOLE_PARAM = "__console__";
const IMPORT_MODULE_PARAM = "__importModule__";
const GLOBALS_PARAM = "__globals__";

/** Names the wrapper declares itself; scope bindings with these names are not destructured */
const RESERVED_NAMES = new Set(["console", "importModule", SCOPE_PARAM, CONSOLE_PARAM, IMPORT_MODULE_PARAM, GLOBALS_PARAM]);

/** Helpers passed to the unit executor */
export interface ExecutionHelpers {
  console: ConsoleCapture;
  importModule: (specifier: string) => Promise<unknown>;
  /** Additional names visible to the unit, such as `plt` */
  globals?: Record<string, unknown>;
}

/** Execution options */
export interface ExecuteOptions {
  /** Timeout in milliseconds (0 = no timeout) */
  timeout?: number;
}

/** Result of a single unit execution */
export interface UnitRunResult {
  success: boolean;
  /** Value of the trailing expression, when `returnsValue` */
  result?: unknown;
  /** Whether the unit ended in a displayable expression (single mode) */
  returnsValue: boolean;
  error?: Error;
  output: ConsoleEntry[];
  /** Names declared with const (immutable binding) */
  constNames: string[];
  /** Names declared with let/var/function/class (mutable binding) */
  mutableNames: string[];
}

/** Error thrown when execution times out */
export class TimeoutError extends Error {
  constructor(message = "Execution timed out") {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * LRU cache for valid identifier checks with bounded size.
 */
class IdentifierCache {
  private cache = new Map<string, boolean>();
  private readonly maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  get(name: string): boolean | undefined {
    const value = this.cache.get(name);
    if (value !== undefined) {
      // Move to end (most recently used)
      this.cache.delete(name);
      this.cache.set(name, value);
    }
    return value;
  }

  set(name: string, value: boolean): void {
    if (this.cache.has(name)) {
      this.cache.delete(name);
    } else if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next().value;
      if (oldest !== undefined) {
        this.cache.delete(oldest);
      }
    }
    this.cache.set(name, value);
  }
}

const identifierCache = new IdentifierCache();

const IDENTIFIER_PATTERN = /^[\p{ID_Start}$_][\p{ID_Continue}$\u200C\u200D]*$/u;

/**
 * Execute a unit of code within a session scope.
 *
 * @param code - The unit source
 * @param mode - "single" returns a trailing expression's value
 * @param scope - The persistent scope object
 * @param mutableKeys - Keys in scope that are mutable (let/var/function/class)
 */
export async function executeUnit(
  code: string,
  mode: CompileMode,
  scope: Record<string, unknown>,
  mutableKeys: ReadonlySet<string>,
  helpers: ExecutionHelpers,
  options: ExecuteOptions = {}
): Promise<UnitRunResult> {
  const { console: consoleCapture, importModule, globals = {} } = helpers;
  const { timeout = 0 } = options;

  let transformResult: TransformResult;
  try {
    transformResult = transformUnit(code, mode);
  } catch (error) {
    return {
      success: false,
      returnsValue: false,
      error: toError(error),
      output: consoleCapture.getOutput(),
      constNames: [],
      mutableNames: [],
    };
  }

  const { code: transformedCode, constNames, mutableNames, returnsValue } = transformResult;
  const declared = new Set([...constNames, ...mutableNames]);
  const wrappedCode = wrapUnitCode(transformedCode, scope, mutableKeys, declared, Object.keys(globals));

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const fn = new AsyncFunction(SCOPE_PARAM, CONSOLE_PARAM, IMPORT_MODULE_PARAM, GLOBALS_PARAM, wrappedCode);
    const running = fn(scope, consoleCapture.proxy, importModule, globals);

    let result: unknown;
    if (timeout > 0) {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => reject(new TimeoutError()), timeout);
      });
      result = await Promise.race([running, timeoutPromise]);
    } else {
      result = await running;
    }

    return {
      success: true,
      result,
      returnsValue,
      output: consoleCapture.getOutput(),
      constNames,
      mutableNames,
    };
  } catch (error) {
    return {
      success: false,
      returnsValue: false,
      error: toError(error),
      output: consoleCapture.getOutput(),
      constNames,
      mutableNames,
    };
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/**
 * Wrap unit code with scope destructuring and helper aliases.
 *
 * The wrapper:
 * 1. Provides console, importModule and the extra globals as local constants
 * 2. Destructures existing scope variables (const for immutable, let for
 *    mutable), skipping names the unit declares itself
 * 3. Executes the transformed unit code
 * 4. Syncs mutable variables back to scope (in a finally block to handle errors)
 *
 * The body runs in strict mode, matching the module goal the parser uses.
 */
function wrapUnitCode(
  code: string,
  scope: Record<string, unknown>,
  mutableKeys: ReadonlySet<string>,
  declared: ReadonlySet<string>,
  globalNames: string[]
): string {
  const validGlobals = globalNames.filter((n) => isValidIdentifier(n) && !RESERVED_NAMES.has(n) && !declared.has(n));
  const hidden = new Set([...RESERVED_NAMES, ...validGlobals, ...declared]);

  const validNames = Object.keys(scope).filter((n) => isValidIdentifier(n) && !hidden.has(n));
  const mutableNames = validNames.filter((n) => mutableKeys.has(n));
  const constNames = validNames.filter((n) => !mutableKeys.has(n));

  const globalsDestructure =
    validGlobals.length > 0 ? `const { ${validGlobals.join(", ")} } = ${GLOBALS_PARAM};` : "";
  const constDestructure =
    constNames.length > 0 ? `const { ${constNames.join(", ")} } = ${SCOPE_PARAM};` : "";
  const mutableDestructure =
    mutableNames.length > 0 ? `let { ${mutableNames.join(", ")} } = ${SCOPE_PARAM};` : "";

  // Reassignments like `x = 2` must persist to scope
  const syncBack = mutableNames.map((n) => `${SCOPE_PARAM}.${n} = ${n};`).join(" ");

  const header = `
"use strict";
const console = ${CONSOLE_PARAM};
const importModule = ${IMPORT_MODULE_PARAM};
${globalsDestructure}
${constDestructure}
${mutableDestructure}`;

  if (syncBack) {
    return `${header}
try {
${code}
} finally {
  ${syncBack}
}
`;
  }

  return `${header}
${code}
`;
}

/**
 * Check if a string is a valid JavaScript identifier.
 */
export function isValidIdentifier(name: string): boolean {
  if (!name || name.length === 0) return false;

  if (!IDENTIFIER_PATTERN.test(name)) return false;

  const cached = identifierCache.get(name);
  if (cached !== undefined) return cached;

  try {
    // Reserved words pass the pattern but fail here
    new Function(`"use strict"; let ${name};`);
    identifierCache.set(name, true);
    return true;
  } catch {
    identifierCache.set(name, false);
    return false;
  }
}
