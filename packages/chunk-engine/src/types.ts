/**
 * Chunk Engine Types
 */

import type { GraphicsSurface } from "./figure.js";

/** A contiguous, 1-based, inclusive slice of a chunk's source lines */
export interface SourceUnit {
  startLine: number;
  endLine: number;
  text: string;
}

/** Console output entry captured during unit execution */
export interface ConsoleEntry {
  level: "log" | "warn" | "error" | "info" | "debug";
  args: unknown[];
  timestamp: number;
}

/** The console methods a unit sees */
export type ConsoleProxy = Pick<
  Console,
  | "log"
  | "warn"
  | "error"
  | "info"
  | "debug"
  | "table"
  | "count"
  | "countReset"
  | "group"
  | "groupEnd"
  | "time"
  | "timeEnd"
  | "assert"
>;

/** Console capture interface */
export interface ConsoleCapture {
  proxy: ConsoleProxy;
  getOutput: () => ConsoleEntry[];
  clear: () => void;
}

/**
 * How a unit is compiled. "single" returns a trailing bare expression as the
 * unit's value; "exec" never produces a value.
 */
export type CompileMode = "exec" | "single";

/** Marker for the most recently produced value of a session */
export interface ValueHandle {
  /** Generation number, unique per produced value within a session */
  handle: number;
  value: unknown;
}

/** Raw outcome of evaluating one unit in the interpreter */
export interface UnitEvaluation {
  /** Console text written while the unit ran */
  capturedText: string;
  /** Present when the unit raised */
  error?: Error;
}

/** Result of a single unit execution, as seen by the multiplexer */
export interface ExecutionResult {
  /** Console text followed by the displayed value, if any */
  text: string;
  /** Console text alone */
  consoleText: string;
  valueChanged: boolean;
  isError: boolean;
  /** Formatted failure message when isError */
  error?: string;
  /** The produced value when valueChanged */
  value?: unknown;
}

/** Persisted rendering of a graphic, opaque to the engine */
export interface GraphicArtifact {
  path: string;
  format: string;
  width: number;
  height: number;
}

export type OutputItem =
  | { type: "source"; text: string }
  | { type: "text"; text: string }
  | { type: "graphic"; artifact: GraphicArtifact }
  | { type: "error"; message: string };

export type ResultsMode = "sequential" | "hold";
export type ErrorMode = "capture" | "abort";

/** Validated, immutable options for one chunk */
export interface ChunkOptions {
  label: string;
  eval: boolean;
  echo: boolean;
  include: boolean;
  warning: boolean;
  results: ResultsMode;
  error: ErrorMode;
  /** Figure width in inches */
  figWidth: number;
  /** Figure height in inches */
  figHeight: number;
  dpi: number;
  /** Requested interpreter, if any */
  enginePath?: string;
  /** Graphics device, used as the figure file extension */
  dev: string;
}

/** Non-fatal problem recorded while preparing or running a chunk */
export interface Diagnostic {
  kind: "configuration" | "backend-mismatch";
  message: string;
}

export interface ChunkResult {
  items: OutputItem[];
  diagnostics: Diagnostic[];
}

/** A top-level syntactic node as reported by the parser */
export interface TopLevelNode {
  startLine: number;
  endLine: number;
  /** Line of the node's first decorator, when it has one */
  decoratorLine?: number;
}

export interface Parser {
  /** @throws ParseError on invalid syntax */
  parse(source: string): TopLevelNode[];
}

/** Output size handed to the graphics backend */
export interface Resolution {
  dpi: number;
  /** Inches */
  width: number;
  /** Inches */
  height: number;
}

export interface GraphicsBackend {
  /** Whether a value is a renderable graphic */
  isGraphic(value: unknown): boolean;
  render(graphic: unknown, path: string, resolution: Resolution): Promise<GraphicArtifact>;
  clearSurface(): void;
}

/**
 * Receives explicit display calls made by guest code. Called synchronously;
 * rendering may finish later.
 */
export interface GraphicsSink {
  display(graphic: unknown): void;
}

/** Computes where a chunk's nth figure is written */
export type FigurePathFn = (options: ChunkOptions, number: number) => string;

export interface Interpreter {
  /** Identifies this interpreter instance, compared against `engine.path` */
  readonly path: string;
  /** Surface guest display calls go through */
  readonly surface: GraphicsSurface;
  evalUnit(text: string, mode: CompileMode, options?: EvalUnitOptions): Promise<UnitEvaluation>;
  lastValue(): ValueHandle | undefined;
  injectBindings(bindings: Record<string, unknown>): void;
  /** Formats a value the way the session displays it */
  formatValue(value: unknown): string;
}

export interface EvalUnitOptions {
  /** Drop console.warn output */
  suppressWarnings?: boolean;
}
