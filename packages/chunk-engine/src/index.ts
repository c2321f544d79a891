/**
 * @chunkweave/engine
 *
 * Runs document chunks statement by statement in a persistent JavaScript
 * session and returns the output a reader of a live session would see.
 *
 * Features:
 * - Statement-level splitting with acorn
 * - Persistent scope across chunks, with value-change detection
 * - Console capture and inline value display
 * - Figure capture through the `plt` binding, rendered to SVG files
 * - Sequential and hold result modes, abort or capture on failure
 * - Binding injection and dynamic imports
 */

// Main engine
export { ChunkEngine, createEngine, type ChunkEngineOptions } from "./engine.js";

// Errors
export { ParseError, RuntimeError, ConfigError, formatErrorMessage } from "./errors.js";

// Chunk options and configuration
export { validateChunkOptions, ChunkOptionsSchema, ENGINE_NAME } from "./options.js";
export type { RawChunkOptions, ValidatedChunkOptions } from "./options.js";
export { loadEngineConfig, defaultFigurePath, type EngineConfig } from "./config.js";

// Splitting (for advanced usage)
export { splitStatements, boundaryLines, toLines } from "./splitter.js";
export { AcornParser } from "./parser.js";

// Execution (for advanced usage)
export { ExecutionSession, sameHandle, compileModeFor, type ExecutionSessionOptions } from "./session.js";
export { JsInterpreter, DEFAULT_ENGINE_PATH, type JsInterpreterOptions } from "./interpreter.js";
export { executeUnit, TimeoutError } from "./executor.js";
export { transformUnit } from "./transformer.js";
export { createConsoleCapture, formatConsoleOutput } from "./console-capture.js";

// Graphics and output assembly (for advanced usage)
export { Figure, GraphicsSurface, type PlotApi } from "./figure.js";
export { SvgFileBackend } from "./graphics-backend.js";
export { GraphicsCapture, type GraphicsCaptureOptions } from "./graphics-capture.js";
export { OutputMultiplexer, mergeText } from "./multiplexer.js";

// Logging
export { createDevLogger, type DevLogger, type LogLevel } from "./devLog.js";

// Types
export type {
  SourceUnit,
  ConsoleEntry,
  CompileMode,
  ValueHandle,
  UnitEvaluation,
  ExecutionResult,
  GraphicArtifact,
  OutputItem,
  ResultsMode,
  ErrorMode,
  ChunkOptions,
  Diagnostic,
  ChunkResult,
  TopLevelNode,
  Parser,
  Resolution,
  GraphicsBackend,
  GraphicsSink,
  FigurePathFn,
  Interpreter,
  EvalUnitOptions,
} from "./types.js";
