/**
 * Chunk Engine
 *
 * Main entry point. Validates chunk options, splits the chunk into units,
 * runs them in order against the active interpreter and returns the ordered
 * output items. Chunks are queued and run one at a time, because every chunk
 * reads and writes the same session.
 */

import { defaultFigurePath, loadEngineConfig, type EngineConfig } from "./config.js";
import { createDevLogger } from "./devLog.js";
import { toError } from "./errors.js";
import { GraphicsCapture } from "./graphics-capture.js";
import { SvgFileBackend } from "./graphics-backend.js";
import { JsInterpreter } from "./interpreter.js";
import { OutputMultiplexer } from "./multiplexer.js";
import { validateChunkOptions } from "./options.js";
import { ExecutionSession } from "./session.js";
import { splitStatements, toLines } from "./splitter.js";
import type { GraphicsSurface } from "./figure.js";
import type {
  ChunkOptions,
  ChunkResult,
  Diagnostic,
  FigurePathFn,
  GraphicArtifact,
  GraphicsBackend,
  Interpreter,
  Parser,
} from "./types.js";

const log = createDevLogger("ChunkEngine");

export interface ChunkEngineOptions {
  /** Overrides for environment configuration */
  config?: Partial<EngineConfig>;
  /** Host bindings pushed into the session before every chunk */
  bindings?: () => Record<string, unknown>;
  /** Where the nth figure of a chunk is written */
  figurePath?: FigurePathFn;
  /** Creates the interpreter for a path (default: a JsInterpreter) */
  createInterpreter?: (path: string) => Interpreter;
  /** Creates the graphics backend for an interpreter's surface (default: SVG files) */
  createBackend?: (surface: GraphicsSurface) => GraphicsBackend;
  /** Parser used to split chunks (default: acorn) */
  parser?: Parser;
}

/** Queued chunk request */
interface QueuedChunk {
  code: string | readonly string[];
  rawOptions: Record<string, unknown>;
  resolve: (result: ChunkResult) => void;
  reject: (error: Error) => void;
}

interface ActiveInterpreter {
  interpreter: Interpreter;
  backend: GraphicsBackend;
}

export class ChunkEngine {
  private readonly config: EngineConfig;
  private readonly options: ChunkEngineOptions;
  private readonly figurePath: FigurePathFn;
  private active: ActiveInterpreter | undefined;
  private readonly queue: QueuedChunk[] = [];
  private executing = false;

  constructor(options: ChunkEngineOptions = {}) {
    this.options = options;
    this.config = { ...loadEngineConfig(), ...options.config };
    this.figurePath = options.figurePath ?? defaultFigurePath(this.config.figureDir);
  }

  /** The interpreter chunks currently run against, if one was started */
  get interpreter(): Interpreter | undefined {
    return this.active?.interpreter;
  }

  /**
   * Run one chunk. Calls are queued and run strictly in order.
   *
   * @param code - Chunk source, as a string or as lines
   * @param rawOptions - Chunk options as supplied by the host
   * @throws ParseError when the chunk does not parse
   * @throws RuntimeError when a unit fails and errors are not captured
   */
  runChunk(code: string | readonly string[], rawOptions: Record<string, unknown> = {}): Promise<ChunkResult> {
    return new Promise<ChunkResult>((resolve, reject) => {
      this.queue.push({ code, rawOptions, resolve, reject });
      this.processQueue();
    });
  }

  /**
   * Start the next queued chunk if none is running.
   */
  private processQueue(): void {
    if (this.executing) return;
    const next = this.queue.shift();
    if (!next) return;

    this.executing = true;
    this.execute(next.code, next.rawOptions)
      .then(next.resolve, next.reject)
      .finally(() => {
        this.executing = false;
        this.processQueue();
      });
  }

  /**
   * Core chunk logic.
   */
  private async execute(code: string | readonly string[], rawOptions: Record<string, unknown>): Promise<ChunkResult> {
    const { options, diagnostics } = validateChunkOptions(rawOptions);
    const lines = toLines(code);

    // eval = false: the source is the only output
    if (!options.eval) {
      const items = options.echo && lines.length > 0 ? [{ type: "source" as const, text: lines.join("\n") }] : [];
      return { items, diagnostics };
    }

    const { interpreter, backend } = this.resolveInterpreter(options, diagnostics);

    if (lines.length === 0) {
      return { items: [], diagnostics };
    }

    const units = splitStatements(lines, this.options.parser);
    log.verbose(`Chunk '${options.label}': ${units.length} unit(s)`);

    this.synchronizeBefore(interpreter);

    const session = new ExecutionSession(interpreter, {
      captureErrors: options.error === "capture" || !this.config.inDocumentBuild,
      suppressWarnings: !options.warning,
    });
    const capture = new GraphicsCapture({
      backend,
      surface: interpreter.surface,
      chunk: options,
      figurePath: this.figurePath,
    });
    const multiplexer = new OutputMultiplexer(lines, options);

    let bailedOut = false;
    const release = capture.acquire();
    try {
      for (const [i, unit] of units.entries()) {
        let result = capture.inspect(await session.run(unit), i === units.length - 1);
        let graphics: GraphicArtifact[] = [];
        try {
          graphics = await capture.drain();
        } catch (error) {
          // a failed render counts against the unit that displayed it
          if (result.isError) {
            log.warn(`Render failed after an earlier failure: ${toError(error).message}`);
          } else {
            result = session.fail(unit, toError(error), result.text);
          }
        }
        if (multiplexer.accept(unit, result, graphics)) {
          log.verbose(`Chunk '${options.label}' stopped at lines ${unit.startLine}-${unit.endLine}`);
          bailedOut = true;
          break;
        }
      }
    } finally {
      release();
    }

    const items = multiplexer.finish(bailedOut);
    this.synchronizeAfter(interpreter);
    return { items, diagnostics };
  }

  /**
   * Return the active interpreter, starting one on first use. A chunk that
   * asks for a different interpreter than the active one gets a diagnostic
   * and runs on the active one.
   */
  private resolveInterpreter(options: ChunkOptions, diagnostics: Diagnostic[]): ActiveInterpreter {
    const requested = options.enginePath;

    if (this.active) {
      const actual = this.active.interpreter.path;
      if (requested !== undefined && requested !== actual) {
        const message = `cannot honor request to use interpreter ${requested} [${actual} already active]`;
        log.warn(message);
        diagnostics.push({ kind: "backend-mismatch", message });
      }
      return this.active;
    }

    const path = requested ?? this.config.enginePath;
    const interpreter = this.options.createInterpreter
      ? this.options.createInterpreter(path)
      : new JsInterpreter({ path, timeout: this.config.timeout });
    const backend = this.options.createBackend
      ? this.options.createBackend(interpreter.surface)
      : new SvgFileBackend(interpreter.surface);

    log.info(`Started interpreter ${interpreter.path}`);
    this.active = { interpreter, backend };
    return this.active;
  }

  /** Push host bindings into the session */
  private synchronizeBefore(interpreter: Interpreter): void {
    const bindings = this.options.bindings?.();
    if (bindings && Object.keys(bindings).length > 0) {
      interpreter.injectBindings(bindings);
    }
  }

  /** Session values are not copied back to the host */
  private synchronizeAfter(_interpreter: Interpreter): void {}
}

/**
 * Create a new chunk engine.
 */
export function createEngine(options?: ChunkEngineOptions): ChunkEngine {
  return new ChunkEngine(options);
}
