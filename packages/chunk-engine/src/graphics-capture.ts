/**
 * Graphics Capture
 *
 * Attaches itself to the interpreter's graphics surface for the duration of a
 * chunk. Every display call renders through the backend into a per-chunk
 * FIFO of pending artifacts, which the engine drains after each unit.
 */

import { createDevLogger } from "./devLog.js";
import { toError } from "./errors.js";
import type { GraphicsSurface } from "./figure.js";
import type {
  ChunkOptions,
  ExecutionResult,
  FigurePathFn,
  GraphicArtifact,
  GraphicsBackend,
  GraphicsSink,
} from "./types.js";

const log = createDevLogger("GraphicsCapture");

type RenderOutcome = { artifact: GraphicArtifact } | { error: Error };

export interface GraphicsCaptureOptions {
  backend: GraphicsBackend;
  surface: GraphicsSurface;
  chunk: ChunkOptions;
  figurePath: FigurePathFn;
}

export class GraphicsCapture implements GraphicsSink {
  private pending: Promise<RenderOutcome>[] = [];
  /** Figures displayed so far in this chunk */
  private counter = 0;

  constructor(private readonly options: GraphicsCaptureOptions) {}

  /**
   * Attach to the surface and apply the chunk's figure size.
   *
   * @returns Release function; restores the previous sink and figure size
   */
  acquire(): () => void {
    const { surface, chunk } = this.options;
    const previousSize = surface.figureSize;
    surface.figureSize = { width: chunk.figWidth, height: chunk.figHeight };
    const detach = surface.attachSink(this);
    log.verbose(`Attached to chunk '${chunk.label}'`);

    return () => {
      detach();
      surface.figureSize = previousSize;
      this.counter = 0;
      log.verbose(`Released chunk '${chunk.label}'`);
    };
  }

  display(graphic: unknown): void {
    const { backend, chunk, figurePath } = this.options;
    this.counter += 1;
    const path = figurePath(chunk, this.counter);

    const rendering = backend.render(graphic, path, {
      dpi: chunk.dpi,
      width: chunk.figWidth,
      height: chunk.figHeight,
    });
    backend.clearSurface();

    this.pending.push(
      rendering.then(
        (artifact): RenderOutcome => ({ artifact }),
        (error: unknown): RenderOutcome => ({ error: toError(error) })
      )
    );
  }

  /**
   * Apply graphic-value rules to a unit result. A unit whose new value is a
   * graphic shows no text at all; on the final unit the graphic is displayed
   * implicitly.
   */
  inspect(result: ExecutionResult, isFinalUnit: boolean): ExecutionResult {
    if (!result.valueChanged || result.isError) return result;

    const graphic = this.unboxGraphic(result.value);
    if (graphic === undefined) return result;

    if (isFinalUnit) {
      this.display(graphic);
    }
    return { ...result, text: "" };
  }

  /**
   * Wait for pending renders and take them off the queue, in display order.
   *
   * @throws the first render failure
   */
  async drain(): Promise<GraphicArtifact[]> {
    const outcomes = await Promise.all(this.pending);
    this.pending = [];

    const artifacts: GraphicArtifact[] = [];
    for (const outcome of outcomes) {
      if ("error" in outcome) {
        throw outcome.error;
      }
      artifacts.push(outcome.artifact);
    }
    return artifacts;
  }

  /** A graphic, or a length-one array holding one */
  private unboxGraphic(value: unknown): unknown {
    const candidate = Array.isArray(value) && value.length === 1 ? value[0] : value;
    return this.options.backend.isGraphic(candidate) ? candidate : undefined;
  }
}
