/**
 * Output Multiplexer
 *
 * Folds per-unit results into the ordered item list a reader of a live
 * session would see: source echoed up to the unit that produced output,
 * then that output. In hold mode the echo is deferred to one block for the
 * whole chunk and output follows it, with adjacent text merged.
 */

import { extractLines } from "./splitter.js";
import type { ChunkOptions, ExecutionResult, GraphicArtifact, OutputItem, SourceUnit } from "./types.js";

export class OutputMultiplexer {
  /** Next line not yet echoed (1-based) */
  private pendingSourceIndex = 1;
  private readonly items: OutputItem[] = [];
  private readonly held: OutputItem[] = [];

  constructor(
    private readonly lines: readonly string[],
    private readonly options: ChunkOptions
  ) {}

  private get holding(): boolean {
    return this.options.results === "hold";
  }

  /**
   * Record one unit's output.
   *
   * @returns true when the chunk must stop here
   */
  accept(unit: SourceUnit, result: ExecutionResult, graphics: readonly GraphicArtifact[]): boolean {
    const hasText = result.text !== "";
    if (!hasText && !result.isError && graphics.length === 0) {
      return false;
    }

    if (this.options.echo && !this.holding) {
      this.items.push({
        type: "source",
        text: extractLines(this.lines, this.pendingSourceIndex, unit.endLine),
      });
    }
    this.pendingSourceIndex = unit.endLine + 1;

    if (this.options.include) {
      const target = this.holding ? this.held : this.items;
      if (hasText) {
        target.push({ type: "text", text: result.text });
      }
      for (const artifact of graphics) {
        target.push({ type: "graphic", artifact });
      }
      if (result.isError) {
        target.push({ type: "error", message: result.error ?? "Error" });
      }
    }

    return this.options.error === "abort" && result.isError;
  }

  /**
   * Produce the final item list.
   *
   * @param bailedOut - Whether processing stopped at a failing unit
   */
  finish(bailedOut: boolean): OutputItem[] {
    const items = [...this.items];
    const n = this.lines.length;

    if (!bailedOut && this.options.echo && !this.holding && this.pendingSourceIndex <= n) {
      items.push({ type: "source", text: extractLines(this.lines, this.pendingSourceIndex, n) });
    }

    if (this.holding) {
      items.push({ type: "source", text: this.lines.join("\n") });
      items.push(...mergeText(this.held));
    }

    return items;
  }
}

/**
 * Merge runs of consecutive text items, keeping everything else in place.
 */
export function mergeText(items: readonly OutputItem[]): OutputItem[] {
  const merged: OutputItem[] = [];
  let text: string[] = [];

  for (const item of items) {
    if (item.type === "text") {
      text.push(item.text);
      continue;
    }
    if (text.length > 0) {
      merged.push({ type: "text", text: text.join("") });
      text = [];
    }
    merged.push(item);
  }

  if (text.length > 0) {
    merged.push({ type: "text", text: text.join("") });
  }

  return merged;
}
