/**
 * Statement Splitter
 *
 * Splits chunk source into the smallest line ranges that can run on their
 * own, one per top-level statement. Ranges are contiguous: together they
 * cover every line of the chunk exactly once.
 */

import { AcornParser } from "./parser.js";
import type { Parser, SourceUnit, TopLevelNode } from "./types.js";

const defaultParser = new AcornParser();

/**
 * Split source lines into ordered, non-overlapping units.
 *
 * @param lines - Chunk source, one entry per line
 * @param parser - Parser used to locate top-level nodes
 * @throws ParseError when the source does not parse
 */
export function splitStatements(lines: readonly string[], parser: Parser = defaultParser): SourceUnit[] {
  const n = lines.length;
  if (n === 0) return [];

  const nodes = parser.parse(lines.join("\n"));
  const starts = boundaryLines(nodes);

  return starts.map((startLine, i) => {
    const next = starts[i + 1];
    const endLine = next === undefined ? n : next - 1;
    return { startLine, endLine, text: extractLines(lines, startLine, endLine) };
  });
}

/**
 * Compute unit start lines from top-level nodes.
 *
 * Line 1 always starts a unit, and the first node belongs to it along with
 * any lines before it. Several statements on one line share a single
 * boundary, and a statement that starts on the line where the previous one
 * ends stays in the previous unit.
 */
export function boundaryLines(nodes: readonly TopLevelNode[]): number[] {
  const starts = [1];
  let previousEnd = 0;

  for (const [i, node] of nodes.entries()) {
    const line = node.decoratorLine ?? node.startLine;
    const last = starts[starts.length - 1] ?? 1;
    if (i > 0 && line > last && line > previousEnd) {
      starts.push(line);
    }
    previousEnd = Math.max(previousEnd, node.endLine);
  }

  return starts;
}

/**
 * Join lines `from`..`to` (1-based, inclusive).
 */
export function extractLines(lines: readonly string[], from: number, to: number): string {
  return lines.slice(from - 1, to).join("\n");
}

/**
 * Normalize chunk code to lines. Strings are split on newlines; arrays are
 * taken as already split.
 */
export function toLines(code: string | readonly string[]): string[] {
  if (typeof code !== "string") return [...code];
  if (code === "") return [];
  return code.split(/\r?\n/);
}
