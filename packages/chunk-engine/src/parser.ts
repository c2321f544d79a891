/**
 * Acorn front end for the statement splitter.
 *
 * Reports the line span of every top-level node of a chunk. Units are later
 * re-parsed by the transformer, so both use the same acorn options.
 */

import * as acorn from "acorn";
import { ParseError } from "./errors.js";
import type { Parser, TopLevelNode } from "./types.js";

export const PARSE_OPTIONS: acorn.Options = {
  ecmaVersion: "latest",
  sourceType: "module",
  allowAwaitOutsideFunction: true,
  locations: true,
};

interface LocatedNode {
  loc?: acorn.SourceLocation | null;
}

function hasDecorators(node: object): node is { decorators: LocatedNode[] } {
  return "decorators" in node && Array.isArray(node.decorators) && node.decorators.length > 0;
}

function startLineOf(node: LocatedNode): number | undefined {
  return node.loc?.start.line;
}

/**
 * Parse source with acorn, converting syntax errors to ParseError.
 */
export function parseProgram(source: string): acorn.Program {
  try {
    return acorn.parse(source, PARSE_OPTIONS);
  } catch (error) {
    if (error instanceof SyntaxError) {
      const loc = "loc" in error && isPosition(error.loc) ? error.loc : undefined;
      throw new ParseError(error.message, loc?.line, loc?.column, { cause: error });
    }
    throw error;
  }
}

function isPosition(value: unknown): value is acorn.Position {
  return (
    typeof value === "object" &&
    value !== null &&
    "line" in value &&
    typeof value.line === "number" &&
    "column" in value &&
    typeof value.column === "number"
  );
}

export class AcornParser implements Parser {
  parse(source: string): TopLevelNode[] {
    const program = parseProgram(source);

    return program.body.map((node) => {
      const startLine = node.loc?.start.line ?? 1;
      const endLine = node.loc?.end.line ?? startLine;
      // Proposal-stage decorators only appear when an acorn plugin adds them
      const decoratorLine = hasDecorators(node) ? startLineOf(node.decorators[0] ?? {}) : undefined;
      return decoratorLine === undefined
        ? { startLine, endLine }
        : { startLine, endLine, decoratorLine };
    });
  }
}
