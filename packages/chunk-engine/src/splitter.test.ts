import { describe, it, expect } from "vitest";
import { ParseError } from "./errors.js";
import { boundaryLines, extractLines, splitStatements, toLines } from "./splitter.js";
import type { Parser, SourceUnit, TopLevelNode } from "./types.js";

function ranges(units: SourceUnit[]): Array<[number, number]> {
  return units.map((unit): [number, number] => [unit.startLine, unit.endLine]);
}

function fakeParser(nodes: TopLevelNode[]): Parser {
  return { parse: () => nodes };
}

const SOURCES = [
  ["let a = 1", "let b = 2", "console.log(a + b)"],
  ["// setup", "", "const items = [", "  1,", "  2,", "];", "items.length"],
  ["function area(r) {", "  return r * r;", "}", "", "area(2); area(3)", "// done"],
  ["const obj = {", "  a: 1", "}; const z = 2", "z"],
];

describe("splitStatements", () => {
  it("should split one statement per line", () => {
    const units = splitStatements(["let a = 1", "let b = 2", "console.log(a + b)"]);

    expect(units).toEqual([
      { startLine: 1, endLine: 1, text: "let a = 1" },
      { startLine: 2, endLine: 2, text: "let b = 2" },
      { startLine: 3, endLine: 3, text: "console.log(a + b)" },
    ]);
  });

  it("should keep statements sharing a line in one unit", () => {
    expect(ranges(splitStatements(["let x = 1; let y = 2"]))).toEqual([[1, 1]]);
  });

  it("should not start a unit on the line a multi-line statement ends", () => {
    expect(ranges(splitStatements(["const obj = {", "  a: 1", "}; const z = 2", "z"]))).toEqual([
      [1, 3],
      [4, 4],
    ]);
  });

  it("should put leading comments in the first unit", () => {
    expect(ranges(splitStatements(["// setup", "", "let a = 1", "a"]))).toEqual([
      [1, 3],
      [4, 4],
    ]);
  });

  it("should attach blank lines to the preceding unit", () => {
    expect(ranges(splitStatements(["let a = 1", "", "let b = 2"]))).toEqual([
      [1, 2],
      [3, 3],
    ]);
  });

  it("should return a single unit for comment-only source", () => {
    expect(splitStatements(["// a", "// b"])).toEqual([{ startLine: 1, endLine: 2, text: "// a\n// b" }]);
  });

  it("should return no units for no lines", () => {
    expect(splitStatements([])).toEqual([]);
  });

  it("should start decorated nodes at their first decorator", () => {
    const parser = fakeParser([
      { startLine: 1, endLine: 1 },
      { startLine: 3, endLine: 5, decoratorLine: 2 },
    ]);

    expect(ranges(splitStatements(["a", "@dec", "class A {", "  x = 1", "}"], parser))).toEqual([
      [1, 1],
      [2, 5],
    ]);
  });

  it("should raise ParseError before anything runs", () => {
    expect(() => splitStatements(["let a = 1", "let = ;"])).toThrow(ParseError);
  });

  it("should report the line of a syntax error", () => {
    try {
      splitStatements(["let a = 1", "let = ;"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError ? error.line : undefined).toBe(2);
    }
  });

  describe("invariants", () => {
    it.each(SOURCES.map((lines): [string, string[]] => [lines.join(" | "), lines]))(
      "should partition %s",
      (_name, lines) => {
        const units = splitStatements(lines);

        expect(units[0]?.startLine).toBe(1);
        expect(units[units.length - 1]?.endLine).toBe(lines.length);
        for (const [i, unit] of units.entries()) {
          expect(unit.startLine).toBeLessThanOrEqual(unit.endLine);
          const next = units[i + 1];
          if (next) expect(next.startLine).toBe(unit.endLine + 1);
        }
      }
    );

    it.each(SOURCES.map((lines): [string, string[]] => [lines.join(" | "), lines]))(
      "should round-trip %s",
      (_name, lines) => {
        const units = splitStatements(lines);
        const joined = units.map((unit) => unit.text).join("\n");

        expect(joined).toBe(lines.join("\n"));
        expect(ranges(splitStatements(toLines(joined)))).toEqual(ranges(units));
      }
    );
  });
});

describe("boundaryLines", () => {
  it("should deduplicate boundaries on one line", () => {
    expect(
      boundaryLines([
        { startLine: 1, endLine: 1 },
        { startLine: 2, endLine: 2 },
        { startLine: 2, endLine: 2 },
      ])
    ).toEqual([1, 2]);
  });

  it("should always start at line 1", () => {
    expect(boundaryLines([])).toEqual([1]);
    expect(boundaryLines([{ startLine: 4, endLine: 4 }])).toEqual([1]);
  });
});

describe("extractLines", () => {
  it("should join an inclusive 1-based range", () => {
    expect(extractLines(["a", "b", "c"], 2, 3)).toBe("b\nc");
  });
});

describe("toLines", () => {
  it("should split strings on newlines", () => {
    expect(toLines("a\r\nb\nc")).toEqual(["a", "b", "c"]);
  });

  it("should treat the empty string as no lines", () => {
    expect(toLines("")).toEqual([]);
  });

  it("should copy line arrays", () => {
    const lines = ["a"];

    expect(toLines(lines)).not.toBe(lines);
    expect(toLines(lines)).toEqual(["a"]);
  });
});
