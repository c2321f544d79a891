import { describe, it, expect } from "vitest";
import {
  createConsoleCapture,
  formatConsoleArg,
  formatConsoleEntry,
  formatConsoleOutput,
} from "./console-capture.js";

describe("createConsoleCapture", () => {
  it("should capture console.log calls", () => {
    const capture = createConsoleCapture();

    capture.proxy.log("hello", "world");

    const output = capture.getOutput();
    expect(output).toHaveLength(1);
    expect(output[0]?.level).toBe("log");
    expect(output[0]?.args).toEqual(["hello", "world"]);
    expect(typeof output[0]?.timestamp).toBe("number");
  });

  it("should capture each level", () => {
    const capture = createConsoleCapture();

    capture.proxy.warn("w");
    capture.proxy.error("e", { code: 500 });
    capture.proxy.info("i");
    capture.proxy.debug("d");

    expect(capture.getOutput().map((entry) => entry.level)).toEqual(["warn", "error", "info", "debug"]);
    expect(capture.getOutput()[1]?.args).toEqual(["e", { code: 500 }]);
  });

  it("should indent grouped output", () => {
    const capture = createConsoleCapture();

    capture.proxy.group("outer");
    capture.proxy.log("inner");
    capture.proxy.groupEnd();
    capture.proxy.log("after");

    expect(capture.getOutput().map((entry) => entry.args)).toEqual([["outer"], ["  inner"], ["after"]]);
  });

  it("should indent nested groups by two spaces per level", () => {
    const capture = createConsoleCapture();

    capture.proxy.group("outer");
    capture.proxy.group("inner");
    capture.proxy.log("x", 1);

    expect(formatConsoleOutput(capture.getOutput())).toBe("outer\n  inner\n    x 1\n");
  });

  it("should count per label", () => {
    const capture = createConsoleCapture();

    capture.proxy.count();
    capture.proxy.count();
    capture.proxy.count("other");
    capture.proxy.countReset();
    capture.proxy.count();

    expect(capture.getOutput().map((entry) => entry.args[0])).toEqual([
      "default: 1",
      "default: 2",
      "other: 1",
      "default: 1",
    ]);
  });

  it("should report failed assertions only", () => {
    const capture = createConsoleCapture();

    capture.proxy.assert(true, "fine");
    capture.proxy.assert(false, "bad");

    expect(capture.getOutput()).toHaveLength(1);
    expect(formatConsoleOutput(capture.getOutput())).toBe("[ERROR] Assertion failed: bad\n");
  });

  it("should pick table columns", () => {
    const capture = createConsoleCapture();

    capture.proxy.table([{ a: 1, b: 2 }], ["a"]);

    expect(capture.getOutput()[0]?.args).toEqual([[{ a: 1 }]]);
  });

  it("should warn about unknown timers", () => {
    const capture = createConsoleCapture();

    capture.proxy.timeEnd("missing");

    expect(formatConsoleOutput(capture.getOutput())).toBe("[WARN] Timer 'missing' does not exist\n");
  });

  it("should warn about timers started twice", () => {
    const capture = createConsoleCapture();

    capture.proxy.time("t");
    capture.proxy.time("t");

    expect(formatConsoleOutput(capture.getOutput())).toBe("[WARN] Timer 't' already exists\n");
  });

  it("should clear captured output", () => {
    const capture = createConsoleCapture();

    capture.proxy.log("one");
    capture.clear();

    expect(capture.getOutput()).toEqual([]);
  });
});

describe("formatConsoleArg", () => {
  it("should leave strings unquoted", () => {
    expect(formatConsoleArg("plain")).toBe("plain");
  });

  it("should show objects as indented JSON", () => {
    expect(formatConsoleArg({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it("should mark circular references", () => {
    const node: Record<string, unknown> = {};
    node["self"] = node;

    expect(formatConsoleArg(node)).toBe('{\n  "self": "[Circular]"\n}');
  });

  it("should show an object reached twice in full", () => {
    const point = { x: 1 };

    expect(formatConsoleArg({ a: point, b: point })).toBe(
      '{\n  "a": {\n    "x": 1\n  },\n  "b": {\n    "x": 1\n  }\n}'
    );
  });

  it("should show Map entries as an object and Set members as an array", () => {
    expect(formatConsoleArg(new Map([[1, 2]]))).toBe('{\n  "1": 2\n}');
    expect(formatConsoleArg(new Set([1, "a"]))).toBe('[\n  1,\n  "a"\n]');
  });

  it("should format functions, bigints and primitives", () => {
    function area() {
      return 0;
    }

    expect(formatConsoleArg(area)).toBe("[Function: area]");
    expect(formatConsoleArg(10n)).toBe("10n");
    expect(formatConsoleArg(undefined)).toBe("undefined");
    expect(formatConsoleArg(3)).toBe("3");
  });
});

describe("formatConsoleOutput", () => {
  it("should prefix levels other than log", () => {
    expect(formatConsoleEntry({ level: "warn", args: ["careful"], timestamp: 0 })).toBe("[WARN] careful");
    expect(formatConsoleEntry({ level: "log", args: [1, "two"], timestamp: 0 })).toBe("1 two");
  });

  it("should end every entry with a newline", () => {
    const text = formatConsoleOutput([
      { level: "log", args: ["a"], timestamp: 0 },
      { level: "info", args: ["b"], timestamp: 0 },
    ]);

    expect(text).toBe("a\n[INFO] b\n");
  });

  it("should produce no text without entries", () => {
    expect(formatConsoleOutput([])).toBe("");
  });
});
