import { describe, it, expect } from "vitest";
import { createConsoleCapture } from "./console-capture.js";
import { ParseError } from "./errors.js";
import { executeUnit, isValidIdentifier, TimeoutError, type ExecutionHelpers } from "./executor.js";

function createTestHelpers(overrides: Partial<ExecutionHelpers> = {}): ExecutionHelpers {
  return {
    console: createConsoleCapture(),
    importModule: async () => {
      throw new Error("importModule not implemented in test");
    },
    ...overrides,
  };
}

describe("executeUnit", () => {
  describe("basic execution", () => {
    it("should return a trailing expression in single mode", async () => {
      const result = await executeUnit("1 + 2", "single", {}, new Set(), createTestHelpers());

      expect(result.success).toBe(true);
      expect(result.returnsValue).toBe(true);
      expect(result.result).toBe(3);
    });

    it("should not return a value in exec mode", async () => {
      const result = await executeUnit("1 + 2", "exec", {}, new Set(), createTestHelpers());

      expect(result.success).toBe(true);
      expect(result.returnsValue).toBe(false);
      expect(result.result).toBeUndefined();
    });

    it("should persist declarations to scope", async () => {
      const scope: Record<string, unknown> = {};

      const result = await executeUnit("const x = 1; const y = 2;", "exec", scope, new Set(), createTestHelpers());

      expect(result.success).toBe(true);
      expect(scope).toEqual({ x: 1, y: 2 });
      expect(result.constNames).toEqual(["x", "y"]);
    });

    it("should handle top-level await", async () => {
      const scope: Record<string, unknown> = {};
      const helpers = createTestHelpers();

      const result = await executeUnit(
        "const p = await Promise.resolve(42); console.log(p);",
        "exec",
        scope,
        new Set(),
        helpers
      );

      expect(result.success).toBe(true);
      expect(scope["p"]).toBe(42);
      expect(result.output[0]?.args).toEqual([42]);
    });
  });

  describe("scope persistence", () => {
    it("should sync reassigned mutable bindings back to scope", async () => {
      const scope: Record<string, unknown> = { counter: 1 };

      const result = await executeUnit("counter = counter + 1", "single", scope, new Set(["counter"]), createTestHelpers());

      expect(result.success).toBe(true);
      expect(result.returnsValue).toBe(false);
      expect(scope["counter"]).toBe(2);
    });

    it("should reject reassignment of const bindings", async () => {
      const scope: Record<string, unknown> = { fixed: 1 };

      const result = await executeUnit("fixed = 2", "exec", scope, new Set(), createTestHelpers());

      expect(result.success).toBe(false);
      expect(result.error?.name).toBe("TypeError");
      expect(scope["fixed"]).toBe(1);
    });

    it("should allow a unit to redeclare a scoped name", async () => {
      const scope: Record<string, unknown> = { a: 1 };

      const result = await executeUnit("const a = 5;", "exec", scope, new Set(), createTestHelpers());

      expect(result.success).toBe(true);
      expect(scope["a"]).toBe(5);
    });

    it("should make functions from earlier units callable", async () => {
      const scope: Record<string, unknown> = {};
      const mutableKeys = new Set<string>();

      const first = await executeUnit("function double(n) { return n * 2; }", "single", scope, mutableKeys, createTestHelpers());
      for (const name of first.mutableNames) mutableKeys.add(name);
      const second = await executeUnit("double(21)", "single", scope, mutableKeys, createTestHelpers());

      expect(second.result).toBe(42);
    });

    it("should expose globals", async () => {
      const result = await executeUnit("answer", "single", {}, new Set(), createTestHelpers({ globals: { answer: 42 } }));

      expect(result.result).toBe(42);
    });
  });

  describe("imports", () => {
    it("should bind imported names through importModule", async () => {
      const scope: Record<string, unknown> = {};
      const requested: string[] = [];
      const helpers = createTestHelpers({
        importModule: async (specifier) => {
          requested.push(specifier);
          return { default: 7, named: "value" };
        },
      });

      const result = await executeUnit('import seven, { named } from "pkg";', "exec", scope, new Set(), helpers);

      expect(result.success).toBe(true);
      expect(requested).toEqual(["pkg"]);
      expect(scope).toEqual({ seven: 7, named: "value" });
    });
  });

  describe("failures", () => {
    it("should keep console output written before a throw", async () => {
      const result = await executeUnit(
        'console.log("before"); throw new Error("boom");',
        "exec",
        {},
        new Set(),
        createTestHelpers()
      );

      expect(result.success).toBe(false);
      expect(result.error?.message).toBe("boom");
      expect(result.output.map((entry) => entry.args)).toEqual([["before"]]);
    });

    it("should report syntax errors as ParseError", async () => {
      const result = await executeUnit("let = ;", "exec", {}, new Set(), createTestHelpers());

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(ParseError);
    });

    it("should time out long-running units", async () => {
      const result = await executeUnit("await new Promise(() => {});", "exec", {}, new Set(), createTestHelpers(), {
        timeout: 20,
      });

      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(TimeoutError);
    });
  });
});

describe("isValidIdentifier", () => {
  it("should accept identifiers", () => {
    expect(isValidIdentifier("foo")).toBe(true);
    expect(isValidIdentifier("$x")).toBe(true);
    expect(isValidIdentifier("_private")).toBe(true);
  });

  it("should reject reserved words and other strings", () => {
    expect(isValidIdentifier("class")).toBe(false);
    expect(isValidIdentifier("1a")).toBe(false);
    expect(isValidIdentifier("a; x")).toBe(false);
    expect(isValidIdentifier("")).toBe(false);
  });
});
