/**
 * Unit Transformer
 *
 * Uses acorn to parse a unit and rewrite it so that it can run inside an
 * async function while its top-level declarations persist in the session
 * scope.
 *
 * Also transforms:
 * - Import declarations → dynamic imports
 * - A trailing bare expression (single mode) → the function's return value
 */

import type * as acorn from "acorn";
import { parseProgram } from "./parser.js";
import type { CompileMode } from "./types.js";

export const SCOPE_PARAM = "__scope__";

/** Result of transforming unit code */
export interface TransformResult {
  code: string;
  /** Names declared with const (immutable binding) */
  constNames: string[];
  /** Names declared with let/var/function/class (mutable binding) */
  mutableNames: string[];
  /** Whether the code returns the value of a trailing expression */
  returnsValue: boolean;
}

/** Transformation operation to apply */
interface Transformation {
  start: number;
  end: number;
  text: string;
}

/**
 * Transform unit code to hoist top-level declarations to the session scope.
 *
 * Transformations:
 * - `const x = 1` → `const x = 1; __scope__.x = x;`
 * - `let y = 2;` → `let y = 2; __scope__.y = y;` (tracked as mutable)
 * - `function foo() {}` → `function foo() {} __scope__.foo = foo;`
 * - `class Bar {}` → `class Bar {} __scope__.Bar = Bar;`
 * - `import x from 'mod'` → `const { default: x } = await __importModule__('mod'); __scope__.x = x;`
 * - in single mode, a trailing `a + b` → `return (a + b);`
 *
 * Nested declarations (in loops, blocks, functions) are NOT transformed.
 *
 * @throws ParseError when the unit does not parse
 */
export function transformUnit(code: string, mode: CompileMode = "exec"): TransformResult {
  const ast = parseProgram(code);

  const constNames: string[] = [];
  const mutableNames: string[] = [];
  const transformations: Transformation[] = [];

  for (const node of ast.body) {
    switch (node.type) {
      case "VariableDeclaration": {
        const names = extractBindingNames(node);
        if (node.kind === "const") {
          constNames.push(...names);
        } else {
          mutableNames.push(...names);
        }
        transformations.push({
          start: node.start,
          end: node.end,
          text: withAssignments(code.slice(node.start, node.end), names),
        });
        break;
      }

      case "FunctionDeclaration":
      case "ClassDeclaration": {
        // Functions and classes can be redefined by later units
        const name = node.id.name;
        mutableNames.push(name);
        transformations.push({
          start: node.start,
          end: node.end,
          text: `${code.slice(node.start, node.end)} ${SCOPE_PARAM}.${name} = ${name};`,
        });
        break;
      }

      case "ImportDeclaration": {
        const transformed = transformImportDeclaration(node);
        constNames.push(...transformed.names);
        transformations.push({ start: node.start, end: node.end, text: transformed.code });
        break;
      }
    }
  }

  const last = ast.body[ast.body.length - 1];
  let returnsValue = false;
  if (mode === "single" && last?.type === "ExpressionStatement" && isDisplayable(last.expression)) {
    returnsValue = true;
    transformations.push({
      start: last.start,
      end: last.end,
      text: `return (${code.slice(last.expression.start, last.expression.end)});`,
    });
  }

  if (transformations.length === 0) {
    return { code, constNames, mutableNames, returnsValue };
  }

  transformations.sort((a, b) => a.start - b.start);

  const segments: string[] = [];
  let lastIndex = 0;

  for (const t of transformations) {
    if (t.start > lastIndex) {
      segments.push(code.slice(lastIndex, t.start));
    }
    segments.push(t.text);
    lastIndex = t.end;
  }

  if (lastIndex < code.length) {
    segments.push(code.slice(lastIndex));
  }

  return { code: segments.join(""), constNames, mutableNames, returnsValue };
}

/**
 * Assignments and updates read as statements: `x = 1` shows nothing.
 */
function isDisplayable(expression: acorn.Expression): boolean {
  return expression.type !== "AssignmentExpression" && expression.type !== "UpdateExpression";
}

function withAssignments(declaration: string, names: string[]): string {
  const assignments = names.map((n) => `${SCOPE_PARAM}.${n} = ${n};`).join(" ");
  if (!assignments) return declaration;
  // A declaration without a semicolon cannot be followed by more code on its line
  const terminated = declaration.trimEnd().endsWith(";") ? declaration : `${declaration};`;
  return `${terminated} ${assignments}`;
}

/**
 * Transform an import declaration to a dynamic import.
 */
function transformImportDeclaration(node: acorn.ImportDeclaration): { code: string; names: string[] } {
  const source = JSON.stringify(node.source.value);
  const names: string[] = [];

  if (node.specifiers.length === 0) {
    // import 'mod' - side effect only
    return { code: `await __importModule__(${source});`, names: [] };
  }

  const parts: string[] = [];
  let namespaceName: string | undefined;

  for (const specifier of node.specifiers) {
    const local = specifier.local.name;
    names.push(local);
    if (specifier.type === "ImportDefaultSpecifier") {
      parts.push(`default: ${local}`);
    } else if (specifier.type === "ImportSpecifier") {
      const imported = nameOf(specifier.imported);
      parts.push(imported === local ? local : `${JSON.stringify(imported)}: ${local}`);
    } else {
      namespaceName = local;
    }
  }

  const assignments = names.map((n) => `${SCOPE_PARAM}.${n} = ${n};`).join(" ");
  if (namespaceName !== undefined) {
    // import d, * as ns from 'mod'
    const defaults = parts.length > 0 ? ` const { ${parts.join(", ")} } = ${namespaceName};` : "";
    return {
      code: `const ${namespaceName} = await __importModule__(${source});${defaults} ${assignments}`,
      names,
    };
  }

  return {
    code: `const { ${parts.join(", ")} } = await __importModule__(${source}); ${assignments}`,
    names,
  };
}

function nameOf(node: acorn.Identifier | acorn.Literal): string {
  return node.type === "Identifier" ? node.name : String(node.value);
}

/**
 * Extract all binding names from a variable declaration.
 */
function extractBindingNames(node: acorn.VariableDeclaration): string[] {
  const names: string[] = [];
  for (const decl of node.declarations) {
    extractFromPattern(decl.id, names);
  }
  return names;
}

/**
 * Recursively extract variable names from a binding pattern.
 */
function extractFromPattern(pattern: acorn.Pattern, names: string[]): void {
  switch (pattern.type) {
    case "Identifier":
      names.push(pattern.name);
      break;

    case "ObjectPattern":
      for (const prop of pattern.properties) {
        if (prop.type === "RestElement") {
          extractFromPattern(prop.argument, names);
        } else {
          extractFromPattern(prop.value, names);
        }
      }
      break;

    case "ArrayPattern":
      for (const elem of pattern.elements) {
        if (elem) {
          extractFromPattern(elem, names);
        }
      }
      break;

    case "RestElement":
      extractFromPattern(pattern.argument, names);
      break;

    case "AssignmentPattern":
      extractFromPattern(pattern.left, names);
      break;
  }
}
