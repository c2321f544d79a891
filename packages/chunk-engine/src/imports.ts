/**
 * Dynamic Import Helpers
 *
 * Resolves module specifiers written in units and imports them with Node's
 * loader.
 */

import * as path from "node:path";
import { pathToFileURL } from "node:url";

export interface ImportModuleOptions {
  /** Directory relative specifiers resolve against (default: process.cwd()) */
  baseDir?: string;
  /** Custom import function for testing */
  importFn?: (url: string) => Promise<unknown>;
}

/**
 * Check if a specifier is relative to the document ('./', '../' or '/').
 */
export function isPathSpecifier(specifier: string): boolean {
  return (
    specifier.startsWith("./") ||
    specifier.startsWith("../") ||
    specifier.startsWith("/") ||
    path.isAbsolute(specifier)
  );
}

/**
 * Resolve a specifier to an importable URL or bare name.
 *
 * - Relative and absolute paths become file: URLs
 * - Bare specifiers ("zod", "node:fs") are left for Node to resolve
 */
export function resolveSpecifier(specifier: string, baseDir: string = process.cwd()): string {
  if (isPathSpecifier(specifier)) {
    return pathToFileURL(path.resolve(baseDir, specifier)).href;
  }
  return specifier;
}

/**
 * Import a module dynamically.
 */
export async function importModule(
  specifier: string,
  options: ImportModuleOptions = {}
): Promise<unknown> {
  const { baseDir, importFn } = options;
  const url = resolveSpecifier(specifier, baseDir);

  if (importFn) {
    return importFn(url);
  }

  return import(url);
}

/**
 * Create a bound importModule function with preset options.
 */
export function createImportModule(
  options: ImportModuleOptions = {}
): (specifier: string) => Promise<unknown> {
  return (specifier: string) => importModule(specifier, options);
}
