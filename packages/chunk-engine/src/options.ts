/**
 * Chunk option validation.
 *
 * Turns the raw option bag supplied by the host into an immutable
 * ChunkOptions value before anything runs. Invalid values never raise: they
 * fall back to a default and leave a configuration diagnostic behind.
 */

import { z } from "zod";
import { createDevLogger } from "./devLog.js";
import type { ChunkOptions, Diagnostic } from "./types.js";

const log = createDevLogger("ChunkOptions");

/** Name of this engine in a per-engine `engine.path` record */
export const ENGINE_NAME = "js";

/** Options that take booleans only; numbers are coerced to true */
const NO_NUMERIC_OPTIONS = ["eval", "echo", "warning"] as const;

// true and false are accepted as capture and abort
const ErrorModeSchema = z.preprocess(
  (value) => (value === true ? "capture" : value === false ? "abort" : value),
  z.enum(["capture", "abort"])
);

export const ChunkOptionsSchema = z.object({
  label: z.string().min(1).default("unnamed-chunk"),
  eval: z.boolean().default(true),
  echo: z.boolean().default(true),
  include: z.boolean().default(true),
  warning: z.boolean().default(true),
  results: z.enum(["sequential", "hold"]).default("sequential"),
  error: ErrorModeSchema.default("abort"),
  "fig.width": z.number().positive().default(7),
  "fig.height": z.number().positive().default(5),
  dpi: z.number().positive().default(72),
  "engine.path": z.union([z.string(), z.record(z.string())]).optional(),
  dev: z.string().min(1).default("svg"),
});

export type RawChunkOptions = z.input<typeof ChunkOptionsSchema>;

export interface ValidatedChunkOptions {
  options: ChunkOptions;
  diagnostics: Diagnostic[];
}

/**
 * Validate and normalize a raw chunk option bag.
 *
 * @param raw - Options as supplied by the host document
 */
export function validateChunkOptions(raw: Record<string, unknown> = {}): ValidatedChunkOptions {
  const diagnostics: Diagnostic[] = [];
  const bag: Record<string, unknown> = { ...raw };

  const report = (message: string) => {
    log.warn(message);
    diagnostics.push({ kind: "configuration", message });
  };

  for (const option of NO_NUMERIC_OPTIONS) {
    if (typeof bag[option] === "number") {
      report(`numeric '${option}' chunk option not supported by the ${ENGINE_NAME} engine`);
      bag[option] = true;
    }
  }

  let parsed = ChunkOptionsSchema.safeParse(bag);
  if (!parsed.success) {
    const seen = new Set<string>();
    for (const issue of parsed.error.issues) {
      const key = issue.path[0];
      if (typeof key !== "string" || seen.has(key)) continue;
      seen.add(key);
      report(`invalid '${key}' chunk option (${issue.message}); using the default`);
      delete bag[key];
    }
    // Defaults always validate, so the second pass cannot fail on dropped keys
    parsed = ChunkOptionsSchema.safeParse(bag);
    if (!parsed.success) {
      throw parsed.error;
    }
  }

  const data = parsed.data;
  const enginePath = data["engine.path"];

  return {
    options: {
      label: data.label,
      eval: data.eval,
      echo: data.echo,
      include: data.include,
      warning: data.warning,
      results: data.results,
      error: data.error,
      figWidth: data["fig.width"],
      figHeight: data["fig.height"],
      dpi: data.dpi,
      enginePath: typeof enginePath === "string" ? enginePath : enginePath?.[ENGINE_NAME],
      dev: data.dev,
    },
    diagnostics,
  };
}
