/**
 * Engine configuration.
 *
 * Process-level settings read from the environment:
 *   - CHUNKWEAVE_IN_BUILD      "1"/"true" when running inside a full document build
 *   - CHUNKWEAVE_FIG_DIR       directory figures are written under (default: "figures")
 *   - CHUNKWEAVE_ENGINE_PATH   interpreter used when a chunk requests none (default: "node")
 *   - CHUNKWEAVE_TIMEOUT       per-unit timeout in milliseconds (default: 0, none)
 *
 * Values passed to the engine constructor take precedence.
 */

import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_ENGINE_PATH } from "./interpreter.js";
import type { ChunkOptions } from "./types.js";

const BooleanFlagSchema = z
  .enum(["1", "0", "true", "false", "yes", "no"])
  .transform((value) => value === "1" || value === "true" || value === "yes");

const EnvSchema = z.object({
  CHUNKWEAVE_IN_BUILD: BooleanFlagSchema.default("false"),
  CHUNKWEAVE_FIG_DIR: z.string().min(1).default("figures"),
  CHUNKWEAVE_ENGINE_PATH: z.string().min(1).default(DEFAULT_ENGINE_PATH),
  CHUNKWEAVE_TIMEOUT: z.coerce.number().int().nonnegative().default(0),
});

export interface EngineConfig {
  /** Inside a full document build, failures abort unless a chunk asks for capture */
  inDocumentBuild: boolean;
  figureDir: string;
  enginePath: string;
  /** Per-unit timeout in milliseconds (0 = no timeout) */
  timeout: number;
}

/**
 * Read engine configuration from environment variables.
 *
 * @throws ConfigError when a variable is set to an invalid value
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse({
    CHUNKWEAVE_IN_BUILD: env["CHUNKWEAVE_IN_BUILD"]?.toLowerCase(),
    CHUNKWEAVE_FIG_DIR: env["CHUNKWEAVE_FIG_DIR"],
    CHUNKWEAVE_ENGINE_PATH: env["CHUNKWEAVE_ENGINE_PATH"],
    CHUNKWEAVE_TIMEOUT: env["CHUNKWEAVE_TIMEOUT"],
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid engine configuration: ${details}`, { cause: parsed.error });
  }

  return {
    inDocumentBuild: parsed.data.CHUNKWEAVE_IN_BUILD,
    figureDir: parsed.data.CHUNKWEAVE_FIG_DIR,
    enginePath: parsed.data.CHUNKWEAVE_ENGINE_PATH,
    timeout: parsed.data.CHUNKWEAVE_TIMEOUT,
  };
}

/**
 * Default figure path: `<figureDir>/<label>-<n>.<dev>`, with the label
 * reduced to characters safe in file names.
 */
export function defaultFigurePath(figureDir: string): (options: ChunkOptions, number: number) => string {
  return (options, number) => {
    const label = options.label.replace(/[^A-Za-z0-9_-]+/g, "-");
    return path.join(figureDir, `${label}-${number}.${options.dev}`);
  };
}
