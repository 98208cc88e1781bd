/**
 * Server configuration from environment variables.
 */

import { resolve } from "node:path";
import * as z from "zod/v4";
import { Err, Ok, type LogLevel, type Result } from "@depmap/core";

const EnvSchema = z.object({
  DEPMAP_DB_PATH: z.string().default(".depmap/graph.db"),
  DEPMAP_ROOT: z.string().optional(),
  DEPMAP_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  DEPMAP_MAX_DEPTH: z.coerce.number().int().min(1).max(50).default(5),
  DEPMAP_CYCLE_STEPS_PER_NODE: z.coerce.number().int().min(1).default(64),
  DEPMAP_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["debug", "info", "warn", "error", "silent"]))
    .default("info"),
});

export interface GraphConfig {
  /** Absolute, or `:memory:`. */
  dbPath: string;
  root: string;
  concurrency: number;
  maxDepth: number;
  cycleStepsPerNode: number;
  logLevel: LogLevel;
}

/**
 * Read and validate the configuration. Empty variables count as unset;
 * every invalid variable is listed in the error.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Result<GraphConfig, Error> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("DEPMAP_") && value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`);
    return Err(new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`));
  }

  const vars = parsed.data;
  const root = resolve(cwd, vars.DEPMAP_ROOT ?? ".");
  return Ok({
    dbPath: vars.DEPMAP_DB_PATH === ":memory:" ? ":memory:" : resolve(root, vars.DEPMAP_DB_PATH),
    root,
    concurrency: vars.DEPMAP_CONCURRENCY,
    maxDepth: vars.DEPMAP_MAX_DEPTH,
    cycleStepsPerNode: vars.DEPMAP_CYCLE_STEPS_PER_NODE,
    logLevel: vars.DEPMAP_LOG_LEVEL,
  });
}
