/**
 * Environment configuration for the bloc runtime.
 */

import { z } from "zod";
import { ConfigError, formatIssues } from "./errors.js";
import type { LogThreshold } from "./logger.js";

export type Env = Record<string, string | undefined>;

export const BlocEnvSchema = z.object({
  BLOC_LOG_LEVEL: z
    .enum(["debug", "info", "warning", "error", "silent"])
    .default("warning"),
});

export interface BlocConfig {
  logLevel: LogThreshold;
}

/**
 * Parse `env` against `schema`, raising ConfigError with every failing
 * variable listed. Shared by the per-package config loaders.
 */
export function parseEnv<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  env: Env,
): T {
  const result = schema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration: ${formatIssues(result.error.issues)}`,
      result.error.issues,
    );
  }
  return result.data;
}

export function loadBlocConfig(env: Env = process.env): BlocConfig {
  const parsed = parseEnv(BlocEnvSchema, env);
  return { logLevel: parsed.BLOC_LOG_LEVEL };
}
