import { z } from "zod";
import { parseEnv } from "@trending/bloc";
import type { Env } from "@trending/bloc";

export const FilterEnvSchema = z.object({
  REPOSITORY_RESET_FILTER_ON_FETCH: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export const PagingEnvSchema = z.object({
  REPOSITORY_PAGE_SIZE: z.coerce.number().int().positive().default(20),
});

export const RepositoryEnvSchema = FilterEnvSchema.merge(PagingEnvSchema);

export interface FilterConfig {
  /** Whether a fresh fetch clears the active category filter */
  resetFilterOnFetch: boolean;
}

export interface PagingConfig {
  /** Page size of the in-memory fetcher */
  pageSize: number;
}

export type RepositoryConfig = FilterConfig & PagingConfig;

/** Read by RepositoryBloc; ignores the paging variables. */
export function loadFilterConfig(env: Env = process.env): FilterConfig {
  const parsed = parseEnv(FilterEnvSchema, env);
  return { resetFilterOnFetch: parsed.REPOSITORY_RESET_FILTER_ON_FETCH };
}

/** Read by the in-memory fetcher; ignores the filter variables. */
export function loadPagingConfig(env: Env = process.env): PagingConfig {
  const parsed = parseEnv(PagingEnvSchema, env);
  return { pageSize: parsed.REPOSITORY_PAGE_SIZE };
}

export function loadRepositoryConfig(
  env: Env = process.env,
): RepositoryConfig {
  const parsed = parseEnv(RepositoryEnvSchema, env);
  return {
    resetFilterOnFetch: parsed.REPOSITORY_RESET_FILTER_ON_FETCH,
    pageSize: parsed.REPOSITORY_PAGE_SIZE,
  };
}
