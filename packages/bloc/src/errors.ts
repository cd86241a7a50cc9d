/**
 * Error classes shared by blocs and their collaborators.
 */

import { ZodError } from "zod";
import type { ZodIssue } from "zod";

export class BlocError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BlocError";
  }
}

/**
 * Thrown when environment configuration fails validation.
 * Carries the zod issues so callers can report every bad variable.
 */
export class ConfigError extends BlocError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * What a fetch collaborator throws on network, decoding or server failure.
 */
export class FetchError extends BlocError {
  public readonly status: number | null;

  constructor(
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.status = options.status ?? null;
  }
}

/** Render zod issues as `path: message` pairs joined with "; ". */
export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Human-readable description of any thrown value. Never throws.
 *
 *   new Error("Error")        -> "Exception: Error"
 *   "timeout"                 -> "Exception: timeout"
 *   ZodError on a fetch page  -> "Exception: Invalid fetch page: items.0.name: Required"
 */
export function describeFailure(error: unknown): string {
  try {
    if (error instanceof ZodError) {
      return `Exception: Invalid fetch page: ${formatIssues(error.issues)}`;
    }
    if (error instanceof Error) {
      return `Exception: ${error.message}`;
    }
    return `Exception: ${String(error)}`;
  } catch {
    return "Exception: Unknown error";
  }
}
