/**
 * packages/core/src/errors.ts — Launcher error codes and error class.
 *
 * Why: Every violation the core reports by throwing goes through one error class
 * with a deterministic `code`, so callers and tests can branch on the code
 * instead of matching message text. Expected negative outcomes (a rejected
 * query, a failed refresh) are result values and never use this class.
 */

/**
 * Deterministic error codes surfaced as LaunchError instances.
 */
export type LaunchErrorCode =
  | "LAUNCH_INVALID_CONFIG"
  | "LAUNCH_INVALID_ITEM"
  | "LAUNCH_INVALID_STATE"
  | "LAUNCH_CACHE_DESYNC"
  | "LAUNCH_REBUILD_FAILED";

/**
 * Error class for all deterministic launcher violations.
 * The `code` property identifies the specific violation.
 */
export class LaunchError extends Error {
  override readonly name = "LaunchError";
  readonly code: LaunchErrorCode;

  constructor(code: LaunchErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LaunchError);
    }
  }
}

export function isLaunchError(value: unknown): value is LaunchError {
  return value instanceof LaunchError;
}

/** Render any thrown value as a single-line detail string. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
