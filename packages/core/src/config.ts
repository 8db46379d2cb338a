import { LaunchError } from "./errors.js";

/** Rows shown when no window size is configured. */
export const DEFAULT_WINDOW_SIZE = 10;

/** Upper bound for configured row counts. */
export const MAX_WINDOW_SIZE = 500;

function invalidConfig(detail: string): never {
  throw new LaunchError("LAUNCH_INVALID_CONFIG", detail);
}

/**
 * Validate the only configuration value the core consumes.
 *
 * @throws LaunchError("LAUNCH_INVALID_CONFIG") unless `value` is undefined or
 * an integer in 1..MAX_WINDOW_SIZE.
 */
export function resolveWindowSize(value: unknown): number {
  if (value === undefined) return DEFAULT_WINDOW_SIZE;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    invalidConfig(`windowSize must be an integer, got ${String(value)}`);
  }
  if (value < 1 || value > MAX_WINDOW_SIZE) {
    invalidConfig(`windowSize must be between 1 and ${MAX_WINDOW_SIZE}, got ${value}`);
  }
  return value;
}
