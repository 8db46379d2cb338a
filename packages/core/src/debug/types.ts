/**
 * packages/core/src/debug/types.ts — Debug log type definitions.
 *
 * Why: Defines the record shape shared by the catalog, search, viewport and
 * session layers when they report what they did, and by the sinks that
 * consume those records (ring buffer queries, console output, tests).
 */

/**
 * Debug record categories.
 *
 * Categories:
 *   - catalog: Catalog construction and rebuilds
 *   - search: Filter passes and cache decisions
 *   - viewport: Redraw and highlight requests
 *   - session: State transitions and key handling
 *   - loader: Filesystem scanning and cache file IO
 *   - exec: Command launches
 */
export type DebugCategory = "catalog" | "search" | "viewport" | "session" | "loader" | "exec";

/**
 * Debug severity levels (low to high):
 *   - trace: Verbose tracing (dropped by default)
 *   - info: Informational (rebuilds, launches)
 *   - warn: Recoverable issues (cache miss fallbacks, failed refresh)
 *   - error: Operation failed
 */
export type DebugSeverity = "trace" | "info" | "warn" | "error";

/**
 * One debug record.
 */
export type DebugRecord = Readonly<{
  /** Monotonic record counter, starting at 1 */
  recordId: number;
  /** Milliseconds from the log's clock */
  timestampMs: number;
  category: DebugCategory;
  severity: DebugSeverity;
  message: string;
  /** Optional structured details */
  data?: Readonly<Record<string, unknown>>;
}>;

/**
 * Debug log configuration. All fields are optional.
 */
export type DebugLogConfig = Readonly<{
  /** Max records kept in the ring buffer (default 256) */
  ringCapacity?: number;
  /** Minimum severity to record (default "info") */
  minSeverity?: DebugSeverity;
  /** Clock used for timestamps (default Date.now) */
  now?: () => number;
}>;

/**
 * Filter for retrieving records. Unset fields don't filter.
 */
export type DebugQuery = Readonly<{
  category?: DebugCategory;
  minSeverity?: DebugSeverity;
  /** Return only the newest N matching records */
  maxRecords?: number;
}>;

export type DebugStats = Readonly<{
  /** Total records ever written */
  totalRecords: number;
  /** Records dropped due to ring overflow */
  totalDropped: number;
  warnCount: number;
  errorCount: number;
}>;

export type DebugRecordHandler = (record: DebugRecord) => void;
