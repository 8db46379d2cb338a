/**
 * packages/core/src/debug/debugLog.ts — Ring-buffered debug log.
 *
 * Usage:
 *   const debug = createDebugLog({ minSeverity: "trace" });
 *   debug.subscribe(createConsoleSink());
 *   debug.info("catalog", "rebuilt", { size: 42 });
 *   const warnings = debug.query({ minSeverity: "warn" });
 */

import type {
  DebugCategory,
  DebugLogConfig,
  DebugQuery,
  DebugRecord,
  DebugRecordHandler,
  DebugSeverity,
  DebugStats,
} from "./types.js";

const DEFAULT_RING_CAPACITY = 256;

const SEVERITY_RANK: Readonly<Record<DebugSeverity, number>> = Object.freeze({
  trace: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export type DebugLog = Readonly<{
  log: (
    severity: DebugSeverity,
    category: DebugCategory,
    message: string,
    data?: Readonly<Record<string, unknown>>,
  ) => void;
  trace: (category: DebugCategory, message: string, data?: Readonly<Record<string, unknown>>) => void;
  info: (category: DebugCategory, message: string, data?: Readonly<Record<string, unknown>>) => void;
  warn: (category: DebugCategory, message: string, data?: Readonly<Record<string, unknown>>) => void;
  error: (category: DebugCategory, message: string, data?: Readonly<Record<string, unknown>>) => void;
  /** Matching records, oldest first. */
  query: (query?: DebugQuery) => readonly DebugRecord[];
  stats: () => DebugStats;
  /** Returns an unsubscribe function. */
  subscribe: (handler: DebugRecordHandler) => () => void;
  clear: () => void;
}>;

export function severityAtLeast(severity: DebugSeverity, min: DebugSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[min];
}

function normalizeCapacity(value: number | undefined): number {
  if (value === undefined) return DEFAULT_RING_CAPACITY;
  if (!Number.isInteger(value) || value <= 0) return DEFAULT_RING_CAPACITY;
  return value;
}

export function createDebugLog(config: DebugLogConfig = {}): DebugLog {
  const capacity = normalizeCapacity(config.ringCapacity);
  const minSeverity = config.minSeverity ?? "info";
  const now = config.now ?? Date.now;

  const ring: DebugRecord[] = [];
  const handlers = new Set<DebugRecordHandler>();
  let nextRecordId = 1;
  let totalDropped = 0;
  let warnCount = 0;
  let errorCount = 0;

  const log: DebugLog["log"] = (severity, category, message, data) => {
    if (!severityAtLeast(severity, minSeverity)) return;

    const record: DebugRecord = Object.freeze({
      recordId: nextRecordId++,
      timestampMs: now(),
      category,
      severity,
      message,
      ...(data === undefined ? {} : { data }),
    });

    if (severity === "warn") warnCount++;
    if (severity === "error") errorCount++;

    ring.push(record);
    if (ring.length > capacity) {
      ring.shift();
      totalDropped++;
    }

    for (const handler of handlers) {
      handler(record);
    }
  };

  const debugLog: DebugLog = {
    log,
    trace: (category, message, data) => log("trace", category, message, data),
    info: (category, message, data) => log("info", category, message, data),
    warn: (category, message, data) => log("warn", category, message, data),
    error: (category, message, data) => log("error", category, message, data),
    query: (query = {}) => {
      const matching = ring.filter((record) => {
        if (query.category !== undefined && record.category !== query.category) return false;
        if (query.minSeverity !== undefined && !severityAtLeast(record.severity, query.minSeverity)) {
          return false;
        }
        return true;
      });
      const max = query.maxRecords;
      if (max !== undefined && max >= 0 && matching.length > max) {
        return Object.freeze(matching.slice(matching.length - max));
      }
      return Object.freeze(matching);
    },
    stats: () =>
      Object.freeze({
        totalRecords: nextRecordId - 1,
        totalDropped,
        warnCount,
        errorCount,
      }),
    subscribe: (handler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    clear: () => {
      ring.length = 0;
    },
  };
  return Object.freeze(debugLog);
}

/**
 * A log that records nothing. Used when the caller supplies no debug log.
 */
export function createSilentDebugLog(): DebugLog {
  const noop = (): void => {};
  return Object.freeze({
    log: noop,
    trace: noop,
    info: noop,
    warn: noop,
    error: noop,
    query: () => Object.freeze([]),
    stats: () => Object.freeze({ totalRecords: 0, totalDropped: 0, warnCount: 0, errorCount: 0 }),
    subscribe: () => noop,
    clear: noop,
  });
}

/**
 * Sink that forwards records at or above `minSeverity` to `console.warn`,
 * prefixed with `[launchdeck][category]`.
 */
export function createConsoleSink(minSeverity: DebugSeverity = "warn"): DebugRecordHandler {
  return (record) => {
    if (!severityAtLeast(record.severity, minSeverity)) return;
    const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
    c?.warn?.(`[launchdeck][${record.category}] ${record.message}`);
  };
}
