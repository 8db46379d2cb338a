/**
 * packages/core/src/debug/index.ts — Debug log public exports.
 *
 * @example
 * ```ts
 * import { createDebugLog, type DebugLog } from "@launchdeck/core";
 * ```
 */

export type {
  DebugCategory,
  DebugLogConfig,
  DebugQuery,
  DebugRecord,
  DebugRecordHandler,
  DebugSeverity,
  DebugStats,
} from "./types.js";

export {
  type DebugLog,
  createConsoleSink,
  createDebugLog,
  createSilentDebugLog,
  severityAtLeast,
} from "./debugLog.js";
