/**
 * packages/core/src/search/filterEngine.ts — Memoized incremental substring filter.
 *
 * Why: Each keystroke appends exactly one character to the accepted query, so
 * the matches for the new query are a subset of the matches for the previous
 * one. The engine caches every accepted result and reuses the previous
 * query's result as the search space of the next scan; queries with no match
 * are remembered too, so repeating a dead-end keystroke costs one lookup.
 *
 * Match offsets live in a table local to one scan. Nothing is written to the
 * items, so results never depend on an earlier pass.
 */

import type { Catalog } from "../catalog/catalog.js";
import { compareStrings } from "../catalog/catalog.js";
import type { Item } from "../catalog/item.js";
import type { DebugLog } from "../debug/debugLog.js";
import { createSilentDebugLog } from "../debug/debugLog.js";

export type FilterResult =
  | Readonly<{
      kind: "accepted";
      items: readonly Item[];
      /** "cache" when no scan ran */
      source: "cache" | "scan";
      /** Candidates tested by this call (0 for cache hits) */
      scanned: number;
    }>
  | Readonly<{
      kind: "rejected";
      source: "negative-cache" | "scan";
      scanned: number;
    }>;

export type FilterStats = Readonly<{
  /** Positive cache hits */
  hits: number;
  /** Negative cache hits */
  negativeHits: number;
  /** Scans performed */
  scans: number;
  /** Candidates tested across all scans */
  scannedItems: number;
}>;

export type FilterEngine = Readonly<{
  filter: (query: string, previousQuery: string) => FilterResult;
  /** True when `query` has a positive cache entry. */
  has: (query: string) => boolean;
  /** True when `query` is known to match nothing. */
  isRejected: (query: string) => boolean;
  /** Drop both caches and re-seed "" from the current catalog order. */
  clear: () => void;
  /** Cached queries in insertion order (includes ""). */
  cachedQueries: () => readonly string[];
  stats: () => FilterStats;
  /** Stop following catalog rebuilds. */
  dispose: () => void;
}>;

export type FilterEngineOptions = Readonly<{
  debug?: DebugLog;
}>;

type Match = Readonly<{ item: Item; offset: number }>;

function compareMatches(a: Match, b: Match): number {
  const byOffset = a.offset - b.offset;
  if (byOffset !== 0) return byOffset;
  return compareStrings(a.item.matchKey, b.item.matchKey);
}

/**
 * Scan `candidates` for `query` and return the sorted matches.
 * Exported for equivalence checks against the cached path.
 */
export function scanItems(candidates: readonly Item[], query: string): readonly Item[] {
  const matches: Match[] = [];
  for (const item of candidates) {
    const offset = item.matchKey.indexOf(query);
    if (offset < 0) continue;
    matches.push({ item, offset });
  }
  matches.sort(compareMatches);
  return Object.freeze(matches.map((m) => m.item));
}

export function createFilterEngine(
  catalog: Catalog,
  options: FilterEngineOptions = {},
): FilterEngine {
  const debug = options.debug ?? createSilentDebugLog();
  const positive = new Map<string, readonly Item[]>();
  const negative = new Set<string>();

  let hits = 0;
  let negativeHits = 0;
  let scans = 0;
  let scannedItems = 0;

  const clear = (): void => {
    positive.clear();
    negative.clear();
    positive.set("", catalog.all());
  };

  clear();
  const unsubscribe = catalog.onRebuild(() => {
    clear();
    debug.trace("search", "filter cache cleared after catalog rebuild");
  });

  const filter = (query: string, previousQuery: string): FilterResult => {
    if (negative.has(query)) {
      negativeHits++;
      return { kind: "rejected", source: "negative-cache", scanned: 0 };
    }

    const cached = positive.get(query);
    if (cached !== undefined) {
      hits++;
      return { kind: "accepted", items: cached, source: "cache", scanned: 0 };
    }

    // Narrowing is only sound because queries grow by appending one character.
    const candidates = positive.get(previousQuery) ?? catalog.all();
    const items = scanItems(candidates, query);
    scans++;
    scannedItems += candidates.length;

    if (items.length === 0) {
      negative.add(query);
      debug.trace("search", `no items for query "${query}"`, { candidates: candidates.length });
      return { kind: "rejected", source: "scan", scanned: candidates.length };
    }

    positive.set(query, items);
    debug.trace("search", `cached ${items.length} items for query "${query}"`, {
      candidates: candidates.length,
    });
    return { kind: "accepted", items, source: "scan", scanned: candidates.length };
  };

  const engine: FilterEngine = {
    filter,
    has: (query) => positive.has(query),
    isRejected: (query) => negative.has(query),
    clear,
    cachedQueries: () => Object.freeze([...positive.keys()]),
    stats: () => Object.freeze({ hits, negativeHits, scans, scannedItems }),
    dispose: unsubscribe,
  };
  return Object.freeze(engine);
}
