/**
 * packages/core/src/catalog/catalog.ts — Canonically ordered item collection.
 *
 * Why: The catalog order is the result of the empty query and the fallback
 * search space of every filter pass. It is computed once per build and only
 * ever replaced wholesale, so dependents can rely on a single `onRebuild`
 * notification to invalidate everything derived from it.
 */

import { ITEM_KIND_RANK, type Item } from "./item.js";

export type CatalogRebuildListener = (catalog: Catalog) => void;

export type Catalog = Readonly<{
  /** Items in `(kind, matchKey)` order. O(1); the array is frozen. */
  all: () => readonly Item[];
  size: () => number;
  /** Starts at 0, incremented by every rebuild. */
  generation: () => number;
  /** Replace all items, then notify rebuild listeners synchronously. */
  rebuild: (items: readonly Item[]) => void;
  /** Returns an unsubscribe function. */
  onRebuild: (listener: CatalogRebuildListener) => () => void;
}>;

/** Code-unit comparison of two strings, the ordering used for match keys. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareCatalogOrder(a: Item, b: Item): number {
  const byKind = ITEM_KIND_RANK[a.kind] - ITEM_KIND_RANK[b.kind];
  if (byKind !== 0) return byKind;
  return compareStrings(a.matchKey, b.matchKey);
}

/** Stable sort into catalog order; the input is left untouched. */
export function sortCatalogItems(items: readonly Item[]): readonly Item[] {
  return Object.freeze([...items].sort(compareCatalogOrder));
}

export function createCatalog(items: readonly Item[]): Catalog {
  let ordered = sortCatalogItems(items);
  let generation = 0;
  const listeners = new Set<CatalogRebuildListener>();

  const catalog: Catalog = {
    all: () => ordered,
    size: () => ordered.length,
    generation: () => generation,
    rebuild: (next) => {
      ordered = sortCatalogItems(next);
      generation++;
      for (const listener of [...listeners]) {
        listener(catalog);
      }
    },
    onRebuild: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
  return Object.freeze(catalog);
}
