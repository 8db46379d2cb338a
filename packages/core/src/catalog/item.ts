/**
 * packages/core/src/catalog/item.ts — Selectable launcher entries.
 *
 * Why: Items are created once by a loader and never mutated afterwards. The
 * folded match key is derived here, at creation, so every comparison and
 * substring search downstream works on the same precomputed string.
 */

import { LaunchError } from "../errors.js";

export type ItemKind = "application" | "executable" | "document";

/** Bucket rank of each kind; also the numeric `type` of the persisted cache. */
export const ITEM_KIND_RANK: Readonly<Record<ItemKind, number>> = Object.freeze({
  application: 1,
  executable: 2,
  document: 3,
});

export const ITEM_KINDS: readonly ItemKind[] = Object.freeze([
  "application",
  "executable",
  "document",
]);

/**
 * Loader-facing description of an item. `matchKey` is optional: when given
 * (e.g. read back from a cache file) it must equal the folded name.
 */
export type ItemInit = Readonly<{
  kind: ItemKind;
  name: string;
  command: string;
  iconRef?: string;
  matchKey?: string;
}>;

export type Item = Readonly<{
  kind: ItemKind;
  /** Human-readable display name */
  name: string;
  /** Lowercase copy of `name`, used for all comparisons and searching */
  matchKey: string;
  /** Opaque command line handed to the executor verbatim */
  command: string;
  /** Opaque icon handle; absent items render without an icon */
  iconRef?: string;
}>;

export function isItemKind(value: unknown): value is ItemKind {
  return value === "application" || value === "executable" || value === "document";
}

export function itemKindFromRank(rank: number): ItemKind | null {
  for (const kind of ITEM_KINDS) {
    if (ITEM_KIND_RANK[kind] === rank) return kind;
  }
  return null;
}

/** Fold a display name to its match key. ASCII-oriented, no Unicode folding. */
export function foldName(name: string): string {
  return name.toLowerCase();
}

function invalidItem(detail: string): never {
  throw new LaunchError("LAUNCH_INVALID_ITEM", detail);
}

/**
 * Validate an ItemInit and build the frozen Item.
 *
 * @throws LaunchError("LAUNCH_INVALID_ITEM") on an unknown kind, an empty name
 * or command, or a match key that is not the folded name.
 */
export function createItem(init: ItemInit): Item {
  if (!isItemKind(init.kind)) {
    invalidItem(`unknown item kind "${String(init.kind)}"`);
  }
  if (typeof init.name !== "string" || init.name.length === 0) {
    invalidItem("item name must be a non-empty string");
  }
  if (typeof init.command !== "string" || init.command.length === 0) {
    invalidItem(`item "${init.name}" has no command`);
  }

  const matchKey = foldName(init.name);
  if (init.matchKey !== undefined && init.matchKey !== matchKey) {
    invalidItem(`item "${init.name}" carries match key "${init.matchKey}", expected "${matchKey}"`);
  }

  if (init.iconRef === undefined || init.iconRef.length === 0) {
    return Object.freeze({ kind: init.kind, name: init.name, matchKey, command: init.command });
  }
  return Object.freeze({
    kind: init.kind,
    name: init.name,
    matchKey,
    command: init.command,
    iconRef: init.iconRef,
  });
}
