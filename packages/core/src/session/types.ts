/**
 * packages/core/src/session/types.ts — Interaction session contracts.
 *
 * Why: The session is the only part of the core that talks to the outside
 * world. These types pin down what it consumes (abstract key events, a
 * catalog source, an executor) and what it reports back per event.
 */

import type { Catalog } from "../catalog/catalog.js";
import type { Item, ItemInit } from "../catalog/item.js";
import type { DebugLog } from "../debug/debugLog.js";
import type { FilterStats } from "../search/filterEngine.js";
import type { RenderTarget, ViewportChange, ViewportSnapshot } from "../viewport/viewport.js";

/** Abstract key events; physical key capture happens outside the core. */
export type LaunchKeyEvent =
  | Readonly<{ kind: "char"; char: string }>
  | Readonly<{ kind: "backspace" }>
  | Readonly<{ kind: "up" }>
  | Readonly<{ kind: "down" }>
  | Readonly<{ kind: "confirm" }>
  | Readonly<{ kind: "refresh" }>
  | Readonly<{ kind: "cancel" }>;

export type LaunchKeyKind = LaunchKeyEvent["kind"];

export type SessionState = "idle" | "active";

/** Why the catalog source is asked for items. */
export type CatalogLoadReason = "initial" | "refresh";

export type CatalogSource = Readonly<{
  /**
   * Produce the full, unordered item list. A rejected promise or anything
   * other than an array leaves the current catalog in place.
   */
  load: (reason: CatalogLoadReason) => Promise<readonly ItemInit[]>;
}>;

export type Executor = Readonly<{
  /** Fire-and-forget; the return value is ignored. */
  execute: (command: string) => void;
}>;

export type RefreshOutcome =
  | Readonly<{ kind: "refreshed"; size: number }>
  | Readonly<{ kind: "failed"; error: unknown }>;

export type KeyOutcome =
  | Readonly<{ kind: "accepted"; query: string; count: number }>
  | Readonly<{ kind: "rejected"; query: string }>
  | Readonly<{ kind: "navigated"; change: ViewportChange }>
  | Readonly<{ kind: "executed"; item: Item }>
  | Readonly<{ kind: "cancelled" }>
  | Readonly<{ kind: "refresh"; done: Promise<RefreshOutcome> }>
  | Readonly<{ kind: "ignored"; reason: "idle" | "busy" | "empty-history" | "no-selection" }>;

export type DoneCallback = () => void;

export type LaunchSessionOptions = Readonly<{
  /** Items for the first catalog build. */
  items: readonly ItemInit[];
  source: CatalogSource;
  executor: Executor;
  target: RenderTarget<Item>;
  /** Visible rows; validated with resolveWindowSize. */
  windowSize?: number;
  debug?: DebugLog;
  /** Label used in log messages, e.g. the launcher's name. */
  name?: string;
}>;

export type LaunchSession = Readonly<{
  state: () => SessionState;
  /** True while a refresh waits for the catalog source. */
  busy: () => boolean;
  query: () => string;
  /** Previously accepted queries, bottom → top. */
  history: () => readonly string[];
  /** The active result list. */
  results: () => readonly Item[];
  viewport: () => ViewportSnapshot;
  selectedItem: () => Item | null;
  /** Cache and scan counters of the filter engine. */
  filterStats: () => FilterStats;
  /** A rebuild, from refresh or direct, returns the session to the empty query. */
  catalog: Catalog;
  /** Idle → active; re-paints the highlight on the current selection. */
  start: (done?: DoneCallback) => void;
  /** Active → idle; idempotent. */
  stop: () => void;
  /** Empty query, empty history, full catalog, viewport reset. */
  initList: () => void;
  handleKey: (event: LaunchKeyEvent) => KeyOutcome;
  /** Rebuild from the catalog source; same as the refresh key. */
  refresh: () => Promise<RefreshOutcome>;
  dispose: () => void;
}>;
