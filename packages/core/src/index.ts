/**
 * @launchdeck/core
 *
 * Runtime-agnostic incremental search core for the launcher.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors and configuration
// =============================================================================

export { LaunchError, type LaunchErrorCode, describeError, isLaunchError } from "./errors.js";
export { DEFAULT_WINDOW_SIZE, MAX_WINDOW_SIZE, resolveWindowSize } from "./config.js";

// =============================================================================
// Catalog
// =============================================================================

export {
  ITEM_KINDS,
  ITEM_KIND_RANK,
  type Item,
  type ItemInit,
  type ItemKind,
  createItem,
  foldName,
  isItemKind,
  itemKindFromRank,
} from "./catalog/item.js";

export {
  type Catalog,
  type CatalogRebuildListener,
  compareCatalogOrder,
  compareStrings,
  createCatalog,
  sortCatalogItems,
} from "./catalog/catalog.js";

export {
  type CatalogCacheParseError,
  type CatalogCacheParseResult,
  parseCatalogCache,
  serializeCatalogCache,
  serializeCatalogItem,
} from "./catalog/cacheFile.js";

// =============================================================================
// Search
// =============================================================================

export {
  type FilterEngine,
  type FilterEngineOptions,
  type FilterResult,
  type FilterStats,
  createFilterEngine,
  scanItems,
} from "./search/filterEngine.js";

export { type QueryHistory, createQueryHistory } from "./search/queryHistory.js";

// =============================================================================
// Viewport
// =============================================================================

export {
  type RenderTarget,
  type RowStyle,
  type RowView,
  type Viewport,
  type ViewportChange,
  type ViewportOptions,
  type ViewportSnapshot,
  createViewport,
} from "./viewport/viewport.js";

// =============================================================================
// Session
// =============================================================================

export type {
  CatalogLoadReason,
  CatalogSource,
  DoneCallback,
  Executor,
  KeyOutcome,
  LaunchKeyEvent,
  LaunchKeyKind,
  LaunchSession,
  LaunchSessionOptions,
  RefreshOutcome,
  SessionState,
} from "./session/types.js";

export { createLaunchSession } from "./session/session.js";

// =============================================================================
// Keys and debug log
// =============================================================================

export * from "./keybindings/index.js";
export * from "./debug/index.js";
