/**
 * packages/core/src/session/session.ts — Launcher interaction state machine.
 *
 * Why: Ties the catalog, the filter engine, the query history and the
 * viewport together behind one key-event entry point. Every event runs to
 * completion synchronously; only refresh waits for its catalog source, and
 * the session ignores other keys until that wait is over.
 *
 * States: idle (keys ignored) and active (keys handled). `start` and `stop`
 * only move between them and paint/clear the highlight; `initList` owns the
 * reset of query, history and viewport.
 */

import { type Catalog, createCatalog } from "../catalog/catalog.js";
import { type Item, type ItemInit, createItem } from "../catalog/item.js";
import { resolveWindowSize } from "../config.js";
import { createSilentDebugLog } from "../debug/debugLog.js";
import { LaunchError, describeError } from "../errors.js";
import { createFilterEngine } from "../search/filterEngine.js";
import { createQueryHistory } from "../search/queryHistory.js";
import { createViewport } from "../viewport/viewport.js";
import type {
  DoneCallback,
  KeyOutcome,
  LaunchKeyEvent,
  LaunchSession,
  LaunchSessionOptions,
  RefreshOutcome,
  SessionState,
} from "./types.js";

function buildItems(inits: readonly ItemInit[]): readonly Item[] {
  return inits.map((init) => createItem(init));
}

export function createLaunchSession(options: LaunchSessionOptions): LaunchSession {
  const windowSize = resolveWindowSize(options.windowSize);
  const debug = options.debug ?? createSilentDebugLog();
  const name = options.name ?? "launchdeck";
  const { source, executor, target } = options;

  const catalog: Catalog = createCatalog(buildItems(options.items));
  const engine = createFilterEngine(catalog, { debug });
  const history = createQueryHistory();
  const viewport = createViewport<Item>({ windowSize, target, debug });
  viewport.setList(catalog.all());
  debug.info("catalog", `${name}: catalog built with ${catalog.size()} items`);

  let state: SessionState = "idle";
  let doneCallback: DoneCallback | undefined;
  let pendingRefresh: Promise<RefreshOutcome> | null = null;

  const showList = (items: readonly Item[], query: string): void => {
    viewport.setList(items);
    viewport.reset();
    target.drawQuery(query);
  };

  const start = (done?: DoneCallback): void => {
    if (state === "active") return;
    state = "active";
    doneCallback = done;
    viewport.focus();
    debug.trace("session", `${name}: started`);
  };

  const stop = (): void => {
    if (state === "idle") return;
    state = "idle";
    viewport.blur();
    debug.trace("session", `${name}: stopped`);
  };

  /** Stop, then run the done-callback captured by `start`. */
  const finish = (): void => {
    const done = doneCallback;
    doneCallback = undefined;
    stop();
    done?.();
  };

  // Registered after the filter engine, so its cache is re-seeded first.
  const unfollowCatalog = catalog.onRebuild(() => {
    history.reset();
    viewport.setList(catalog.all());
    if (state === "active") {
      viewport.reset();
      target.drawQuery("");
    } else {
      viewport.rewind();
    }
  });

  const initList = (): void => {
    history.reset();
    engine.clear();
    showList(catalog.all(), "");
  };

  const appendChar = (char: string): KeyOutcome => {
    const current = history.current();
    if (char.length === 0) return { kind: "rejected", query: current };

    const next = current + char.toLowerCase();
    const result = engine.filter(next, current);
    if (result.kind === "rejected") {
      return { kind: "rejected", query: next };
    }

    history.accept(next);
    showList(result.items, next);
    return { kind: "accepted", query: next, count: result.items.length };
  };

  const removeLastChar = (): KeyOutcome => {
    const previous = history.peek();
    if (previous === null) return { kind: "ignored", reason: "empty-history" };

    // Every history entry was accepted, and therefore cached, before it was pushed.
    const result = engine.filter(previous, "");
    if (result.kind !== "accepted" || result.source !== "cache") {
      throw new LaunchError(
        "LAUNCH_CACHE_DESYNC",
        `query "${previous}" from history has no cached result`,
      );
    }

    history.undo();
    showList(result.items, previous);
    return { kind: "accepted", query: previous, count: result.items.length };
  };

  const runRefresh = async (): Promise<RefreshOutcome> => {
    debug.info("catalog", `${name}: refreshing item list`);
    let items: readonly Item[];
    try {
      const loaded: unknown = await source.load("refresh");
      if (!Array.isArray(loaded)) {
        throw new LaunchError("LAUNCH_REBUILD_FAILED", "catalog source returned no item list");
      }
      items = buildItems(loaded);
    } catch (error) {
      debug.warn("catalog", `${name}: refresh failed, keeping current catalog`, {
        error: describeError(error),
      });
      return { kind: "failed", error };
    }

    catalog.rebuild(items);
    debug.info("catalog", `${name}: catalog rebuilt with ${catalog.size()} items`);
    return { kind: "refreshed", size: catalog.size() };
  };

  const refresh = (): Promise<RefreshOutcome> => {
    if (pendingRefresh !== null) return pendingRefresh;
    const pending = runRefresh().finally(() => {
      pendingRefresh = null;
    });
    pendingRefresh = pending;
    return pending;
  };

  const handleKey = (event: LaunchKeyEvent): KeyOutcome => {
    if (state === "idle") return { kind: "ignored", reason: "idle" };
    if (pendingRefresh !== null) return { kind: "ignored", reason: "busy" };

    switch (event.kind) {
      case "char":
        return appendChar(event.char);
      case "backspace":
        return removeLastChar();
      case "up":
        return { kind: "navigated", change: viewport.moveUp() };
      case "down":
        return { kind: "navigated", change: viewport.moveDown() };
      case "confirm": {
        const item = viewport.selectedItem();
        if (item === null) return { kind: "ignored", reason: "no-selection" };
        finish();
        debug.info("exec", `${name}: launching ${item.name}: ${item.command}`);
        executor.execute(item.command);
        return { kind: "executed", item };
      }
      case "cancel":
        finish();
        return { kind: "cancelled" };
      case "refresh":
        return { kind: "refresh", done: refresh() };
    }
  };

  const session: LaunchSession = {
    state: () => state,
    busy: () => pendingRefresh !== null,
    query: () => history.current(),
    history: () => history.entries(),
    results: () => viewport.items(),
    viewport: () => viewport.snapshot(),
    selectedItem: () => viewport.selectedItem(),
    filterStats: () => engine.stats(),
    catalog,
    start,
    stop,
    initList,
    handleKey,
    refresh,
    dispose: () => {
      stop();
      unfollowCatalog();
      engine.dispose();
    },
  };
  return Object.freeze(session);
}
