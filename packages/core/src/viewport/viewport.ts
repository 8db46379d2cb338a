/**
 * packages/core/src/viewport/viewport.ts — Fixed-size window over the active result list.
 *
 * Why: The launcher shows `windowSize` rows of a list that is usually much
 * longer. Navigation inside the visible window only recolors the previous
 * and the new selection (two `paintRow` calls); a full `drawRows` happens on
 * reset and when the selection scrolls past an edge of the window.
 *
 * Indices are 1-based: `selected` and `firstVisible` index the active list,
 * rows are numbered 1..windowSize. While the list is non-empty:
 *   firstVisible <= selected <= firstVisible + windowSize - 1
 */

import type { DebugLog } from "../debug/debugLog.js";
import { createSilentDebugLog } from "../debug/debugLog.js";

export type RowStyle = "focus" | "normal";

export type RowView<T> =
  | Readonly<{ kind: "empty" }>
  | Readonly<{ kind: "item"; item: T; logicalIndex: number }>;

/**
 * Render collaborator. Only called at the granularity described above.
 */
export type RenderTarget<T> = Readonly<{
  /** Full redraw; always receives exactly `windowSize` rows. */
  drawRows: (rows: readonly RowView<T>[]) => void;
  /** Recolor one visible row (1-based). */
  paintRow: (row: number, style: RowStyle) => void;
  /** Show the accepted query text. */
  drawQuery: (text: string) => void;
}>;

/** What a navigation call did. */
export type ViewportChange = "none" | "highlight" | "scroll";

export type ViewportSnapshot = Readonly<{
  windowSize: number;
  firstVisible: number;
  /** `null` when the active list is empty */
  selected: number | null;
  length: number;
  focused: boolean;
}>;

export type Viewport<T> = Readonly<{
  /** Replace the active list. Call `reset()` afterwards to redraw. */
  setList: (items: readonly T[]) => void;
  items: () => readonly T[];
  reset: () => void;
  /** Back to the top of the list without drawing; the next `reset()` draws. */
  rewind: () => void;
  moveUp: () => ViewportChange;
  moveDown: () => ViewportChange;
  /** Paint the selection highlight and keep painting it on later changes. */
  focus: () => void;
  /** Clear the selection highlight. */
  blur: () => void;
  rowFor: (logicalIndex: number) => number;
  logicalIndexFor: (row: number) => number;
  selectedItem: () => T | null;
  snapshot: () => ViewportSnapshot;
}>;

export type ViewportOptions<T> = Readonly<{
  windowSize: number;
  target: RenderTarget<T>;
  debug?: DebugLog;
}>;

export function createViewport<T>(options: ViewportOptions<T>): Viewport<T> {
  const { windowSize, target } = options;
  const debug = options.debug ?? createSilentDebugLog();

  let list: readonly T[] = Object.freeze([]);
  let firstVisible = 1;
  let selected: number | null = null;
  let focused = false;

  const rowFor = (logicalIndex: number): number => logicalIndex - firstVisible + 1;
  const logicalIndexFor = (row: number): number => firstVisible + row - 1;

  const paintSelected = (style: RowStyle): void => {
    if (selected === null) return;
    target.paintRow(rowFor(selected), style);
  };

  const redraw = (): void => {
    const rows: RowView<T>[] = [];
    for (let row = 1; row <= windowSize; row++) {
      const logicalIndex = logicalIndexFor(row);
      const item = list[logicalIndex - 1];
      if (logicalIndex > list.length || item === undefined) {
        rows.push({ kind: "empty" });
      } else {
        rows.push({ kind: "item", item, logicalIndex });
      }
    }
    target.drawRows(Object.freeze(rows));
    debug.trace("viewport", "full redraw", { firstVisible, length: list.length });
  };

  const reset = (): void => {
    if (focused) paintSelected("normal");
    firstVisible = 1;
    redraw();
    selected = list.length > 0 ? 1 : null;
    if (focused) paintSelected("focus");
  };

  const moveUp = (): ViewportChange => {
    if (selected === null || selected <= 1) return "none";

    if (focused) paintSelected("normal");
    selected--;
    let change: ViewportChange = "highlight";
    if (selected < firstVisible) {
      firstVisible = selected;
      redraw();
      change = "scroll";
    }
    if (focused) paintSelected("focus");
    return change;
  };

  const moveDown = (): ViewportChange => {
    if (selected === null || selected >= list.length) return "none";

    if (focused) paintSelected("normal");
    selected++;
    let change: ViewportChange = "highlight";
    if (selected > logicalIndexFor(windowSize)) {
      firstVisible++;
      redraw();
      change = "scroll";
    }
    if (focused) paintSelected("focus");
    return change;
  };

  const viewport: Viewport<T> = {
    setList: (items) => {
      list = items;
    },
    items: () => list,
    reset,
    rewind: () => {
      firstVisible = 1;
      selected = list.length > 0 ? 1 : null;
    },
    moveUp,
    moveDown,
    focus: () => {
      focused = true;
      paintSelected("focus");
    },
    blur: () => {
      paintSelected("normal");
      focused = false;
    },
    rowFor,
    logicalIndexFor,
    selectedItem: () => {
      if (selected === null) return null;
      return list[selected - 1] ?? null;
    },
    snapshot: () =>
      Object.freeze({ windowSize, firstVisible, selected, length: list.length, focused }),
  };
  return Object.freeze(viewport);
}
