/**
 * packages/core/src/testing/renderTarget.ts — Recording render target.
 *
 * Why: Redraw minimization is part of the viewport contract, so tests need to
 * count exactly which render calls happened. The recording target keeps the
 * call log plus a model of what the screen shows.
 */

import type { RenderTarget, RowStyle, RowView } from "../viewport/viewport.js";

export type RenderCall<T> =
  | Readonly<{ kind: "drawRows"; rows: readonly RowView<T>[] }>
  | Readonly<{ kind: "paintRow"; row: number; style: RowStyle }>
  | Readonly<{ kind: "drawQuery"; text: string }>;

export type RecordingTarget<T> = RenderTarget<T> &
  Readonly<{
    calls: () => readonly RenderCall<T>[];
    /** Number of full redraws so far. */
    drawCount: () => number;
    /** Number of single-row recolors so far. */
    paintCount: () => number;
    /** Rows from the latest drawRows, or [] before the first one. */
    rows: () => readonly RowView<T>[];
    /** Row currently painted with "focus", or null. */
    focusedRow: () => number | null;
    /** Latest query text. */
    query: () => string;
    /** Forget recorded calls; screen model is kept. */
    clearCalls: () => void;
  }>;

export function createRecordingTarget<T>(): RecordingTarget<T> {
  let calls: RenderCall<T>[] = [];
  let rows: readonly RowView<T>[] = [];
  const styles = new Map<number, RowStyle>();
  let query = "";

  return Object.freeze({
    drawRows: (next: readonly RowView<T>[]) => {
      calls.push({ kind: "drawRows", rows: next });
      rows = next;
    },
    paintRow: (row: number, style: RowStyle) => {
      calls.push({ kind: "paintRow", row, style });
      styles.set(row, style);
    },
    drawQuery: (text: string) => {
      calls.push({ kind: "drawQuery", text });
      query = text;
    },
    calls: () => calls,
    drawCount: () => calls.filter((c) => c.kind === "drawRows").length,
    paintCount: () => calls.filter((c) => c.kind === "paintRow").length,
    rows: () => rows,
    focusedRow: () => {
      for (const [row, style] of styles) {
        if (style === "focus") return row;
      }
      return null;
    },
    query: () => query,
    clearCalls: () => {
      calls = [];
    },
  });
}

/** Names shown in each visible row; "" for empty rows. */
export function rowNames<T extends Readonly<{ name: string }>>(
  rows: readonly RowView<T>[],
): string[] {
  return rows.map((row) => (row.kind === "item" ? row.item.name : ""));
}
