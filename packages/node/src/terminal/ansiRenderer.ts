/**
 * packages/node/src/terminal/ansiRenderer.ts — ANSI render target.
 *
 * Screen layout (1-based terminal lines):
 *   line 1             title
 *   lines 2..rows+1    list rows 1..rows
 *
 * The filter line is not a separate line: while it is shown it covers the
 * last list row, and hiding it repaints that row from the screen model.
 * Every render call is written as one chunk.
 */

import type { Item, ItemKind, RenderTarget, RowStyle, RowView } from "@launchdeck/core";
import type { AnsiColorName, LauncherColors } from "../config.js";

export type TerminalOutput = Readonly<{
  write: (chunk: string) => unknown;
}>;

export type AnsiRendererOptions = Readonly<{
  output: TerminalOutput;
  rows: number;
  colors: LauncherColors;
  noColor: boolean;
  title?: string;
  /** Visible width; lines are padded or cut to it. Default 60. */
  columns?: number;
  /** Prefix each row with a kind glyph. Default true. */
  showGlyphs?: boolean;
}>;

export type AnsiRenderer = RenderTarget<Item> &
  Readonly<{
    drawTitle: () => void;
    showFilter: () => void;
    hideFilter: () => void;
    filterVisible: () => boolean;
    /** Blank every line the launcher uses. */
    clear: () => void;
  }>;

const ESC = "\u001b[";
const RESET = `${ESC}0m`;

const COLOR_INDEX: Readonly<Record<Exclude<AnsiColorName, "default">, number>> = Object.freeze({
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
});

export const KIND_GLYPHS: Readonly<Record<ItemKind, string>> = Object.freeze({
  application: "*",
  executable: "$",
  document: "~",
});

export function moveTo(line: number): string {
  return `${ESC}${String(line)};1H${ESC}2K`;
}

export function sgr(fg: AnsiColorName, bg: AnsiColorName): string {
  const fgCode = fg === "default" ? 39 : 30 + COLOR_INDEX[fg];
  const bgCode = bg === "default" ? 49 : 40 + COLOR_INDEX[bg];
  return `${ESC}${String(fgCode)};${String(bgCode)}m`;
}

function fit(text: string, columns: number): string {
  const chars = [...text];
  if (chars.length >= columns) return chars.slice(0, columns).join("");
  return text + " ".repeat(columns - chars.length);
}

export function createAnsiRenderer(options: AnsiRendererOptions): AnsiRenderer {
  const { output, rows, colors, noColor } = options;
  const columns = options.columns ?? 60;
  const showGlyphs = options.showGlyphs ?? true;
  const title = options.title ?? "launchdeck";

  let screen: readonly RowView<Item>[] = [];
  let focusRow: number | null = null;
  let query = "";
  let filterShown = false;

  const styled = (text: string, style: RowStyle): string => {
    if (noColor) return text;
    const open = style === "focus" ? sgr(colors.fgFocus, colors.bgFocus) : sgr(colors.fg, colors.bg);
    return `${open}${text}${RESET}`;
  };

  const rowText = (row: number): string => {
    const view = screen[row - 1];
    const style: RowStyle = focusRow === row ? "focus" : "normal";
    if (view === undefined || view.kind === "empty") return moveTo(row + 1);
    const marker = style === "focus" ? ">" : " ";
    const glyph = showGlyphs ? `${KIND_GLYPHS[view.item.kind]} ` : "";
    return moveTo(row + 1) + styled(fit(`${marker}${glyph}${view.item.name}`, columns), style);
  };

  const filterText = (): string => moveTo(rows + 1) + fit(`/ ${query}_`, columns);

  /** The last list row is covered while the filter is shown. */
  const rowVisible = (row: number): boolean => !(filterShown && row === rows);

  const renderer: AnsiRenderer = {
    drawRows: (next) => {
      screen = next;
      let chunk = "";
      for (let row = 1; row <= rows; row++) {
        if (rowVisible(row)) chunk += rowText(row);
      }
      output.write(chunk);
    },
    paintRow: (row, style) => {
      if (style === "focus") focusRow = row;
      else if (focusRow === row) focusRow = null;
      if (rowVisible(row)) output.write(rowText(row));
    },
    drawQuery: (text) => {
      query = text;
      if (filterShown) output.write(filterText());
    },
    drawTitle: () => {
      output.write(moveTo(1) + fit(title, columns));
    },
    showFilter: () => {
      if (filterShown) return;
      filterShown = true;
      output.write(filterText());
    },
    hideFilter: () => {
      if (!filterShown) return;
      filterShown = false;
      output.write(rowText(rows));
    },
    filterVisible: () => filterShown,
    clear: () => {
      let chunk = "";
      for (let line = 1; line <= rows + 1; line++) chunk += moveTo(line);
      output.write(chunk);
    },
  };
  return Object.freeze(renderer);
}
