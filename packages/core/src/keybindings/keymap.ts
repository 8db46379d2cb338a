/**
 * packages/core/src/keybindings/keymap.ts — Key presses to session events.
 *
 * Fixed bindings:
 *   - escape, and every configured exit combo → cancel
 *   - up / down → navigation
 *   - enter / kpenter → confirm
 *   - f5 → refresh
 *   - backspace → remove last character
 *   - one printable character without ctrl/alt/meta → char (shift allowed)
 *
 * Anything else is unmapped and left to the caller.
 */

import type { LaunchKeyEvent } from "../session/types.js";
import { comboMatches, parseKeyCombo } from "./parser.js";
import type { KeyCombo, KeyParseError, KeyPress } from "./types.js";

export type Keymap = Readonly<{
  exitCombos: readonly KeyCombo[];
  /** `null` when the press has no launcher meaning. */
  resolve: (press: KeyPress) => LaunchKeyEvent | null;
}>;

export type KeymapOptions = Readonly<{
  /** Extra combos that close the launcher, e.g. ["ctrl+c", "mod4+r"] */
  exitKeys?: readonly string[];
}>;

export type CreateKeymapResult =
  | Readonly<{ ok: true; value: Keymap }>
  | Readonly<{ ok: false; error: KeyParseError & Readonly<{ input: string }> }>;

const FIXED: ReadonlyMap<string, LaunchKeyEvent> = new Map<string, LaunchKeyEvent>([
  ["escape", { kind: "cancel" }],
  ["up", { kind: "up" }],
  ["down", { kind: "down" }],
  ["enter", { kind: "confirm" }],
  ["kpenter", { kind: "confirm" }],
  ["f5", { kind: "refresh" }],
  ["backspace", { kind: "backspace" }],
]);

/** True for a single printable code point (no control characters). */
export function isPrintableKey(key: string): boolean {
  if ([...key].length !== 1) return false;
  const code = key.codePointAt(0);
  if (code === undefined) return false;
  return code >= 0x20 && code !== 0x7f;
}

export function createKeymap(options: KeymapOptions = {}): CreateKeymapResult {
  const exitCombos: KeyCombo[] = [];
  for (const input of options.exitKeys ?? []) {
    const parsed = parseKeyCombo(input);
    if (!parsed.ok) {
      return { ok: false, error: { ...parsed.error, input } };
    }
    exitCombos.push(parsed.value);
  }

  const resolve = (press: KeyPress): LaunchKeyEvent | null => {
    for (const combo of exitCombos) {
      if (comboMatches(combo, press)) return { kind: "cancel" };
    }

    const { mods } = press;
    if (mods.ctrl || mods.alt || mods.meta) return null;

    const fixed = FIXED.get(press.key);
    if (fixed !== undefined) return fixed;

    if (isPrintableKey(press.key)) return { kind: "char", char: press.key };
    return null;
  };

  return { ok: true, value: Object.freeze({ exitCombos: Object.freeze(exitCombos), resolve }) };
}
