/**
 * packages/core/src/keybindings/parser.ts — Parse key combo strings.
 *
 * Why: Exit keys come from configuration as human-readable strings. They are
 * parsed once into KeyCombo values so matching a key press is a plain field
 * comparison.
 *
 * Format examples:
 *   - Single key: "escape", "f5", "q"
 *   - With modifiers: "ctrl+c", "mod4+r", "ctrl+shift+q"
 */

import { MODIFIER_NAMES, type ModifierName, normalizeKeyName } from "./keyNames.js";
import type { KeyCombo, KeyPress, Modifiers, ParseKeyResult } from "./types.js";

/**
 * Parse a key combo string into a KeyCombo.
 *
 * Modifier names (case-insensitive):
 *   - shift
 *   - ctrl, control
 *   - alt, mod1
 *   - meta, cmd, command, win, super, mod4
 *
 * @example
 * ```ts
 * parseKeyCombo("ctrl+c")  // { key: "c", mods: { ctrl: true, ... } }
 * parseKeyCombo("Escape")  // { key: "escape", mods: EMPTY_MODS }
 * ```
 */
export function parseKeyCombo(input: string): ParseKeyResult {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return {
      ok: false,
      error: { code: "EMPTY_COMBO", detail: "key combo string is empty" },
    };
  }

  const lower = trimmed.toLowerCase();
  const pieces = lower.split("+");
  const seen = new Set<ModifierName>();
  let keyName: string | undefined;

  // All but the last piece must be modifiers; the last one is the key
  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (piece === undefined || piece.length === 0) {
      return {
        ok: false,
        error: { code: "INVALID_KEY", detail: `empty component in "${trimmed}"` },
      };
    }

    const isLast = i === pieces.length - 1;
    const modifier = MODIFIER_NAMES.get(piece);

    if (modifier !== undefined) {
      if (isLast) {
        return {
          ok: false,
          error: {
            code: "INVALID_KEY",
            detail: `modifier "${piece}" cannot be the final key in "${trimmed}"`,
          },
        };
      }
      if (seen.has(modifier)) {
        return {
          ok: false,
          error: {
            code: "INVALID_MODIFIER",
            detail: `duplicate modifier "${piece}" in "${trimmed}"`,
          },
        };
      }
      seen.add(modifier);
      continue;
    }

    if (!isLast) {
      return {
        ok: false,
        error: {
          code: "INVALID_MODIFIER",
          detail: `"${piece}" is not a valid modifier in "${trimmed}"`,
        },
      };
    }
    keyName = piece;
  }

  const key = keyName === undefined ? null : normalizeKeyName(keyName);
  if (key === null) {
    return {
      ok: false,
      error: { code: "INVALID_KEY", detail: `unknown key "${keyName ?? ""}" in "${trimmed}"` },
    };
  }

  const mods: Modifiers = Object.freeze({
    shift: seen.has("shift"),
    ctrl: seen.has("ctrl"),
    alt: seen.has("alt"),
    meta: seen.has("meta"),
  });
  return { ok: true, value: Object.freeze({ key, mods }) };
}

function modsEqual(a: Modifiers, b: Modifiers): boolean {
  return a.shift === b.shift && a.ctrl === b.ctrl && a.alt === b.alt && a.meta === b.meta;
}

/**
 * Check whether a key press matches a combo. Character keys compare
 * case-insensitively.
 */
export function comboMatches(combo: KeyCombo, press: KeyPress): boolean {
  return combo.key === press.key.toLowerCase() && modsEqual(combo.mods, press.mods);
}

/**
 * Convert a combo to a human-readable string (for logs and help output).
 */
export function comboToString(combo: KeyCombo): string {
  const parts: string[] = [];
  if (combo.mods.ctrl) parts.push("ctrl");
  if (combo.mods.alt) parts.push("alt");
  if (combo.mods.shift) parts.push("shift");
  if (combo.mods.meta) parts.push("meta");
  parts.push(combo.key);
  return parts.join("+");
}
