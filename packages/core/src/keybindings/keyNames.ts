import type { Modifiers } from "./types.js";

export const EMPTY_MODS: Modifiers = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

/** Canonical named keys. */
export const NAMED_KEYS: ReadonlySet<string> = new Set([
  "escape",
  "enter",
  "kpenter",
  "tab",
  "backspace",
  "space",
  "insert",
  "delete",
  "home",
  "end",
  "pageup",
  "pagedown",
  "up",
  "down",
  "left",
  "right",
  "f1",
  "f2",
  "f3",
  "f4",
  "f5",
  "f6",
  "f7",
  "f8",
  "f9",
  "f10",
  "f11",
  "f12",
]);

/** Alternative spellings accepted in configuration strings. */
export const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["esc", "escape"],
  ["return", "enter"],
  ["kp_enter", "kpenter"],
  ["del", "delete"],
  ["ins", "insert"],
  ["pgup", "pageup"],
  ["pgdn", "pagedown"],
  ["arrowup", "up"],
  ["arrowdown", "down"],
  ["arrowleft", "left"],
  ["arrowright", "right"],
]);

export type ModifierName = keyof Modifiers;

/** Modifier spellings; "mod1"/"mod4" follow X11 naming. */
export const MODIFIER_NAMES: ReadonlyMap<string, ModifierName> = new Map([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["mod1", "alt"],
  ["meta", "meta"],
  ["cmd", "meta"],
  ["command", "meta"],
  ["win", "meta"],
  ["super", "meta"],
  ["mod4", "meta"],
]);

/** Resolve a lowercase key name or alias; single characters pass through. */
export function normalizeKeyName(name: string): string | null {
  const aliased = KEY_ALIASES.get(name) ?? name;
  if (NAMED_KEYS.has(aliased)) return aliased;
  if (aliased.length === 1) return aliased;
  return null;
}
