/**
 * packages/core/src/keybindings/index.ts — Public exports for key handling.
 */

export type { KeyCombo, KeyParseError, KeyPress, Modifiers, ParseKeyResult } from "./types.js";

export {
  EMPTY_MODS,
  KEY_ALIASES,
  MODIFIER_NAMES,
  NAMED_KEYS,
  normalizeKeyName,
} from "./keyNames.js";

export { comboMatches, comboToString, parseKeyCombo } from "./parser.js";

export {
  type CreateKeymapResult,
  type Keymap,
  type KeymapOptions,
  createKeymap,
  isPrintableKey,
} from "./keymap.js";
