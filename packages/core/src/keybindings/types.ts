/**
 * packages/core/src/keybindings/types.ts — Key press and key combo types.
 *
 * Why: The core never sees raw terminal or window-system input. A backend
 * decodes its input into KeyPress values; the keymap turns those into the
 * session's abstract key events. Configured exit combos are parsed into
 * KeyCombo values once, up front.
 */

/**
 * Keyboard modifier state.
 */
export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;

/**
 * One decoded key press.
 * `key` is a lowercase named key ("enter", "up", "f5") or a single printable
 * character as typed (case preserved).
 */
export type KeyPress = Readonly<{
  key: string;
  mods: Modifiers;
}>;

/**
 * A parsed combo such as "ctrl+c". `key` is normalized to lowercase.
 */
export type KeyCombo = Readonly<{
  key: string;
  mods: Modifiers;
}>;

/**
 * Error returned when parsing a key combo string fails.
 */
export type KeyParseError = Readonly<{
  /** Error code for programmatic handling */
  code: "INVALID_KEY" | "EMPTY_COMBO" | "INVALID_MODIFIER";
  /** Human-readable detail */
  detail: string;
}>;

/**
 * Result of parsing a key combo string.
 */
export type ParseKeyResult =
  | Readonly<{ ok: true; value: KeyCombo }>
  | Readonly<{ ok: false; error: KeyParseError }>;
