/**
 * packages/node/src/terminal/keyDecoder.ts — Raw stdin bytes to key presses.
 *
 * Handles what a launcher needs from a raw-mode terminal: arrows, enter,
 * backspace, escape, F5, ctrl+letter, alt+character and printable text.
 * Unrecognized escape sequences are consumed and dropped.
 */

import { EMPTY_MODS, type KeyPress, type Modifiers } from "@launchdeck/core";

const ESC = "\u001b";

/** Complete sequences after ESC, longest first where they share a prefix. */
const ESCAPE_SEQUENCES: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ["[15~", "f5"],
  ["[A", "up"],
  ["[B", "down"],
  ["[C", "right"],
  ["[D", "left"],
  ["[H", "home"],
  ["[F", "end"],
  ["OA", "up"],
  ["OB", "down"],
  ["OC", "right"],
  ["OD", "left"],
  ["OM", "kpenter"],
  ["[[E", "f5"],
]);

function press(key: string, mods: Partial<Modifiers> = {}): KeyPress {
  return Object.freeze({ key, mods: Object.freeze({ ...EMPTY_MODS, ...mods }) });
}

function isUpperCaseLetter(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

/** Length of an unknown CSI/SS3 sequence starting right after ESC, or 0. */
function unknownSequenceLength(rest: readonly string[]): number {
  const first = rest[0];
  if (first === "O") return Math.min(2, rest.length);
  if (first !== "[") return 0;
  for (let i = 1; i < rest.length; i++) {
    const code = rest[i]?.codePointAt(0) ?? 0;
    // Final byte of a CSI sequence.
    if (code >= 0x40 && code <= 0x7e) return i + 1;
  }
  return rest.length;
}

function isPrintable(char: string | undefined): char is string {
  if (char === undefined) return false;
  const code = char.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Decode one chunk of terminal input. A lone ESC at the end of a chunk is
 * the escape key.
 */
export function decodeKeys(chunk: string): KeyPress[] {
  const out: KeyPress[] = [];
  const chars = [...chunk];
  let i = 0;

  while (i < chars.length) {
    const char = chars[i] ?? "";

    if (char === ESC) {
      const restChars = chars.slice(i + 1);
      const rest = restChars.join("");
      const known = ESCAPE_SEQUENCES.find(([seq]) => rest.startsWith(seq));
      if (known !== undefined) {
        out.push(press(known[1]));
        i += 1 + known[0].length;
        continue;
      }
      const skip = unknownSequenceLength(restChars);
      if (skip > 0) {
        i += 1 + skip;
        continue;
      }
      const next = chars[i + 1];
      if (isPrintable(next)) {
        out.push(press(next, { alt: true }));
        i += 2;
        continue;
      }
      out.push(press("escape"));
      i++;
      continue;
    }

    const code = char.codePointAt(0) ?? 0;
    if (char === "\r" || char === "\n") {
      out.push(press("enter"));
    } else if (char === "\u007f" || char === "\b") {
      out.push(press("backspace"));
    } else if (char === "\t") {
      out.push(press("tab"));
    } else if (code >= 1 && code <= 26) {
      out.push(press(String.fromCharCode(code + 96), { ctrl: true }));
    } else if (code >= 0x20) {
      out.push(isUpperCaseLetter(char) ? press(char, { shift: true }) : press(char));
    }
    i++;
  }
  return out;
}
