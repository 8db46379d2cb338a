/**
 * packages/core/src/search/queryHistory.ts — Accepted query plus undo stack.
 *
 * The query only changes by appending one character or removing the last
 * one, so "remove last character" is a pop of the previously accepted query.
 */

export type QueryHistory = Readonly<{
  current: () => string;
  /** Stack bottom → top. */
  entries: () => readonly string[];
  depth: () => number;
  /** Push the current query and make `next` current. */
  accept: (next: string) => void;
  /** Top entry without popping it; `null` when the stack is empty. */
  peek: () => string | null;
  /** Pop the top entry into `current`; `null` when the stack is empty. */
  undo: () => string | null;
  reset: () => void;
}>;

export function createQueryHistory(): QueryHistory {
  let current = "";
  const stack: string[] = [];

  return Object.freeze({
    current: () => current,
    entries: () => Object.freeze([...stack]),
    depth: () => stack.length,
    accept: (next: string) => {
      stack.push(current);
      current = next;
    },
    peek: () => stack[stack.length - 1] ?? null,
    undo: () => {
      const popped = stack.pop();
      if (popped === undefined) return null;
      current = popped;
      return popped;
    },
    reset: () => {
      current = "";
      stack.length = 0;
    },
  });
}
