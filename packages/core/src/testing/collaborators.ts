import type { ItemInit } from "../catalog/item.js";
import type { CatalogLoadReason, CatalogSource, Executor } from "../session/types.js";

export type RecordingExecutor = Executor &
  Readonly<{
    commands: () => readonly string[];
  }>;

export function createRecordingExecutor(): RecordingExecutor {
  const commands: string[] = [];
  return Object.freeze({
    execute: (command: string) => {
      commands.push(command);
    },
    commands: () => commands,
  });
}

export type ScriptedSource = CatalogSource &
  Readonly<{
    /** Reasons passed to load, in call order. */
    loads: () => readonly CatalogLoadReason[];
    /** Replace what the next load resolves with. */
    setItems: (items: readonly ItemInit[]) => void;
    /** Make the next load reject with `error`. */
    failNext: (error: unknown) => void;
  }>;

/**
 * In-memory catalog source. Resolves with the current item list unless a
 * failure was queued with `failNext`.
 */
export function createScriptedSource(initial: readonly ItemInit[] = []): ScriptedSource {
  let items = initial;
  let failure: { error: unknown } | null = null;
  const loads: CatalogLoadReason[] = [];

  return Object.freeze({
    load: async (reason: CatalogLoadReason) => {
      loads.push(reason);
      if (failure !== null) {
        const { error } = failure;
        failure = null;
        throw error;
      }
      return items;
    },
    loads: () => loads,
    setItems: (next: readonly ItemInit[]) => {
      items = next;
    },
    failNext: (error: unknown) => {
      failure = { error };
    },
  });
}
