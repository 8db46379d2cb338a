import { type SpawnOptions, spawn } from "node:child_process";
import { type DebugLog, type Executor, createSilentDebugLog } from "@launchdeck/core";

/** The part of ChildProcess the executor touches. */
export type SpawnedProcess = Readonly<{
  on: (event: "error", listener: (error: Error) => void) => unknown;
  unref: () => void;
}>;

export type SpawnFn = (command: string, options: SpawnOptions) => SpawnedProcess;

export type SpawnExecutorOptions = Readonly<{
  debug?: DebugLog;
  spawn?: SpawnFn;
  /** Passed to child_process as `shell`; default true (the platform shell). */
  shell?: boolean | string;
}>;

/**
 * Executor that hands the command line to the shell and forgets about it.
 * The child is detached and its output ignored, so it outlives the launcher.
 * Spawn failures are logged.
 */
export function createSpawnExecutor(options: SpawnExecutorOptions = {}): Executor {
  const debug = options.debug ?? createSilentDebugLog();
  const spawnFn: SpawnFn = options.spawn ?? spawn;
  const shell = options.shell ?? true;

  return Object.freeze({
    execute: (command: string) => {
      let child: SpawnedProcess;
      try {
        child = spawnFn(command, { shell, detached: true, stdio: "ignore" });
      } catch (error) {
        debug.error("exec", `cannot start "${command}"`, {
          error: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      child.on("error", (error) => {
        debug.error("exec", `"${command}" failed: ${error.message}`);
      });
      child.unref();
    },
  });
}
