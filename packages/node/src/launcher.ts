/**
 * packages/node/src/launcher.ts — Terminal launcher assembly.
 *
 * Why: Wires the core session to a real terminal. The catalog is loaded once
 * up front (cache first), then `open()` shows the list and grabs raw stdin
 * until the session finishes or `close()` is called.
 *
 * Key path: stdin chunk → decodeKeys → keymap → session.handleKey.
 * Typing and backspace also poke the filter overlay.
 */

import { StringDecoder } from "node:string_decoder";
import {
  type CatalogSource,
  type DebugLog,
  type Executor,
  LaunchError,
  type LaunchSession,
  createKeymap,
  createLaunchSession,
  createSilentDebugLog,
} from "@launchdeck/core";
import {
  type EnvMap,
  type NodeLauncherConfig,
  type NodeLauncherConfigInput,
  resolveNodeLauncherConfig,
} from "./config.js";
import { createSpawnExecutor } from "./exec/spawnExecutor.js";
import { createNodeCatalogLoader } from "./loader/catalogLoader.js";
import { type TerminalOutput, createAnsiRenderer } from "./terminal/ansiRenderer.js";
import { type Scheduler, createFilterOverlay } from "./terminal/filterOverlay.js";
import { decodeKeys } from "./terminal/keyDecoder.js";

export type TerminalInput = Readonly<{
  on: (event: "data", listener: (chunk: Buffer | string) => void) => unknown;
  off: (event: "data", listener: (chunk: Buffer | string) => void) => unknown;
  resume: () => unknown;
  pause: () => unknown;
  setRawMode?: (mode: boolean) => unknown;
}>;

export type CloseReason = "executed" | "cancelled" | "closed";

export type NodeLauncherDeps = Readonly<{
  input?: TerminalInput;
  output?: TerminalOutput;
  env?: EnvMap;
  source?: CatalogSource;
  executor?: Executor;
  schedule?: Scheduler;
  debug?: DebugLog;
  columns?: number;
  onClose?: (reason: CloseReason) => void;
}>;

export type NodeLauncher = Readonly<{
  config: NodeLauncherConfig;
  session: LaunchSession;
  /** Returns false when already open. */
  open: () => boolean;
  /** Returns false when already closed. */
  close: () => boolean;
  /** Returns whether the launcher is open afterwards. */
  toggle: () => boolean;
  isOpen: () => boolean;
  dispose: () => void;
}>;

export async function createNodeLauncher(
  input: NodeLauncherConfigInput = {},
  deps: NodeLauncherDeps = {},
): Promise<NodeLauncher> {
  const config = resolveNodeLauncherConfig(input, deps.env ?? process.env);
  const debug = deps.debug ?? createSilentDebugLog();
  const stdin = deps.input ?? process.stdin;
  const stdout = deps.output ?? process.stdout;

  const keymap = createKeymap({ exitKeys: config.exitKeys });
  if (!keymap.ok) {
    throw new LaunchError(
      "LAUNCH_INVALID_CONFIG",
      `exitKeys: "${keymap.error.input}": ${keymap.error.detail}`,
    );
  }

  const source = deps.source ?? createNodeCatalogLoader(config, { debug });
  const executor = deps.executor ?? createSpawnExecutor({ debug });
  const items = await source.load("initial");

  const renderer = createAnsiRenderer({
    output: stdout,
    rows: config.rows,
    colors: config.colors,
    noColor: config.noColor,
    title: config.name,
    showGlyphs: !config.disableIcons,
    ...(deps.columns === undefined ? {} : { columns: deps.columns }),
  });
  const overlay = createFilterOverlay({
    show: renderer.showFilter,
    hide: renderer.hideFilter,
    ...(deps.schedule === undefined ? {} : { schedule: deps.schedule }),
  });
  const session = createLaunchSession({
    items,
    source,
    executor,
    target: renderer,
    windowSize: config.rows,
    debug,
    name: config.name,
  });

  let attached = false;
  // Keeps a UTF-8 sequence split across two chunks together.
  const utf8 = new StringDecoder("utf8");

  const onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === "string" ? chunk : utf8.write(chunk);
    for (const press of decodeKeys(text)) {
      const event = keymap.value.resolve(press);
      if (event === null) continue;
      if (event.kind === "char" || event.kind === "backspace") overlay.poke();

      const outcome = session.handleKey(event);
      if (outcome.kind === "executed" || outcome.kind === "cancelled") {
        deps.onClose?.(outcome.kind);
        return;
      }
    }
  };

  const detach = (): void => {
    if (!attached) return;
    attached = false;
    stdin.off("data", onData);
    stdin.setRawMode?.(false);
    stdin.pause();
    utf8.end();
    overlay.dismiss();
    renderer.clear();
  };

  const attach = (): void => {
    if (attached) return;
    attached = true;
    stdin.setRawMode?.(true);
    stdin.on("data", onData);
    stdin.resume();
  };

  const isOpen = (): boolean => session.state() === "active";

  const open = (): boolean => {
    if (isOpen()) return false;
    renderer.drawTitle();
    session.initList();
    session.start(detach);
    attach();
    return true;
  };

  const close = (): boolean => {
    if (!isOpen()) return false;
    session.stop();
    detach();
    deps.onClose?.("closed");
    return true;
  };

  const launcher: NodeLauncher = {
    config,
    session,
    open,
    close,
    toggle: () => (isOpen() ? !close() : open()),
    isOpen,
    dispose: () => {
      close();
      session.dispose();
    },
  };
  return Object.freeze(launcher);
}
