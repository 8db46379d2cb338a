/**
 * packages/node/src/loader/catalogLoader.ts — File-system catalog source.
 *
 * Why: The session only knows the CatalogSource contract. This module is the
 * Node side of it: desktop applications, documents and executables are read
 * from the configured directories, and the result is kept in a cache file so
 * the next start does not have to walk the file system again.
 *
 * Cache policy:
 *   - "initial": read the cache when enabled; a missing or unparsable file
 *     falls back to a rescan
 *   - "refresh": always rescan
 *   - every rescan rewrites the cache when enabled
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  type CatalogLoadReason,
  type CatalogSource,
  type DebugLog,
  type ItemInit,
  createItem,
  createSilentDebugLog,
  describeError,
  parseCatalogCache,
  serializeCatalogCache,
} from "@launchdeck/core";
import type { NodeLauncherConfig } from "../config.js";
import { desktopEntryCommand, isLaunchableEntry, parseDesktopEntry } from "./desktopEntry.js";
import { FALLBACK_ICONS, type IconResolver, createIconResolver } from "./icons.js";
import { scanFiles } from "./scanFiles.js";

export type CatalogLoaderConfig = Pick<
  NodeLauncherConfig,
  | "terminal"
  | "disableApps"
  | "appDirs"
  | "iconDirs"
  | "disableIcons"
  | "docDirs"
  | "docExt"
  | "binDirs"
  | "binExt"
  | "disableCache"
  | "cacheFile"
>;

export type NodeCatalogLoader = CatalogSource &
  Readonly<{
    /** Walk the configured directories; does not touch the cache. */
    scan: () => Promise<ItemInit[]>;
    /** Cached items, or null when the cache is missing, disabled or unreadable. */
    readCache: () => Promise<ItemInit[] | null>;
    writeCache: (items: readonly ItemInit[]) => Promise<void>;
  }>;

export type NodeCatalogLoaderOptions = Readonly<{
  debug?: DebugLog;
  icons?: IconResolver;
}>;

function isNodeErrorWithCode(error: unknown): error is Readonly<{ code: string }> {
  if (!error || typeof error !== "object") return false;
  const code = (error as { code?: unknown }).code;
  return typeof code === "string";
}

function withIcon(init: ItemInit, iconRef: string | undefined): ItemInit {
  return iconRef === undefined ? init : { ...init, iconRef };
}

export function createNodeCatalogLoader(
  config: CatalogLoaderConfig,
  options: NodeCatalogLoaderOptions = {},
): NodeCatalogLoader {
  const debug = options.debug ?? createSilentDebugLog();
  const icons = options.icons ?? createIconResolver({ dirs: config.iconDirs });

  const icon = (name: string | undefined, fallback: string): string | undefined => {
    if (config.disableIcons) return undefined;
    return (name === undefined ? undefined : icons.resolve(name)) ?? icons.resolve(fallback);
  };

  const readApplications = async (): Promise<ItemInit[]> => {
    const files = await scanFiles(config.appDirs, { extensions: ["desktop"] });
    // Later directories override earlier ones; a hidden override removes the entry.
    const byName = new Map<string, ItemInit>();
    for (const file of files) {
      let text: string;
      try {
        text = await readFile(file.path, "utf8");
      } catch (error) {
        debug.warn("loader", `skipping unreadable desktop file ${file.path}`, {
          error: describeError(error),
        });
        continue;
      }
      const entry = parseDesktopEntry(text);
      if (entry === null) continue;
      const command = isLaunchableEntry(entry) ? desktopEntryCommand(entry, config.terminal) : null;
      if (command === null) {
        byName.delete(entry.name);
        continue;
      }
      byName.set(
        entry.name,
        withIcon(
          { kind: "application", name: entry.name, command },
          icon(entry.icon, FALLBACK_ICONS.application),
        ),
      );
    }
    return [...byName.values()];
  };

  const readDocuments = async (): Promise<ItemInit[]> => {
    const files = await scanFiles(config.docDirs, { extensions: config.docExt });
    const iconRef = icon(undefined, FALLBACK_ICONS.document);
    return files.map((file) =>
      withIcon({ kind: "document", name: file.name, command: `xdg-open "${file.path}"` }, iconRef),
    );
  };

  const readExecutables = async (): Promise<ItemInit[]> => {
    const files = await scanFiles(config.binDirs, { extensions: config.binExt, recursive: false });
    const iconRef = icon(undefined, FALLBACK_ICONS.executable);
    const seen = new Set<string>();
    const out: ItemInit[] = [];
    for (const file of files) {
      // One-character names are mostly shell builtins such as "[".
      if (file.name.length === 1 || seen.has(file.name)) continue;
      seen.add(file.name);
      out.push(
        withIcon(
          { kind: "executable", name: file.name, command: `${config.terminal} -e ${file.path}` },
          iconRef,
        ),
      );
    }
    return out;
  };

  const scan = async (): Promise<ItemInit[]> => {
    const items: ItemInit[] = [];
    if (!config.disableApps) items.push(...(await readApplications()));
    if (config.docDirs.length > 0) items.push(...(await readDocuments()));
    if (config.binDirs.length > 0) items.push(...(await readExecutables()));
    debug.info("loader", `scanned ${items.length} items`);
    return items;
  };

  const readCache = async (): Promise<ItemInit[] | null> => {
    if (config.disableCache) return null;
    let text: string;
    try {
      text = await readFile(config.cacheFile, "utf8");
    } catch (error) {
      if (isNodeErrorWithCode(error) && error.code === "ENOENT") return null;
      debug.warn("loader", `cannot read cache ${config.cacheFile}`, { error: describeError(error) });
      return null;
    }
    const parsed = parseCatalogCache(text);
    if (!parsed.ok) {
      debug.warn(
        "loader",
        `ignoring cache ${config.cacheFile}: line ${parsed.error.line}: ${parsed.error.detail}`,
      );
      return null;
    }
    debug.info("loader", `read ${parsed.value.length} items from cache ${config.cacheFile}`);
    return [...parsed.value];
  };

  const writeCache = async (items: readonly ItemInit[]): Promise<void> => {
    const text = serializeCatalogCache(items.map((init) => createItem(init)));
    await mkdir(dirname(config.cacheFile), { recursive: true });
    await writeFile(config.cacheFile, text, "utf8");
    debug.info("loader", `wrote ${items.length} items to cache ${config.cacheFile}`);
  };

  const rescan = async (): Promise<ItemInit[]> => {
    const items = await scan();
    if (!config.disableCache) {
      try {
        await writeCache(items);
      } catch (error) {
        debug.warn("loader", `cannot write cache ${config.cacheFile}`, {
          error: describeError(error),
        });
      }
    }
    return items;
  };

  const load = async (reason: CatalogLoadReason): Promise<readonly ItemInit[]> => {
    if (reason === "initial") {
      const cached = await readCache();
      if (cached !== null) return cached;
    }
    return rescan();
  };

  return Object.freeze({ load, scan, readCache, writeCache });
}
