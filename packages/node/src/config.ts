/**
 * packages/node/src/config.ts — Node launcher configuration.
 *
 * Why: Options arrive from the CLI or from embedding code as loose partial
 * objects. They are merged with defaults and validated once, so the loader,
 * renderer and executor only ever see a complete, frozen config.
 */

import { DEFAULT_WINDOW_SIZE, LaunchError, resolveWindowSize } from "@launchdeck/core";
import { join } from "node:path";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export const ANSI_COLOR_NAMES = [
  "default",
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
] as const;

export type AnsiColorName = (typeof ANSI_COLOR_NAMES)[number];

export type LauncherColors = Readonly<{
  fg: AnsiColorName;
  bg: AnsiColorName;
  fgFocus: AnsiColorName;
  bgFocus: AnsiColorName;
}>;

export type NodeLauncherConfig = Readonly<{
  /** Used in log messages and in the default cache file name. */
  name: string;
  rows: number;
  /** Terminal emulator used for executables and `Terminal=true` apps. */
  terminal: string;
  disableApps: boolean;
  /** Searched in order; later directories override earlier ones by `Name`. */
  appDirs: readonly string[];
  iconDirs: readonly string[];
  disableIcons: boolean;
  /** `-`-prefixed entries exclude a subtree. */
  docDirs: readonly string[];
  /** Empty means every file. */
  docExt: readonly string[];
  binDirs: readonly string[];
  binExt: readonly string[];
  disableCache: boolean;
  cacheFile: string;
  /** Combos that close the launcher in addition to escape, e.g. "ctrl+c". */
  exitKeys: readonly string[];
  colors: LauncherColors;
  noColor: boolean;
}>;

export type NodeLauncherConfigInput = Partial<Omit<NodeLauncherConfig, "colors">> &
  Readonly<{ colors?: Partial<LauncherColors> }>;

export const DEFAULT_TERMINAL = "xterm";
export const DEFAULT_LAUNCHER_NAME = "launchdeck";

export const DEFAULT_COLORS: LauncherColors = Object.freeze({
  fg: "default",
  bg: "default",
  fgFocus: "black",
  bgFocus: "cyan",
});

const SYSTEM_APP_DIR = "/usr/share/applications";
const DEFAULT_ICON_DIRS: readonly string[] = Object.freeze([
  "/usr/share/icons/hicolor/48x48/apps",
  "/usr/share/pixmaps",
]);

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function invalid(field: string, detail: string): never {
  throw new LaunchError("LAUNCH_INVALID_CONFIG", `${field}: ${detail}`);
}

function isAnsiColorName(value: unknown): value is AnsiColorName {
  return typeof value === "string" && ANSI_COLOR_NAMES.some((name) => name === value);
}

function readString(field: string, value: unknown, fallback: string): string {
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value.trim().length === 0) {
    invalid(field, "must be a non-empty string");
  }
  return value;
}

function readBoolean(field: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") invalid(field, "must be a boolean");
  return value;
}

function readStringList(field: string, value: unknown, fallback: readonly string[]): readonly string[] {
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) invalid(field, "must be an array of strings");
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || entry.length === 0) {
      invalid(field, "must contain non-empty strings only");
    }
    out.push(entry);
  }
  return Object.freeze(out);
}

/** Extensions are compared without the leading dot. */
function readExtensions(field: string, value: unknown): readonly string[] {
  const list = readStringList(field, value, []);
  return Object.freeze(list.map((ext) => (ext.startsWith(".") ? ext.slice(1) : ext)));
}

function readColor(field: string, value: unknown, fallback: AnsiColorName): AnsiColorName {
  if (value === undefined) return fallback;
  if (!isAnsiColorName(value)) {
    invalid(field, `must be one of ${ANSI_COLOR_NAMES.join(", ")}`);
  }
  return value;
}

/** Non-letters become "x" so any launcher name gives a safe file name. */
export function cacheFileName(name: string): string {
  return `launchdeck_${name.replace(/[^A-Za-z]/g, "x")}`;
}

export function resolveNodeLauncherConfig(
  input: NodeLauncherConfigInput = {},
  env: EnvMap = {},
): NodeLauncherConfig {
  const home = envText(env, "HOME");
  const name = readString("name", input.name, DEFAULT_LAUNCHER_NAME);

  let rows: number;
  try {
    rows = resolveWindowSize(input.rows ?? DEFAULT_WINDOW_SIZE);
  } catch (error) {
    if (error instanceof LaunchError) invalid("rows", error.message);
    throw error;
  }

  const defaultAppDirs =
    home === undefined ? [SYSTEM_APP_DIR] : [SYSTEM_APP_DIR, join(home, ".local/share/applications")];

  let cacheFile = input.cacheFile;
  if (cacheFile === undefined) {
    const base = home === undefined ? ".cache" : join(home, ".cache");
    cacheFile = join(base, "launchdeck", cacheFileName(name));
  }

  const colors = input.colors ?? {};

  const config: NodeLauncherConfig = {
    name,
    rows,
    terminal: readString("terminal", input.terminal, DEFAULT_TERMINAL),
    disableApps: readBoolean("disableApps", input.disableApps, false),
    appDirs: readStringList("appDirs", input.appDirs, defaultAppDirs),
    iconDirs: readStringList("iconDirs", input.iconDirs, DEFAULT_ICON_DIRS),
    disableIcons: readBoolean("disableIcons", input.disableIcons, false),
    docDirs: readStringList("docDirs", input.docDirs, []),
    docExt: readExtensions("docExt", input.docExt),
    binDirs: readStringList("binDirs", input.binDirs, []),
    binExt: readExtensions("binExt", input.binExt),
    disableCache: readBoolean("disableCache", input.disableCache, false),
    cacheFile: readString("cacheFile", cacheFile, cacheFile),
    exitKeys: readStringList("exitKeys", input.exitKeys, []),
    colors: Object.freeze({
      fg: readColor("colors.fg", colors.fg, DEFAULT_COLORS.fg),
      bg: readColor("colors.bg", colors.bg, DEFAULT_COLORS.bg),
      fgFocus: readColor("colors.fgFocus", colors.fgFocus, DEFAULT_COLORS.fgFocus),
      bgFocus: readColor("colors.bgFocus", colors.bgFocus, DEFAULT_COLORS.bgFocus),
    }),
    noColor: readBoolean("noColor", input.noColor, envText(env, "NO_COLOR") !== undefined),
  };
  return Object.freeze(config);
}
