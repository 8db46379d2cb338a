/**
 * @launchdeck/node
 *
 * Node.js side of the launcher: file-system catalog loading, process
 * spawning, ANSI rendering and raw-terminal key input.
 */

export {
  ANSI_COLOR_NAMES,
  type AnsiColorName,
  DEFAULT_COLORS,
  DEFAULT_LAUNCHER_NAME,
  DEFAULT_TERMINAL,
  type EnvMap,
  type LauncherColors,
  type NodeLauncherConfig,
  type NodeLauncherConfigInput,
  cacheFileName,
  resolveNodeLauncherConfig,
} from "./config.js";

export {
  type ScanOptions,
  type ScanPlan,
  type ScannedFile,
  fileExtension,
  planScan,
  scanFiles,
} from "./loader/scanFiles.js";

export {
  type DesktopEntry,
  desktopEntryCommand,
  isLaunchableEntry,
  parseDesktopEntry,
  stripFieldCodes,
} from "./loader/desktopEntry.js";

export {
  FALLBACK_ICONS,
  type IconResolver,
  type IconResolverOptions,
  createIconResolver,
} from "./loader/icons.js";

export {
  type CatalogLoaderConfig,
  type NodeCatalogLoader,
  type NodeCatalogLoaderOptions,
  createNodeCatalogLoader,
} from "./loader/catalogLoader.js";

export {
  type SpawnExecutorOptions,
  type SpawnFn,
  type SpawnedProcess,
  createSpawnExecutor,
} from "./exec/spawnExecutor.js";

export {
  type AnsiRenderer,
  type AnsiRendererOptions,
  KIND_GLYPHS,
  type TerminalOutput,
  createAnsiRenderer,
  moveTo,
  sgr,
} from "./terminal/ansiRenderer.js";

export { decodeKeys } from "./terminal/keyDecoder.js";

export {
  FILTER_HIDE_DELAY_MS,
  type FilterOverlay,
  type FilterOverlayOptions,
  type Scheduler,
  createFilterOverlay,
  scheduleWithTimeout,
} from "./terminal/filterOverlay.js";

export {
  type CloseReason,
  type NodeLauncher,
  type NodeLauncherDeps,
  type TerminalInput,
  createNodeLauncher,
} from "./launcher.js";

export { type CliOptions, HELP_TEXT, parseArgs } from "./cliArgs.js";
