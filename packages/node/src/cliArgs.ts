import type { NodeLauncherConfigInput } from "./config.js";

export type CliOptions = Readonly<{
  config: NodeLauncherConfigInput;
  verbose: boolean;
  help: boolean;
}>;

type MutableConfig = {
  -readonly [K in keyof NodeLauncherConfigInput]: NodeLauncherConfigInput[K];
};

const VALUE_OPTIONS = [
  "--rows",
  "--terminal",
  "--doc-dir",
  "--doc-ext",
  "--bin-dir",
  "--bin-ext",
  "--cache-file",
  "--exit-key",
  "--name",
] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];

function isValueOption(value: string): value is ValueOption {
  return VALUE_OPTIONS.some((option) => option === value);
}

/** "pdf,txt" and repeated flags both add to the list. */
function splitList(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function parseRows(value: string): number {
  const rows = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(rows)) {
    throw new Error(`Invalid value for --rows: ${value}`);
  }
  return rows;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const config: MutableConfig = {};
  const docDirs: string[] = [];
  const docExt: string[] = [];
  const binDirs: string[] = [];
  const binExt: string[] = [];
  const exitKeys: string[] = [];
  let verbose = false;
  let help = false;

  const applyValue = (option: ValueOption, value: string): void => {
    switch (option) {
      case "--rows":
        config.rows = parseRows(value);
        return;
      case "--terminal":
        config.terminal = value;
        return;
      case "--doc-dir":
        docDirs.push(value);
        return;
      case "--doc-ext":
        docExt.push(...splitList(value));
        return;
      case "--bin-dir":
        binDirs.push(value);
        return;
      case "--bin-ext":
        binExt.push(...splitList(value));
        return;
      case "--cache-file":
        config.cacheFile = value;
        return;
      case "--exit-key":
        exitKeys.push(value);
        return;
      case "--name":
        config.name = value;
        return;
    }
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
      continue;
    }
    if (arg === "--no-apps") {
      config.disableApps = true;
      continue;
    }
    if (arg === "--no-cache") {
      config.disableCache = true;
      continue;
    }
    if (arg === "--no-icons") {
      config.disableIcons = true;
      continue;
    }
    if (isValueOption(arg)) {
      const value = argv[i + 1];
      if (!value) throw new Error(`Missing value for ${arg}`);
      applyValue(arg, value);
      i++;
      continue;
    }
    const eq = arg.indexOf("=");
    const name = eq > 0 ? arg.slice(0, eq) : "";
    if (isValueOption(name)) {
      applyValue(name, arg.slice(eq + 1));
      continue;
    }
    if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    }
    throw new Error(`Unexpected argument: ${arg}`);
  }

  if (docDirs.length > 0) config.docDirs = docDirs;
  if (docExt.length > 0) config.docExt = docExt;
  if (binDirs.length > 0) config.binDirs = binDirs;
  if (binExt.length > 0) config.binExt = binExt;
  if (exitKeys.length > 0) config.exitKeys = exitKeys;

  return { config, verbose, help };
}

export const HELP_TEXT = [
  "launchdeck",
  "",
  "Usage:",
  "  launchdeck [options]",
  "",
  "Options:",
  "  --rows <n>            Visible rows (default 10)",
  "  --terminal <cmd>      Terminal for executables (default xterm)",
  "  --doc-dir <dir>       Document directory; repeat for more, prefix with - to exclude",
  "  --doc-ext <ext,...>   Document extensions",
  "  --bin-dir <dir>       Executable directory; repeat for more",
  "  --bin-ext <ext,...>   Executable extensions",
  "  --no-apps             Skip desktop applications",
  "  --no-cache            Neither read nor write the item cache",
  "  --no-icons            Hide kind glyphs",
  "  --cache-file <path>   Item cache location",
  "  --exit-key <combo>    Extra close key such as ctrl+c; repeatable",
  "  --name <name>         Launcher name for logs and the cache file",
  "  --verbose, -v         Log loader and launch activity to stderr",
  "  --help, -h            Show this help",
  "",
  "Keys: type to filter, Backspace undoes, Up/Down move, Enter launches,",
  "F5 rescans, Escape closes.",
  "",
].join("\n");
