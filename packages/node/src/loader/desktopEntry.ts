/**
 * packages/node/src/loader/desktopEntry.ts — `.desktop` file reading.
 *
 * Only the `[Desktop Entry]` group is read, and only the unlocalized keys the
 * launcher needs. Localized variants such as `Name[de]` are ignored.
 */

export type DesktopEntry = Readonly<{
  name: string;
  exec?: string;
  icon?: string;
  type?: string;
  noDisplay: boolean;
  hidden: boolean;
  terminal: boolean;
}>;

const MAIN_GROUP = "[Desktop Entry]";

/** Field codes from the desktop entry spec; `%%` is a literal percent sign. */
const FIELD_CODE = /%[fFuUdDnNickvm]/g;

function parseBool(value: string | undefined): boolean {
  return value?.trim().toLowerCase() === "true";
}

/**
 * Parse the main group of a desktop file. Returns null when the file has no
 * main group or no `Name`.
 */
export function parseDesktopEntry(text: string): DesktopEntry | null {
  const fields = new Map<string, string>();
  let inMain = false;
  let sawMain = false;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    if (line.startsWith("[")) {
      inMain = line === MAIN_GROUP;
      if (inMain) sawMain = true;
      continue;
    }
    if (!inMain) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    // First occurrence wins.
    if (!fields.has(key)) fields.set(key, line.slice(eq + 1).trim());
  }

  const name = fields.get("Name");
  if (!sawMain || name === undefined || name.length === 0) return null;

  const exec = fields.get("Exec");
  const icon = fields.get("Icon");
  const type = fields.get("Type");
  return Object.freeze({
    name,
    ...(exec === undefined || exec.length === 0 ? {} : { exec }),
    ...(icon === undefined || icon.length === 0 ? {} : { icon }),
    ...(type === undefined ? {} : { type }),
    noDisplay: parseBool(fields.get("NoDisplay")),
    hidden: parseBool(fields.get("Hidden")),
    terminal: parseBool(fields.get("Terminal")),
  });
}

/** Whether the entry belongs in the launcher at all. */
export function isLaunchableEntry(entry: DesktopEntry): boolean {
  return (
    entry.type === "Application" && !entry.noDisplay && !entry.hidden && entry.exec !== undefined
  );
}

/** Drop field codes from an `Exec` value and collapse the leftover whitespace. */
export function stripFieldCodes(exec: string): string {
  return exec
    .split("%%")
    .map((part) => part.replace(FIELD_CODE, ""))
    .join("%")
    .replace(/\s+/g, " ")
    .trim();
}

/** Command line for a launchable entry; `Terminal=true` runs it inside `terminal`. */
export function desktopEntryCommand(entry: DesktopEntry, terminal: string): string | null {
  if (entry.exec === undefined) return null;
  const command = stripFieldCodes(entry.exec);
  if (command.length === 0) return null;
  return entry.terminal ? `${terminal} -e ${command}` : command;
}
