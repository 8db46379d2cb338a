import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { compareStrings } from "@launchdeck/core";

export type ScannedFile = Readonly<{
  path: string;
  name: string;
}>;

export type ScanOptions = Readonly<{
  /** Extensions without the dot; empty or absent accepts every file. */
  extensions?: readonly string[];
  /** Descend into subdirectories. Default true. */
  recursive?: boolean;
}>;

export type ScanPlan = Readonly<{
  roots: readonly string[];
  excluded: ReadonlySet<string>;
}>;

type EntryType = "file" | "directory" | "other";

function isNodeErrorWithCode(error: unknown): error is Readonly<{ code: string }> {
  if (!error || typeof error !== "object") return false;
  const code = (error as { code?: unknown }).code;
  return typeof code === "string";
}

/** "notes.txt" → "txt"; dotfiles and names without a dot have no extension. */
export function fileExtension(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1) : "";
}

/** Split a directory list into scan roots and `-`-prefixed excluded subtrees. */
export function planScan(dirs: readonly string[]): ScanPlan {
  const roots: string[] = [];
  const excluded = new Set<string>();
  for (const dir of dirs) {
    if (dir.startsWith("-")) {
      excluded.add(resolve(dir.slice(1)));
    } else {
      roots.push(dir);
    }
  }
  return { roots, excluded };
}

async function entryType(path: string, entry: Dirent): Promise<EntryType> {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (!entry.isSymbolicLink()) return "other";
  try {
    const target = await stat(path);
    if (target.isFile()) return "file";
    if (target.isDirectory()) return "directory";
  } catch (error) {
    // Dangling links are skipped like any other non-file entry.
    if (!isNodeErrorWithCode(error)) throw error;
  }
  return "other";
}

/**
 * Regular files (symlinks followed) under `dirs`, each directory's entries in
 * name order. Missing or unreadable directories are skipped.
 */
export async function scanFiles(
  dirs: readonly string[],
  options: ScanOptions = {},
): Promise<ScannedFile[]> {
  const { roots, excluded } = planScan(dirs);
  const extensions = new Set(options.extensions ?? []);
  const recursive = options.recursive ?? true;
  const out: ScannedFile[] = [];

  const readDir = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isNodeErrorWithCode(error)) return;
      throw error;
    }
    entries.sort((a, b) => compareStrings(a.name, b.name));

    for (const entry of entries) {
      const path = join(dir, entry.name);
      const type = await entryType(path, entry);
      if (type === "file") {
        if (extensions.size === 0 || extensions.has(fileExtension(entry.name))) {
          out.push({ path, name: entry.name });
        }
      } else if (type === "directory" && recursive && !excluded.has(resolve(path))) {
        await readDir(path);
      }
    }
  };

  for (const root of roots) {
    await readDir(root);
  }
  return out;
}
