import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T> | T): Promise<T> {
  const dir = mkdtempSync(join(tmpdir(), "launchdeck-test-"));
  try {
    return await fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Write a tree of files below `root`. Keys are relative paths; parent
 * directories are created as needed. Returns the absolute paths written.
 */
export function writeTree(root: string, files: Readonly<Record<string, string>>): string[] {
  const written: string[] = [];
  for (const [relPath, content] of Object.entries(files)) {
    const file = join(root, relPath);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, content, "utf8");
    written.push(file);
  }
  return written;
}
