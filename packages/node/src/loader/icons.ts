import { existsSync } from "node:fs";
import { isAbsolute, join } from "node:path";

const ICON_EXTENSIONS: readonly string[] = Object.freeze(["png", "svg", "xpm"]);

/** Icon names used when an item brings none of its own. */
export const FALLBACK_ICONS = Object.freeze({
  application: "applications-other",
  executable: "applications-all",
  document: "gnome-documents",
});

export type IconResolver = Readonly<{
  /** Path of the first `<dir>/<name>.<ext>` found, or the name itself when it is an existing absolute path. */
  resolve: (name: string) => string | undefined;
}>;

export type IconResolverOptions = Readonly<{
  dirs: readonly string[];
  exists?: (path: string) => boolean;
}>;

/** Lookups are memoized, misses included. */
export function createIconResolver(options: IconResolverOptions): IconResolver {
  const exists = options.exists ?? existsSync;
  const memo = new Map<string, string | null>();

  const lookup = (name: string): string | null => {
    if (isAbsolute(name)) return exists(name) ? name : null;
    for (const dir of options.dirs) {
      for (const ext of ICON_EXTENSIONS) {
        const candidate = join(dir, `${name}.${ext}`);
        if (exists(candidate)) return candidate;
      }
    }
    return null;
  };

  return Object.freeze({
    resolve: (name: string) => {
      let found = memo.get(name);
      if (found === undefined) {
        found = lookup(name);
        memo.set(name, found);
      }
      return found ?? undefined;
    },
  });
}
