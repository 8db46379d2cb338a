/**
 * packages/core/src/catalog/cacheFile.ts — Persisted catalog cache codec.
 *
 * Format: one line per item, each a run of `field:value,` tokens.
 *
 *   type:1,name:Firefox,name_lower:firefox,cmdline:firefox %u,icon_path:/x/firefox.png,
 *
 * Recognized fields: type (1 application, 2 executable, 3 document), name,
 * name_lower, cmdline, icon_path. Values are not escaped, so a value holding
 * "," or ":" leaves text between tokens and the parse fails at that line.
 * The loader owns the file; this module only converts between text and
 * ItemInit records.
 */

import { ITEM_KIND_RANK, type Item, type ItemInit, itemKindFromRank } from "./item.js";

export type CatalogCacheParseError = Readonly<{
  /** 1-based line number */
  line: number;
  detail: string;
}>;

export type CatalogCacheParseResult =
  | Readonly<{ ok: true; value: readonly ItemInit[] }>
  | Readonly<{ ok: false; error: CatalogCacheParseError }>;

const TOKEN_PATTERN = /([^,:]+):([^,:]+),/y;

function formatToken(field: string, value: string): string {
  return `${field}:${value},`;
}

export function serializeCatalogItem(item: Item): string {
  let line =
    formatToken("type", String(ITEM_KIND_RANK[item.kind])) +
    formatToken("name", item.name) +
    formatToken("name_lower", item.matchKey) +
    formatToken("cmdline", item.command);
  if (item.iconRef !== undefined) {
    line += formatToken("icon_path", item.iconRef);
  }
  return line;
}

export function serializeCatalogCache(items: readonly Item[]): string {
  let out = "";
  for (const item of items) {
    out += `${serializeCatalogItem(item)}\n`;
  }
  return out;
}

function fail(line: number, detail: string): CatalogCacheParseResult {
  return { ok: false, error: { line, detail } };
}

/**
 * Parse cache text into loader records.
 * Any malformed line fails the whole parse; callers treat that as a cache miss.
 */
export function parseCatalogCache(text: string): CatalogCacheParseResult {
  const lines = text.split(/\r?\n/);
  const out: ItemInit[] = [];

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    if (raw === undefined || raw.trim().length === 0) continue;
    const lineNo = i + 1;

    const fields = new Map<string, string>();
    const line = raw.trimEnd();
    let pos = 0;
    while (pos < line.length) {
      TOKEN_PATTERN.lastIndex = pos;
      const match = TOKEN_PATTERN.exec(line);
      const key = match?.[1];
      const value = match?.[2];
      if (key === undefined || value === undefined) {
        return fail(lineNo, `unexpected text at column ${pos + 1}`);
      }
      fields.set(key, value);
      pos = TOKEN_PATTERN.lastIndex;
    }

    const typeText = fields.get("type");
    const kind = typeText === undefined ? null : itemKindFromRank(Number(typeText));
    if (kind === null) {
      return fail(lineNo, `invalid or missing type "${typeText ?? ""}"`);
    }
    const name = fields.get("name");
    if (name === undefined) return fail(lineNo, "missing name");
    const command = fields.get("cmdline");
    if (command === undefined) return fail(lineNo, `missing cmdline for "${name}"`);

    const matchKey = fields.get("name_lower");
    const iconRef = fields.get("icon_path");
    out.push(
      Object.freeze({
        kind,
        name,
        command,
        ...(matchKey === undefined ? {} : { matchKey }),
        ...(iconRef === undefined ? {} : { iconRef }),
      }),
    );
  }

  return { ok: true, value: Object.freeze(out) };
}
