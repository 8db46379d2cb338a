import { assert, describe, test } from "@launchdeck/testkit";
import { createCatalog } from "../../catalog/catalog.js";
import { type Item, type ItemInit, createItem } from "../../catalog/item.js";
import { createFilterEngine, scanItems } from "../filterEngine.js";

const SCENARIO_ITEMS: readonly ItemInit[] = [
  { kind: "application", name: "Firefox", command: "firefox" },
  { kind: "executable", name: "firefox-esr", command: "xterm -e /usr/bin/firefox-esr" },
  { kind: "document", name: "file.pdf", command: 'xdg-open "/docs/file.pdf"' },
];

function catalogOf(inits: readonly ItemInit[]) {
  return createCatalog(inits.map((init) => createItem(init)));
}

function names(items: readonly Item[]): string[] {
  return items.map((item) => item.name);
}

describe("filter engine", () => {
  test("empty query returns the catalog order without scanning", () => {
    const catalog = catalogOf(SCENARIO_ITEMS);
    const engine = createFilterEngine(catalog);

    const result = engine.filter("", "anything");

    assert.equal(result.kind, "accepted");
    if (result.kind !== "accepted") return;
    assert.equal(result.source, "cache");
    assert.equal(result.items, catalog.all());
    assert.deepEqual(names(result.items), ["Firefox", "firefox-esr", "file.pdf"]);
    assert.equal(engine.stats().scans, 0);
  });

  test("incremental typing narrows to the two firefox entries", () => {
    const engine = createFilterEngine(catalogOf(SCENARIO_ITEMS));

    const f = engine.filter("f", "");
    const fi = engine.filter("fi", "f");
    const fir = engine.filter("fir", "fi");
    const fire = engine.filter("fire", "fir");

    assert.equal(f.kind, "accepted");
    if (f.kind !== "accepted") return;
    assert.deepEqual(names(f.items), ["file.pdf", "Firefox", "firefox-esr"]);

    assert.equal(fi.kind, "accepted");
    assert.equal(fir.kind, "accepted");
    if (fir.kind !== "accepted") return;
    assert.deepEqual(names(fir.items), ["Firefox", "firefox-esr"]);

    assert.equal(fire.kind, "accepted");
    if (fire.kind !== "accepted") return;
    assert.deepEqual(names(fire.items), ["Firefox", "firefox-esr"]);
    assert.equal(fire.scanned, 2);
  });

  test("earlier match offset ranks first, ties broken by folded name", () => {
    const engine = createFilterEngine(
      catalogOf([
        { kind: "application", name: "Redfox", command: "redfox" },
        { kind: "application", name: "Firefox", command: "firefox" },
        { kind: "application", name: "Foxtrot", command: "foxtrot" },
        { kind: "application", name: "foxglove", command: "foxglove" },
      ]),
    );

    const result = engine.filter("fox", "");

    assert.equal(result.kind, "accepted");
    if (result.kind !== "accepted") return;
    assert.deepEqual(names(result.items), ["foxglove", "Foxtrot", "Redfox", "Firefox"]);
  });

  test("a query with no match is rejected and remembered", () => {
    const engine = createFilterEngine(catalogOf(SCENARIO_ITEMS));
    engine.filter("f", "");

    const first = engine.filter("fz", "f");
    const second = engine.filter("fz", "f");

    assert.deepEqual(first, { kind: "rejected", source: "scan", scanned: 3 });
    assert.deepEqual(second, { kind: "rejected", source: "negative-cache", scanned: 0 });
    assert.equal(engine.isRejected("fz"), true);
    assert.equal(engine.has("fz"), false);
    assert.equal(engine.stats().negativeHits, 1);
  });

  test("repeating a query returns the identical cached list", () => {
    const engine = createFilterEngine(catalogOf(SCENARIO_ITEMS));

    const first = engine.filter("fire", "");
    const second = engine.filter("fire", "");

    assert.equal(first.kind, "accepted");
    assert.equal(second.kind, "accepted");
    if (first.kind !== "accepted" || second.kind !== "accepted") return;
    assert.equal(second.items, first.items);
    assert.equal(second.source, "cache");
    assert.equal(engine.stats().scans, 1);
    assert.equal(engine.stats().hits, 1);
  });

  test("uses the previous query's result as the search space", () => {
    const engine = createFilterEngine(
      catalogOf([
        { kind: "application", name: "Calculator", command: "calc" },
        { kind: "application", name: "Calendar", command: "cal" },
        { kind: "application", name: "Terminal", command: "term" },
        { kind: "application", name: "Editor", command: "edit" },
        { kind: "application", name: "Mail", command: "mail" },
      ]),
    );

    const ca = engine.filter("ca", "");
    const cal = engine.filter("cal", "ca");

    assert.equal(ca.kind, "accepted");
    if (ca.kind !== "accepted") return;
    assert.equal(ca.scanned, 5);
    assert.deepEqual(names(ca.items), ["Calculator", "Calendar"]);

    assert.equal(cal.kind, "accepted");
    if (cal.kind !== "accepted") return;
    assert.equal(cal.scanned, 2);
    assert.deepEqual(engine.stats(), { hits: 0, negativeHits: 0, scans: 2, scannedItems: 7 });
  });

  test("falls back to the catalog when the previous query is not cached", () => {
    const engine = createFilterEngine(catalogOf(SCENARIO_ITEMS));
    const result = engine.filter("esr", "never-typed");
    assert.equal(result.kind, "accepted");
    if (result.kind !== "accepted") return;
    assert.equal(result.scanned, 3);
    assert.deepEqual(names(result.items), ["firefox-esr"]);
  });

  test("incremental results equal a direct scan of the catalog", () => {
    const catalog = catalogOf([
      { kind: "application", name: "Text Editor", command: "a" },
      { kind: "application", name: "Terminal", command: "b" },
      { kind: "executable", name: "tee", command: "c" },
      { kind: "executable", name: "test", command: "d" },
      { kind: "executable", name: "testparm", command: "e" },
      { kind: "document", name: "latest-notes.txt", command: "f" },
      { kind: "document", name: "attest.md", command: "g" },
    ]);
    const engine = createFilterEngine(catalog);

    let previous = "";
    for (const char of "test") {
      const query = previous + char;
      const result = engine.filter(query, previous);
      assert.equal(result.kind, "accepted");
      if (result.kind !== "accepted") return;
      assert.deepEqual(names(result.items), names(scanItems(catalog.all(), query)));
      previous = query;
    }

    const final = engine.filter("test", "tes");
    assert.equal(final.kind, "accepted");
    if (final.kind !== "accepted") return;
    assert.deepEqual(names(final.items), [
      "test",
      "testparm",
      "attest.md",
      "latest-notes.txt",
    ]);
  });

  test("a catalog rebuild clears both caches", () => {
    const catalog = catalogOf(SCENARIO_ITEMS);
    const engine = createFilterEngine(catalog);
    engine.filter("fire", "");
    engine.filter("firez", "fire");
    assert.equal(engine.isRejected("firez"), true);

    catalog.rebuild([createItem({ kind: "application", name: "Firez Viewer", command: "firez" })]);

    assert.equal(engine.isRejected("firez"), false);
    assert.equal(engine.has("fire"), false);
    assert.deepEqual(engine.cachedQueries(), [""]);
    const result = engine.filter("firez", "fire");
    assert.equal(result.kind, "accepted");
    if (result.kind !== "accepted") return;
    assert.deepEqual(names(result.items), ["Firez Viewer"]);
  });

  test("dispose stops following catalog rebuilds", () => {
    const catalog = catalogOf(SCENARIO_ITEMS);
    const engine = createFilterEngine(catalog);
    engine.filter("fire", "");
    engine.dispose();

    catalog.rebuild([]);

    assert.equal(engine.has("fire"), true);
  });
});
