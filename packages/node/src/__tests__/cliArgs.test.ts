import { assert, test } from "@launchdeck/testkit";
import { parseArgs } from "../cliArgs.js";

test("parseArgs with no arguments yields an empty config", () => {
  assert.deepEqual(parseArgs([]), { config: {}, verbose: false, help: false });
});

test("parseArgs collects repeatable and comma-separated options", () => {
  const options = parseArgs([
    "--rows",
    "8",
    "--terminal=kitty",
    "--doc-dir",
    "/home/test/docs",
    "--doc-dir=-/home/test/docs/archive",
    "--doc-ext",
    "pdf,txt",
    "--doc-ext=md",
    "--bin-dir",
    "/usr/bin",
    "--exit-key",
    "ctrl+c",
    "--no-apps",
    "--no-cache",
    "--no-icons",
    "--cache-file",
    "/tmp/items",
    "--name",
    "docs",
    "-v",
  ]);

  assert.deepEqual(options, {
    config: {
      rows: 8,
      terminal: "kitty",
      docDirs: ["/home/test/docs", "-/home/test/docs/archive"],
      docExt: ["pdf", "txt", "md"],
      binDirs: ["/usr/bin"],
      exitKeys: ["ctrl+c"],
      disableApps: true,
      disableCache: true,
      disableIcons: true,
      cacheFile: "/tmp/items",
      name: "docs",
    },
    verbose: true,
    help: false,
  });
});

test("parseArgs recognizes help", () => {
  assert.equal(parseArgs(["-h"]).help, true);
  assert.equal(parseArgs(["--help"]).help, true);
});

test("parseArgs rejects bad input", () => {
  assert.throws(() => parseArgs(["--rows"]), /Missing value for --rows/);
  assert.throws(() => parseArgs(["--rows", "ten"]), /Invalid value for --rows: ten/);
  assert.throws(() => parseArgs(["--colour"]), /Unknown option: --colour/);
  assert.throws(() => parseArgs(["stray"]), /Unexpected argument: stray/);
});
