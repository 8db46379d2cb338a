import { EventEmitter } from "node:events";
import { type ItemInit, LaunchError } from "@launchdeck/core";
import { createRecordingExecutor, createScriptedSource } from "@launchdeck/core/testing";
import { assert, describe, test } from "@launchdeck/testkit";
import { type CloseReason, type NodeLauncherDeps, type TerminalInput, createNodeLauncher } from "../launcher.js";
import type { Scheduler } from "../terminal/filterOverlay.js";

const ITEMS: readonly ItemInit[] = [
  { kind: "application", name: "Firefox", command: "firefox" },
  { kind: "executable", name: "firefox-esr", command: "xterm -e /usr/bin/firefox-esr" },
  { kind: "document", name: "file.pdf", command: 'xdg-open "/docs/file.pdf"' },
];

function fakeInput() {
  const emitter = new EventEmitter();
  const rawModes: boolean[] = [];
  let flowing = false;
  const input: TerminalInput = {
    on: (event, listener) => emitter.on(event, listener),
    off: (event, listener) => emitter.off(event, listener),
    resume: () => {
      flowing = true;
    },
    pause: () => {
      flowing = false;
    },
    setRawMode: (mode) => {
      rawModes.push(mode);
    },
  };
  return {
    input,
    rawModes,
    type: (chunk: string) => emitter.emit("data", Buffer.from(chunk, "utf8")),
    typeBytes: (bytes: readonly number[]) => emitter.emit("data", Buffer.from(bytes)),
    listeners: () => emitter.listenerCount("data"),
    flowing: () => flowing,
  };
}

function setup(config: Parameters<typeof createNodeLauncher>[0] = {}, items = ITEMS) {
  const stdin = fakeInput();
  const writes: string[] = [];
  const source = createScriptedSource(items);
  const executor = createRecordingExecutor();
  const closes: CloseReason[] = [];
  const timers: (() => void)[] = [];
  const schedule: Scheduler = (fn) => {
    timers.push(fn);
    return () => {};
  };
  const deps: NodeLauncherDeps = {
    input: stdin.input,
    output: { write: (chunk) => writes.push(chunk) },
    env: {},
    source,
    executor,
    schedule,
    columns: 20,
    onClose: (reason) => closes.push(reason),
  };
  return { stdin, writes, source, executor, closes, timers, deps, config };
}

describe("node launcher", () => {
  test("loads the initial catalog without opening", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);

    assert.deepEqual(t.source.loads(), ["initial"]);
    assert.equal(launcher.isOpen(), false);
    assert.equal(launcher.session.catalog.size(), 3);
    assert.equal(t.writes.length, 0);
  });

  test("open grabs raw input and draws the list", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);

    assert.equal(launcher.open(), true);
    assert.equal(launcher.open(), false);

    assert.deepEqual(t.stdin.rawModes, [true]);
    assert.equal(t.stdin.listeners(), 1);
    assert.equal(t.stdin.flowing(), true);
    assert.equal(t.writes[0], "\u001b[1;1H\u001b[2Klaunchdeck          ");
    assert.equal(launcher.session.viewport().selected, 1);
  });

  test("typing, moving and enter launch the selected item", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();

    t.stdin.type("fir");
    assert.equal(launcher.session.query(), "fir");
    assert.equal(t.timers.length, 3);

    t.stdin.type("\u001b[B");
    t.stdin.type("\r");

    assert.deepEqual(t.executor.commands(), ["xterm -e /usr/bin/firefox-esr"]);
    assert.deepEqual(t.closes, ["executed"]);
    assert.equal(launcher.isOpen(), false);
    assert.deepEqual(t.stdin.rawModes, [true, false]);
    assert.equal(t.stdin.listeners(), 0);
    assert.equal(t.stdin.flowing(), false);
  });

  test("keys after a launch in the same chunk are dropped", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();

    t.stdin.type("\rxyz");

    assert.deepEqual(t.executor.commands(), ["firefox"]);
    assert.equal(launcher.session.query(), "");
  });

  test("escape and configured exit keys cancel", async () => {
    const t = setup({ exitKeys: ["ctrl+c"] });
    const launcher = await createNodeLauncher(t.config, t.deps);

    launcher.open();
    t.stdin.type("\u001b");
    launcher.open();
    t.stdin.type("\u0003");

    assert.deepEqual(t.closes, ["cancelled", "cancelled"]);
    assert.deepEqual(t.executor.commands(), []);
  });

  test("reopening starts from the empty query", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();
    t.stdin.type("fi");
    launcher.close();

    launcher.open();

    assert.equal(launcher.session.query(), "");
    assert.deepEqual(launcher.session.history(), []);
  });

  test("toggle alternates between open and closed", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);

    assert.equal(launcher.toggle(), true);
    assert.equal(launcher.toggle(), false);
    assert.equal(launcher.close(), false);
    assert.deepEqual(t.closes, ["closed"]);
  });

  test("F5 rescans through the catalog source", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();
    t.source.setItems([{ kind: "application", name: "Terminal", command: "xterm" }]);

    t.stdin.type("\u001b[15~");
    assert.equal(launcher.session.busy(), true);
    const outcome = await launcher.session.refresh();

    assert.deepEqual(outcome, { kind: "refreshed", size: 1 });
    assert.deepEqual(t.source.loads(), ["initial", "refresh"]);
    assert.equal(launcher.session.selectedItem()?.name, "Terminal");
  });

  test("a refresh that completes after close leaves the screen alone", async () => {
    const t = setup();
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();
    t.source.setItems([{ kind: "application", name: "Terminal", command: "xterm" }]);

    t.stdin.type("\u001b[15~");
    assert.equal(launcher.close(), true);
    t.writes.length = 0;

    assert.deepEqual(await launcher.session.refresh(), { kind: "refreshed", size: 1 });
    assert.deepEqual(t.writes, []);
    assert.equal(launcher.isOpen(), false);

    launcher.open();
    assert.equal(launcher.session.selectedItem()?.name, "Terminal");
  });

  test("a character split across two input chunks is decoded whole", async () => {
    const t = setup({}, [{ kind: "application", name: "Café", command: "cafe" }]);
    const launcher = await createNodeLauncher(t.config, t.deps);
    launcher.open();

    t.stdin.type("caf");
    t.stdin.typeBytes([0xc3]);
    t.stdin.typeBytes([0xa9]);

    assert.equal(launcher.session.query(), "café");
  });

  test("rejects an exit key that does not parse", async () => {
    const t = setup({ exitKeys: ["hyper+x"] });
    await assert.rejects(
      createNodeLauncher(t.config, t.deps),
      (error: unknown) =>
        error instanceof LaunchError &&
        error.code === "LAUNCH_INVALID_CONFIG" &&
        error.message === 'exitKeys: "hyper+x": "hyper" is not a valid modifier in "hyper+x"',
    );
  });
});
