import type { SpawnOptions } from "node:child_process";
import { EventEmitter } from "node:events";
import { createDebugLog } from "@launchdeck/core";
import { assert, test } from "@launchdeck/testkit";
import { type SpawnFn, createSpawnExecutor } from "../exec/spawnExecutor.js";

type SpawnCall = Readonly<{ command: string; options: SpawnOptions }>;

function fakeSpawn() {
  const calls: SpawnCall[] = [];
  const children: EventEmitter[] = [];
  let unrefs = 0;
  const spawn: SpawnFn = (command, options) => {
    calls.push({ command, options });
    const child = new EventEmitter();
    children.push(child);
    return {
      on: (event, listener) => child.on(event, listener),
      unref: () => {
        unrefs++;
      },
    };
  };
  return { spawn, calls, children, unrefs: () => unrefs };
}

test("spawn executor runs the command line detached through the shell", () => {
  const fake = fakeSpawn();
  const executor = createSpawnExecutor({ spawn: fake.spawn });

  executor.execute('xdg-open "/docs/My Report.pdf"');

  assert.deepEqual(fake.calls, [
    {
      command: 'xdg-open "/docs/My Report.pdf"',
      options: { shell: true, detached: true, stdio: "ignore" },
    },
  ]);
  assert.equal(fake.unrefs(), 1);
});

test("spawn executor logs asynchronous spawn errors", () => {
  const fake = fakeSpawn();
  const debug = createDebugLog();
  const executor = createSpawnExecutor({ spawn: fake.spawn, debug, shell: "/bin/sh" });

  executor.execute("no-such-program");
  fake.children[0]?.emit("error", new Error("spawn /bin/sh ENOENT"));

  assert.equal(fake.calls[0]?.options.shell, "/bin/sh");
  assert.deepEqual(
    debug.query({ category: "exec" }).map((record) => record.message),
    ['"no-such-program" failed: spawn /bin/sh ENOENT'],
  );
});

test("spawn executor logs synchronous spawn failures without throwing", () => {
  const debug = createDebugLog();
  const executor = createSpawnExecutor({
    debug,
    spawn: () => {
      throw new Error("EAGAIN");
    },
  });

  executor.execute("firefox");

  assert.deepEqual(debug.query().map((record) => [record.severity, record.message, record.data]), [
    ["error", 'cannot start "firefox"', { error: "EAGAIN" }],
  ]);
});
