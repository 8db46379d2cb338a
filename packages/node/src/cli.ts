#!/usr/bin/env node
import { resolve } from "node:path";
import { exit, stderr, stdout } from "node:process";
import { fileURLToPath } from "node:url";
import { createConsoleSink, createDebugLog } from "@launchdeck/core";
import { HELP_TEXT, parseArgs } from "./cliArgs.js";
import { type CloseReason, createNodeLauncher } from "./launcher.js";

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    stdout.write(HELP_TEXT);
    return;
  }

  const minSeverity = options.verbose ? "info" : "warn";
  const debug = createDebugLog({ minSeverity });
  debug.subscribe(createConsoleSink(minSeverity));

  let closed: (reason: CloseReason) => void = () => {};
  const done = new Promise<CloseReason>((resolveDone) => {
    closed = resolveDone;
  });

  const launcher = await createNodeLauncher(options.config, {
    debug,
    columns: stdout.columns,
    onClose: (reason) => closed(reason),
  });
  process.once("SIGTERM", () => launcher.close());
  launcher.open();

  const reason = await done;
  launcher.dispose();
  if (reason !== "executed") stdout.write("\n");
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  main().catch((err) => {
    stderr.write(`launchdeck error: ${err instanceof Error ? err.message : String(err)}\n`);
    exit(1);
  });
}
