#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runCallCommand } from "./commands/call.js";
import { runGetCommand, runKeysCommand } from "./commands/inspect.js";

const usage = [
  "stackbridge",
  "  get --file <script.lua> --global <name> [--path a.b.1] [--kind string|boolean|int32|int64|float32|float64]",
  "  keys --file <script.lua> --global <name> [--path a.b]",
  "  call --file <script.lua> --function <name|a.b.fn> [--args 1,2,text] [--results n] [--kind float64]",
].join("\n");

export const runStackbridgeCli = (argv: string[]): number => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "get") {
    return runGetCommand(rest);
  }
  if (mode === "keys") {
    return runKeysCommand(rest);
  }
  if (mode === "call") {
    return runCallCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 3 */
if (entryPath && currentPath === entryPath) {
  process.exitCode = runStackbridgeCli(process.argv.slice(2));
}
