#!/usr/bin/env node

import path from "node:path";
import { fileURLToPath } from "node:url";

import { runMatchCommand } from "./commands/match.js";
import { runWatchCommand } from "./commands/watch.js";

const usage = [
  "xml-pathway",
  "  match --file <path> --pattern <p> [--pattern <p> ...] [--whitespace <mode>] [--limit <n>] [--local-names] [--verbose]",
  "  watch --file <path> --pattern <p> [--pattern <p> ...] [--whitespace <mode>] [--limit <n>] [--local-names]",
].join("\n");

export const runCli = async (argv: string[]): Promise<number> => {
  const [mode, ...rest] = argv;
  if (!mode || mode === "--help" || mode === "-h") {
    process.stdout.write(`${usage}\n`);
    return 0;
  }
  if (mode === "match") {
    return runMatchCommand(rest);
  }
  if (mode === "watch") {
    return runWatchCommand(rest);
  }
  process.stderr.write(`Unknown mode: ${mode}\n${usage}\n`);
  return 1;
};

const currentPath = fileURLToPath(import.meta.url);
const entryPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

/* v8 ignore next 11 */
if (entryPath && currentPath === entryPath) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "Unknown CLI crash.";
      process.stderr.write(`${message}\n`);
      process.exitCode = 1;
    });
}
