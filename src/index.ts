#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { CommanderError } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

const CLEAN_EXIT_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

export async function main(argv: string[]): Promise<void> {
  try {
    await buildCli().parseAsync(argv);
  } catch (error) {
    process.exitCode = reportFailure(error, argv);
  }
}

function reportFailure(error: unknown, argv: string[]): number {
  if (error instanceof CommanderError && CLEAN_EXIT_CODES.has(error.code)) {
    return error.exitCode;
  }

  console.error(renderCliError(error, { debug: hasDebugFlag(argv) }));
  if (error instanceof CommanderError && error.exitCode > 0) {
    return error.exitCode;
  }
  return 1;
}

// Read from argv so that --debug also applies to errors raised while parsing.
function hasDebugFlag(argv: string[]): boolean {
  const end = argv.indexOf("--");
  return (end === -1 ? argv : argv.slice(0, end)).includes("--debug");
}

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}
