import { Command } from "commander";

import { DEFAULT_CONFIG_FILENAME } from "../core/config-loader.js";

import { registerLogsCommand } from "./logs.js";

export const CLI_VERSION = "0.1.0";

// Parse failures throw a CommanderError instead of exiting, and commander
// prints nothing itself; `main` renders the error. Subcommands inherit both.
export function buildCli(): Command {
  const program = new Command();

  program
    .name("prsweep")
    .description("Find pull requests with failing CI and pull the error lines out of their build logs")
    .version(CLI_VERSION)
    .option(
      "--config <path>",
      `Config file path (defaults to ./${DEFAULT_CONFIG_FILENAME} when present)`,
    )
    .option("--log-file <path>", "Append structured JSONL events to this file")
    .option("--debug", "Echo events to stderr and show error details", false)
    .exitOverride()
    .configureOutput({ outputError: () => undefined });

  registerLogsCommand(program);

  return program;
}
