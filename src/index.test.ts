import { CommanderError } from "commander";
import { afterEach, describe, expect, it, vi } from "vitest";

import { buildCli } from "./cli/index.js";
import { main } from "./index.js";

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe("buildCli", () => {
  it("registers the logs command and global options", () => {
    const program = buildCli();

    expect(program.name()).toBe("prsweep");
    expect(program.commands.map((command) => command.name())).toEqual(["logs"]);
    expect(program.options.map((option) => option.long)).toEqual([
      "--version",
      "--config",
      "--log-file",
      "--debug",
    ]);
  });

  it("throws parse failures from subcommands instead of exiting", async () => {
    const program = buildCli();

    await expect(
      program.parseAsync(["node", "prsweep", "logs", "--concurrency", "0"]),
    ).rejects.toBeInstanceOf(CommanderError);
  });
});

describe("main", () => {
  it("exits cleanly after printing the version", async () => {
    const writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await main(["node", "prsweep", "--version"]);

    expect(writeSpy).toHaveBeenCalledWith("0.1.0\n");
    expect(errorSpy).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(0);
  });

  it("renders invalid option values as usage errors", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await main(["node", "prsweep", "logs", "--concurrency", "0"]);

    const output = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(output.split("\n")[0]).toContain("Invalid command usage.");
    expect(output).toContain("Expected a positive integer.");
    expect(process.exitCode).toBe(1);
  });

  it("reports a missing config file before doing any work", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await main(["node", "prsweep", "--config", "/nonexistent/prsweep.yaml", "logs", "1", "-r", "a/b"]);

    const output = String(errorSpy.mock.calls[0]?.[0] ?? "");
    expect(output).toContain("Config file missing.");
    expect(output).toContain("Config file not found at /nonexistent/prsweep.yaml.");
    expect(process.exitCode).toBe(1);
  });
});
