/*
Purpose: render errors and warnings for prsweep's terminal output, colored only on a TTY.
Assumptions: stderr is the default stream; commander usage errors are shown as input errors.
Usage: console.error(renderCliError(err, { debug })); console.error(renderCliWarning(text));
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const USAGE_HINT = "Run `prsweep --help` or `prsweep logs --help` for usage.";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(normalizeCliError(error), { mode });
  const format = resolveFormatter(options);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function renderCliWarning(message: string, options: CliErrorFormatOptions = {}): string {
  const format = resolveFormatter(options);
  return message.startsWith("Warning:")
    ? `${format("Warning:", ["yellow", "bold"])}${message.slice("Warning:".length)}`
    : `${format("Warning:", ["yellow", "bold"])} ${message}`;
}

// Commander usage failures (unknown option, bad argument) become input errors.
export function normalizeCliError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Invalid command usage.",
    message: error.message.replace(/^error:\s*/i, ""),
    hint: USAGE_HINT,
    cause: error,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveFormatter(options: CliErrorFormatOptions): AnsiFormatter {
  const stream = options.stream ?? process.stderr;
  return createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
    default:
      return line.text;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
