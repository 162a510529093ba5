/*
Purpose: decide whether a single log line looks like an error, and which pattern said so.
Assumptions: the pattern table is compiled once per process and shared read-only across tasks.
Usage: const table = defaultPatternTable(); classifyLine(table, line) -> "error-keyword" | null.
*/

import { z } from "zod";

import patternData from "./error-patterns.json" with { type: "json" };

// =============================================================================
// TYPES
// =============================================================================

export type PatternName = string;

export type ErrorPattern = {
  readonly name: PatternName;
  readonly group: string;
  readonly regex: RegExp;
};

export type PatternTable = {
  readonly patterns: readonly ErrorPattern[];
};

const PatternEntrySchema = z
  .object({
    name: z.string().min(1),
    group: z.string().min(1),
    pattern: z.string().min(1),
    flags: z
      .string()
      .regex(/^[imsu]*$/, "flags may only contain i, m, s or u")
      .optional(),
  })
  .strict();

const PatternFileSchema = z.array(PatternEntrySchema).min(1);

export type PatternEntry = z.infer<typeof PatternEntrySchema>;

// Checked by the caller after the table: "exit code" followed later by a non-zero digit.
export const EXIT_CODE_PATTERN_NAME = "exit-code";
const EXIT_CODE_REGEX = /exit code.*[1-9]/i;

// =============================================================================
// TABLE
// =============================================================================

export function compilePatternTable(entries: unknown): PatternTable {
  const parsed = PatternFileSchema.safeParse(entries);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid error pattern table: ${details}`);
  }

  const seen = new Set<string>();
  const patterns = parsed.data.map((entry) => {
    if (seen.has(entry.name)) {
      throw new Error(`Invalid error pattern table: duplicate pattern name "${entry.name}"`);
    }
    seen.add(entry.name);

    let regex: RegExp;
    try {
      regex = new RegExp(entry.pattern, entry.flags);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid error pattern "${entry.name}": ${detail}`);
    }

    return Object.freeze({ name: entry.name, group: entry.group, regex });
  });

  return Object.freeze({ patterns: Object.freeze(patterns) });
}

let defaultTable: PatternTable | undefined;

export function defaultPatternTable(): PatternTable {
  defaultTable ??= compilePatternTable(patternData);
  return defaultTable;
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

// First match in table order wins.
export function classify(table: PatternTable, line: string): PatternName | null {
  for (const pattern of table.patterns) {
    if (pattern.regex.test(line)) {
      return pattern.name;
    }
  }
  return null;
}

export function classifyLine(table: PatternTable, line: string): PatternName | null {
  const name = classify(table, line);
  if (name !== null) return name;
  return EXIT_CODE_REGEX.test(line) ? EXIT_CODE_PATTERN_NAME : null;
}
