import { classifyLine, type PatternName, type PatternTable } from "./line-classifier.js";

export const MAX_ERROR_LINES = 20;
export const MAX_LINES = 1000;
export const MAX_LINE_LENGTH = 500;
export const TRUNCATION_MARKER = "... (truncated)";

// Per-task accumulator. Owned by a single fetch pipeline until it is finalized.
export type TaskState = {
  lineCount: number;
  errorCount: number;
  errorLines: string[];
  patternMatchCounts: Map<PatternName, number>;
};

export function createTaskState(): TaskState {
  return {
    lineCount: 0,
    errorCount: 0,
    errorLines: [],
    patternMatchCounts: new Map(),
  };
}

/**
 * Feeds one line into the task state.
 *
 * @returns false once the task has seen enough: either MAX_ERROR_LINES matches
 * (the truncation marker is appended) or MAX_LINES lines read.
 */
export function consumeLine(state: TaskState, line: string, table: PatternTable): boolean {
  state.lineCount += 1;

  const trimmed = line.trim();
  if (trimmed.length === 0 || line.length > MAX_LINE_LENGTH) {
    return state.lineCount < MAX_LINES;
  }

  const pattern = classifyLine(table, line);
  if (pattern !== null) {
    state.errorLines.push(trimmed);
    state.errorCount += 1;
    state.patternMatchCounts.set(pattern, (state.patternMatchCounts.get(pattern) ?? 0) + 1);

    if (state.errorCount >= MAX_ERROR_LINES) {
      state.errorLines.push(TRUNCATION_MARKER);
      return false;
    }
  }

  return state.lineCount < MAX_LINES;
}

export function patternStats(state: TaskState): Record<PatternName, number> {
  return Object.fromEntries(
    [...state.patternMatchCounts.entries()].sort(([a], [b]) => a.localeCompare(b)),
  );
}
