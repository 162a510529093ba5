import { describe, expect, it } from "vitest";

import { defaultPatternTable } from "./line-classifier.js";
import {
  MAX_LINES,
  TRUNCATION_MARKER,
  consumeLine,
  createTaskState,
  patternStats,
  type TaskState,
} from "./task-state.js";

const table = defaultPatternTable();

function feed(state: TaskState, lines: string[]): number {
  let consumed = 0;
  for (const line of lines) {
    consumed += 1;
    if (!consumeLine(state, line, table)) break;
  }
  return consumed;
}

describe("consumeLine", () => {
  it("collects trimmed error lines in order", () => {
    const state = createTaskState();

    feed(state, ["INFO starting", "  ERROR: build failed  ", "INFO done"]);

    expect(state.errorLines).toEqual(["ERROR: build failed"]);
    expect(state.errorCount).toBe(1);
    expect(state.lineCount).toBe(3);
    expect(patternStats(state)).toEqual({ "error-keyword": 1 });
  });

  it("stops after twenty matches and appends the truncation marker", () => {
    const state = createTaskState();
    const lines = Array.from({ length: 25 }, (_, i) => `panic: failure ${i}`);

    const consumed = feed(state, lines);

    expect(consumed).toBe(20);
    expect(state.errorLines).toHaveLength(21);
    expect(state.errorLines[19]).toBe("panic: failure 19");
    expect(state.errorLines[20]).toBe(TRUNCATION_MARKER);
    expect(patternStats(state)).toEqual({ "panic-keyword": 20 });
  });

  it("stops after reading the line limit", () => {
    const state = createTaskState();
    const lines = Array.from({ length: MAX_LINES + 50 }, (_, i) => `INFO line ${i}`);

    const consumed = feed(state, lines);

    expect(consumed).toBe(MAX_LINES);
    expect(state.lineCount).toBe(MAX_LINES);
    expect(state.errorLines).toEqual([]);
  });

  it("counts blank and overlong lines without classifying them", () => {
    const state = createTaskState();
    const overlong = `ERROR: ${"x".repeat(500)}`;

    feed(state, ["", "   ", overlong, "fatal: bad object"]);

    expect(state.lineCount).toBe(4);
    expect(state.errorLines).toEqual(["fatal: bad object"]);
  });

  it("reports lines matched by the exit code rule", () => {
    const state = createTaskState();

    feed(state, ["command terminated with exit code 137"]);

    expect(patternStats(state)).toEqual({ "exit-code": 1 });
  });
});
