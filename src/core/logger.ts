import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = {
  ts: string;
  type: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  payload?: JsonObject;
  ts?: string | Date;
};

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly debug = false,
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(eventWithTs(event))}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.debug));
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.debug));
    } finally {
      this.closed = true;
    }
  }
}

// Echoes events to a stream (stderr under --debug).
export class StreamLogger implements EventLogger {
  constructor(private readonly stream: { write(chunk: string): unknown }) {}

  log(event: LogEventInput): void {
    this.stream.write(`${JSON.stringify(eventWithTs(event))}\n`);
  }

  close(): void {}
}

export class FanoutLogger implements EventLogger {
  constructor(private readonly loggers: EventLogger[]) {}

  log(event: LogEventInput): void {
    for (const logger of this.loggers) {
      logger.log(event);
    }
  }

  close(): void {
    for (const logger of this.loggers) {
      logger.close();
    }
  }
}

export const noopLogger: EventLogger = {
  log: () => undefined,
  close: () => undefined,
};

export function createEventLogger(options: {
  logFile?: string;
  debug?: boolean;
  stderr?: { write(chunk: string): unknown };
}): EventLogger {
  const loggers: EventLogger[] = [];
  if (options.logFile) {
    loggers.push(new JsonlLogger(path.resolve(options.logFile), options.debug ?? false));
  }
  if (options.debug) {
    loggers.push(new StreamLogger(options.stderr ?? process.stderr));
  }

  if (loggers.length === 0) return noopLogger;
  if (loggers.length === 1) return loggers[0];
  return new FanoutLogger(loggers);
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput): LogEvent {
  const { ts, type, payload } = event;
  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const result: LogEvent = { ts: normalizedTs, type };
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  debug: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!debug) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
