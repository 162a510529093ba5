/*
Purpose: download the build logs of failing checks concurrently and extract their error lines.
Assumptions: one task per failing check with a resolvable log URL; a failed task never aborts the others.
Usage: await new LogFetcher(logFetcherOptionsFromConfig(config)).fetchLogsForPrs(prs).
*/

import PQueue from "p-queue";

import { resolveHttpDeadlines, type AppConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { LogFetchError } from "../core/errors.js";
import { noopLogger, type EventLogger } from "../core/logger.js";
import { isFailedCheck, type CheckPredicate, type PullRequest } from "../core/pull-request.js";

import { defaultPatternTable, type PatternTable } from "./line-classifier.js";
import { readLines } from "./line-stream.js";
import {
  AxiosLogTransport,
  HttpStatusError,
  StreamReadError,
  TransportError,
  type LogResponse,
  type LogTransport,
} from "./log-transport.js";
import {
  DEFAULT_RETRY_POLICY,
  retryPolicyFromConfig,
  runWithRetries,
  type RetryPolicy,
} from "./retry.js";
import { consumeLine, createTaskState, patternStats, type TaskState } from "./task-state.js";
import { resolveLogUrl, type LogUrl } from "./url-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type CheckRef = {
  readonly prNumber: number;
  readonly name: string;
  readonly checkUrl: string;
};

export type FetchTask = {
  // Position of the owning PR in the input list; PR numbers may repeat.
  readonly prIndex: number;
  readonly prNumber: number;
  readonly check: CheckRef;
  readonly logUrl: LogUrl;
};

export type FetchOutcome =
  | { task: FetchTask; ok: true; state: TaskState }
  | { task: FetchTask; ok: false; error: LogFetchError };

export type FetchError = {
  prNumber: number;
  checkName: string;
  checkUrl: string;
  logUrl: LogUrl;
  error: LogFetchError;
};

export type PrResult = {
  pr: PullRequest;
  logs: Map<string, string[]>;
  fetchErrors: FetchError[];
};

export type LogFetcherOptions = {
  transport?: LogTransport;
  patternTable?: PatternTable;
  concurrency?: number;
  requestTimeoutMs?: number;
  connectTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  isFailing?: CheckPredicate;
  prowHosts?: readonly string[];
  logger?: EventLogger;
  sleep?: (ms: number) => Promise<void>;
};

export type BuildFetchTasksOptions = {
  isFailing?: CheckPredicate;
  prowHosts?: readonly string[];
};

type OpenLog = {
  response: LogResponse;
  controller: AbortController;
  clearDeadline: () => void;
};

const DEFAULT_CONCURRENCY = 20;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

// =============================================================================
// TASKS
// =============================================================================

export function buildFetchTasks(
  prs: readonly PullRequest[],
  options: BuildFetchTasksOptions = {},
): FetchTask[] {
  const isFailing = options.isFailing ?? isFailedCheck;
  const tasks: FetchTask[] = [];

  prs.forEach((pr, prIndex) => {
    for (const check of pr.checks) {
      if (!check.url || !isFailing(check)) continue;

      const logUrl = resolveLogUrl(check.url, { prowHosts: options.prowHosts });
      if (!logUrl) continue;

      tasks.push({
        prIndex,
        prNumber: pr.number,
        check: { prNumber: pr.number, name: check.name, checkUrl: check.url },
        logUrl,
      });
    }
  });

  return tasks;
}

export function formatFetchError(error: FetchError): string {
  return `PR ${error.prNumber} check '${error.checkName}' (${error.checkUrl}): ${error.logUrl} -> ${error.error.message}`;
}

export function logFetcherOptionsFromConfig(config: AppConfig): LogFetcherOptions {
  const { requestTimeoutMs, connectTimeoutMs } = resolveHttpDeadlines(config.http);
  return {
    concurrency: config.http.max_concurrent,
    requestTimeoutMs,
    connectTimeoutMs,
    retryPolicy: retryPolicyFromConfig(config.http),
    prowHosts: config.prow_hosts,
  };
}

// =============================================================================
// FETCHER
// =============================================================================

export class LogFetcher {
  private readonly transport: LogTransport;
  private readonly patternTable: PatternTable;
  private readonly concurrency: number;
  private readonly requestTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly isFailing: CheckPredicate;
  private readonly prowHosts?: readonly string[];
  private readonly logger: EventLogger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: LogFetcherOptions = {}) {
    this.transport = options.transport ?? new AxiosLogTransport();
    this.patternTable = options.patternTable ?? defaultPatternTable();
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.connectTimeoutMs = Math.min(
      options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      this.requestTimeoutMs,
    );
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.isFailing = options.isFailing ?? isFailedCheck;
    this.prowHosts = options.prowHosts;
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep;
  }

  async fetchLogsForPrs(prs: readonly PullRequest[]): Promise<PrResult[]> {
    const results: PrResult[] = prs.map((pr) => ({ pr, logs: new Map(), fetchErrors: [] }));

    const tasks = buildFetchTasks(prs, { isFailing: this.isFailing, prowHosts: this.prowHosts });
    if (tasks.length === 0) {
      return results;
    }

    const startedAt = Date.now();
    this.logger.log({
      type: "logs.fetch.start",
      payload: { prs: prs.length, tasks: tasks.length, concurrency: this.concurrency },
    });

    const queue = new PQueue({ concurrency: this.concurrency });
    const outcomes = await Promise.all(
      tasks.map((task) => queue.add(() => this.runTask(task), { throwOnTimeout: true })),
    );

    let failed = 0;
    for (const outcome of outcomes) {
      const result = results[outcome.task.prIndex];
      if (outcome.ok) {
        if (outcome.state.errorLines.length > 0) {
          result.logs.set(outcome.task.check.name, outcome.state.errorLines);
        }
        continue;
      }

      failed += 1;
      result.fetchErrors.push({
        prNumber: outcome.task.prNumber,
        checkName: outcome.task.check.name,
        checkUrl: outcome.task.check.checkUrl,
        logUrl: outcome.task.logUrl,
        error: outcome.error,
      });
    }

    this.logger.log({
      type: "logs.fetch.complete",
      payload: {
        tasks: tasks.length,
        succeeded: tasks.length - failed,
        failed,
        duration_ms: Date.now() - startedAt,
      },
    });

    return results;
  }

  // Never rejects: every failure becomes an outcome.
  private async runTask(task: FetchTask): Promise<FetchOutcome> {
    try {
      const opened = await runWithRetries(() => this.openLog(task.logUrl), this.retryPolicy, {
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.log({
            type: "logs.task.retry",
            payload: {
              pr: task.prNumber,
              check: task.check.name,
              url: task.logUrl,
              attempt,
              delay_ms: delayMs,
              error: formatErrorMessage(error),
            },
          });
        },
      });

      const state = await this.consumeLog(opened);
      const counts = patternStats(state);
      if (Object.keys(counts).length > 0) {
        this.logger.log({
          type: "logs.pattern_stats",
          payload: {
            pr: task.prNumber,
            check: task.check.name,
            url: task.logUrl,
            lines: state.lineCount,
            errors: state.errorCount,
            patterns: counts,
          },
        });
      }

      return { task, ok: true, state };
    } catch (err) {
      const error = toLogFetchError(err);
      this.logger.log({
        type: "logs.task.failed",
        payload: {
          pr: task.prNumber,
          check: task.check.name,
          url: task.logUrl,
          error: error.message,
        },
      });
      return { task, ok: false, error };
    }
  }

  private async openLog(url: LogUrl): Promise<OpenLog> {
    const controller = new AbortController();
    const deadline = setTimeout(() => {
      controller.abort(new Error(`request timed out after ${this.requestTimeoutMs} ms`));
    }, this.requestTimeoutMs);
    const connectDeadline = setTimeout(() => {
      controller.abort(new Error(`connect timed out after ${this.connectTimeoutMs} ms`));
    }, this.connectTimeoutMs);

    let response: LogResponse;
    try {
      response = await this.transport.get(url, { signal: controller.signal });
    } catch (err) {
      clearTimeout(deadline);
      throw err instanceof LogFetchError ? err : new TransportError(formatErrorMessage(err), err);
    } finally {
      clearTimeout(connectDeadline);
    }

    if (response.status < 200 || response.status > 299) {
      clearTimeout(deadline);
      response.body.destroy();
      throw new HttpStatusError(response.status, response.statusText, url);
    }

    return { response, controller, clearDeadline: () => clearTimeout(deadline) };
  }

  private async consumeLog(opened: OpenLog): Promise<TaskState> {
    const { body } = opened.response;
    const signal = opened.controller.signal;
    const onAbort = (): void => {
      const reason: unknown = signal.reason;
      body.destroy(reason instanceof Error ? reason : new Error("request aborted"));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    const state = createTaskState();
    try {
      for await (const line of readLines(body)) {
        if (!consumeLine(state, line, this.patternTable)) break;
      }
      return state;
    } catch (err) {
      throw new StreamReadError(formatErrorMessage(err), err);
    } finally {
      signal.removeEventListener("abort", onAbort);
      opened.clearDeadline();
      body.destroy();
    }
  }
}

function toLogFetchError(error: unknown): LogFetchError {
  if (error instanceof LogFetchError) return error;
  return new LogFetchError(formatErrorMessage(error), error);
}
