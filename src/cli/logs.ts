import { InvalidArgumentError, type Command } from "commander";

import { loadAppConfig, applyHttpOverrides } from "../core/config-loader.js";
import type { AppConfig } from "../core/config.js";
import { createAnsiFormatter, resolveColorEnabled } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { createEventLogger, type EventLogger } from "../core/logger.js";
import { parseRepo, type PullRequest, type RepoRef } from "../core/pull-request.js";
import { pluralize } from "../core/utils.js";
import { fetchPullRequestsWithGh, type GhRunner } from "../github/gh-cli.js";
import { loadPullRequestsFromFile } from "../github/pr-records.js";
import { parsePrReference } from "../github/pr-reference.js";
import { LogFetcher, logFetcherOptionsFromConfig } from "../logs/log-fetcher.js";
import type { LogTransport } from "../logs/log-transport.js";

import { renderFetchWarnings, renderPrResults, toPrResultJson } from "./checks-tree.js";
import { renderCliWarning } from "./error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogsCommandOptions = {
  refs: string[];
  repo?: string;
  input?: string;
  limit?: number;
  concurrency?: number;
  timeout?: number;
  connectTimeout?: number;
  countPendingStatusContexts?: boolean;
  json?: boolean;
};

export type LogsCommandContext = {
  config: AppConfig;
  logger: EventLogger;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  color?: boolean;
  ghRunner?: GhRunner;
  transport?: LogTransport;
};

type LogsCliOptions = {
  repo?: string;
  input?: string;
  limit?: number;
  concurrency?: number;
  timeout?: number;
  connectTimeout?: number;
  countPendingStatusContexts?: boolean;
  json?: boolean;
  config?: string;
  logFile?: string;
  debug?: boolean;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerLogsCommand(program: Command): void {
  program
    .command("logs")
    .description("Fetch error lines from the CI logs of failing pull request checks")
    .argument("[prs...]", "PR numbers (with --repo), owner/repo#N, or pull request URLs")
    .option("-r, --repo <owner/repo>", "Repository for bare PR numbers, or to list open PRs")
    .option("--input <file>", "Read PRs from saved `gh pr list --json ...` output")
    .option("-L, --limit <n>", "Maximum open PRs to list when no PRs are given", parsePositiveInt)
    .option("--concurrency <n>", "Maximum concurrent log downloads", parsePositiveInt)
    .option("--timeout <seconds>", "Overall per-request timeout", parsePositiveNumber)
    .option("--connect-timeout <seconds>", "Connect timeout per request", parsePositiveNumber)
    .option(
      "--count-pending-status-contexts",
      "Count pending status contexts (merge bots) in the CI summary",
      false,
    )
    .option("--json", "Print results as JSON", false)
    .action(async (prs: string[], _opts: unknown, command: Command) => {
      const opts = command.optsWithGlobals<LogsCliOptions>();
      const { config } = loadAppConfig({ explicitPath: opts.config });
      const logger = createEventLogger({ logFile: opts.logFile, debug: opts.debug });

      try {
        await logsCommand(
          {
            refs: prs,
            repo: opts.repo,
            input: opts.input,
            limit: opts.limit,
            concurrency: opts.concurrency,
            timeout: opts.timeout,
            connectTimeout: opts.connectTimeout,
            countPendingStatusContexts: opts.countPendingStatusContexts,
            json: opts.json,
          },
          { config, logger },
        );
      } finally {
        logger.close();
      }
    });
}

// =============================================================================
// COMMAND IMPLEMENTATION
// =============================================================================

export async function logsCommand(
  options: LogsCommandOptions,
  ctx: LogsCommandContext,
): Promise<void> {
  const stdout = ctx.stdout ?? ((line: string) => console.log(line));
  const stderr = ctx.stderr ?? ((line: string) => console.error(line));

  const repo = resolveRepoOption(options.repo);
  const config = applyHttpOverrides(ctx.config, {
    concurrency: options.concurrency,
    timeoutSeconds: options.timeout,
    connectTimeoutSeconds: options.connectTimeout,
  });

  const prs = await loadPullRequests(options, repo, ctx.ghRunner);
  if (prs.length === 0) {
    stderr(renderCliWarning("no pull requests to inspect.", { useColor: ctx.color }));
    if (options.json) stdout("[]");
    return;
  }

  const fetcher = new LogFetcher({
    ...logFetcherOptionsFromConfig(config),
    transport: ctx.transport,
    logger: ctx.logger,
  });
  const results = await fetcher.fetchLogsForPrs(prs);

  for (const warning of renderFetchWarnings(results)) {
    stderr(renderCliWarning(warning, { useColor: ctx.color }));
  }

  const renderOptions = {
    ciStatusOptions: { ignorePendingStatusContexts: !options.countPendingStatusContexts },
  };

  if (options.json) {
    const payload = results.map((result) => toPrResultJson(result, renderOptions));
    stdout(JSON.stringify(payload, null, 2));
    return;
  }

  const color = ctx.color ?? resolveColorEnabled({ stream: process.stdout });
  for (const line of renderPrResults(results, { ...renderOptions, format: createAnsiFormatter(color) })) {
    stdout(line);
  }

  const withLogs = results.filter((result) => result.logs.size > 0).length;
  stdout(`Fetched error logs for ${pluralize(withLogs, "pull request")} of ${prs.length}.`);
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveRepoOption(value: string | undefined): RepoRef | undefined {
  if (value === undefined) return undefined;
  const repo = parseRepo(value);
  if (!repo) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid repository.",
      message: `Expected owner/repo, received "${value}".`,
      hint: "Pass --repo in the form owner/repo.",
    });
  }
  return repo;
}

async function loadPullRequests(
  options: LogsCommandOptions,
  repo: RepoRef | undefined,
  ghRunner: GhRunner | undefined,
): Promise<PullRequest[]> {
  if (options.input) {
    if (options.refs.length > 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Conflicting inputs.",
        message: "Pass either PR references or --input, not both.",
        hint: "Filter the saved JSON before passing it with --input.",
      });
    }
    return loadPullRequestsFromFile(options.input, repo);
  }

  const refs = options.refs.map((ref) => parsePrReference(ref, repo));
  return fetchPullRequestsWithGh({ refs, repo, limit: options.limit, runner: ghRunner });
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}
