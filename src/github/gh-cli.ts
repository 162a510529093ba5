import { execa } from "execa";

import { formatErrorMessage } from "../core/error-format.js";
import { GitHubError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { formatRepo, type PullRequest, type RepoRef } from "../core/pull-request.js";

import { formatPrReference, type PrReference } from "./pr-reference.js";
import { GH_PR_JSON_FIELDS, parsePullRequestRecords } from "./pr-records.js";

// Runs `gh` with the given arguments and resolves to its stdout.
export type GhRunner = (args: string[]) => Promise<string>;

export type FetchPullRequestsArgs = {
  refs: PrReference[];
  repo?: RepoRef;
  limit?: number;
  runner?: GhRunner;
};

export const DEFAULT_LIST_LIMIT = 30;

const GH_AUTH_HINT = "Run `gh auth status` and `gh auth login` if the session has expired.";

// =============================================================================
// RUNNER
// =============================================================================

export function createGhRunner(env: NodeJS.ProcessEnv = process.env): GhRunner {
  return async (args) => {
    try {
      const res = await execa("gh", args, { stdio: "pipe", env });
      return res.stdout;
    } catch (err) {
      throw toGhError(args, err);
    }
  };
}

// =============================================================================
// PULL REQUESTS
// =============================================================================

export async function fetchPullRequestsWithGh(args: FetchPullRequestsArgs): Promise<PullRequest[]> {
  const run = args.runner ?? createGhRunner();
  const fields = GH_PR_JSON_FIELDS.join(",");

  if (args.refs.length === 0) {
    if (!args.repo) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Nothing to fetch.",
        message: "No pull requests, repository or input file were given.",
        hint: "Pass PR numbers or URLs, --repo owner/repo, or --input <file>.",
      });
    }

    const repo = formatRepo(args.repo);
    const limit = args.limit ?? DEFAULT_LIST_LIMIT;
    const stdout = await run([
      "pr",
      "list",
      "--repo",
      repo,
      "--state",
      "open",
      "--limit",
      String(limit),
      "--json",
      fields,
    ]);
    return parseGhJson(stdout, `gh pr list --repo ${repo}`, args.repo);
  }

  const prs: PullRequest[] = [];
  for (const ref of args.refs) {
    const repo = formatRepo(ref.repo);
    const stdout = await run([
      "pr",
      "view",
      String(ref.number),
      "--repo",
      repo,
      "--json",
      fields,
    ]);
    prs.push(...parseGhJson(stdout, `gh pr view ${formatPrReference(ref)}`, ref.repo));
  }
  return prs;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseGhJson(stdout: string, source: string, repo: RepoRef): PullRequest[] {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.github,
      title: "GitHub CLI output invalid.",
      message: `${source} did not print JSON: ${formatErrorMessage(err)}`,
      cause: err,
    });
  }
  return parsePullRequestRecords(data, source, repo);
}

function readStringField(error: unknown, field: string): string | undefined {
  if (!error || typeof error !== "object" || !(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

function toGhError(args: string[], error: unknown): UserFacingError {
  const command = `gh ${args.slice(0, 2).join(" ")}`;

  if (readStringField(error, "code") === "ENOENT") {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.github,
      title: "GitHub CLI not found.",
      message: "`gh` is not installed or not on PATH.",
      hint: "Install `gh` from https://cli.github.com/ and run `gh auth login`.",
      cause: error,
    });
  }

  const stderr = readStringField(error, "stderr")?.trim();
  const detail = stderr || formatErrorMessage(error);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.github,
    title: "GitHub CLI command failed.",
    message: `${command} failed: ${detail}`,
    hint: GH_AUTH_HINT,
    cause: new GitHubError(detail, error),
  });
}
