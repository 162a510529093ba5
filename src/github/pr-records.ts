/*
Purpose: validate the JSON printed by `gh pr view/list --json ...` and convert it to PullRequest records.
Assumptions: statusCheckRollup mixes CheckRun and StatusContext entries; gh prints "" for unset enums.
Usage: parsePullRequestRecords(JSON.parse(stdout), "gh pr list"), await loadPullRequestsFromFile(path).
*/

import fse from "fs-extra";
import { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import { InputError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import {
  CHECK_CONCLUSIONS,
  CHECK_RUN_STATUSES,
  STATUS_STATES,
  parseRepo,
  type CheckInfo,
  type PullRequest,
  type RepoRef,
} from "../core/pull-request.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const GH_PR_JSON_FIELDS = [
  "number",
  "title",
  "url",
  "author",
  "labels",
  "createdAt",
  "baseRefName",
  "statusCheckRollup",
] as const;

const CheckRunSchema = z.object({
  __typename: z.literal("CheckRun"),
  name: z.string().default(""),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  detailsUrl: z.string().nullish(),
});

const StatusContextSchema = z.object({
  __typename: z.literal("StatusContext"),
  context: z.string().default(""),
  state: z.string().nullish(),
  targetUrl: z.string().nullish(),
});

const RollupEntrySchema = z.discriminatedUnion("__typename", [CheckRunSchema, StatusContextSchema]);

export const GhPullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().default(""),
  url: z.string().min(1),
  author: z.object({ login: z.string() }).nullish(),
  labels: z.array(z.object({ name: z.string() })).default([]),
  createdAt: z.string().nullish(),
  baseRefName: z.string().nullish(),
  statusCheckRollup: z.array(RollupEntrySchema).nullish(),
});

export type GhPullRequestRecord = z.infer<typeof GhPullRequestSchema>;
type RollupEntry = z.infer<typeof RollupEntrySchema>;

const PullRequestListSchema = z.union([z.array(GhPullRequestSchema), GhPullRequestSchema]);

const UNKNOWN_CHECK_NAME = "Unknown Check";
const UNKNOWN_STATUS_NAME = "Unknown Status";

// =============================================================================
// CONVERSION
// =============================================================================

export function toPullRequest(record: GhPullRequestRecord, fallbackRepo?: RepoRef): PullRequest {
  const repo = repoFromPrUrl(record.url) ?? fallbackRepo;
  if (!repo) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Pull request data invalid.",
      message: `Cannot determine the repository of PR #${record.number} from ${record.url}.`,
      hint: "Pass --repo owner/repo.",
    });
  }

  return {
    repo,
    number: record.number,
    title: record.title,
    url: record.url,
    author: record.author?.login ?? "",
    labels: record.labels.map((label) => label.name),
    createdAt: record.createdAt ?? undefined,
    baseBranch: record.baseRefName ?? undefined,
    checks: (record.statusCheckRollup ?? []).map(toCheckInfo),
  };
}

export function parsePullRequestRecords(
  data: unknown,
  source: string,
  fallbackRepo?: RepoRef,
): PullRequest[] {
  const parsed = PullRequestListSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("\n");
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Pull request data invalid.",
      message: `Unexpected pull request JSON from ${source}:\n${details}`,
      hint: `Produce it with gh pr list --json ${GH_PR_JSON_FIELDS.join(",")}.`,
      cause: parsed.error,
    });
  }

  const records = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return records.map((record) => toPullRequest(record, fallbackRepo));
}

export async function loadPullRequestsFromFile(
  filePath: string,
  fallbackRepo?: RepoRef,
): Promise<PullRequest[]> {
  let raw: string;
  try {
    raw = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Input file unreadable.",
      message: `Failed to read ${filePath}: ${formatErrorMessage(err)}`,
      cause: new InputError(`Failed to read ${filePath}`, err),
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Input file is not JSON.",
      message: `Failed to parse ${filePath}: ${formatErrorMessage(err)}`,
      cause: new InputError(`Failed to parse ${filePath}`, err),
    });
  }

  return parsePullRequestRecords(data, filePath, fallbackRepo);
}

// =============================================================================
// INTERNALS
// =============================================================================

function toCheckInfo(entry: RollupEntry): CheckInfo {
  if (entry.__typename === "CheckRun") {
    return {
      kind: "check_run",
      name: entry.name.trim() || UNKNOWN_CHECK_NAME,
      conclusion: pickEnum(CHECK_CONCLUSIONS, entry.conclusion),
      runStatus: pickEnum(CHECK_RUN_STATUSES, entry.status),
      url: entry.detailsUrl || undefined,
    };
  }

  return {
    kind: "status_context",
    name: entry.context.trim() || UNKNOWN_STATUS_NAME,
    state: pickEnum(STATUS_STATES, entry.state),
    url: entry.targetUrl || undefined,
  };
}

function pickEnum<T extends string>(values: readonly T[], raw: string | null | undefined): T | undefined {
  if (!raw) return undefined;
  const upper = raw.toUpperCase();
  return values.find((value) => value === upper);
}

function repoFromPrUrl(url: string): RepoRef | null {
  const match = /github\.com\/([^/]+\/[^/]+)\/pull\/\d+/i.exec(url);
  return match ? parseRepo(match[1]) : null;
}
