/*
Purpose: render fetched PR results as a box-drawing tree (checks grouped by status, error logs inline).
Assumptions: results arrive in input order; PRs are grouped under their repository in first-seen order.
Usage: renderPrResults(results, { ciStatusOptions, format }).join("\n").
*/

import type { AnsiFormatter, AnsiStyle } from "../core/error-format.js";
import {
  checkDisplayStatus,
  formatCiStatus,
  formatRepo,
  summarizeCiStatus,
  type CheckDisplayStatus,
  type CheckInfo,
  type CiStatusOptions,
  type PullRequest,
} from "../core/pull-request.js";
import { formatFetchError, type PrResult } from "../logs/log-fetcher.js";

// =============================================================================
// TYPES
// =============================================================================

export type RenderOptions = {
  ciStatusOptions?: CiStatusOptions;
  format?: AnsiFormatter;
};

export type PrResultJson = {
  repo: string;
  number: number;
  title: string;
  url: string;
  author: string;
  ci_status: string;
  logs: Record<string, string[]>;
  fetch_errors: Array<{
    check: string;
    check_url: string;
    log_url: string;
    error: string;
  }>;
};

type TreePrefixes = {
  check: string;
  url: string;
  log: string;
};

const STATUS_ORDER: CheckDisplayStatus[] = ["FAILURE", "PENDING", "SUCCESS"];

const STATUS_STYLES: Record<CheckDisplayStatus, AnsiStyle[]> = {
  FAILURE: ["red", "bold"],
  PENDING: ["yellow"],
  SUCCESS: ["cyan"],
};

const REPOSITORY_RULE = "=".repeat(37);

const plain: AnsiFormatter = (text) => text;

// =============================================================================
// TREE
// =============================================================================

export function renderPrResults(results: PrResult[], options: RenderOptions = {}): string[] {
  const byRepo = new Map<string, PrResult[]>();
  for (const result of results) {
    const key = formatRepo(result.pr.repo);
    const group = byRepo.get(key) ?? [];
    group.push(result);
    byRepo.set(key, group);
  }

  const lines: string[] = [];
  for (const [repo, group] of byRepo) {
    lines.push(`Repository: ${repo}`, REPOSITORY_RULE);
    for (const result of group) {
      lines.push(...renderPrResult(result, options), "");
    }
  }
  return lines;
}

export function renderPrResult(result: PrResult, options: RenderOptions = {}): string[] {
  const summary = summarizeCiStatus(result.pr.checks, options.ciStatusOptions);
  return [
    ...renderPrHeader(result.pr, formatCiStatus(summary)),
    ...renderChecksTree(result.pr.checks, result.logs, options.format ?? plain),
  ];
}

export function renderPrHeader(pr: PullRequest, ciStatus: string): string[] {
  const author = pr.author ? ` (${pr.author})` : "";
  const lines = [
    `● ${pr.url}`,
    `├─Title: ${pr.title}${author}`,
    `├─PR #${pr.number}`,
    `├─CI: ${ciStatus}`,
  ];
  if (pr.createdAt) {
    lines.push(`├─Created: ${pr.createdAt}`);
  }

  lines.push("├─Labels");
  if (pr.labels.length === 0) {
    lines.push("│ └─None");
  } else {
    pr.labels.forEach((label, index) => {
      const connector = index === pr.labels.length - 1 ? "└─" : "├─";
      lines.push(`│ ${connector}${label}`);
    });
  }
  return lines;
}

export function renderChecksTree(
  checks: CheckInfo[],
  logs: ReadonlyMap<string, string[]>,
  format: AnsiFormatter = plain,
): string[] {
  const lines = ["└─Checks"];
  if (checks.length === 0) {
    lines.push("  └─None");
    return lines;
  }

  const groups = STATUS_ORDER.map((status) => ({
    status,
    checks: checks.filter((check) => checkDisplayStatus(check) === status),
  })).filter((group) => group.checks.length > 0);

  groups.forEach((group, groupIndex) => {
    const lastGroup = groupIndex === groups.length - 1;
    const label = format(group.status, STATUS_STYLES[group.status]);
    lines.push(`${lastGroup ? "  └─" : "  ├─"}${label} (${group.checks.length})`);

    group.checks.forEach((check, checkIndex) => {
      const prefixes = treePrefixes(lastGroup, checkIndex === group.checks.length - 1);
      lines.push(`${prefixes.check}${check.name}`);
      if (check.url) {
        lines.push(`${prefixes.url}URL: ${check.url}`);
      }

      const errorLines = group.status === "FAILURE" ? logs.get(check.name) : undefined;
      if (errorLines && errorLines.length > 0) {
        lines.push(`${prefixes.log}Error logs:`);
        for (const line of errorLines) {
          lines.push(`${prefixes.log}${format(line, ["dim"])}`);
        }
      }
    });
  });

  return lines;
}

// =============================================================================
// WARNINGS + JSON
// =============================================================================

export function renderFetchWarnings(results: PrResult[]): string[] {
  return results.flatMap((result) =>
    result.fetchErrors.map((error) => `Warning: Failed to fetch logs for ${formatFetchError(error)}`),
  );
}

export function toPrResultJson(result: PrResult, options: RenderOptions = {}): PrResultJson {
  const summary = summarizeCiStatus(result.pr.checks, options.ciStatusOptions);
  return {
    repo: formatRepo(result.pr.repo),
    number: result.pr.number,
    title: result.pr.title,
    url: result.pr.url,
    author: result.pr.author,
    ci_status: formatCiStatus(summary),
    logs: Object.fromEntries(result.logs),
    fetch_errors: result.fetchErrors.map((error) => ({
      check: error.checkName,
      check_url: error.checkUrl,
      log_url: error.logUrl,
      error: error.error.message,
    })),
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function treePrefixes(lastGroup: boolean, lastCheck: boolean): TreePrefixes {
  if (lastGroup) {
    return lastCheck
      ? { check: "    └─", url: "      └─", log: "      " }
      : { check: "    ├─", url: "    │ └─", log: "    │ " };
  }
  return lastCheck
    ? { check: "  │ └─", url: "  │   └─", log: "  │   " }
    : { check: "  │ ├─", url: "  │ │ └─", log: "  │ │ " };
}
