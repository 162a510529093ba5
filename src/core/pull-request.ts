// =============================================================================
// TYPES
// =============================================================================

export const CHECK_CONCLUSIONS = [
  "SUCCESS",
  "FAILURE",
  "CANCELLED",
  "TIMED_OUT",
  "ACTION_REQUIRED",
  "NEUTRAL",
  "SKIPPED",
  "STALE",
  "STARTUP_FAILURE",
] as const;
export type CheckConclusion = (typeof CHECK_CONCLUSIONS)[number];

export const CHECK_RUN_STATUSES = [
  "QUEUED",
  "IN_PROGRESS",
  "COMPLETED",
  "WAITING",
  "REQUESTED",
  "PENDING",
] as const;
export type CheckRunStatus = (typeof CHECK_RUN_STATUSES)[number];

export const STATUS_STATES = ["SUCCESS", "FAILURE", "PENDING", "ERROR", "EXPECTED"] as const;
export type StatusState = (typeof STATUS_STATES)[number];

export type RepoRef = {
  owner: string;
  name: string;
};

// A check run (GitHub Checks API) carries a conclusion and run status; a legacy
// status context carries a state.
export type CheckInfo = {
  kind: "check_run" | "status_context";
  name: string;
  conclusion?: CheckConclusion;
  runStatus?: CheckRunStatus;
  state?: StatusState;
  url?: string;
};

export type PullRequest = {
  repo: RepoRef;
  number: number;
  title: string;
  url: string;
  author: string;
  labels: string[];
  createdAt?: string;
  baseBranch?: string;
  checks: CheckInfo[];
};

export type CheckDisplayStatus = "FAILURE" | "PENDING" | "SUCCESS";

export type CiStatusType = "success" | "failure" | "pending" | "unknown";

export type CiStatusSummary = {
  queued: number;
  inProgress: number;
  pending: number;
  failed: number;
  cancelled: number;
  succeeded: number;
  total: number;
  status: CiStatusType;
};

export type CiStatusOptions = {
  // Pending status contexts without a conclusion (merge bots such as tide)
  // are left out of the totals unless this is false.
  ignorePendingStatusContexts?: boolean;
};

export type CheckPredicate = (check: CheckInfo) => boolean;

// =============================================================================
// REPO HELPERS
// =============================================================================

export function formatRepo(repo: RepoRef): string {
  return `${repo.owner}/${repo.name}`;
}

export function parseRepo(value: string): RepoRef | null {
  const match = /^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/.exec(value.trim());
  if (!match) return null;
  return { owner: match[1], name: match[2] };
}

// =============================================================================
// CHECK STATUS
// =============================================================================

export const isFailedCheck: CheckPredicate = (check) => {
  if (check.conclusion) {
    return (
      check.conclusion === "FAILURE" ||
      check.conclusion === "CANCELLED" ||
      check.conclusion === "TIMED_OUT" ||
      check.conclusion === "STARTUP_FAILURE"
    );
  }
  return check.state === "FAILURE" || check.state === "ERROR";
};

export function checkDisplayStatus(check: CheckInfo): CheckDisplayStatus {
  if (isFailedCheck(check)) return "FAILURE";
  if (check.conclusion === "SUCCESS") return "SUCCESS";
  if (!check.conclusion && check.state === "SUCCESS") return "SUCCESS";
  return "PENDING";
}

export function summarizeCiStatus(
  checks: CheckInfo[],
  options: CiStatusOptions = {},
): CiStatusSummary {
  const ignorePendingStatusContexts = options.ignorePendingStatusContexts ?? true;
  const summary: CiStatusSummary = {
    queued: 0,
    inProgress: 0,
    pending: 0,
    failed: 0,
    cancelled: 0,
    succeeded: 0,
    total: 0,
    status: "unknown",
  };

  let ignored = 0;

  for (const check of checks) {
    switch (check.runStatus) {
      case "QUEUED":
      case "WAITING":
      case "REQUESTED":
        summary.queued += 1;
        continue;
      case "IN_PROGRESS":
      case "PENDING":
        summary.inProgress += 1;
        continue;
      default:
        break;
    }

    if (check.conclusion === "CANCELLED") {
      summary.cancelled += 1;
    } else if (isFailedCheck(check)) {
      summary.failed += 1;
    } else if (check.conclusion === "SUCCESS" || (!check.conclusion && check.state === "SUCCESS")) {
      summary.succeeded += 1;
    } else if (!check.conclusion && check.state === "PENDING" && ignorePendingStatusContexts) {
      ignored += 1;
    } else if (check.conclusion === "ACTION_REQUIRED") {
      summary.pending += 1;
    } else if (!check.runStatus) {
      summary.pending += 1;
    }
  }

  summary.total = checks.length - ignored;

  const totalPending = summary.queued + summary.inProgress + summary.pending;
  if (totalPending > 0) {
    summary.status = "pending";
  } else if (summary.failed > 0 || summary.cancelled > 0) {
    summary.status = "failure";
  } else if (summary.succeeded > 0) {
    summary.status = "success";
  }

  return summary;
}

export function formatCiStatus(summary: CiStatusSummary): string {
  if (summary.total === 0) return "Unknown";

  const totalPending = summary.queued + summary.inProgress + summary.pending;
  if (totalPending > 0) {
    const completed = summary.succeeded + summary.failed + summary.cancelled;
    const parts = [`S:${summary.succeeded}`, `F:${summary.failed}`];
    if (summary.cancelled > 0) parts.push(`C:${summary.cancelled}`);
    if (summary.inProgress > 0) parts.push(`X:${summary.inProgress}`);
    if (summary.queued > 0) parts.push(`Q:${summary.queued}`);
    if (summary.pending > 0) parts.push(`P:${summary.pending}`);
    return `${parts.join(" ")} (${completed}/${summary.total})`;
  }

  switch (summary.status) {
    case "failure": {
      const totalBad = summary.failed + summary.cancelled;
      if (totalBad === summary.total) {
        return summary.cancelled > 0
          ? `F:${summary.failed} C:${summary.cancelled}`
          : `Failed (${summary.failed})`;
      }
      return summary.cancelled > 0
        ? `F:${summary.failed} C:${summary.cancelled} (${totalBad}/${summary.total})`
        : `Failed: ${summary.failed}/${summary.total}`;
    }
    case "success":
      return "Success";
    default:
      return "Unknown";
  }
}
