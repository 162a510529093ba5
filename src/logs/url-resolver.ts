import { DEFAULT_PROW_HOSTS } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

declare const logUrlBrand: unique symbol;

// A validated http(s) URL pointing at a raw build log. Only produced here.
export type LogUrl = string & { readonly [logUrlBrand]: true };

export type ResolveLogUrlOptions = {
  prowHosts?: readonly string[];
};

const GCS_HOST = "storage.googleapis.com";
const GCS_BASE = `https://${GCS_HOST}`;
const BUILD_LOG_FILE = "build-log.txt";
const PROW_VIEW_SEGMENT = "/view/gs";

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveLogUrl(
  checkUrl: string,
  options: ResolveLogUrlOptions = {},
): LogUrl | null {
  const parsed = parseHttpUrl(checkUrl);
  if (!parsed) return null;

  const host = parsed.hostname.toLowerCase();
  const prowHosts = options.prowHosts ?? DEFAULT_PROW_HOSTS;

  if (isProwHost(host, prowHosts) && parsed.pathname.includes(`${PROW_VIEW_SEGMENT}/`)) {
    return rewriteProwUrl(parsed.pathname);
  }

  if (host === "github.com" && parsed.pathname.includes("/actions/runs/")) {
    return null;
  }

  if (checkUrl.includes("raw") || host === GCS_HOST) {
    return toLogUrl(checkUrl);
  }

  // PR comments (#issuecomment) and dashboards have no raw log behind them.
  return null;
}

export function toLogUrl(value: string): LogUrl | null {
  const trimmed = value.trim();
  if (!parseHttpUrl(trimmed) || !isLogUrlString(trimmed)) return null;
  return trimmed;
}

// =============================================================================
// INTERNALS
// =============================================================================

function isLogUrlString(value: string): value is LogUrl {
  return /^https?:\/\//i.test(value);
}

function parseHttpUrl(value: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(value.trim());
  } catch {
    return null;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
  if (!parsed.hostname) return null;
  return parsed;
}

function isProwHost(host: string, prowHosts: readonly string[]): boolean {
  if (prowHosts.some((candidate) => candidate.toLowerCase() === host)) return true;
  return host.split(".")[0] === "prow";
}

function rewriteProwUrl(pathname: string): LogUrl | null {
  const index = pathname.indexOf(`${PROW_VIEW_SEGMENT}/`);
  // Only the viewer segment goes; any path before it is kept.
  let rest = (pathname.slice(0, index) + pathname.slice(index + PROW_VIEW_SEGMENT.length)).replace(
    /\/+$/,
    "",
  );
  if (!rest.endsWith(`/${BUILD_LOG_FILE}`)) {
    rest = `${rest}/${BUILD_LOG_FILE}`;
  }
  return toLogUrl(`${GCS_BASE}${rest}`);
}
