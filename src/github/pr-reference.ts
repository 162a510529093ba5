import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { formatRepo, parseRepo, type RepoRef } from "../core/pull-request.js";

export type PrReference = {
  repo: RepoRef;
  number: number;
};

const PR_URL_PATTERN =
  /^https?:\/\/github\.com\/([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)\/pull\/(\d+)(?:[/?#].*)?$/i;
const SHORT_REF_PATTERN = /^(?:([A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+))?#?(\d+)$/;

const REFERENCE_HINT =
  "Use a PR number with --repo owner/repo, owner/repo#123, or https://github.com/owner/repo/pull/123.";

/**
 * Accepts `123`, `#123`, `owner/repo#123` or a pull request URL.
 * Bare numbers need `defaultRepo`.
 */
export function parsePrReference(arg: string, defaultRepo?: RepoRef): PrReference {
  const value = arg.trim();

  const urlMatch = PR_URL_PATTERN.exec(value);
  if (urlMatch) {
    return {
      repo: { owner: urlMatch[1], name: urlMatch[2] },
      number: parsePrNumber(urlMatch[3], arg),
    };
  }

  const shortMatch = SHORT_REF_PATTERN.exec(value);
  if (shortMatch) {
    const number = parsePrNumber(shortMatch[2], arg);
    const repo = shortMatch[1] ? parseRepo(shortMatch[1]) : (defaultRepo ?? null);
    if (!repo) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.input,
        title: "Repository required.",
        message: `Pull request "${arg}" has no repository.`,
        hint: REFERENCE_HINT,
      });
    }
    return { repo, number };
  }

  throw invalidReference(arg);
}

export function formatPrReference(ref: PrReference): string {
  return `${formatRepo(ref.repo)}#${ref.number}`;
}

function parsePrNumber(raw: string, arg: string): number {
  const number = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(number) || number <= 0) {
    throw invalidReference(arg);
  }
  return number;
}

function invalidReference(arg: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.input,
    title: "Invalid pull request reference.",
    message: `Cannot parse pull request reference "${arg}".`,
    hint: REFERENCE_HINT,
  });
}
