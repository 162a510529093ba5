export class PrsweepError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "PrsweepError";
  }
}

export class ConfigError extends PrsweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitHubError extends PrsweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitHubError";
  }
}

export class InputError extends PrsweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InputError";
  }
}

// Failure of a single log download; reported per check, never fatal to a run.
export class LogFetchError extends PrsweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LogFetchError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  github: "GITHUB_ERROR",
  input: "INPUT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends PrsweepError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
