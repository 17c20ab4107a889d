export class ReleaseSyncError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ReleaseSyncError";
  }
}

export class ConfigError extends ReleaseSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export type GitErrorOutput = {
  stdout: string;
  stderr: string;
  timedOut?: boolean;
};

export class GitError extends ReleaseSyncError {
  constructor(message: string, public readonly output?: GitErrorOutput) {
    super(message, output);
    this.name = "GitError";
  }
}

// Clone or fetch failed: network, DNS, auth, or a local path that is not a mirror of the remote.
export class MirrorUnavailableError extends ReleaseSyncError {
  constructor(
    message: string,
    public readonly repo: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "MirrorUnavailableError";
  }
}

export class CheckoutConflictError extends ReleaseSyncError {
  constructor(
    message: string,
    public readonly branch: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CheckoutConflictError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  input: "INPUT_ERROR",
  manifest: "MANIFEST_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInit = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(init: UserFacingErrorInit) {
    super(init.message);
    this.name = "UserFacingError";
    this.code = init.code;
    this.title = init.title;
    this.hint = init.hint;
    this.next = init.next;
    this.cause = init.cause;
  }
}
