export class EvalSweepError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "EvalSweepError";
  }
}

export class ConfigError extends EvalSweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SourceError extends EvalSweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SourceError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  source: "SOURCE_ERROR",
  remote: "REMOTE_ERROR",
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

export class UserFacingError extends EvalSweepError {
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

export function createMissingCredentialError(envVar: string, label: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${label} API key missing.`,
    message: `${label} API key is required but ${envVar} is not set.`,
    hint: `Set ${envVar} in the environment, or point api_key_env at another variable in the config.`,
  });
}

export function createSourceError(error: SourceError, inputPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.source,
    title: "Input source unusable.",
    message: error.message,
    hint: "Check the input path and that each line carries the fields this job reads.",
    next: `Pass --input to point at another file than ${inputPath}.`,
    cause: error,
  });
}

export function createEmptySnapshotError(snapshotPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.source,
    title: "Snapshot to extend is empty.",
    message: `No records found in ${snapshotPath}.`,
    hint: "Run the base job first, or pass --output to point at its snapshot.",
  });
}
