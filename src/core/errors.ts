export class ProvisionerError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ProvisionerError";
  }
}

export class ConfigError extends ProvisionerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SpecValidationError extends ProvisionerError {
  constructor(
    public readonly issues: string[],
    cause?: unknown,
  ) {
    super(formatSpecIssues(issues), cause);
    this.name = "SpecValidationError";
  }
}

export class CheckpointError extends ProvisionerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CheckpointError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  spec: "SPEC_ERROR",
  checkpoint: "CHECKPOINT_ERROR",
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

export class UserFacingError extends ProvisionerError {
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

function formatSpecIssues(issues: string[]): string {
  if (issues.length === 0) return "Record specs are invalid.";
  if (issues.length === 1) return `Record specs are invalid: ${issues[0]}`;
  return `Record specs are invalid (${issues.length} issues):\n- ${issues.join("\n- ")}`;
}
