export class GateError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "GateError";
  }
}

export class ConfigError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class RuleConfigError extends GateError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RuleConfigError";
  }
}

export type RuleSelectionErrorKind = "usage" | "unknown_ids" | "empty";

export class RuleSelectionError extends GateError {
  constructor(
    message: string,
    public readonly kind: RuleSelectionErrorKind,
    public readonly ruleIds: string[] = [],
  ) {
    super(message);
    this.name = "RuleSelectionError";
  }
}

export class ExternalToolError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ExternalToolError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  input: "INPUT_ERROR",
  tool: "TOOL_ERROR",
  pipeline: "PIPELINE_ERROR",
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

export class UserFacingError extends GateError {
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
