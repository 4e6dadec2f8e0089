/*
Purpose: core error types used across maintenance runs, formula tooling, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ConfigError("..."); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class MaintainerError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "MaintainerError";
  }
}

export class ConfigError extends MaintainerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class FormulaError extends MaintainerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "FormulaError";
  }
}

// =============================================================================
// BREW ERRORS
// =============================================================================

export type BrewErrorReason = "execution_failed" | "input_requested" | "timeout";

const BREW_ERROR_MESSAGES: Record<BrewErrorReason, string> = {
  execution_failed: "Error executing the brew command",
  input_requested: "Error Input request cannot be fulfilled",
  timeout: "Error command takes more than the timeout requested",
};

export class BrewError extends MaintainerError {
  public readonly reason: BrewErrorReason;
  // stderr or spawn failure text for execution_failed; empty otherwise.
  public readonly detail: string;

  constructor(reason: BrewErrorReason, detail = "", cause?: unknown) {
    const base = BREW_ERROR_MESSAGES[reason];
    super(detail.trim() ? `${base}: ${detail.trim()}` : base, cause);
    this.name = "BrewError";
    this.reason = reason;
    this.detail = detail.trim();
  }
}

export function isBrewError(error: unknown): error is BrewError {
  return error instanceof BrewError;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  brew: "BREW_ERROR",
  formula: "FORMULA_ERROR",
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

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
