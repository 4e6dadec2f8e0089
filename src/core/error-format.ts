/*
Purpose: turn any thrown value into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  BrewError,
  ConfigError,
  FormulaError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type BrewErrorReason,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = toUserFacingInput(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if ((options.mode ?? "short") !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });

  const source = error instanceof Error ? error : normalized.cause;
  if (source instanceof Error && source.name.trim()) {
    lines.push({ kind: "name", text: source.name.trim() });
  }

  const cause = causeText(normalized.cause, normalized.message);
  if (cause) lines.push({ kind: "cause", text: cause });

  const stack = stackText(error) ?? stackText(normalized.cause);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name.trim() || String(error);
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

const BREW_TITLES: Record<BrewErrorReason, string> = {
  execution_failed: "brew command failed.",
  input_requested: "brew asked for user input.",
  timeout: "brew command timed out.",
};

const BREW_HINTS: Record<BrewErrorReason, string> = {
  execution_failed: "Run the same brew command by hand to see its full output.",
  input_requested: "Run the command interactively once, then let the service retry.",
  timeout: "Raise upgrade_timeout_minutes in the config or pass --timeout.",
};

function toUserFacingInput(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title.trim() || DEFAULT_ERROR_TITLE,
      message: error.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: error.hint?.trim() || undefined,
      next: error.next?.trim() || undefined,
      cause: error.cause,
    };
  }

  if (error instanceof BrewError) {
    return {
      code: USER_FACING_ERROR_CODES.brew,
      title: BREW_TITLES[error.reason],
      message: error.message,
      hint: BREW_HINTS[error.reason],
      cause: error.cause,
    };
  }

  if (error instanceof ConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error",
      message: error.message,
      cause: error.cause,
    };
  }

  if (error instanceof FormulaError) {
    return {
      code: USER_FACING_ERROR_CODES.formula,
      title: "Formula error",
      message: error.message,
      cause: error.cause,
    };
  }

  const message =
    error === null || error === undefined ? DEFAULT_ERROR_MESSAGE : formatErrorMessage(error);

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message.trim() || DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function causeText(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) return undefined;
  const text = formatErrorMessage(cause).trim();
  return text && text !== message ? text : undefined;
}

function stackText(value: unknown): string | undefined {
  return value instanceof Error && value.stack ? value.stack : undefined;
}
