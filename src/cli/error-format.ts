/*
Purpose: render errors that escape a command as operator-facing CLI output.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug }));
*/

import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  formatErrorMessage,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import {
  CheckoutConflictError,
  ConfigError,
  GitError,
  MirrorUnavailableError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";
import { isTimeoutError } from "../git/git.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

const TIMEOUT_HINT = "Raise git_timeout_ms in the config, or check the network.";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );
  const described = describeCliError(error);

  const lines = formatErrorLines(described, { mode: "short" }).map((line) =>
    renderLine(line, format),
  );
  for (const [label, value] of releaseContextEntries(error)) {
    lines.push(`${format(`${label}:`, ["cyan"])} ${value}`);
  }

  if (options.debug) {
    lines.push(renderDetail("Code:", described.code, format));
    // Name, cause and stack come from the original error, not its operator-facing description.
    for (const line of formatErrorLines(error, { mode: "debug" })) {
      if (line.kind === "name" || line.kind === "cause" || line.kind === "stack") {
        lines.push(renderLine(line, format));
      }
    }
  }

  return lines.join("\n");
}

/** Operator-facing title, hint and code for anything a command can throw. */
export function describeCliError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  if (error instanceof CheckoutConflictError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: `Branch ${error.branch} cannot be fast-forwarded.`,
      message: error.message,
      hint: "Reset the branch in the mirror to its origin, or delete the mirror and sync again.",
      cause: error,
    });
  }

  if (error instanceof MirrorUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: `Repository ${error.repo} is unavailable.`,
      message: error.message,
      hint: isTimeoutError(error.cause)
        ? TIMEOUT_HINT
        : "Check the repository URL, the network and your git credentials.",
      cause: error,
    });
  }

  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      hint: isTimeoutError(error) ? TIMEOUT_HINT : undefined,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid configuration.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof CommanderError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Invalid command line.",
      message: error.message,
      hint: "Run release-sync --help for usage.",
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error.",
    message: formatErrorMessage(error),
    cause: error,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function releaseContextEntries(error: unknown): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  let current: unknown = error;

  // Walk the cause chain; a wrapped mirror or checkout failure still names its repository.
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if (current instanceof MirrorUnavailableError) entries.push(["Repository", current.repo]);
    if (current instanceof CheckoutConflictError) entries.push(["Branch", current.branch]);
    current = current.cause;
  }

  return entries;
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return renderDetail("Code:", line.text, format);
    case "name":
      return renderDetail("Name:", line.text, format);
    case "cause":
      return renderDetail("Cause:", line.text, format);
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text, "  "), ["dim"])}`;
    default:
      return line.text;
  }
}

function renderDetail(label: string, text: string, format: AnsiFormatter): string {
  return `${format(label, ["dim"])} ${format(text, ["dim"])}`;
}

function indent(value: string, prefix: string): string {
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
