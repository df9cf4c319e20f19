/*
Purpose: turn arbitrary thrown values into ordered, typed lines for logs and reports.
Assumptions: UserFacingError carries the operator-facing title/hint; everything else is summarized.
Usage: formatErrorLines(err, { mode: "debug" }) and pick the kinds you need.
*/

import { UserFacingError } from "./errors.js";

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

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
    if (mode === "debug") {
      lines.push({ kind: "code", text: error.code });
    }
  } else {
    lines.push({ kind: "title", text: "Unexpected error." });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (mode !== "debug") {
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    const cause = resolveCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }
    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: Error): unknown {
  const cause: unknown = error.cause;
  return cause === null ? undefined : cause;
}
