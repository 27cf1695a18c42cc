/*
Purpose: turn thrown values into ordered display lines for CLI output and log warnings.
Assumptions: UserFacingError carries the title/hint text; anything else is unexpected.
Usage: formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(useColor).
*/

import { BatchTaskError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

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

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
};

const UNEXPECTED_ERROR_TITLE = "Unexpected error.";

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  opts: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNEXPECTED_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (opts.mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: resolveErrorCode(error) });
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

export function resolveColorEnabled(opts: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!opts.stream?.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return opts.useColor ?? true;
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveErrorCode(error: unknown): string {
  if (error instanceof UserFacingError) return error.code;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveCause(error: unknown): unknown {
  if (error instanceof UserFacingError || error instanceof BatchTaskError) {
    return error.cause;
  }
  return undefined;
}
