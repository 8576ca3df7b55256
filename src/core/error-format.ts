/*
Purpose: turn any thrown value into ordered display lines for CLI output and logs.
Assumptions: UserFacingError carries title/hint; everything else falls back to name + message.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { OrchestratorError, UserFacingError } from "./errors.js";

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

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const UNKNOWN_ERROR_TITLE = "Unexpected error.";

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
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
      appendDebugLines(lines, error);
    }
    return lines;
  }

  if (error instanceof Error) {
    lines.push({ kind: "title", text: resolveErrorTitle(error) });
    lines.push({ kind: "message", text: error.message });
    if (mode === "debug") {
      lines.push({ kind: "name", text: error.name });
      appendDebugLines(lines, error);
    }
    return lines;
  }

  lines.push({ kind: "title", text: UNKNOWN_ERROR_TITLE });
  lines.push({ kind: "message", text: String(error) });
  return lines;
}

function resolveErrorTitle(error: Error): string {
  if (error instanceof OrchestratorError) {
    return `${error.name.replace(/Error$/, "")} error.`;
  }
  return UNKNOWN_ERROR_TITLE;
}

function appendDebugLines(lines: ErrorFormatLine[], error: Error): void {
  if (error.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
  }
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }
}

// =============================================================================
// ANSI
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  // Color needs a terminal; useColor can only switch it off.
  if (options.useColor === false) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return Boolean(options.stream?.isTTY);
}
