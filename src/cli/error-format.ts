import { USER_FACING_ERROR_CODES, UserFacingError, type UserFacingErrorCode } from "../core/errors.js";
import {
  createAnsiFormatter,
  formatErrorMessage,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
  type ErrorFormatMode,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type CliErrorPayload = {
  error: {
    code: UserFacingErrorCode;
    title: string;
    message: string;
    hint?: string;
    next?: string;
  };
};

// =============================================================================
// OUTPUT
// =============================================================================

/** Text form for stderr. Color applies only when the target stream is a TTY. */
export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return formatErrorLines(error, { mode })
    .map((line) => renderLine(line, format))
    .join("\n");
}

/** JSON counterpart of renderCliError for `--json` runs; never includes stack traces. */
export function renderCliErrorJson(error: unknown): string {
  return JSON.stringify(buildCliErrorPayload(error), null, 2);
}

export function buildCliErrorPayload(error: unknown): CliErrorPayload {
  if (error instanceof UserFacingError) {
    return {
      error: {
        code: error.code,
        title: error.title,
        message: error.message,
        ...(error.hint ? { hint: error.hint } : {}),
        ...(error.next ? { next: error.next } : {}),
      },
    };
  }

  const [title] = formatErrorLines(error);
  return {
    error: {
      code: USER_FACING_ERROR_CODES.unknown,
      title: title?.text ?? "Unexpected error.",
      message: formatErrorMessage(error),
    },
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

type LineLayout = { label: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LINE_LAYOUTS: Record<Exclude<ErrorFormatLineKind, "message">, LineLayout> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"] },
};

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "message") return line.text;

  const layout = LINE_LAYOUTS[line.kind];
  const label = format(layout.label, layout.labelStyles);
  const text = layout.textStyles.length > 0 ? format(line.text, layout.textStyles) : line.text;

  // Stack traces go on their own lines, indented under the label.
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((row) => `  ${row}`)
      .join("\n");
    return `${label}\n${format(indented, layout.textStyles)}`;
  }
  return `${label} ${text}`;
}
