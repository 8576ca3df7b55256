import { describe, expect, it } from "vitest";

import { GateViolationError, NotFoundError, StorageError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { buildCliErrorPayload, renderCliError, renderCliErrorJson } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config error",
    message: "Missing config value",
    hint: "Run taskweave init",
    next: "Edit .taskweave/config.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const output = renderCliError(buildUserFacingError(), { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config error",
        "Missing config value",
        "Hint: Run taskweave init",
        "Next: Edit .taskweave/config.yaml",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.storage,
      title: "Storage failed",
      message: "Database locked",
      cause: new Error("SQLITE_BUSY"),
    });
    error.stack = "UserFacingError: Database locked\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Storage failed",
        "Database locked",
        "Code: storage",
        "Cause: SQLITE_BUSY",
        "Stack:",
        "  UserFacingError: Database locked",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("titles internal errors after their class", () => {
    const output = renderCliError(new StorageError("disk gone"), { stream: nonTtyStream });

    expect(output).toBe(["Error: Storage error.", "disk gone"].join("\n"));
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const output = renderCliError(buildUserFacingError(), {
      stream: nonTtyStream,
      useColor: true,
    });

    expect(output).toContain("Error: Config error");
    expect(output).not.toContain("\x1b[");
  });
});

describe("renderCliErrorJson", () => {
  it("serializes user-facing errors with their code and hint", () => {
    const payload = JSON.parse(renderCliErrorJson(new NotFoundError("task", 12)));

    expect(payload).toEqual({
      error: {
        code: "not_found",
        title: "Task not found.",
        message: "Task 12 does not exist.",
        hint: "List tasks with `taskweave tasks list --project <id>`.",
      },
    });
  });

  it("reports gate violations under the gate code", () => {
    expect(buildCliErrorPayload(new GateViolationError("tests_failed", 4)).error).toMatchObject({
      code: "gate",
      title: "Task cannot be completed with failed tests.",
    });
  });

  it("falls back to the unknown code for other errors", () => {
    expect(buildCliErrorPayload(new Error("boom"))).toEqual({
      error: { code: "unknown", title: "Unexpected error.", message: "boom" },
    });
  });
});
