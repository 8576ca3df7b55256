import { describe, expect, it } from "vitest";

import { FIXED_NOW, makeTask } from "../../test/helpers.js";

import { GateBypassError, GateViolationError, ValidationError } from "./errors.js";
import {
  approveTask,
  completeTask,
  findCompletionViolation,
  rejectTask,
  setTaskStatus,
} from "./lifecycle.js";

const LATER = "2026-01-06T10:30:00.000Z";

function gateKindOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    if (error instanceof GateViolationError) return error.kind;
    throw error;
  }
}

describe("approveTask", () => {
  it("requires a non-empty spec", () => {
    const task = makeTask({ id: 4, status: "review" });

    expect(gateKindOf(() => approveTask(task, "dana", LATER))).toBe("spec_missing");
    expect(gateKindOf(() => approveTask({ ...task, spec: {} }, "dana", LATER))).toBe(
      "spec_missing",
    );
  });

  it("records the approver and clears an earlier rejection", () => {
    const task = makeTask({
      id: 4,
      status: "review",
      spec: { objective: "Ship it" },
      rejection_reason: "Missing edge cases",
    });

    const approved = approveTask(task, "  dana ", LATER);

    expect(approved).toMatchObject({
      status: "approved",
      approved_by: "dana",
      approved_at: LATER,
      rejection_reason: null,
      updated_at: LATER,
    });
    expect(task.status).toBe("review");
  });

  it("rejects a blank approver", () => {
    const task = makeTask({ id: 4, spec: { objective: "Ship it" } });

    expect(() => approveTask(task, "   ", LATER)).toThrow(ValidationError);
  });
});

describe("rejectTask", () => {
  it("returns the task to pending with the trimmed reason", () => {
    const task = makeTask({
      id: 2,
      status: "approved",
      approved_by: "dana",
      approved_at: FIXED_NOW,
    });

    expect(rejectTask(task, " Needs load tests ", LATER)).toMatchObject({
      status: "pending",
      rejection_reason: "Needs load tests",
      approved_by: null,
      approved_at: null,
      updated_at: LATER,
    });
  });

  it("requires a reason", () => {
    expect(() => rejectTask(makeTask({ id: 2 }), "", LATER)).toThrow(ValidationError);
  });
});

describe("completeTask", () => {
  it("checks test results before approval", () => {
    const task = makeTask({ id: 3, requires_approval: true });

    expect(findCompletionViolation(task)).toBe("test_results_missing");
    expect(findCompletionViolation({ ...task, test_results: {} })).toBe("test_results_missing");
    expect(findCompletionViolation({ ...task, test_results: { status: "failed" } })).toBe(
      "tests_failed",
    );
    expect(findCompletionViolation({ ...task, test_results: { status: "passed" } })).toBe(
      "approval_required",
    );
  });

  it("completes an approved task with passing tests", () => {
    const task = makeTask({
      id: 3,
      requires_approval: true,
      status: "approved",
      test_results: { status: "passed", total: 12 },
    });

    const completed = completeTask(task, LATER);

    expect(completed.status).toBe("completed");
    expect(completed.updated_at).toBe(LATER);
  });

  it("accepts results without a status field", () => {
    const task = makeTask({ id: 3, test_results: { total: 3 } });

    expect(completeTask(task, LATER).status).toBe("completed");
  });

  it("throws a gate violation naming the task", () => {
    const task = makeTask({ id: 8 });

    expect(() => completeTask(task, LATER)).toThrow(GateViolationError);
    expect(() => completeTask(task, LATER)).toThrow(
      "Task 8: task cannot be completed without test results.",
    );
  });
});

describe("setTaskStatus", () => {
  it("moves between ungated statuses", () => {
    const task = makeTask({ id: 1 });

    expect(setTaskStatus(task, "in_progress", LATER)).toMatchObject({
      status: "in_progress",
      updated_at: LATER,
    });
    expect(setTaskStatus(task, "failed", LATER).status).toBe("failed");
  });

  it("refuses to bypass the approval and completion gates", () => {
    const task = makeTask({ id: 1, spec: { objective: "x" }, test_results: { status: "passed" } });

    expect(() => setTaskStatus(task, "approved", LATER)).toThrow(GateBypassError);
    expect(() => setTaskStatus(task, "completed", LATER)).toThrow(GateBypassError);
  });
});
