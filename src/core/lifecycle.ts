import { GateBypassError, GateViolationError, ValidationError, type GateViolationKind } from "./errors.js";
import type { Task, TaskStatus } from "./task-model.js";
import { isNonEmptyObject, isoNow } from "./utils.js";

// =============================================================================
// GATES
// =============================================================================

export function findApprovalViolation(task: Task): GateViolationKind | null {
  return isNonEmptyObject(task.spec) ? null : "spec_missing";
}

export function findCompletionViolation(task: Task): GateViolationKind | null {
  if (!isNonEmptyObject(task.test_results)) return "test_results_missing";
  if (task.test_results.status === "failed") return "tests_failed";
  if (task.requires_approval && task.status !== "approved") return "approval_required";
  return null;
}

// =============================================================================
// TRANSITIONS
// =============================================================================

export function approveTask(task: Task, approverId: string, now: string = isoNow()): Task {
  const violation = findApprovalViolation(task);
  if (violation) throw new GateViolationError(violation, task.id);

  const approver = approverId.trim();
  if (!approver) throw new ValidationError("approval", ["approved_by: approver is required"]);

  return {
    ...task,
    status: "approved",
    approved_by: approver,
    approved_at: now,
    rejection_reason: null,
    updated_at: now,
  };
}

export function rejectTask(task: Task, reason: string, now: string = isoNow()): Task {
  const trimmed = reason.trim();
  if (!trimmed) throw new ValidationError("rejection", ["rejection_reason: reason is required"]);

  return {
    ...task,
    status: "pending",
    rejection_reason: trimmed,
    approved_by: null,
    approved_at: null,
    updated_at: now,
  };
}

export function completeTask(task: Task, now: string = isoNow()): Task {
  const violation = findCompletionViolation(task);
  if (violation) throw new GateViolationError(violation, task.id);

  return { ...task, status: "completed", updated_at: now };
}

/**
 * Moves a task into a status that has no gate. Approved and completed are reachable
 * only through approveTask and completeTask.
 */
export function setTaskStatus(task: Task, status: TaskStatus, now: string = isoNow()): Task {
  switch (status) {
    case "pending":
    case "in_progress":
    case "blocked":
    case "review":
    case "failed":
      return { ...task, status, updated_at: now };
    case "approved":
    case "completed":
      throw new GateBypassError(task.id, status);
    default:
      return assertNever(status);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled task status: ${String(value)}`);
}
