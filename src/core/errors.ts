export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class StorageError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "StorageError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "config",
  task: "task",
  gate: "gate",
  notFound: "not_found",
  dependency: "dependency",
  validation: "validation",
  storage: "storage",
  producer: "producer",
  unknown: "unknown",
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
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

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

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}

// =============================================================================
// NOT FOUND
// =============================================================================

export type NotFoundResource = "project" | "task" | "dependency_endpoint";

export class NotFoundError extends UserFacingError {
  constructor(
    public readonly resource: NotFoundResource,
    public readonly id: number,
  ) {
    super({
      code: USER_FACING_ERROR_CODES.notFound,
      title: NOT_FOUND_TITLES[resource],
      message: formatNotFoundMessage(resource, id),
      hint: NOT_FOUND_HINTS[resource],
    });
    this.name = "NotFoundError";
  }
}

const NOT_FOUND_TITLES: Record<NotFoundResource, string> = {
  project: "Project not found.",
  task: "Task not found.",
  dependency_endpoint: "Dependency endpoint not found.",
};

const NOT_FOUND_HINTS: Record<NotFoundResource, string> = {
  project: "List projects with `taskweave projects list`.",
  task: "List tasks with `taskweave tasks list --project <id>`.",
  dependency_endpoint: "Both tasks must exist before they can be linked.",
};

function formatNotFoundMessage(resource: NotFoundResource, id: number): string {
  switch (resource) {
    case "project":
      return `Project ${id} does not exist.`;
    case "task":
      return `Task ${id} does not exist.`;
    case "dependency_endpoint":
      return `Dependency references task ${id}, which does not exist.`;
  }
}

// =============================================================================
// LIFECYCLE GATES
// =============================================================================

export type GateViolationKind =
  | "spec_missing"
  | "test_results_missing"
  | "tests_failed"
  | "approval_required";

const GATE_MESSAGES: Record<GateViolationKind, { title: string; hint: string }> = {
  spec_missing: {
    title: "Task cannot be approved without a specification.",
    hint: "Generate a specification before approving: `taskweave tasks spec <id>`.",
  },
  test_results_missing: {
    title: "Task cannot be completed without test results.",
    hint: "Run the task's tests and record them: `taskweave tasks record-tests <id>`.",
  },
  tests_failed: {
    title: "Task cannot be completed with failed tests.",
    hint: "Fix the failing tests and record passing results before completing.",
  },
  approval_required: {
    title: "Task requires human approval before completion.",
    hint: "Approve the task first: `taskweave tasks approve <id> --by <name>`.",
  },
};

export class GateViolationError extends UserFacingError {
  constructor(
    public readonly kind: GateViolationKind,
    public readonly taskId: number,
  ) {
    const { title, hint } = GATE_MESSAGES[kind];
    super({
      code: USER_FACING_ERROR_CODES.gate,
      title,
      message: `Task ${taskId}: ${title.charAt(0).toLowerCase()}${title.slice(1)}`,
      hint,
    });
    this.name = "GateViolationError";
  }
}

export class GateBypassError extends UserFacingError {
  constructor(taskId: number, status: string) {
    super({
      code: USER_FACING_ERROR_CODES.gate,
      title: "Status change not allowed.",
      message: `Task ${taskId} cannot be moved to ${status} directly.`,
      hint: "Use `taskweave tasks approve` or `taskweave tasks complete` so the gates are checked.",
    });
    this.name = "GateBypassError";
  }
}

// =============================================================================
// DEPENDENCIES
// =============================================================================

export class SelfDependencyError extends UserFacingError {
  constructor(public readonly taskId: number) {
    super({
      code: USER_FACING_ERROR_CODES.dependency,
      title: "Task cannot depend on itself.",
      message: `Task ${taskId} was given itself as a prerequisite.`,
    });
    this.name = "SelfDependencyError";
  }
}

export class CrossProjectDependencyError extends UserFacingError {
  constructor(taskId: number, dependsOnTaskId: number) {
    super({
      code: USER_FACING_ERROR_CODES.dependency,
      title: "Dependency crosses projects.",
      message: `Task ${taskId} and task ${dependsOnTaskId} belong to different projects.`,
      hint: "Dependencies can only link tasks of the same project.",
    });
    this.name = "CrossProjectDependencyError";
  }
}

export class CycleFormingDependencyError extends UserFacingError {
  constructor(
    taskId: number,
    dependsOnTaskId: number,
    public readonly cycle: number[],
  ) {
    super({
      code: USER_FACING_ERROR_CODES.dependency,
      title: "Dependency would create a cycle.",
      message: `Task ${taskId} cannot depend on task ${dependsOnTaskId}: ${cycle.join(" -> ")}.`,
      hint: "Remove one of the existing dependencies or disable scheduling.enforce_acyclic.",
    });
    this.name = "CycleFormingDependencyError";
  }
}

export class ProjectScopeError extends TaskError {
  constructor(message: string) {
    super(message);
    this.name = "ProjectScopeError";
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

export class ValidationError extends UserFacingError {
  constructor(
    subject: string,
    public readonly issues: string[],
  ) {
    super({
      code: USER_FACING_ERROR_CODES.validation,
      title: `Invalid ${subject}.`,
      message: issues.join("\n"),
    });
    this.name = "ValidationError";
  }
}
