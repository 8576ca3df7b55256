import type { Command } from "commander";

import type { OrchestrationService } from "../app/services/orchestration-service.js";
import type { Task, TaskCreateInput } from "../core/task-model.js";
import { isPlainObject } from "../core/utils.js";

import { withAppContext } from "./config.js";
import {
  buildUpdatePatch,
  parseBoolean,
  parseId,
  parseInteger,
  parseJson,
  parseNullableNumber,
  parseNumber,
} from "./options.js";
import { emit, formatHours, renderTable, type OutputOptions } from "./output.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerTasksCommand(program: Command): void {
  const tasks = program.command("tasks").description("Create, edit and move tasks through review");

  tasks
    .command("create")
    .description("Create a task in a project")
    .requiredOption("--project <id>", "Project id", parseId)
    .requiredOption("--name <name>", "Task name")
    .requiredOption("--description <text>", "What the task delivers")
    .option("--estimate <hours>", "Estimated hours", parseNumber)
    .option("--order <n>", "Display order", parseInteger)
    .option("--confidence <score>", "Confidence score between 0 and 1", parseNumber)
    .option("--requires-approval", "Gate completion on an approval", false)
    .option("--inputs <json>", "Inputs as a JSON object", parseJson)
    .option("--outputs <json>", "Outputs as a JSON object", parseJson)
    .option("--tests <json>", "Tests as a JSON array of objects", parseJson)
    .option("--security-checks <json>", "Security checks as a JSON array of objects", parseJson)
    .action(async (opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksCreateCommand(
          service,
          {
            project_id: opts.project,
            name: opts.name,
            description: opts.description,
            estimate_hours: opts.estimate,
            order: opts.order,
            confidence_score: opts.confidence,
            requires_approval: opts.requiresApproval,
            inputs: opts.inputs,
            outputs: opts.outputs,
            tests: opts.tests,
            security_checks: opts.securityChecks,
          },
          output,
        ),
      );
    });

  tasks
    .command("list")
    .description("List a project's tasks in display order")
    .requiredOption("--project <id>", "Project id", parseId)
    .action(async (opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksListCommand(service, opts.project, output),
      );
    });

  tasks
    .command("show")
    .description("Show one task")
    .argument("<taskId>", "Task id", parseId)
    .action(async (taskId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksShowCommand(service, taskId, output),
      );
    });

  tasks
    .command("update")
    .description("Edit task fields (status changes go through set-status, approve and complete)")
    .argument("<taskId>", "Task id", parseId)
    .option("--name <name>", "Task name")
    .option("--description <text>", "Task description")
    .option("--estimate <hours>", 'Estimated hours, or "none" to clear', parseNullableNumber)
    .option("--order <n>", "Display order", parseInteger)
    .option("--confidence <score>", "Confidence score between 0 and 1", parseNumber)
    .option("--requires-approval <bool>", "Gate completion on an approval", parseBoolean)
    .option("--patch <json>", "Additional fields as a JSON object", parseJson)
    .action(async (taskId: number, opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksUpdateCommand(
          service,
          taskId,
          buildUpdatePatch(
            {
              name: opts.name,
              description: opts.description,
              estimate_hours: opts.estimate,
              order: opts.order,
              confidence_score: opts.confidence,
              requires_approval: opts.requiresApproval,
            },
            opts.patch,
          ),
          output,
        ),
      );
    });

  tasks
    .command("delete")
    .description("Delete a task and its dependency edges")
    .argument("<taskId>", "Task id", parseId)
    .action(async (taskId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksDeleteCommand(service, taskId, output),
      );
    });

  tasks
    .command("set-status")
    .description("Move a task to pending, in_progress, review, blocked or failed")
    .argument("<taskId>", "Task id", parseId)
    .argument("<status>", "Target status")
    .action(async (taskId: number, status: string, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksSetStatusCommand(service, taskId, status, output),
      );
    });

  tasks
    .command("record-tests")
    .description("Record test results on a task")
    .argument("<taskId>", "Task id", parseId)
    .option("--status <status>", "Overall result, e.g. passed or failed")
    .option("--results <json>", "Full results as a JSON object", parseJson)
    .action(async (taskId: number, opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksRecordTestsCommand(
          service,
          taskId,
          buildTestResults(opts.results, opts.status),
          output,
        ),
      );
    });

  tasks
    .command("spec")
    .description("Generate a detailed specification with the configured spec producer")
    .argument("<taskId>", "Task id", parseId)
    .action(async (taskId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksSpecCommand(service, taskId, output),
      );
    });

  tasks
    .command("approve")
    .description("Approve a task")
    .argument("<taskId>", "Task id", parseId)
    .requiredOption("--by <approver>", "Who approves the task")
    .action(async (taskId: number, opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksApproveCommand(service, taskId, opts.by, output),
      );
    });

  tasks
    .command("reject")
    .description("Reject a task back to pending with a reason")
    .argument("<taskId>", "Task id", parseId)
    .requiredOption("--by <rejector>", "Who rejects the task")
    .requiredOption("--reason <text>", "Why the task was rejected")
    .action(async (taskId: number, opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksRejectCommand(service, taskId, { by: opts.by, reason: opts.reason }, output),
      );
    });

  tasks
    .command("complete")
    .description("Complete a task once its approval and test gates pass")
    .argument("<taskId>", "Task id", parseId)
    .action(async (taskId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        tasksCompleteCommand(service, taskId, output),
      );
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export function tasksCreateCommand(
  service: OrchestrationService,
  input: TaskCreateInput,
  output: OutputOptions,
): Task {
  const task = service.createTask(input);
  emit(output, task, () => [`Created task ${task.id}: ${task.name}`]);
  return task;
}

export function tasksListCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): Task[] {
  const tasks = service.listTasks(projectId);
  emit(output, tasks, () => {
    if (tasks.length === 0) return [`No tasks in project ${projectId}.`];
    return renderTable(tasks, [
      { header: "ID", value: (task) => String(task.id) },
      { header: "ORDER", value: (task) => String(task.order) },
      { header: "STATUS", value: (task) => task.status },
      { header: "ESTIMATE", value: (task) => formatHours(task.estimate_hours) },
      { header: "NAME", value: (task) => task.name },
    ]);
  });
  return tasks;
}

export function tasksShowCommand(
  service: OrchestrationService,
  taskId: number,
  output: OutputOptions,
): Task {
  const task = service.getTask(taskId);
  emit(output, task, () => renderTask(task));
  return task;
}

export function tasksUpdateCommand(
  service: OrchestrationService,
  taskId: number,
  patch: Record<string, unknown>,
  output: OutputOptions,
): Task {
  const task = service.updateTask(taskId, patch);
  emit(output, task, () => [`Updated task ${task.id}: ${task.name}`]);
  return task;
}

export function tasksDeleteCommand(
  service: OrchestrationService,
  taskId: number,
  output: OutputOptions,
): void {
  service.deleteTask(taskId);
  emit(output, { task_id: taskId, deleted: true }, () => [`Deleted task ${taskId}`]);
}

export function tasksSetStatusCommand(
  service: OrchestrationService,
  taskId: number,
  status: string,
  output: OutputOptions,
): Task {
  const task = service.setStatus(taskId, status);
  emit(output, task, () => [`Task ${task.id} is now ${task.status}`]);
  return task;
}

export function tasksRecordTestsCommand(
  service: OrchestrationService,
  taskId: number,
  results: Record<string, unknown>,
  output: OutputOptions,
): Task {
  const task = service.recordTestResults(taskId, results);
  const status = task.test_results?.status ?? "unspecified";
  emit(output, task, () => [`Recorded test results for task ${task.id} (${status})`]);
  return task;
}

export async function tasksSpecCommand(
  service: OrchestrationService,
  taskId: number,
  output: OutputOptions,
): Promise<Task> {
  const task = await service.generateSpec(taskId);
  emit(output, task, () => [
    `Generated spec for task ${task.id}: ${task.name}`,
    `Confidence: ${task.confidence_score ?? "-"}`,
  ]);
  return task;
}

export function tasksApproveCommand(
  service: OrchestrationService,
  taskId: number,
  approver: string,
  output: OutputOptions,
): Task {
  const task = service.approve(taskId, approver);
  emit(output, task, () => [`Approved task ${task.id} (by ${task.approved_by ?? approver})`]);
  return task;
}

export function tasksRejectCommand(
  service: OrchestrationService,
  taskId: number,
  opts: { by: string; reason: string },
  output: OutputOptions,
): Task {
  const task = service.reject(taskId, opts.by, opts.reason);
  emit(output, task, () => [`Rejected task ${task.id}: ${task.rejection_reason ?? opts.reason}`]);
  return task;
}

export function tasksCompleteCommand(
  service: OrchestrationService,
  taskId: number,
  output: OutputOptions,
): Task {
  const task = service.complete(taskId);
  emit(output, task, () => [`Completed task ${task.id}: ${task.name}`]);
  return task;
}

// =============================================================================
// HELPERS
// =============================================================================

export function buildTestResults(results: unknown, status: string | undefined): Record<string, unknown> {
  const base = isPlainObject(results) ? results : {};
  return status === undefined ? { ...base } : { ...base, status };
}

function renderTask(task: Task): string[] {
  const lines = [
    `Task ${task.id}: ${task.name}`,
    `Project: ${task.project_id}`,
    `Status: ${task.status}`,
    `Order: ${task.order}`,
    `Estimate: ${formatHours(task.estimate_hours)}`,
    `Requires approval: ${task.requires_approval ? "yes" : "no"}`,
    `Description: ${task.description}`,
  ];
  if (task.approved_by) lines.push(`Approved by: ${task.approved_by} at ${task.approved_at ?? "-"}`);
  if (task.rejection_reason) lines.push(`Rejection reason: ${task.rejection_reason}`);
  if (task.confidence_score !== null) lines.push(`Confidence: ${task.confidence_score}`);
  if (task.test_results) lines.push(`Tests: ${task.test_results.status ?? "recorded"}`);
  if (task.spec) lines.push("Spec: present");
  return lines;
}
