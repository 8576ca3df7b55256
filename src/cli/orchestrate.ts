import type { Command } from "commander";

import type {
  CriticalPathReport,
  DependencyGraphView,
  NextActionsReport,
  OrchestrationService,
  ReprioritizeReport,
} from "../app/services/orchestration-service.js";
import type { ProjectStatusSummary } from "../core/status-summary.js";
import { TASK_STATUSES } from "../core/task-model.js";

import { withAppContext } from "./config.js";
import { parseId } from "./options.js";
import { emit, formatHours, renderTable, type OutputOptions } from "./output.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerOrchestrateCommand(program: Command): void {
  const orchestrate = program
    .command("orchestrate")
    .description("Analyze a project's dependency graph and schedule");

  orchestrate
    .command("critical-path")
    .description("Show the longest duration-weighted chain of tasks")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        criticalPathCommand(service, projectId, output),
      );
    });

  orchestrate
    .command("graph")
    .description("Show tasks and dependency edges")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        graphCommand(service, projectId, output),
      );
    });

  orchestrate
    .command("next")
    .description("List actionable, approval-gated and blocked tasks")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        nextActionsCommand(service, projectId, output),
      );
    });

  orchestrate
    .command("reprioritize")
    .description("Renumber task order by status, keeping the current order within a status")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        reprioritizeCommand(service, projectId, output),
      );
    });

  orchestrate
    .command("status")
    .description("Summarize progress, critical path and next actions")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        statusCommand(service, projectId, output),
      );
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export function criticalPathCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): CriticalPathReport {
  const report = service.criticalPath(projectId);
  emit(output, report, () => renderCriticalPath(report));
  return report;
}

export function graphCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): DependencyGraphView {
  const view = service.dependencyGraph(projectId);
  emit(output, view, () => renderGraph(view));
  return view;
}

export function nextActionsCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): NextActionsReport {
  const report = service.nextActions(projectId);
  emit(output, report, () => renderNextActions(report));
  return report;
}

export function reprioritizeCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): ReprioritizeReport {
  const report = service.reprioritize(projectId);
  emit(output, report, () => {
    if (report.changes.length === 0) {
      return [`Order unchanged for ${report.total_tasks} task(s).`];
    }
    return [
      `Reordered ${report.changes.length} of ${report.total_tasks} task(s):`,
      ...report.changes.map(
        (change) => `  ${change.task_id} ${change.name}: ${change.old_order} -> ${change.new_order}`,
      ),
    ];
  });
  return report;
}

export function statusCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): ProjectStatusSummary {
  const summary = service.statusSummary(projectId);
  emit(output, summary, () => renderStatus(summary));
  return summary;
}

// =============================================================================
// RENDERING
// =============================================================================

function renderCriticalPath(report: CriticalPathReport): string[] {
  if (report.error === "circular_dependency") {
    return ["Critical path unavailable: the dependency graph contains a cycle."];
  }
  if (report.path.length === 0) return ["No tasks in this project."];

  return [
    `Critical path: ${formatHours(report.total_hours)}`,
    ...report.path.map((step, index) => `  ${index + 1}. [${step.task_id}] ${step.name} (${formatHours(step.duration)}, ${step.status})`),
  ];
}

function renderGraph(view: DependencyGraphView): string[] {
  if (view.nodes.length === 0) return ["No tasks in this project."];

  const names = new Map(view.nodes.map((node) => [node.id, node.name]));
  const lines = renderTable(view.nodes, [
    { header: "ID", value: (node) => String(node.id) },
    { header: "STATUS", value: (node) => node.status },
    { header: "HOURS", value: (node) => formatHours(node.duration) },
    { header: "NAME", value: (node) => node.name },
  ]);

  lines.push(view.edges.length === 0 ? "No dependencies." : "Dependencies:");
  for (const edge of view.edges) {
    lines.push(`  ${edge.from} ${names.get(edge.from) ?? ""} -> ${edge.to} ${names.get(edge.to) ?? ""}`);
  }
  return lines;
}

function renderNextActions(report: NextActionsReport): string[] {
  const lines: string[] = [];

  lines.push(`Actionable (${report.actionable.length}):`);
  for (const task of report.actionable) {
    lines.push(`  [${task.task_id}] ${task.name} (${task.status}, ${formatHours(task.estimate_hours)})`);
  }

  lines.push(`Needs approval (${report.needs_approval.length}):`);
  for (const task of report.needs_approval) {
    lines.push(`  [${task.task_id}] ${task.name} (${task.status})`);
  }

  lines.push(`Blocked (${report.blocked.length}):`);
  for (const task of report.blocked) {
    lines.push(`  [${task.task_id}] ${task.name} waiting on: ${task.blocked_by.join(", ")}`);
  }

  return lines;
}

function renderStatus(summary: ProjectStatusSummary): string[] {
  const counts = TASK_STATUSES.filter((status) => summary.task_counts[status] > 0)
    .map((status) => `${status}=${summary.task_counts[status]}`)
    .join(" ");

  const lines = [
    `Project ${summary.project_id}: ${summary.project_name} (${summary.status}, risk ${summary.risk_level})`,
    `Tasks: ${summary.total_tasks}${counts ? ` (${counts})` : ""}`,
    `Progress: ${summary.progress_percent}% (${formatHours(summary.completed_estimate_hours)} of ${formatHours(summary.total_estimate_hours)})`,
    summary.circular_dependency
      ? "Critical path: unavailable (circular dependency)"
      : `Critical path: ${formatHours(summary.critical_path_hours)}`,
  ];

  if (summary.next_actions.length > 0) {
    lines.push("Next actions:");
    for (const task of summary.next_actions) lines.push(`  [${task.task_id}] ${task.name}`);
  }
  if (summary.needs_approval.length > 0) {
    lines.push("Needs approval:");
    for (const task of summary.needs_approval) lines.push(`  [${task.task_id}] ${task.name}`);
  }
  return lines;
}
