import type { TaskStatus } from "./task-model.js";
import type { DependencyGraph, GraphNode } from "./task-graph.js";

// =============================================================================
// TYPES
// =============================================================================

export type ActionableTask = {
  task_id: number;
  name: string;
  status: TaskStatus;
  estimate_hours: number | null;
};

export type ApprovalTask = {
  task_id: number;
  name: string;
  status: TaskStatus;
};

export type BlockedTask = {
  task_id: number;
  name: string;
  blocked_by: string[];
};

export type ReadinessReport = {
  actionable: ActionableTask[];
  needs_approval: ApprovalTask[];
  blocked: BlockedTask[];
};

// =============================================================================
// CLASSIFIER
// =============================================================================

export function classifyReadiness(graph: DependencyGraph): ReadinessReport {
  const report: ReadinessReport = { actionable: [], needs_approval: [], blocked: [] };

  graph.nodes.forEach((node, index) => {
    if (!isOfferable(node.status)) return;

    const unmet = graph.predecessors[index]
      .map((pred) => graph.nodes[pred])
      .filter((pred) => pred.status !== "completed");

    if (unmet.length > 0) {
      report.blocked.push({
        task_id: node.id,
        name: node.name,
        blocked_by: unmet.map((pred) => pred.name),
      });
      return;
    }

    if (awaitsSignOff(node)) {
      report.needs_approval.push({ task_id: node.id, name: node.name, status: node.status });
      return;
    }

    report.actionable.push({
      task_id: node.id,
      name: node.name,
      status: node.status,
      estimate_hours: node.estimateHours,
    });
  });

  return report;
}

// In-progress work is already moving and is not offered again.
function isOfferable(status: TaskStatus): boolean {
  switch (status) {
    case "pending":
    case "blocked":
    case "review":
    case "approved":
      return true;
    case "in_progress":
    case "completed":
    case "failed":
      return false;
    default:
      return assertNever(status);
  }
}

function awaitsSignOff(node: GraphNode): boolean {
  return node.status === "review" && node.requiresApproval;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled task status: ${String(value)}`);
}
