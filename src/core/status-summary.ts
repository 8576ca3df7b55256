import { computeCriticalPath } from "./critical-path.js";
import { classifyReadiness, type ActionableTask, type ApprovalTask } from "./readiness.js";
import type { DependencyGraph } from "./task-graph.js";
import type { Project, Task, TaskStatus } from "./task-model.js";
import { roundTo } from "./utils.js";

export type ProjectStatusSummary = {
  project_id: number;
  project_name: string;
  status: Project["status"];
  risk_level: Project["risk_level"];
  task_counts: Record<TaskStatus, number>;
  total_tasks: number;
  total_estimate_hours: number;
  completed_estimate_hours: number;
  progress_percent: number;
  critical_path_hours: number;
  circular_dependency: boolean;
  next_actions: ActionableTask[];
  needs_approval: ApprovalTask[];
};

export function summarizeProject(args: {
  project: Project;
  tasks: Task[];
  graph: DependencyGraph;
  actionLimit: number;
}): ProjectStatusSummary {
  const { project, tasks, graph, actionLimit } = args;

  const taskCounts = emptyStatusCounts();

  let totalEstimate = 0;
  let completedEstimate = 0;
  for (const task of tasks) {
    taskCounts[task.status] += 1;
    if (task.estimate_hours !== null) {
      totalEstimate += task.estimate_hours;
      if (task.status === "completed") completedEstimate += task.estimate_hours;
    }
  }

  const progress = totalEstimate > 0 ? (completedEstimate / totalEstimate) * 100 : 0;
  const criticalPath = computeCriticalPath(graph);
  const readiness = classifyReadiness(graph);

  return {
    project_id: project.id,
    project_name: project.name,
    status: project.status,
    risk_level: project.risk_level,
    task_counts: taskCounts,
    total_tasks: tasks.length,
    total_estimate_hours: totalEstimate,
    completed_estimate_hours: completedEstimate,
    progress_percent: roundTo(progress, 2),
    critical_path_hours: criticalPath.total_hours,
    circular_dependency: criticalPath.error === "circular_dependency",
    next_actions: readiness.actionable.slice(0, actionLimit),
    needs_approval: readiness.needs_approval,
  };
}

function emptyStatusCounts(): Record<TaskStatus, number> {
  return {
    pending: 0,
    in_progress: 0,
    blocked: 0,
    review: 0,
    approved: 0,
    completed: 0,
    failed: 0,
  };
}
