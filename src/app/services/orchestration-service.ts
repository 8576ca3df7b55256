/**
 * OrchestrationService is the single entry point for project, task and scheduling operations.
 * Purpose: load a consistent snapshot from the TaskStore, run the pure analyzers and lifecycle
 * transitions over it, persist the result and append an event for every write.
 * Assumptions: the store is synchronous; each write runs inside one store transaction.
 * Usage: const service = new OrchestrationService({ store, log, producers, scheduling }).
 */

import type { z } from "zod";

import type { SchedulingConfig } from "../../core/config.js";
import { computeCriticalPath, type CriticalPathResult } from "../../core/critical-path.js";
import {
  CrossProjectDependencyError,
  CycleFormingDependencyError,
  NotFoundError,
  SelfDependencyError,
  ValidationError,
} from "../../core/errors.js";
import {
  approveTask,
  completeTask,
  rejectTask,
  setTaskStatus,
} from "../../core/lifecycle.js";
import { logTaskEvent, type EventLog } from "../../core/logger.js";
import { planReprioritization, type OrderChange } from "../../core/prioritizer.js";
import { classifyReadiness, type ReadinessReport } from "../../core/readiness.js";
import { summarizeProject, type ProjectStatusSummary } from "../../core/status-summary.js";
import {
  buildDependencyGraph,
  findPath,
  listGraphEdges,
  type DependencyGraph,
  type GraphEdge,
} from "../../core/task-graph.js";
import {
  formatIssues,
  ProjectCreateSchema,
  ProjectUpdateSchema,
  TaskCreateSchema,
  TaskStatusSchema,
  TaskUpdateSchema,
  TestResultsSchema,
  type Project,
  type ProjectCreateInput,
  type Task,
  type TaskCreateInput,
  type TaskDependency,
  type TaskStatus,
  type TestResults,
} from "../../core/task-model.js";
import type { TaskStore } from "../../core/task-store.js";
import { isoNow } from "../../core/utils.js";
import { FALLBACK_SPEC_CONFIDENCE } from "../../producers/fallback.js";
import type { Producers } from "../../producers/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type OrchestrationServiceDeps = {
  store: TaskStore;
  log: EventLog;
  producers: Producers;
  scheduling: SchedulingConfig;
  now?: () => string;
};

export type CriticalPathReport = CriticalPathResult & { project_id: number };

export type GraphNodeView = {
  id: number;
  name: string;
  status: TaskStatus;
  duration: number;
  estimate_hours: number | null;
  requires_approval: boolean;
  order: number;
};

export type DependencyGraphView = {
  project_id: number;
  nodes: GraphNodeView[];
  edges: GraphEdge[];
};

export type ReprioritizeReport = {
  project_id: number;
  changes: OrderChange[];
  total_tasks: number;
};

export type NextActionsReport = ReadinessReport & { project_id: number };

export type GeneratedPlanReport = {
  project_id: number;
  tasks: Task[];
  dependencies: TaskDependency[];
  skipped_dependencies: number;
  risk_level: Project["risk_level"];
  estimated_total_hours: number;
};

type ProjectSnapshot = {
  project: Project;
  tasks: Task[];
  graph: DependencyGraph;
};

// =============================================================================
// SERVICE
// =============================================================================

export class OrchestrationService {
  private readonly store: TaskStore;
  private readonly log: EventLog;
  private readonly producers: Producers;
  private readonly scheduling: SchedulingConfig;
  private readonly now: () => string;

  constructor(deps: OrchestrationServiceDeps) {
    this.store = deps.store;
    this.log = deps.log;
    this.producers = deps.producers;
    this.scheduling = deps.scheduling;
    this.now = deps.now ?? isoNow;
  }

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  createProject(input: ProjectCreateInput): Project {
    const data = parseInput(ProjectCreateSchema, input, "project");
    const project = this.store.createProject(data, this.now());
    this.log.log({
      type: "project.created",
      projectId: project.id,
      payload: { name: project.name, risk_level: project.risk_level },
    });
    return project;
  }

  getProject(projectId: number): Project {
    return this.requireProject(projectId);
  }

  listProjects(): Project[] {
    return this.store.listProjects();
  }

  /** Applies a partial edit; unknown fields are rejected. */
  updateProject(projectId: number, patch: unknown): Project {
    const data = parseInput(ProjectUpdateSchema, patch, "project update");
    const project = this.store.transaction(() => {
      const current = this.requireProject(projectId);
      return this.store.saveProject({ ...current, ...data, updated_at: this.now() });
    });
    this.log.log({
      type: "project.updated",
      projectId,
      payload: { fields: Object.keys(data).sort() },
    });
    return project;
  }

  /** Removes the project, its tasks and every edge between them. */
  deleteProject(projectId: number): void {
    const { project, taskCount } = this.store.transaction(() => {
      const current = this.requireProject(projectId);
      const count = this.store.listTasks(projectId).length;
      this.store.deleteProject(projectId);
      return { project: current, taskCount: count };
    });
    this.log.log({
      type: "project.deleted",
      projectId,
      payload: { name: project.name, task_count: taskCount },
    });
  }

  // ---------------------------------------------------------------------------
  // Tasks
  // ---------------------------------------------------------------------------

  createTask(input: TaskCreateInput): Task {
    const data = parseInput(TaskCreateSchema, input, "task");
    const task = this.store.transaction(() => {
      this.requireProject(data.project_id);
      return this.store.createTask(data, this.now());
    });
    logTaskEvent(this.log, "task.created", task, { name: task.name });
    return task;
  }

  getTask(taskId: number): Task {
    return this.requireTask(taskId);
  }

  listTasks(projectId: number): Task[] {
    return this.store.transaction(() => {
      this.requireProject(projectId);
      return this.store.listTasks(projectId);
    });
  }

  /** Applies a partial edit. Status is not editable here; see setStatus, approve and complete. */
  updateTask(taskId: number, patch: unknown): Task {
    const data = parseInput(TaskUpdateSchema, patch, "task update");
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask({ ...current, ...data, updated_at: this.now() });
    });
    logTaskEvent(this.log, "task.updated", task, { fields: Object.keys(data).sort() });
    return task;
  }

  deleteTask(taskId: number): void {
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      this.store.deleteTask(taskId);
      return current;
    });
    logTaskEvent(this.log, "task.deleted", task, { name: task.name });
  }

  setStatus(taskId: number, status: string): Task {
    const next = parseInput(TaskStatusSchema, status, "status");
    const { previous, task } = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return {
        previous: current.status,
        task: this.store.saveTask(setTaskStatus(current, next, this.now())),
      };
    });
    logTaskEvent(this.log, "task.status_set", task, { from: previous, to: task.status });
    return task;
  }

  recordTestResults(taskId: number, results: unknown): Task {
    const data: TestResults = parseInput(TestResultsSchema, results, "test results");
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask({ ...current, test_results: data, updated_at: this.now() });
    });
    logTaskEvent(this.log, "task.tests_recorded", task, { status: data.status ?? null });
    return task;
  }

  // ---------------------------------------------------------------------------
  // Dependencies
  // ---------------------------------------------------------------------------

  /** Records that `taskId` depends on `dependsOnTaskId`. Re-adding an edge returns the stored one. */
  addDependency(taskId: number, dependsOnTaskId: number): TaskDependency {
    if (taskId === dependsOnTaskId) {
      throw new SelfDependencyError(taskId);
    }

    const outcome = this.store.transaction(() => {
      const task = this.store.getTask(taskId);
      if (!task) throw new NotFoundError("dependency_endpoint", taskId);
      const prerequisite = this.store.getTask(dependsOnTaskId);
      if (!prerequisite) throw new NotFoundError("dependency_endpoint", dependsOnTaskId);

      if (task.project_id !== prerequisite.project_id) {
        throw new CrossProjectDependencyError(taskId, dependsOnTaskId);
      }

      const existing = this.store.findDependency(taskId, dependsOnTaskId);
      if (existing) return { task, dependency: existing, created: false };

      if (this.scheduling.enforce_acyclic) {
        const cycle = this.findClosingCycle(task.project_id, taskId, dependsOnTaskId);
        if (cycle) throw new CycleFormingDependencyError(taskId, dependsOnTaskId, cycle);
      }

      const dependency = this.store.saveDependency(
        { task_id: taskId, depends_on_task_id: dependsOnTaskId },
        this.now(),
      );
      return { task, dependency, created: true };
    });

    if (outcome.created) {
      logTaskEvent(this.log, "dependency.created", outcome.task, {
        depends_on_task_id: dependsOnTaskId,
      });
    }
    return outcome.dependency;
  }

  // ---------------------------------------------------------------------------
  // Analysis
  // ---------------------------------------------------------------------------

  criticalPath(projectId: number): CriticalPathReport {
    const { graph } = this.loadSnapshot(projectId);
    const result = computeCriticalPath(graph);
    if (result.error) {
      this.log.log({ type: "critical_path.cycle", projectId, payload: { tasks: graph.nodes.length } });
    }
    return { project_id: projectId, ...result };
  }

  dependencyGraph(projectId: number): DependencyGraphView {
    const { graph } = this.loadSnapshot(projectId);
    return {
      project_id: projectId,
      nodes: graph.nodes.map((node) => ({
        id: node.id,
        name: node.name,
        status: node.status,
        duration: node.duration,
        estimate_hours: node.estimateHours,
        requires_approval: node.requiresApproval,
        order: node.order,
      })),
      edges: listGraphEdges(graph),
    };
  }

  nextActions(projectId: number): NextActionsReport {
    const { graph } = this.loadSnapshot(projectId);
    return { project_id: projectId, ...classifyReadiness(graph) };
  }

  statusSummary(projectId: number): ProjectStatusSummary {
    const { project, tasks, graph } = this.loadSnapshot(projectId);
    return summarizeProject({
      project,
      tasks,
      graph,
      actionLimit: this.scheduling.summary_action_limit,
    });
  }

  reprioritize(projectId: number): ReprioritizeReport {
    const report = this.store.transaction(() => {
      this.requireProject(projectId);
      const tasks = this.store.listTasks(projectId);
      const changes = planReprioritization(tasks);
      const byId = new Map(tasks.map((task) => [task.id, task]));
      const now = this.now();

      for (const change of changes) {
        const task = byId.get(change.task_id);
        if (task) this.store.saveTask({ ...task, order: change.new_order, updated_at: now });
      }

      return { project_id: projectId, changes, total_tasks: tasks.length };
    });

    if (report.changes.length > 0) {
      this.log.log({
        type: "tasks.reprioritized",
        projectId,
        payload: { changed: report.changes.length, total_tasks: report.total_tasks },
      });
    }
    return report;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  approve(taskId: number, approverId: string): Task {
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask(approveTask(current, approverId, this.now()));
    });
    logTaskEvent(this.log, "task.approved", task, { approved_by: task.approved_by });
    return task;
  }

  reject(taskId: number, rejectorId: string, reason: string): Task {
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask(rejectTask(current, reason, this.now()));
    });
    logTaskEvent(this.log, "task.rejected", task, {
      rejected_by: rejectorId.trim() || "unknown",
      reason: task.rejection_reason,
    });
    return task;
  }

  complete(taskId: number): Task {
    const task = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask(completeTask(current, this.now()));
    });
    logTaskEvent(this.log, "task.completed", task);
    return task;
  }

  // ---------------------------------------------------------------------------
  // Producers
  // ---------------------------------------------------------------------------

  /**
   * Asks the plan producer for a breakdown of the project and stores it: one task per plan
   * entry, plan dependency indices resolved to the new task ids. Out-of-range, self and
   * repeated indices are skipped, as are cycle-forming ones when acyclicity is enforced.
   */
  async generatePlan(projectId: number): Promise<GeneratedPlanReport> {
    const project = this.requireProject(projectId);
    const plan = await this.producers.plan.producePlan(project);

    const report = this.store.transaction(() => {
      const current = this.requireProject(projectId);
      const now = this.now();

      const tasks = plan.tasks.map((entry, index) =>
        this.store.createTask(
          parseInput(
            TaskCreateSchema,
            {
              project_id: projectId,
              name: entry.name,
              description: entry.description,
              inputs: entry.inputs,
              outputs: entry.outputs,
              tests: entry.tests,
              security_checks: entry.security_checks,
              estimate_hours: entry.estimate_hours,
              confidence_score: entry.confidence_score,
              requires_approval: entry.requires_approval,
              order: entry.order ?? index,
            },
            "planned task",
          ),
          now,
        ),
      );

      const dependencies: TaskDependency[] = [];
      const seenEdges = new Set<string>();
      let skipped = 0;
      plan.tasks.forEach((entry, index) => {
        const task = tasks[index];
        for (const depIndex of entry.dependencies) {
          const inRange = depIndex >= 0 && depIndex < tasks.length && depIndex !== index;
          const prerequisite = inRange ? tasks[depIndex] : undefined;
          if (!prerequisite) {
            skipped += 1;
            continue;
          }
          if (
            this.scheduling.enforce_acyclic &&
            this.findClosingCycle(projectId, task.id, prerequisite.id)
          ) {
            skipped += 1;
            continue;
          }
          const edgeKey = `${task.id}:${prerequisite.id}`;
          if (seenEdges.has(edgeKey)) {
            skipped += 1;
            continue;
          }
          seenEdges.add(edgeKey);
          dependencies.push(
            this.store.saveDependency(
              { task_id: task.id, depends_on_task_id: prerequisite.id },
              now,
            ),
          );
        }
      });

      this.store.saveProject({
        ...current,
        risk_level: plan.risk_level,
        status: "planning",
        updated_at: now,
      });

      return {
        project_id: projectId,
        tasks,
        dependencies,
        skipped_dependencies: skipped,
        risk_level: plan.risk_level,
        estimated_total_hours: plan.estimated_total_hours ?? 0,
      };
    });

    this.log.log({
      type: "plan.generated",
      projectId,
      payload: {
        task_count: report.tasks.length,
        dependency_count: report.dependencies.length,
        estimated_total_hours: report.estimated_total_hours,
      },
    });
    return report;
  }

  async generateSpec(taskId: number): Promise<Task> {
    const task = this.requireTask(taskId);
    const project = this.requireProject(task.project_id);
    const spec = await this.producers.spec.produceSpec(task, project);

    const updated = this.store.transaction(() => {
      const current = this.requireTask(taskId);
      return this.store.saveTask({
        ...current,
        spec,
        confidence_score: spec.confidence_score ?? FALLBACK_SPEC_CONFIDENCE,
        updated_at: this.now(),
      });
    });
    logTaskEvent(this.log, "spec.generated", updated, {
      confidence_score: updated.confidence_score,
    });
    return updated;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private loadSnapshot(projectId: number): ProjectSnapshot {
    return this.store.transaction(() => {
      const project = this.requireProject(projectId);
      const tasks = this.store.listTasks(projectId);
      const dependencies = this.store.listDependencies(projectId);
      const graph = buildDependencyGraph(projectId, tasks, dependencies, this.scheduling);
      return { project, tasks, graph };
    });
  }

  /**
   * Returns the cycle that the edge `dependsOnTaskId -> taskId` would close, as task ids
   * starting and ending at `taskId`, or null when the edge keeps the graph acyclic.
   */
  private findClosingCycle(projectId: number, taskId: number, dependsOnTaskId: number): number[] | null {
    const graph = buildDependencyGraph(
      projectId,
      this.store.listTasks(projectId),
      this.store.listDependencies(projectId),
      this.scheduling,
    );
    const path = findPath(graph, taskId, dependsOnTaskId);
    return path ? [...path, taskId] : null;
  }

  private requireProject(projectId: number): Project {
    const project = this.store.getProject(projectId);
    if (!project) throw new NotFoundError("project", projectId);
    return project;
  }

  private requireTask(taskId: number): Task {
    const task = this.store.getTask(taskId);
    if (!task) throw new NotFoundError("task", taskId);
    return task;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, subject: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(subject, formatIssues(parsed.error.issues));
  }
  return parsed.data;
}
