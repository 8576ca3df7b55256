/**
 * Storage boundary for projects, tasks and dependency edges.
 * Purpose: the orchestration service reads snapshots and writes transitions through this port.
 * Assumptions: calls are synchronous; `transaction` serializes a read-check-write sequence.
 * Usage: SqliteTaskStore for real projects, MemoryTaskStore for tests and dry runs.
 */

import type {
  DependencyCreate,
  Project,
  ProjectCreate,
  Task,
  TaskCreate,
  TaskDependency,
} from "./task-model.js";

export interface TaskStore {
  /**
   * Runs `fn` atomically. Writes made inside are rolled back if it throws, and no other
   * writer can interleave between the reads and writes it performs.
   */
  transaction<T>(fn: () => T): T;

  createProject(input: ProjectCreate, now: string): Project;
  getProject(projectId: number): Project | null;
  listProjects(): Project[];
  saveProject(project: Project): Project;
  /** Deletes the project with all of its tasks and their edges. False when it did not exist. */
  deleteProject(projectId: number): boolean;

  createTask(input: TaskCreate, now: string): Task;
  getTask(taskId: number): Task | null;
  /** Tasks of one project ordered by `order`, then id. */
  listTasks(projectId: number): Task[];
  saveTask(task: Task): Task;
  /** Deletes the task and every edge that touches it. Returns false when it did not exist. */
  deleteTask(taskId: number): boolean;

  /** Edges whose dependent task belongs to the project, ordered by id. */
  listDependencies(projectId: number): TaskDependency[];
  findDependency(taskId: number, dependsOnTaskId: number): TaskDependency | null;
  saveDependency(input: DependencyCreate, now: string): TaskDependency;

  close(): void;
}

export function compareTasksByOrder(a: Task, b: Task): number {
  return a.order - b.order || a.id - b.id;
}
