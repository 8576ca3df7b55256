import { NotFoundError } from "./errors.js";
import type {
  DependencyCreate,
  Project,
  ProjectCreate,
  Task,
  TaskCreate,
  TaskDependency,
} from "./task-model.js";
import { compareTasksByOrder, type TaskStore } from "./task-store.js";

type MemoryState = {
  projects: Map<number, Project>;
  tasks: Map<number, Task>;
  dependencies: Map<number, TaskDependency>;
  nextProjectId: number;
  nextTaskId: number;
  nextDependencyId: number;
};

export class MemoryTaskStore implements TaskStore {
  private state: MemoryState = {
    projects: new Map(),
    tasks: new Map(),
    dependencies: new Map(),
    nextProjectId: 1,
    nextTaskId: 1,
    nextDependencyId: 1,
  };

  private depth = 0;

  transaction<T>(fn: () => T): T {
    // Nested calls join the outer transaction; only the outermost one restores on failure.
    if (this.depth > 0) return fn();

    const snapshot = structuredClone(this.state);
    this.depth += 1;
    try {
      return fn();
    } catch (err) {
      this.state = snapshot;
      throw err;
    } finally {
      this.depth -= 1;
    }
  }

  createProject(input: ProjectCreate, now: string): Project {
    const project: Project = {
      id: this.state.nextProjectId,
      ...input,
      status: "draft",
      created_at: now,
      updated_at: now,
    };
    this.state.nextProjectId += 1;
    this.state.projects.set(project.id, project);
    return { ...project };
  }

  getProject(projectId: number): Project | null {
    const project = this.state.projects.get(projectId);
    return project ? { ...project } : null;
  }

  listProjects(): Project[] {
    return [...this.state.projects.values()].sort((a, b) => a.id - b.id).map((p) => ({ ...p }));
  }

  saveProject(project: Project): Project {
    if (!this.state.projects.has(project.id)) {
      throw new NotFoundError("project", project.id);
    }
    this.state.projects.set(project.id, { ...project });
    return { ...project };
  }

  createTask(input: TaskCreate, now: string): Task {
    if (!this.state.projects.has(input.project_id)) {
      throw new NotFoundError("project", input.project_id);
    }

    const task: Task = {
      id: this.state.nextTaskId,
      ...input,
      status: "pending",
      approved_by: null,
      approved_at: null,
      rejection_reason: null,
      test_results: null,
      created_at: now,
      updated_at: now,
    };
    this.state.nextTaskId += 1;
    this.state.tasks.set(task.id, task);
    return { ...task };
  }

  getTask(taskId: number): Task | null {
    const task = this.state.tasks.get(taskId);
    return task ? { ...task } : null;
  }

  listTasks(projectId: number): Task[] {
    return [...this.state.tasks.values()]
      .filter((task) => task.project_id === projectId)
      .sort(compareTasksByOrder)
      .map((task) => ({ ...task }));
  }

  saveTask(task: Task): Task {
    if (!this.state.tasks.has(task.id)) {
      throw new NotFoundError("task", task.id);
    }
    this.state.tasks.set(task.id, { ...task });
    return { ...task };
  }

  deleteProject(projectId: number): boolean {
    if (!this.state.projects.delete(projectId)) return false;

    for (const task of [...this.state.tasks.values()]) {
      if (task.project_id === projectId) this.deleteTask(task.id);
    }
    return true;
  }

  deleteTask(taskId: number): boolean {
    if (!this.state.tasks.delete(taskId)) return false;

    for (const [id, dep] of this.state.dependencies) {
      if (dep.task_id === taskId || dep.depends_on_task_id === taskId) {
        this.state.dependencies.delete(id);
      }
    }
    return true;
  }

  listDependencies(projectId: number): TaskDependency[] {
    return [...this.state.dependencies.values()]
      .filter((dep) => this.state.tasks.get(dep.task_id)?.project_id === projectId)
      .sort((a, b) => a.id - b.id)
      .map((dep) => ({ ...dep }));
  }

  findDependency(taskId: number, dependsOnTaskId: number): TaskDependency | null {
    for (const dep of this.state.dependencies.values()) {
      if (dep.task_id === taskId && dep.depends_on_task_id === dependsOnTaskId) {
        return { ...dep };
      }
    }
    return null;
  }

  saveDependency(input: DependencyCreate, now: string): TaskDependency {
    for (const id of [input.task_id, input.depends_on_task_id]) {
      if (!this.state.tasks.has(id)) throw new NotFoundError("dependency_endpoint", id);
    }

    const existing = this.findDependency(input.task_id, input.depends_on_task_id);
    if (existing) return existing;

    const dep: TaskDependency = { id: this.state.nextDependencyId, ...input, created_at: now };
    this.state.nextDependencyId += 1;
    this.state.dependencies.set(dep.id, dep);
    return { ...dep };
  }

  close(): void {}
}
