import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { z } from "zod";

import { NotFoundError, StorageError } from "./errors.js";
import {
  ProjectSchema,
  TaskDependencySchema,
  TaskSchema,
  type DependencyCreate,
  type Project,
  type ProjectCreate,
  type Task,
  type TaskCreate,
  type TaskDependency,
} from "./task-model.js";
import type { TaskStore } from "./task-store.js";

// =============================================================================
// ROW SHAPES
// =============================================================================

const ProjectRowSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string(),
  goal: z.string(),
  acceptance_criteria_json: z.string(),
  risk_level: z.string(),
  status: z.string(),
  environment: z.string().nullable(),
  created_by: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});
type ProjectRow = z.infer<typeof ProjectRowSchema>;

const TaskRowSchema = z.object({
  id: z.number(),
  project_id: z.number(),
  name: z.string(),
  description: z.string(),
  inputs_json: z.string(),
  outputs_json: z.string(),
  tests_json: z.string(),
  security_checks_json: z.string(),
  estimate_hours: z.number().nullable(),
  status: z.string(),
  confidence_score: z.number().nullable(),
  requires_approval: z.number(),
  approved_by: z.string().nullable(),
  approved_at: z.string().nullable(),
  rejection_reason: z.string().nullable(),
  sort_order: z.number(),
  spec_json: z.string().nullable(),
  test_results_json: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
type TaskRow = z.infer<typeof TaskRowSchema>;

const TASK_COLUMNS = `
  project_id, name, description, inputs_json, outputs_json, tests_json, security_checks_json,
  estimate_hours, status, confidence_score, requires_approval, approved_by, approved_at,
  rejection_reason, sort_order, spec_json, test_results_json, created_at, updated_at
`;

// =============================================================================
// STORE
// =============================================================================

export class SqliteTaskStore implements TaskStore {
  private closed = false;

  private constructor(private readonly db: Database.Database) {}

  /** Opens (and migrates) the database at `dbPath`. Pass ":memory:" for a throwaway store. */
  static open(dbPath: string): SqliteTaskStore {
    let db: Database.Database;
    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      db = new Database(dbPath);
    } catch (err) {
      throw new StorageError(`Failed to open task database at ${dbPath}.`, err);
    }

    const store = new SqliteTaskStore(db);
    try {
      store.ensureSchema();
    } catch (err) {
      db.close();
      throw err;
    }
    return store;
  }

  transaction<T>(fn: () => T): T {
    return this.guard("transaction", () => this.db.transaction(fn).immediate());
  }

  createProject(input: ProjectCreate, now: string): Project {
    return this.guard("create project", () => {
      const info = this.db
        .prepare(
          `INSERT INTO projects
             (name, description, goal, acceptance_criteria_json, risk_level, status,
              environment, created_by, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, 'draft', ?, ?, ?, ?)`,
        )
        .run(
          input.name,
          input.description,
          input.goal,
          JSON.stringify(input.acceptance_criteria),
          input.risk_level,
          input.environment,
          input.created_by,
          now,
          now,
        );
      return this.requireProject(Number(info.lastInsertRowid));
    });
  }

  getProject(projectId: number): Project | null {
    return this.guard("read project", () => {
      const row = this.db.prepare("SELECT * FROM projects WHERE id = ?").get(projectId);
      return row === undefined ? null : projectFromRow(ProjectRowSchema.parse(row));
    });
  }

  listProjects(): Project[] {
    return this.guard("list projects", () =>
      this.db
        .prepare("SELECT * FROM projects ORDER BY id")
        .all()
        .map((row) => projectFromRow(ProjectRowSchema.parse(row))),
    );
  }

  saveProject(project: Project): Project {
    return this.guard("save project", () => {
      const info = this.db
        .prepare(
          `UPDATE projects SET
             name = ?, description = ?, goal = ?, acceptance_criteria_json = ?, risk_level = ?,
             status = ?, environment = ?, created_by = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(
          project.name,
          project.description,
          project.goal,
          JSON.stringify(project.acceptance_criteria),
          project.risk_level,
          project.status,
          project.environment,
          project.created_by,
          project.updated_at,
          project.id,
        );
      if (info.changes === 0) throw new NotFoundError("project", project.id);
      return this.requireProject(project.id);
    });
  }

  createTask(input: TaskCreate, now: string): Task {
    return this.guard("create task", () => {
      if (this.getProject(input.project_id) === null) {
        throw new NotFoundError("project", input.project_id);
      }

      const info = this.db
        .prepare(
          `INSERT INTO tasks (${TASK_COLUMNS})
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?, NULL, NULL, NULL, ?, ?, NULL, ?, ?)`,
        )
        .run(
          input.project_id,
          input.name,
          input.description,
          JSON.stringify(input.inputs),
          JSON.stringify(input.outputs),
          JSON.stringify(input.tests),
          JSON.stringify(input.security_checks),
          input.estimate_hours,
          input.confidence_score,
          input.requires_approval ? 1 : 0,
          input.order,
          input.spec === null ? null : JSON.stringify(input.spec),
          now,
          now,
        );
      return this.requireTask(Number(info.lastInsertRowid));
    });
  }

  getTask(taskId: number): Task | null {
    return this.guard("read task", () => {
      const row = this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(taskId);
      return row === undefined ? null : taskFromRow(TaskRowSchema.parse(row));
    });
  }

  listTasks(projectId: number): Task[] {
    return this.guard("list tasks", () =>
      this.db
        .prepare("SELECT * FROM tasks WHERE project_id = ? ORDER BY sort_order, id")
        .all(projectId)
        .map((row) => taskFromRow(TaskRowSchema.parse(row))),
    );
  }

  saveTask(task: Task): Task {
    return this.guard("save task", () => {
      const info = this.db
        .prepare(
          `UPDATE tasks SET
             name = ?, description = ?, inputs_json = ?, outputs_json = ?, tests_json = ?,
             security_checks_json = ?, estimate_hours = ?, status = ?, confidence_score = ?,
             requires_approval = ?, approved_by = ?, approved_at = ?, rejection_reason = ?,
             sort_order = ?, spec_json = ?, test_results_json = ?, updated_at = ?
           WHERE id = ?`,
        )
        .run(
          task.name,
          task.description,
          JSON.stringify(task.inputs),
          JSON.stringify(task.outputs),
          JSON.stringify(task.tests),
          JSON.stringify(task.security_checks),
          task.estimate_hours,
          task.status,
          task.confidence_score,
          task.requires_approval ? 1 : 0,
          task.approved_by,
          task.approved_at,
          task.rejection_reason,
          task.order,
          task.spec === null ? null : JSON.stringify(task.spec),
          task.test_results === null ? null : JSON.stringify(task.test_results),
          task.updated_at,
          task.id,
        );
      if (info.changes === 0) throw new NotFoundError("task", task.id);
      return this.requireTask(task.id);
    });
  }

  // Tasks and edges go with it through ON DELETE CASCADE.
  deleteProject(projectId: number): boolean {
    return this.guard("delete project", () => {
      const info = this.db.prepare("DELETE FROM projects WHERE id = ?").run(projectId);
      return info.changes > 0;
    });
  }

  deleteTask(taskId: number): boolean {
    return this.guard("delete task", () => {
      const info = this.db.prepare("DELETE FROM tasks WHERE id = ?").run(taskId);
      return info.changes > 0;
    });
  }

  listDependencies(projectId: number): TaskDependency[] {
    return this.guard("list dependencies", () =>
      this.db
        .prepare(
          `SELECT d.* FROM task_dependencies d
           JOIN tasks t ON t.id = d.task_id
           WHERE t.project_id = ?
           ORDER BY d.id`,
        )
        .all(projectId)
        .map((row) => TaskDependencySchema.parse(row)),
    );
  }

  findDependency(taskId: number, dependsOnTaskId: number): TaskDependency | null {
    return this.guard("read dependency", () => {
      const row = this.db
        .prepare("SELECT * FROM task_dependencies WHERE task_id = ? AND depends_on_task_id = ?")
        .get(taskId, dependsOnTaskId);
      return row === undefined ? null : TaskDependencySchema.parse(row);
    });
  }

  saveDependency(input: DependencyCreate, now: string): TaskDependency {
    return this.transaction(() => {
      for (const id of [input.task_id, input.depends_on_task_id]) {
        if (this.getTask(id) === null) throw new NotFoundError("dependency_endpoint", id);
      }

      this.db
        .prepare(
          `INSERT INTO task_dependencies (task_id, depends_on_task_id, created_at)
           VALUES (?, ?, ?)
           ON CONFLICT (task_id, depends_on_task_id) DO NOTHING`,
        )
        .run(input.task_id, input.depends_on_task_id, now);

      const saved = this.findDependency(input.task_id, input.depends_on_task_id);
      if (saved === null) {
        throw new StorageError(
          `Dependency ${input.task_id} -> ${input.depends_on_task_id} was not persisted.`,
        );
      }
      return saved;
    });
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  private ensureSchema(): void {
    this.guard("migrate schema", () => {
      this.db.pragma("foreign_keys = ON");
      this.db.pragma("busy_timeout = 5000");
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS projects (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL,
          description TEXT NOT NULL,
          goal TEXT NOT NULL,
          acceptance_criteria_json TEXT NOT NULL DEFAULT '[]',
          risk_level TEXT NOT NULL DEFAULT 'low',
          status TEXT NOT NULL DEFAULT 'draft',
          environment TEXT,
          created_by TEXT NOT NULL DEFAULT 'system',
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS tasks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          project_id INTEGER NOT NULL REFERENCES projects (id) ON DELETE CASCADE,
          name TEXT NOT NULL,
          description TEXT NOT NULL,
          inputs_json TEXT NOT NULL DEFAULT '{}',
          outputs_json TEXT NOT NULL DEFAULT '{}',
          tests_json TEXT NOT NULL DEFAULT '[]',
          security_checks_json TEXT NOT NULL DEFAULT '[]',
          estimate_hours REAL,
          status TEXT NOT NULL DEFAULT 'pending',
          confidence_score REAL,
          requires_approval INTEGER NOT NULL DEFAULT 0,
          approved_by TEXT,
          approved_at TEXT,
          rejection_reason TEXT,
          sort_order INTEGER NOT NULL DEFAULT 0,
          spec_json TEXT,
          test_results_json TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE TABLE IF NOT EXISTS task_dependencies (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          task_id INTEGER NOT NULL REFERENCES tasks (id) ON DELETE CASCADE,
          depends_on_task_id INTEGER NOT NULL REFERENCES tasks (id) ON DELETE CASCADE,
          created_at TEXT NOT NULL,
          UNIQUE (task_id, depends_on_task_id)
        );
        CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks (project_id, sort_order);
        CREATE INDEX IF NOT EXISTS idx_deps_prereq ON task_dependencies (depends_on_task_id);
      `);
    });
  }

  private requireProject(projectId: number): Project {
    const project = this.getProject(projectId);
    if (project === null) throw new NotFoundError("project", projectId);
    return project;
  }

  private requireTask(taskId: number): Task {
    const task = this.getTask(taskId);
    if (task === null) throw new NotFoundError("task", taskId);
    return task;
  }

  private guard<T>(operation: string, fn: () => T): T {
    if (this.closed) throw new StorageError(`Cannot ${operation}: task database is closed.`);
    try {
      return fn();
    } catch (err) {
      if (err instanceof Database.SqliteError) {
        throw new StorageError(`Failed to ${operation}: ${err.message}`, err);
      }
      if (err instanceof z.ZodError) {
        throw new StorageError(`Failed to ${operation}: stored row is malformed.`, err);
      }
      throw err;
    }
  }
}

// =============================================================================
// ROW MAPPING
// =============================================================================

function projectFromRow(row: ProjectRow): Project {
  return ProjectSchema.parse({
    id: row.id,
    name: row.name,
    description: row.description,
    goal: row.goal,
    acceptance_criteria: parseJsonColumn(row.acceptance_criteria_json),
    risk_level: row.risk_level,
    status: row.status,
    environment: row.environment,
    created_by: row.created_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
  });
}

function taskFromRow(row: TaskRow): Task {
  return TaskSchema.parse({
    id: row.id,
    project_id: row.project_id,
    name: row.name,
    description: row.description,
    inputs: parseJsonColumn(row.inputs_json),
    outputs: parseJsonColumn(row.outputs_json),
    tests: parseJsonColumn(row.tests_json),
    security_checks: parseJsonColumn(row.security_checks_json),
    estimate_hours: row.estimate_hours,
    status: row.status,
    confidence_score: row.confidence_score,
    requires_approval: row.requires_approval === 1,
    approved_by: row.approved_by,
    approved_at: row.approved_at,
    rejection_reason: row.rejection_reason,
    order: row.sort_order,
    spec: row.spec_json === null ? null : parseJsonColumn(row.spec_json),
    test_results: row.test_results_json === null ? null : parseJsonColumn(row.test_results_json),
    created_at: row.created_at,
    updated_at: row.updated_at,
  });
}

function parseJsonColumn(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new StorageError("Stored JSON column could not be parsed.", err);
  }
}
