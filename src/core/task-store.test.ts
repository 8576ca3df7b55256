import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import { afterEach, describe, expect, it, vi } from "vitest";

import { FIXED_NOW, makeTemporaryDirectory, removeTemporaryDirectories } from "../../test/helpers.js";

import { NotFoundError, StorageError } from "./errors.js";
import { MemoryTaskStore } from "./memory-task-store.js";
import { SqliteTaskStore } from "./sqlite-task-store.js";
import {
  ProjectCreateSchema,
  TaskCreateSchema,
  type ProjectCreateInput,
  type TaskCreateInput,
} from "./task-model.js";
import type { TaskStore } from "./task-store.js";

const LATER = "2026-01-07T12:00:00.000Z";

function projectInput(overrides: Partial<ProjectCreateInput> = {}) {
  return ProjectCreateSchema.parse({
    name: "Billing",
    description: "Invoice pipeline",
    goal: "Send invoices automatically",
    ...overrides,
  });
}

function taskInput(projectId: number, overrides: Partial<TaskCreateInput> = {}) {
  return TaskCreateSchema.parse({
    project_id: projectId,
    name: "Render invoice",
    description: "Produce a PDF per invoice",
    ...overrides,
  });
}

const openStores: TaskStore[] = [];

afterEach(() => {
  for (const store of openStores) store.close();
  openStores.length = 0;
  removeTemporaryDirectories();
});

describe.each([
  ["MemoryTaskStore", (): TaskStore => new MemoryTaskStore()],
  ["SqliteTaskStore", (): TaskStore => SqliteTaskStore.open(":memory:")],
])("%s", (_name, openStore) => {
  function createStore(): TaskStore {
    const store = openStore();
    openStores.push(store);
    return store;
  }

  it("creates projects as drafts with sequential ids", () => {
    const store = createStore();

    const first = store.createProject(
      projectInput({ acceptance_criteria: ["Invoices match ledger"], risk_level: "high" }),
      FIXED_NOW,
    );
    const second = store.createProject(projectInput({ name: "Payroll" }), FIXED_NOW);

    expect(first).toEqual({
      id: 1,
      name: "Billing",
      description: "Invoice pipeline",
      goal: "Send invoices automatically",
      acceptance_criteria: ["Invoices match ledger"],
      risk_level: "high",
      status: "draft",
      environment: null,
      created_by: "system",
      created_at: FIXED_NOW,
      updated_at: FIXED_NOW,
    });
    expect(second.id).toBe(2);
    expect(store.listProjects().map((project) => project.name)).toEqual(["Billing", "Payroll"]);
    expect(store.getProject(99)).toBeNull();
  });

  it("round-trips task fields through save", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    const task = store.createTask(
      taskInput(project.id, {
        inputs: { invoice_id: "string" },
        tests: [{ type: "unit", description: "renders totals" }],
        estimate_hours: 2.5,
        requires_approval: true,
      }),
      FIXED_NOW,
    );

    expect(task).toMatchObject({
      id: 1,
      project_id: project.id,
      status: "pending",
      inputs: { invoice_id: "string" },
      tests: [{ type: "unit", description: "renders totals" }],
      estimate_hours: 2.5,
      requires_approval: true,
      spec: null,
      test_results: null,
    });

    const saved = store.saveTask({
      ...task,
      status: "review",
      spec: { objective: "Render invoices" },
      test_results: { status: "passed", total: 4 },
      updated_at: LATER,
    });

    expect(store.getTask(task.id)).toEqual(saved);
    expect(saved).toMatchObject({
      status: "review",
      spec: { objective: "Render invoices" },
      test_results: { status: "passed", total: 4 },
      updated_at: LATER,
      created_at: FIXED_NOW,
    });
  });

  it("lists tasks by order, then id", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    store.createTask(taskInput(project.id, { name: "c", order: 2 }), FIXED_NOW);
    store.createTask(taskInput(project.id, { name: "a", order: 0 }), FIXED_NOW);
    store.createTask(taskInput(project.id, { name: "b", order: 0 }), FIXED_NOW);

    expect(store.listTasks(project.id).map((task) => task.name)).toEqual(["a", "b", "c"]);
  });

  it("refuses tasks for unknown projects", () => {
    const store = createStore();

    expect(() => store.createTask(taskInput(7), FIXED_NOW)).toThrow(NotFoundError);
  });

  it("stores each dependency edge once", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    const a = store.createTask(taskInput(project.id, { name: "a" }), FIXED_NOW);
    const b = store.createTask(taskInput(project.id, { name: "b" }), FIXED_NOW);

    const first = store.saveDependency({ task_id: b.id, depends_on_task_id: a.id }, FIXED_NOW);
    const again = store.saveDependency({ task_id: b.id, depends_on_task_id: a.id }, LATER);

    expect(again).toEqual(first);
    expect(store.listDependencies(project.id)).toEqual([
      { id: first.id, task_id: b.id, depends_on_task_id: a.id, created_at: FIXED_NOW },
    ]);
    expect(store.findDependency(a.id, b.id)).toBeNull();
  });

  it("rejects edges to missing tasks", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    const a = store.createTask(taskInput(project.id), FIXED_NOW);

    expect(() =>
      store.saveDependency({ task_id: a.id, depends_on_task_id: 42 }, FIXED_NOW),
    ).toThrow(NotFoundError);
  });

  it("removes a deleted task's edges in both directions", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    const a = store.createTask(taskInput(project.id, { name: "a" }), FIXED_NOW);
    const b = store.createTask(taskInput(project.id, { name: "b" }), FIXED_NOW);
    const c = store.createTask(taskInput(project.id, { name: "c" }), FIXED_NOW);
    store.saveDependency({ task_id: b.id, depends_on_task_id: a.id }, FIXED_NOW);
    store.saveDependency({ task_id: c.id, depends_on_task_id: b.id }, FIXED_NOW);

    expect(store.deleteTask(b.id)).toBe(true);
    expect(store.deleteTask(b.id)).toBe(false);
    expect(store.listDependencies(project.id)).toEqual([]);
    expect(store.listTasks(project.id).map((task) => task.name)).toEqual(["a", "c"]);
  });

  it("deletes a project together with its tasks and their edges", () => {
    const store = createStore();
    const doomed = store.createProject(projectInput(), FIXED_NOW);
    const kept = store.createProject(projectInput({ name: "Payroll" }), FIXED_NOW);
    const a = store.createTask(taskInput(doomed.id, { name: "a" }), FIXED_NOW);
    const b = store.createTask(taskInput(doomed.id, { name: "b" }), FIXED_NOW);
    const c = store.createTask(taskInput(kept.id, { name: "c" }), FIXED_NOW);
    const d = store.createTask(taskInput(kept.id, { name: "d" }), FIXED_NOW);
    store.saveDependency({ task_id: b.id, depends_on_task_id: a.id }, FIXED_NOW);
    const keptEdge = store.saveDependency({ task_id: d.id, depends_on_task_id: c.id }, FIXED_NOW);

    expect(store.deleteProject(doomed.id)).toBe(true);
    expect(store.deleteProject(doomed.id)).toBe(false);

    expect(store.getProject(doomed.id)).toBeNull();
    expect(store.getTask(a.id)).toBeNull();
    expect(store.getTask(b.id)).toBeNull();
    expect(store.findDependency(b.id, a.id)).toBeNull();
    expect(store.listProjects().map((project) => project.name)).toEqual(["Payroll"]);
    expect(store.listTasks(kept.id).map((task) => task.name)).toEqual(["c", "d"]);
    expect(store.listDependencies(kept.id)).toEqual([keptEdge]);
  });

  it("rolls back every write when a transaction throws", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);

    expect(() =>
      store.transaction(() => {
        store.createTask(taskInput(project.id), FIXED_NOW);
        store.saveProject({ ...project, status: "planning", updated_at: LATER });
        throw new Error("abort");
      }),
    ).toThrow("abort");

    expect(store.listTasks(project.id)).toEqual([]);
    expect(store.getProject(project.id)?.status).toBe("draft");
  });

  it("joins nested transactions into the outer one", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);

    const names = store.transaction(() => {
      store.transaction(() => store.createTask(taskInput(project.id, { name: "inner" }), FIXED_NOW));
      return store.listTasks(project.id).map((task) => task.name);
    });

    expect(names).toEqual(["inner"]);
  });

  it("returns copies that callers cannot mutate in place", () => {
    const store = createStore();
    const project = store.createProject(projectInput(), FIXED_NOW);
    const task = store.createTask(taskInput(project.id), FIXED_NOW);

    task.name = "mutated";

    expect(store.getTask(task.id)?.name).toBe("Render invoice");
  });
});

describe("SqliteTaskStore", () => {
  it("fails with a storage error after close", () => {
    const store = SqliteTaskStore.open(":memory:");
    store.close();

    expect(() => store.listProjects()).toThrow(StorageError);
    expect(() => store.listProjects()).toThrow("task database is closed");
  });

  it("closes the database again when the schema cannot be created", () => {
    const dbPath = path.join(makeTemporaryDirectory("sqlite-store-"), "tasks.sqlite");
    fs.writeFileSync(dbPath, "this is not a database file, just text padding it out".repeat(4));
    const closeSpy = vi.spyOn(Database.prototype, "close");

    expect(() => SqliteTaskStore.open(dbPath)).toThrow(StorageError);
    expect(closeSpy).toHaveBeenCalledTimes(1);
  });
});
