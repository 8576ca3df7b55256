import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { OrchestrationService } from "../src/app/services/orchestration-service.js";
import { DEFAULT_SCHEDULING_CONFIG } from "../src/core/config.js";
import { toLogEvent, type EventLog, type LogEvent, type LogEventInput } from "../src/core/logger.js";
import { MemoryTaskStore } from "../src/core/memory-task-store.js";
import type { Project, Task, TaskDependency } from "../src/core/task-model.js";
import { FallbackPlanProducer, FallbackSpecProducer } from "../src/producers/fallback.js";

// =============================================================================
// FIXTURES
// =============================================================================

export const FIXED_NOW = "2026-01-05T09:00:00.000Z";

export function makeTask(overrides: Partial<Task> & { id: number }): Task {
  return {
    project_id: 1,
    name: `Task ${overrides.id}`,
    description: "Fixture task",
    inputs: {},
    outputs: {},
    tests: [],
    security_checks: [],
    estimate_hours: null,
    status: "pending",
    confidence_score: null,
    requires_approval: false,
    approved_by: null,
    approved_at: null,
    rejection_reason: null,
    order: 0,
    spec: null,
    test_results: null,
    created_at: FIXED_NOW,
    updated_at: FIXED_NOW,
    ...overrides,
  };
}

export function makeProject(overrides: Partial<Project> = {}): Project {
  return {
    id: 1,
    name: "Checkout revamp",
    description: "Rebuild the checkout flow",
    goal: "Ship a faster checkout",
    acceptance_criteria: [],
    risk_level: "low",
    status: "draft",
    environment: null,
    created_by: "system",
    created_at: FIXED_NOW,
    updated_at: FIXED_NOW,
    ...overrides,
  };
}

export function makeDependency(id: number, taskId: number, dependsOnTaskId: number): TaskDependency {
  return { id, task_id: taskId, depends_on_task_id: dependsOnTaskId, created_at: FIXED_NOW };
}

// =============================================================================
// FAKES
// =============================================================================

/** EventLog that keeps events in memory, stamped with a fixed time. */
export class RecordingEventLog implements EventLog {
  readonly events: LogEvent[] = [];
  closed = false;

  log(event: LogEventInput): void {
    this.events.push(toLogEvent({ ts: FIXED_NOW, ...event }));
  }

  close(): void {
    this.closed = true;
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}

/** Service over an in-memory store with the deterministic producers and a fixed clock. */
export function createTestService(): { service: OrchestrationService; log: RecordingEventLog } {
  const log = new RecordingEventLog();
  const service = new OrchestrationService({
    store: new MemoryTaskStore(),
    log,
    producers: { plan: new FallbackPlanProducer(), spec: new FallbackSpecProducer() },
    scheduling: DEFAULT_SCHEDULING_CONFIG,
    now: () => FIXED_NOW,
  });
  return { service, log };
}

// =============================================================================
// FILESYSTEM
// =============================================================================

const temporaryDirectories: string[] = [];

export function makeTemporaryDirectory(prefix: string): string {
  const directoryPath = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  temporaryDirectories.push(directoryPath);
  return directoryPath;
}

export function removeTemporaryDirectories(): void {
  for (const directoryPath of temporaryDirectories) {
    fs.rmSync(directoryPath, { recursive: true, force: true });
  }
  temporaryDirectories.length = 0;
}
