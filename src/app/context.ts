/**
 * AppContext bundles the resolved config with the collaborators built from it.
 * Purpose: give CLI commands one object to hand to OrchestrationService and to close on exit.
 * Assumptions: config has been validated and its storage paths resolved to absolute paths.
 * Usage: const ctx = createAppContext({ config, configPath, rootDir }); ... closeAppContext(ctx).
 */

import type { ProjectConfig } from "../core/config.js";
import { JsonlEventLog, type EventLog } from "../core/logger.js";
import { SqliteTaskStore } from "../core/sqlite-task-store.js";
import type { TaskStore } from "../core/task-store.js";
import { createProducers } from "../producers/factory.js";
import type { Producers } from "../producers/types.js";

import { OrchestrationService } from "./services/orchestration-service.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  rootDir: string;
  configPath: string | null;
  config: ProjectConfig;
  store: TaskStore;
  log: EventLog;
  producers: Producers;
  service: OrchestrationService;
};

export type CreateAppContextInput = {
  rootDir: string;
  configPath: string | null;
  config: ProjectConfig;
  store?: TaskStore;
  log?: EventLog;
  producers?: Producers;
  now?: () => string;
  env?: NodeJS.ProcessEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const { config } = input;
  const store = input.store ?? SqliteTaskStore.open(config.database_path);
  const log = input.log ?? openEventLog(config.log_path, input.store ? null : store);
  const producers =
    input.producers ?? createProducers({ config: config.producer, log, env: input.env });

  return {
    rootDir: input.rootDir,
    configPath: input.configPath,
    config,
    store,
    log,
    producers,
    service: new OrchestrationService({
      store,
      log,
      producers,
      scheduling: config.scheduling,
      now: input.now,
    }),
  };
}

// `owned` is the store opened for this context; it is closed again if the log cannot open.
function openEventLog(logPath: string, owned: TaskStore | null): EventLog {
  try {
    return new JsonlEventLog(logPath);
  } catch (err) {
    owned?.close();
    throw err;
  }
}

export function closeAppContext(ctx: AppContext): void {
  try {
    ctx.store.close();
  } finally {
    ctx.log.close();
  }
}
