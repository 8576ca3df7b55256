import type { Command } from "commander";

import type { OrchestrationService } from "../app/services/orchestration-service.js";
import type { TaskDependency } from "../core/task-model.js";

import { withAppContext } from "./config.js";
import { parseId } from "./options.js";
import { emit, type OutputOptions } from "./output.js";

export function registerDepsCommand(program: Command): void {
  const deps = program.command("deps").description("Manage task dependencies");

  deps
    .command("add")
    .description("Record that <taskId> cannot start before <dependsOnTaskId> completes")
    .argument("<taskId>", "Dependent task id", parseId)
    .argument("<dependsOnTaskId>", "Prerequisite task id", parseId)
    .action(async (taskId: number, dependsOnTaskId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        depsAddCommand(service, taskId, dependsOnTaskId, output),
      );
    });
}

export function depsAddCommand(
  service: OrchestrationService,
  taskId: number,
  dependsOnTaskId: number,
  output: OutputOptions,
): TaskDependency {
  const dependency = service.addDependency(taskId, dependsOnTaskId);
  emit(output, dependency, () => [
    `Task ${dependency.task_id} now depends on task ${dependency.depends_on_task_id}`,
  ]);
  return dependency;
}
