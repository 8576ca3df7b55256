import { Command } from "commander";

import { outputOptionsFor } from "./config.js";
import { registerDepsCommand } from "./deps.js";
import { initCommand } from "./init.js";
import { registerOrchestrateCommand } from "./orchestrate.js";
import { registerProjectsCommand } from "./projects.js";
import { registerTasksCommand } from "./tasks.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("taskweave")
    .description("Task orchestration: dependency graphs, critical path and gated task review")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to $TASKWEAVE_CONFIG or .taskweave/config.yaml)",
    )
    .option("--json", "Print machine-readable JSON", false)
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Create .taskweave/config.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action((opts, command: Command) => {
      initCommand({ force: opts.force }, outputOptionsFor(command));
    });

  registerProjectsCommand(program);
  registerTasksCommand(program);
  registerDepsCommand(program);
  registerOrchestrateCommand(program);

  return program;
}
