import type { Command } from "commander";

import type { GeneratedPlanReport, OrchestrationService } from "../app/services/orchestration-service.js";
import type { Project, ProjectCreateInput } from "../core/task-model.js";

import { withAppContext } from "./config.js";
import { buildUpdatePatch, collect, parseId, parseJson } from "./options.js";
import { emit, formatHours, renderTable, type OutputOptions } from "./output.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerProjectsCommand(program: Command): void {
  const projects = program.command("projects").description("Create, edit and inspect projects");

  projects
    .command("create")
    .description("Create a project")
    .requiredOption("--name <name>", "Project name")
    .requiredOption("--description <text>", "What the project is about")
    .requiredOption("--goal <text>", "The outcome the project must reach")
    .option("--criterion <text>", "Acceptance criterion (repeatable)", collect, [])
    .option("--risk <level>", "Risk level (low, medium, high, critical)")
    .option("--environment <name>", "Target environment")
    .option("--created-by <name>", "Author recorded on the project")
    .action(async (opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsCreateCommand(
          service,
          {
            name: opts.name,
            description: opts.description,
            goal: opts.goal,
            acceptance_criteria: opts.criterion,
            risk_level: opts.risk,
            environment: opts.environment,
            created_by: opts.createdBy,
          },
          output,
        ),
      );
    });

  projects
    .command("list")
    .description("List projects")
    .action(async (_opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsListCommand(service, output),
      );
    });

  projects
    .command("show")
    .description("Show one project")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsShowCommand(service, projectId, output),
      );
    });

  projects
    .command("update")
    .description("Edit project fields")
    .argument("<projectId>", "Project id", parseId)
    .option("--name <name>", "Project name")
    .option("--description <text>", "What the project is about")
    .option("--goal <text>", "The outcome the project must reach")
    .option("--criterion <text>", "Replace acceptance criteria (repeatable)", collect)
    .option("--risk <level>", "Risk level (low, medium, high, critical)")
    .option("--status <status>", "Project status")
    .option("--environment <name>", "Target environment")
    .option("--patch <json>", "Additional fields as a JSON object", parseJson)
    .action(async (projectId: number, opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsUpdateCommand(
          service,
          projectId,
          buildUpdatePatch(
            {
              name: opts.name,
              description: opts.description,
              goal: opts.goal,
              acceptance_criteria: opts.criterion,
              risk_level: opts.risk,
              status: opts.status,
              environment: opts.environment,
            },
            opts.patch,
          ),
          output,
        ),
      );
    });

  projects
    .command("delete")
    .description("Delete a project with all of its tasks and dependency edges")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsDeleteCommand(service, projectId, output),
      );
    });

  projects
    .command("plan")
    .description("Generate the project's task breakdown with the configured plan producer")
    .argument("<projectId>", "Project id", parseId)
    .action(async (projectId: number, _opts, command: Command) => {
      await withAppContext(command, ({ service }, output) =>
        projectsPlanCommand(service, projectId, output),
      );
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export function projectsCreateCommand(
  service: OrchestrationService,
  input: ProjectCreateInput,
  output: OutputOptions,
): Project {
  const project = service.createProject(input);
  emit(output, project, () => [`Created project ${project.id}: ${project.name}`]);
  return project;
}

export function projectsListCommand(
  service: OrchestrationService,
  output: OutputOptions,
): Project[] {
  const projects = service.listProjects();
  emit(output, projects, () => {
    if (projects.length === 0) return ["No projects yet."];
    return renderTable(projects, [
      { header: "ID", value: (project) => String(project.id) },
      { header: "NAME", value: (project) => project.name },
      { header: "STATUS", value: (project) => project.status },
      { header: "RISK", value: (project) => project.risk_level },
    ]);
  });
  return projects;
}

export function projectsShowCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): Project {
  const project = service.getProject(projectId);
  emit(output, project, () => renderProject(project));
  return project;
}

export function projectsUpdateCommand(
  service: OrchestrationService,
  projectId: number,
  patch: Record<string, unknown>,
  output: OutputOptions,
): Project {
  const project = service.updateProject(projectId, patch);
  emit(output, project, () => [`Updated project ${project.id}: ${project.name}`]);
  return project;
}

export function projectsDeleteCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): void {
  service.deleteProject(projectId);
  emit(output, { project_id: projectId, deleted: true }, () => [`Deleted project ${projectId}`]);
}

export async function projectsPlanCommand(
  service: OrchestrationService,
  projectId: number,
  output: OutputOptions,
): Promise<GeneratedPlanReport> {
  const report = await service.generatePlan(projectId);
  emit(output, report, () => renderPlan(report));
  return report;
}

// =============================================================================
// RENDERING
// =============================================================================

function renderProject(project: Project): string[] {
  const lines = [
    `Project ${project.id}: ${project.name}`,
    `Status: ${project.status}`,
    `Risk: ${project.risk_level}`,
    `Goal: ${project.goal}`,
    `Description: ${project.description}`,
  ];
  if (project.environment) lines.push(`Environment: ${project.environment}`);
  if (project.acceptance_criteria.length > 0) {
    lines.push("Acceptance criteria:");
    for (const criterion of project.acceptance_criteria) lines.push(`  - ${criterion}`);
  }
  return lines;
}

function renderPlan(report: GeneratedPlanReport): string[] {
  const lines = [
    `Planned ${report.tasks.length} task(s) for project ${report.project_id} (risk ${report.risk_level}, ${formatHours(report.estimated_total_hours)} estimated).`,
  ];
  if (report.tasks.length > 0) {
    lines.push(
      ...renderTable(report.tasks, [
        { header: "ID", value: (task) => String(task.id) },
        { header: "ORDER", value: (task) => String(task.order) },
        { header: "NAME", value: (task) => task.name },
        { header: "ESTIMATE", value: (task) => formatHours(task.estimate_hours) },
        { header: "APPROVAL", value: (task) => (task.requires_approval ? "required" : "-") },
      ]),
    );
  }
  if (report.skipped_dependencies > 0) {
    lines.push(`Skipped ${report.skipped_dependencies} invalid dependency reference(s).`);
  }
  return lines;
}
