import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { OrchestratorError } from "./errors.js";
import type { Project, Task } from "./task-model.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlanPromptValues = {
  project_name: string;
  goal: string;
  description: string;
  acceptance_criteria: string;
  environment: string;
};

export type SpecPromptValues = {
  task_name: string;
  task_description: string;
  project_context: string;
  inputs: string;
  outputs: string;
  tests: string;
};

export type PromptValuesByTemplate = {
  plan: PlanPromptValues;
  spec: SpecPromptValues;
};

export type PromptTemplateName = keyof PromptValuesByTemplate;

export class PromptTemplateError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PromptTemplateError";
  }
}

// =============================================================================
// VALUE BUILDERS
// =============================================================================

export function buildPlanPromptValues(project: Project): PlanPromptValues {
  const criteria = project.acceptance_criteria.map((criterion) => `- ${criterion}`);

  return {
    project_name: project.name,
    goal: project.goal,
    description: project.description,
    acceptance_criteria: criteria.length > 0 ? criteria.join("\n") : "N/A",
    environment: project.environment ?? "Not specified",
  };
}

export function buildSpecPromptValues(task: Task, project: Project): SpecPromptValues {
  return {
    task_name: task.name,
    task_description: task.description,
    project_context: `Project: ${project.name}\nGoal: ${project.goal}`,
    inputs: JSON.stringify(task.inputs),
    outputs: JSON.stringify(task.outputs),
    tests: JSON.stringify(task.tests),
  };
}

// =============================================================================
// RENDERING
// =============================================================================

export function renderPromptTemplate<N extends PromptTemplateName>(
  name: N,
  values: PromptValuesByTemplate[N],
): string {
  return renderPromptSource(name, readTemplateSource(name), values);
}

/**
 * Renders Markdown prompt text. Placeholders are strict (a missing value throws) and values
 * are inserted verbatim, so JSON in a value keeps its quotes.
 */
export function renderPromptSource(
  label: string,
  source: string,
  values: Readonly<Record<string, string>>,
): string {
  const render = compiledSources.get(source) ?? compileSource(source);

  let output: string;
  try {
    output = render(values);
  } catch (err) {
    throw new PromptTemplateError(`Could not render the ${label} prompt.`, err);
  }
  return output.trim();
}

// =============================================================================
// TEMPLATE FILES
// =============================================================================

const compiledSources = new Map<string, Handlebars.TemplateDelegate>();
const templateSources = new Map<PromptTemplateName, string>();

function compileSource(source: string): Handlebars.TemplateDelegate {
  const compiled = Handlebars.compile(source, { noEscape: true, strict: true });
  compiledSources.set(source, compiled);
  return compiled;
}

function readTemplateSource(name: PromptTemplateName): string {
  const known = templateSources.get(name);
  if (known !== undefined) return known;

  const file = path.join(locateTemplatesDir(), `${name}.md`);
  if (!fse.pathExistsSync(file)) {
    throw new PromptTemplateError(`Prompt template not found: ${file}`);
  }

  const source = fse.readFileSync(file, "utf8");
  templateSources.set(name, source);
  return source;
}

// Sources run from src/core and builds from dist/src/core, so search upward.
function locateTemplatesDir(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = path.join(dir, "templates", "prompts");
    if (fse.pathExistsSync(candidate)) return candidate;

    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new PromptTemplateError("templates/prompts directory not found above the package");
    }
    dir = parent;
  }
}
