import type { Project, Task } from "../core/task-model.js";

import type {
  PlanProducer,
  ProducedPlan,
  SpecProducer,
  TaskSpecDocument,
} from "./types.js";

// Deterministic producers used when no model is configured or a model reply is unusable.

export const FALLBACK_SPEC_CONFIDENCE = 0.5;

export class FallbackPlanProducer implements PlanProducer {
  async producePlan(project: Project): Promise<ProducedPlan> {
    return buildFallbackPlan(project);
  }
}

export class FallbackSpecProducer implements SpecProducer {
  async produceSpec(task: Task): Promise<TaskSpecDocument> {
    return buildFallbackSpec(task);
  }
}

/** Three-phase plan: requirements, implementation, validation, chained in that order. */
export function buildFallbackPlan(project: Pick<Project, "goal" | "description">): ProducedPlan {
  return {
    tasks: [
      {
        name: "Research and Requirements",
        description: `Analyze requirements for: ${project.goal}`,
        inputs: { requirements: project.description },
        outputs: { specification: "Detailed requirements document" },
        tests: [{ type: "review", description: "Stakeholder review of requirements" }],
        security_checks: [],
        estimate_hours: 2.0,
        order: 0,
        requires_approval: true,
        confidence_score: 0.7,
        dependencies: [],
      },
      {
        name: "Implementation",
        description: `Implement solution for: ${project.goal}`,
        inputs: { specification: "Requirements document" },
        outputs: { code: "Working implementation" },
        tests: [
          { type: "unit", description: "Unit tests for core functionality" },
          { type: "integration", description: "Integration tests" },
        ],
        security_checks: [{ type: "code_review", description: "Security code review" }],
        estimate_hours: 4.0,
        order: 1,
        requires_approval: false,
        confidence_score: 0.6,
        dependencies: [0],
      },
      {
        name: "Testing and Validation",
        description: "Run comprehensive tests and validation",
        inputs: { code: "Implementation" },
        outputs: { test_results: "Test reports" },
        tests: [
          { type: "e2e", description: "End-to-end testing" },
          { type: "integration", description: "Full system integration test" },
        ],
        security_checks: [
          { type: "vulnerability_scan", description: "Security vulnerability scan" },
        ],
        estimate_hours: 2.0,
        order: 2,
        requires_approval: true,
        confidence_score: 0.8,
        dependencies: [1],
      },
    ],
    risk_level: "medium",
    estimated_total_hours: 8.0,
  };
}

export function buildFallbackSpec(
  task: Pick<Task, "name" | "description" | "inputs" | "outputs" | "tests">,
): TaskSpecDocument {
  return {
    task_name: task.name,
    objective: task.description,
    inputs: Object.fromEntries(
      Object.entries(task.inputs).map(([key, value]) => [
        key,
        { type: "any", description: describeValue(value), validation: [], example: "" },
      ]),
    ),
    outputs: Object.fromEntries(
      Object.entries(task.outputs).map(([key, value]) => [
        key,
        { type: "any", description: describeValue(value), example: "" },
      ]),
    ),
    test_cases: task.tests.map((test, index) => ({
      name: `Test ${index + 1}`,
      type: typeof test.type === "string" ? test.type : "unit",
      inputs: {},
      expected_output: {},
      expected_behavior:
        typeof test.description === "string" ? test.description : JSON.stringify(test),
    })),
    edge_cases: [],
    security_requirements: [],
    implementation_notes: [
      "This is a fallback specification generated without model assistance",
      "Please review and enhance with specific implementation details",
    ],
    confidence_score: FALLBACK_SPEC_CONFIDENCE,
  };
}

function describeValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}
