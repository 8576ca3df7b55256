import { z } from "zod";

import { RiskLevelSchema, type Project, type Task } from "../core/task-model.js";

// =============================================================================
// PLAN
// =============================================================================

const JsonRecordSchema = z.record(z.unknown());

export const ProducedPlanTaskSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().trim().min(1),
  inputs: JsonRecordSchema.default({}),
  outputs: JsonRecordSchema.default({}),
  tests: z.array(JsonRecordSchema).default([]),
  security_checks: z.array(JsonRecordSchema).default([]),
  estimate_hours: z.number().positive().nullable().default(null),
  order: z.number().int().optional(),
  requires_approval: z.boolean().default(false),
  confidence_score: z.number().min(0).max(1).nullable().default(null),
  /** Zero-based indices into the plan's task list. */
  dependencies: z.array(z.number().int()).default([]),
});
export type ProducedPlanTask = z.infer<typeof ProducedPlanTaskSchema>;

export const ProducedPlanSchema = z.object({
  tasks: z.array(ProducedPlanTaskSchema),
  risk_level: RiskLevelSchema,
  estimated_total_hours: z.number().nonnegative().optional(),
});
export type ProducedPlan = z.infer<typeof ProducedPlanSchema>;

const FREE_FORM_OBJECT = { type: "object" } as const;

/** Structured output schema sent with plan requests. */
export const ProducedPlanJsonSchema = {
  type: "object",
  properties: {
    tasks: {
      type: "array",
      items: {
        type: "object",
        properties: {
          name: { type: "string" },
          description: { type: "string" },
          inputs: FREE_FORM_OBJECT,
          outputs: FREE_FORM_OBJECT,
          tests: { type: "array", items: FREE_FORM_OBJECT },
          security_checks: { type: "array", items: FREE_FORM_OBJECT },
          estimate_hours: { type: ["number", "null"] },
          order: { type: "integer" },
          requires_approval: { type: "boolean" },
          confidence_score: { type: ["number", "null"] },
          dependencies: { type: "array", items: { type: "integer" } },
        },
        required: ["name", "description", "dependencies"],
      },
    },
    risk_level: { type: "string", enum: RiskLevelSchema.options },
    estimated_total_hours: { type: "number" },
  },
  required: ["tasks", "risk_level"],
};

// =============================================================================
// SPEC
// =============================================================================

export const TaskSpecDocumentSchema = z
  .object({
    task_name: z.string(),
    objective: z.string(),
    inputs: JsonRecordSchema,
    outputs: JsonRecordSchema,
    test_cases: z.array(z.unknown()),
    confidence_score: z.number().min(0).max(1).optional(),
  })
  .passthrough();
export type TaskSpecDocument = z.infer<typeof TaskSpecDocumentSchema>;

/** Structured output schema sent with spec requests. Extra keys are kept. */
export const TaskSpecDocumentJsonSchema = {
  type: "object",
  properties: {
    task_name: { type: "string" },
    objective: { type: "string" },
    inputs: FREE_FORM_OBJECT,
    outputs: FREE_FORM_OBJECT,
    test_cases: { type: "array" },
    confidence_score: { type: "number" },
  },
  required: ["task_name", "objective", "inputs", "outputs", "test_cases"],
};

// =============================================================================
// PRODUCERS
// =============================================================================

export interface PlanProducer {
  producePlan(project: Project): Promise<ProducedPlan>;
}

export interface SpecProducer {
  produceSpec(task: Task, project: Project): Promise<TaskSpecDocument>;
}

export type Producers = {
  plan: PlanProducer;
  spec: SpecProducer;
};
