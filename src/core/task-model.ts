import { z } from "zod";

// =============================================================================
// ENUMS
// =============================================================================

export const TaskStatusSchema = z.enum([
  "pending",
  "in_progress",
  "blocked",
  "review",
  "approved",
  "completed",
  "failed",
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TASK_STATUSES: readonly TaskStatus[] = TaskStatusSchema.options;

export const RiskLevelSchema = z.enum(["low", "medium", "high", "critical"]);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const ProjectStatusSchema = z.enum([
  "draft",
  "planning",
  "in_progress",
  "review",
  "completed",
  "archived",
]);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

// =============================================================================
// RECORDS
// =============================================================================

const JsonRecordSchema = z.record(z.unknown());

export const TestResultsSchema = z
  .object({
    status: z.string().optional(),
  })
  .passthrough();
export type TestResults = z.infer<typeof TestResultsSchema>;

export const TaskSchema = z.object({
  id: z.number().int().positive(),
  project_id: z.number().int().positive(),
  name: z.string().min(1).max(255),
  description: z.string(),
  inputs: JsonRecordSchema.default({}),
  outputs: JsonRecordSchema.default({}),
  tests: z.array(JsonRecordSchema).default([]),
  security_checks: z.array(JsonRecordSchema).default([]),
  estimate_hours: z.number().positive().nullable().default(null),
  status: TaskStatusSchema.default("pending"),
  confidence_score: z.number().min(0).max(1).nullable().default(null),
  requires_approval: z.boolean().default(false),
  approved_by: z.string().nullable().default(null),
  approved_at: z.string().nullable().default(null),
  rejection_reason: z.string().nullable().default(null),
  order: z.number().int().default(0),
  spec: JsonRecordSchema.nullable().default(null),
  test_results: TestResultsSchema.nullable().default(null),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Task = z.infer<typeof TaskSchema>;

export const TaskDependencySchema = z.object({
  id: z.number().int().positive(),
  task_id: z.number().int().positive(),
  depends_on_task_id: z.number().int().positive(),
  created_at: z.string(),
});
export type TaskDependency = z.infer<typeof TaskDependencySchema>;

export const ProjectSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1).max(255),
  description: z.string(),
  goal: z.string(),
  acceptance_criteria: z.array(z.string()).default([]),
  risk_level: RiskLevelSchema.default("low"),
  status: ProjectStatusSchema.default("draft"),
  environment: z.string().nullable().default(null),
  created_by: z.string().default("system"),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Project = z.infer<typeof ProjectSchema>;

// =============================================================================
// INPUTS
// =============================================================================

export const TaskCreateSchema = z.object({
  project_id: z.number().int().positive(),
  name: z.string().trim().min(1).max(255),
  description: z.string().trim().min(1),
  inputs: JsonRecordSchema.default({}),
  outputs: JsonRecordSchema.default({}),
  tests: z.array(JsonRecordSchema).default([]),
  security_checks: z.array(JsonRecordSchema).default([]),
  estimate_hours: z.number().positive().nullable().default(null),
  confidence_score: z.number().min(0).max(1).nullable().default(null),
  requires_approval: z.boolean().default(false),
  order: z.number().int().default(0),
  spec: JsonRecordSchema.nullable().default(null),
});
export type TaskCreateInput = z.input<typeof TaskCreateSchema>;
export type TaskCreate = z.output<typeof TaskCreateSchema>;

export const TaskUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    description: z.string().trim().min(1),
    inputs: JsonRecordSchema,
    outputs: JsonRecordSchema,
    tests: z.array(JsonRecordSchema),
    security_checks: z.array(JsonRecordSchema),
    estimate_hours: z.number().positive().nullable(),
    confidence_score: z.number().min(0).max(1).nullable(),
    requires_approval: z.boolean(),
    order: z.number().int(),
    spec: JsonRecordSchema.nullable(),
    test_results: TestResultsSchema.nullable(),
  })
  .partial()
  .strict();
export type TaskUpdate = z.infer<typeof TaskUpdateSchema>;

export const ProjectCreateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().trim().min(1),
  goal: z.string().trim().min(1),
  acceptance_criteria: z.array(z.string()).default([]),
  risk_level: RiskLevelSchema.default("low"),
  environment: z.string().nullable().default(null),
  created_by: z.string().trim().min(1).default("system"),
});
export type ProjectCreateInput = z.input<typeof ProjectCreateSchema>;
export type ProjectCreate = z.output<typeof ProjectCreateSchema>;

export const ProjectUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    description: z.string().trim().min(1),
    goal: z.string().trim().min(1),
    acceptance_criteria: z.array(z.string()),
    risk_level: RiskLevelSchema,
    status: ProjectStatusSchema,
    environment: z.string().nullable(),
  })
  .partial()
  .strict();
export type ProjectUpdate = z.infer<typeof ProjectUpdateSchema>;

export type DependencyCreate = {
  task_id: number;
  depends_on_task_id: number;
};

// =============================================================================
// HELPERS
// =============================================================================

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${where}: ${issue.message}`;
  });
}
