import { z } from "zod";

const SchedulingSchema = z.object({
  default_estimate_hours: z.number().positive().default(1.0),
  // Reject cycle-forming edges when they are added instead of reporting them at analysis time.
  enforce_acyclic: z.boolean().default(false),
  summary_action_limit: z.number().int().positive().default(3),
});

const ProducerSchema = z.object({
  provider: z.enum(["fallback", "openai", "anthropic", "mock"]).default("fallback"),
  model: z.string().min(1).default("gpt-4o"),
  temperature: z.number().min(0).max(2).optional(),
  timeout_ms: z.number().int().positive().optional(),
  max_tokens: z.number().int().positive().optional(),
  api_key: z.string().min(1).optional(),
  base_url: z.string().url().optional(),
});

export const ProjectConfigSchema = z.object({
  database_path: z.string().min(1).default(".taskweave/taskweave.sqlite"),
  log_path: z.string().min(1).default(".taskweave/events.jsonl"),
  scheduling: SchedulingSchema.default({}),
  producer: ProducerSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type SchedulingConfig = z.infer<typeof SchedulingSchema>;
export type ProducerConfig = z.infer<typeof ProducerSchema>;

export const DEFAULT_SCHEDULING_CONFIG: SchedulingConfig = SchedulingSchema.parse({});

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
