import type { z } from "zod";

import { formatErrorMessage } from "../core/error-format.js";
import type { EventLog } from "../core/logger.js";
import {
  buildPlanPromptValues,
  buildSpecPromptValues,
  renderPromptTemplate,
  type PromptTemplateName,
  type PromptValuesByTemplate,
} from "../core/prompts.js";
import { formatIssues, type Project, type Task } from "../core/task-model.js";
import { LlmError, parseJsonReply, type LlmClient } from "../llm/client.js";

import { buildFallbackPlan, buildFallbackSpec } from "./fallback.js";
import {
  ProducedPlanJsonSchema,
  ProducedPlanSchema,
  TaskSpecDocumentJsonSchema,
  TaskSpecDocumentSchema,
  type PlanProducer,
  type ProducedPlan,
  type SpecProducer,
  type TaskSpecDocument,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmProducerOptions = {
  /** Called on first use; a throw (e.g. a missing API key) falls back like any other failure. */
  createClient: () => LlmClient;
  log: EventLog;
  temperature?: number;
  timeoutMs?: number;
};

type ProducerKind = "plan" | "spec";

/** The JSON schema sent to the model and the zod schema its reply is checked against. */
type ReplySchemas<T extends z.ZodTypeAny> = {
  json: Record<string, unknown>;
  zod: T;
};

// =============================================================================
// PRODUCERS
// =============================================================================

export class LlmPlanProducer implements PlanProducer {
  private readonly requester: ModelRequester;

  constructor(private readonly options: LlmProducerOptions) {
    this.requester = new ModelRequester(options);
  }

  async producePlan(project: Project): Promise<ProducedPlan> {
    try {
      return await this.requester.request("plan", buildPlanPromptValues(project), {
        json: ProducedPlanJsonSchema,
        zod: ProducedPlanSchema,
      });
    } catch (err) {
      logFallback(this.options.log, "plan", err, { projectId: project.id });
      return buildFallbackPlan(project);
    }
  }
}

export class LlmSpecProducer implements SpecProducer {
  private readonly requester: ModelRequester;

  constructor(private readonly options: LlmProducerOptions) {
    this.requester = new ModelRequester(options);
  }

  async produceSpec(task: Task, project: Project): Promise<TaskSpecDocument> {
    try {
      return await this.requester.request("spec", buildSpecPromptValues(task, project), {
        json: TaskSpecDocumentJsonSchema,
        zod: TaskSpecDocumentSchema,
      });
    } catch (err) {
      logFallback(this.options.log, "spec", err, { projectId: task.project_id, taskId: task.id });
      return buildFallbackSpec(task);
    }
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

class ModelRequester {
  private client: LlmClient | null = null;

  constructor(private readonly options: LlmProducerOptions) {}

  async request<N extends PromptTemplateName, T extends z.ZodTypeAny>(
    template: N,
    values: PromptValuesByTemplate[N],
    schemas: ReplySchemas<T>,
  ): Promise<z.output<T>> {
    const prompt = renderPromptTemplate(template, values);
    const result = await this.getClient().complete(prompt, {
      schema: schemas.json,
      temperature: this.options.temperature,
      timeoutMs: this.options.timeoutMs,
    });

    const reply = result.parsed !== undefined ? result.parsed : parseJsonReply(result.text);
    const parsed = schemas.zod.safeParse(reply);
    if (!parsed.success) {
      throw new LlmError(
        `Model ${template} reply did not match the expected shape:\n${formatIssues(parsed.error.issues).join("\n")}`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  private getClient(): LlmClient {
    if (!this.client) {
      this.client = this.options.createClient();
    }
    return this.client;
  }
}

function logFallback(
  log: EventLog,
  producer: ProducerKind,
  error: unknown,
  ids: { projectId: number; taskId?: number },
): void {
  log.log({
    type: "producer.fallback",
    projectId: ids.projectId,
    taskId: ids.taskId,
    payload: { producer, reason: formatErrorMessage(error) },
  });
}
