import { describe, expect, it } from "vitest";

import { FIXED_NOW, makeProject, makeTask, RecordingEventLog } from "../../test/helpers.js";
import type { LlmClient, LlmCompletionOptions } from "../llm/client.js";
import { MockLlmClient } from "../llm/mock.js";

import { buildFallbackPlan, buildFallbackSpec } from "./fallback.js";
import { LlmPlanProducer, LlmSpecProducer } from "./llm-producers.js";
import { ProducedPlanJsonSchema, TaskSpecDocumentJsonSchema } from "./types.js";

// =============================================================================
// HELPERS
// =============================================================================

function producerOptions(client: LlmClient, log = new RecordingEventLog()) {
  return { createClient: () => client, log };
}

/** Replies with a decoded object whose text form is not JSON, as a tool-call reply can. */
function structuredClient(parsed: unknown) {
  const calls: LlmCompletionOptions[] = [];
  const client: LlmClient = {
    complete: async (_prompt, options = {}) => {
      calls.push(options);
      return { text: "(structured reply)", parsed, finishReason: "tool_use" };
    },
  };
  return { client, calls };
}

// =============================================================================
// TESTS
// =============================================================================

describe("LlmPlanProducer", () => {
  it("returns the model plan with defaults filled in", async () => {
    const client = new MockLlmClient({
      tasks: [{ name: "Design schema", description: "Model the tables", estimate_hours: 3 }],
      risk_level: "low",
    });
    const producer = new LlmPlanProducer(producerOptions(client));

    const plan = await producer.producePlan(makeProject());

    expect(plan).toEqual({
      tasks: [
        {
          name: "Design schema",
          description: "Model the tables",
          inputs: {},
          outputs: {},
          tests: [],
          security_checks: [],
          estimate_hours: 3,
          requires_approval: false,
          confidence_score: null,
          dependencies: [],
        },
      ],
      risk_level: "low",
    });
    expect(client.prompts).toHaveLength(1);
    expect(client.prompts[0]).toContain("Project: Checkout revamp");
    expect(client.prompts[0]).toContain("Acceptance criteria:\nN/A");
    expect(client.prompts[0]).toContain("Environment: Not specified");
  });

  it("sends the plan schema and reads the decoded reply", async () => {
    const { client, calls } = structuredClient({
      tasks: [{ name: "Design schema", description: "Model the tables", dependencies: [] }],
      risk_level: "high",
    });
    const log = new RecordingEventLog();
    const producer = new LlmPlanProducer({ ...producerOptions(client, log), temperature: 0.2 });

    const plan = await producer.producePlan(makeProject());

    expect(calls).toEqual([
      { schema: ProducedPlanJsonSchema, temperature: 0.2, timeoutMs: undefined },
    ]);
    expect(plan.risk_level).toBe("high");
    expect(plan.tasks.map((task) => task.name)).toEqual(["Design schema"]);
    expect(log.events).toEqual([]);
  });

  it("lists acceptance criteria as bullets in the prompt", async () => {
    const client = new MockLlmClient({ tasks: [], risk_level: "low" });
    const producer = new LlmPlanProducer(producerOptions(client));

    await producer.producePlan(
      makeProject({ acceptance_criteria: ["Fast", "Accessible"], environment: "staging" }),
    );

    expect(client.prompts[0]).toContain("Acceptance criteria:\n- Fast\n- Accessible");
    expect(client.prompts[0]).toContain("Environment: staging");
  });

  it("falls back and logs when the reply is not a JSON object", async () => {
    const log = new RecordingEventLog();
    const producer = new LlmPlanProducer(producerOptions(new MockLlmClient("not json"), log));
    const project = makeProject();

    const plan = await producer.producePlan(project);

    expect(plan).toEqual(buildFallbackPlan(project));
    expect(log.events).toEqual([
      {
        ts: FIXED_NOW,
        type: "producer.fallback",
        project_id: 1,
        payload: {
          producer: "plan",
          reason: "Mock LLM requires an object payload when a schema is provided.",
        },
      },
    ]);
  });

  it("falls back when the reply does not match the plan shape", async () => {
    const log = new RecordingEventLog();
    const client = new MockLlmClient({ tasks: [], risk_level: "extreme" });
    const producer = new LlmPlanProducer(producerOptions(client, log));

    const plan = await producer.producePlan(makeProject());

    expect(plan.risk_level).toBe("medium");
    expect(plan.tasks).toHaveLength(3);
    expect(String(log.events[0]?.payload?.reason)).toContain(
      "Model plan reply did not match the expected shape:\nrisk_level:",
    );
  });

  it("falls back when the client cannot be created", async () => {
    const log = new RecordingEventLog();
    const producer = new LlmPlanProducer({
      createClient: () => {
        throw new Error("API key is missing");
      },
      log,
    });

    const plan = await producer.producePlan(makeProject());

    expect(plan.tasks.map((task) => task.name)[0]).toBe("Research and Requirements");
    expect(log.events[0]?.payload).toEqual({ producer: "plan", reason: "API key is missing" });
  });
});

describe("LlmSpecProducer", () => {
  it("keeps extra fields from the model document", async () => {
    const client = new MockLlmClient({
      task_name: "Build API",
      objective: "Expose checkout endpoints",
      inputs: {},
      outputs: {},
      test_cases: [],
      edge_cases: [{ scenario: "Empty cart", handling: "Reject with 400" }],
      confidence_score: 0.9,
    });
    const producer = new LlmSpecProducer(producerOptions(client));
    const task = makeTask({ id: 4, name: "Build API", inputs: { schema: "openapi.yaml" } });

    const spec = await producer.produceSpec(task, makeProject());

    expect(spec.confidence_score).toBe(0.9);
    expect(spec.edge_cases).toEqual([{ scenario: "Empty cart", handling: "Reject with 400" }]);
    expect(client.prompts[0]).toContain("Task: Build API");
    expect(client.prompts[0]).toContain(
      "Project context:\nProject: Checkout revamp\nGoal: Ship a faster checkout",
    );
    expect(client.prompts[0]).toContain('Inputs: {"schema":"openapi.yaml"}');
  });

  it("sends the spec schema and reads the decoded reply", async () => {
    const { client, calls } = structuredClient({
      task_name: "Build API",
      objective: "Expose checkout endpoints",
      inputs: {},
      outputs: {},
      test_cases: [{ name: "returns 201" }],
    });
    const producer = new LlmSpecProducer(producerOptions(client));

    const spec = await producer.produceSpec(makeTask({ id: 4 }), makeProject());

    expect(calls[0]?.schema).toBe(TaskSpecDocumentJsonSchema);
    expect(spec.objective).toBe("Expose checkout endpoints");
    expect(spec.test_cases).toEqual([{ name: "returns 201" }]);
  });

  it("falls back to the derived document and logs the task id", async () => {
    const log = new RecordingEventLog();
    const producer = new LlmSpecProducer(
      producerOptions(new MockLlmClient({ objective: "missing the rest" }), log),
    );
    const task = makeTask({ id: 4, project_id: 2 });

    const spec = await producer.produceSpec(task, makeProject({ id: 2 }));

    expect(spec).toEqual(buildFallbackSpec(task));
    expect(log.events[0]).toMatchObject({
      type: "producer.fallback",
      project_id: 2,
      task_id: 4,
      payload: { producer: "spec" },
    });
  });
});
