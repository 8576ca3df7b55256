import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { makeTemporaryDirectory, removeTemporaryDirectories } from "../../test/helpers.js";

import { isMockLlmEnabled, MockLlmClient } from "./mock.js";

afterEach(() => {
  removeTemporaryDirectories();
});

describe("isMockLlmEnabled", () => {
  it("accepts common truthy spellings", () => {
    expect(isMockLlmEnabled({ MOCK_LLM: "1" })).toBe(true);
    expect(isMockLlmEnabled({ MOCK_LLM: " Yes " })).toBe(true);
    expect(isMockLlmEnabled({ MOCK_LLM: "0" })).toBe(false);
    expect(isMockLlmEnabled({})).toBe(false);
  });
});

describe("MockLlmClient", () => {
  it("replies with the constructor payload and records prompts", async () => {
    const client = new MockLlmClient({ tasks: [] });

    const result = await client.complete("Plan the work", { schema: { type: "object" } });

    expect(result).toEqual({ text: '{"tasks":[]}', parsed: { tasks: [] }, finishReason: "mock" });
    expect(client.prompts).toEqual(["Plan the work"]);
  });

  it("reads a JSON fixture from MOCK_LLM_OUTPUT_PATH before inline output", async () => {
    const dir = makeTemporaryDirectory("mock-llm-");
    const fixturePath = path.join(dir, "reply.json");
    fs.writeFileSync(fixturePath, '{"source": "file"}', "utf8");
    process.env.MOCK_LLM_OUTPUT_PATH = fixturePath;
    process.env.MOCK_LLM_OUTPUT = '{"source": "inline"}';

    const result = await new MockLlmClient().complete("x");

    expect(result.text).toBe('{"source":"file"}');
  });

  it("falls back to inline output, then to a stub", async () => {
    process.env.MOCK_LLM_OUTPUT = '{"source": "inline"}';
    expect((await new MockLlmClient().complete("x")).text).toBe('{"source":"inline"}');

    delete process.env.MOCK_LLM_OUTPUT;
    expect((await new MockLlmClient().complete("x")).text).toBe(
      '{"status":"ok","source":"mock-llm"}',
    );
  });

  it("reads output variables from an injected environment", async () => {
    process.env.MOCK_LLM_OUTPUT = '{"source": "process"}';
    const client = new MockLlmClient(undefined, { MOCK_LLM_OUTPUT: '{"source": "injected"}' });

    expect((await client.complete("x", { schema: { type: "object" } })).parsed).toEqual({
      source: "injected",
    });
  });

  it("rejects non-object payloads when a schema is requested", async () => {
    await expect(
      new MockLlmClient("just text").complete("x", { schema: { type: "object" } }),
    ).rejects.toThrow("Mock LLM requires an object payload when a schema is provided.");
  });
});
