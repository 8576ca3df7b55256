import path from "node:path";

import fse from "fs-extra";

import {
  LlmError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

const ENABLED_FLAGS = ["1", "true", "yes", "on"];

const STUB_REPLY = { status: "ok", source: "mock-llm" };

export function isMockLlmEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.MOCK_LLM?.trim().toLowerCase();
  return flag !== undefined && ENABLED_FLAGS.includes(flag);
}

type CannedReply =
  | { origin: "constructor"; value: unknown }
  | { origin: "fixture"; file: string }
  | { origin: "env"; raw: string }
  | { origin: "stub" };

/**
 * Offline client for tests and `MOCK_LLM=1` runs. Reply lookup order: the constructor
 * payload, the JSON file at MOCK_LLM_OUTPUT_PATH, MOCK_LLM_OUTPUT, then a stub object.
 */
export class MockLlmClient implements LlmClient {
  readonly prompts: string[] = [];

  constructor(
    private readonly reply?: unknown,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    this.prompts.push(prompt);

    const value = await readCannedReply(this.pickReply());
    return {
      text: typeof value === "string" ? value : JSON.stringify(value),
      parsed: options.schema ? requireObjectReply(value) : undefined,
      finishReason: "mock",
    };
  }

  private pickReply(): CannedReply {
    if (this.reply !== undefined) return { origin: "constructor", value: this.reply };
    if (this.env.MOCK_LLM_OUTPUT_PATH) {
      return { origin: "fixture", file: path.resolve(this.env.MOCK_LLM_OUTPUT_PATH) };
    }
    if (this.env.MOCK_LLM_OUTPUT) return { origin: "env", raw: this.env.MOCK_LLM_OUTPUT };
    return { origin: "stub" };
  }
}

async function readCannedReply(reply: CannedReply): Promise<unknown> {
  switch (reply.origin) {
    case "constructor":
      return reply.value;
    case "fixture":
      return decodeLenient(await fse.readFile(reply.file, "utf8"));
    case "env":
      return decodeLenient(reply.raw);
    case "stub":
      return STUB_REPLY;
  }
}

function requireObjectReply(value: unknown): unknown {
  const decoded = typeof value === "string" ? decodeLenient(value) : value;
  if (typeof decoded !== "object" || decoded === null) {
    throw new LlmError("Mock LLM requires an object payload when a schema is provided.");
  }
  return decoded;
}

// Text that is not JSON comes back as the trimmed string.
function decodeLenient(raw: string): unknown {
  const text = raw.trim();
  if (text === "") return {};

  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
