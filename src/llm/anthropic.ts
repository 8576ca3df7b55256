import Anthropic, { APIConnectionError, APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  Message,
  MessageCreateParamsNonStreaming,
  ToolUseBlock,
} from "@anthropic-ai/sdk/resources/messages/messages";

import { isPlainObject } from "../core/utils.js";

import {
  apiErrorDetail,
  HostedLlmClient,
  LlmError,
  type HostedCall,
  type HostedClientOptions,
  type HostedFailure,
  type LlmCompletionResult,
} from "./client.js";

export type AnthropicRequestOptions = {
  timeout?: number;
  maxRetries?: number;
};

export type AnthropicTransport = {
  create: (body: MessageCreateParamsNonStreaming, options?: AnthropicRequestOptions) => Promise<Message>;
};

export type AnthropicClientOptions = HostedClientOptions<AnthropicTransport> & {
  defaultMaxTokens?: number;
};

const STRUCTURED_OUTPUT_TOOL = "structured_output";

/**
 * Messages API client. The API has no JSON response mode, so a schema is sent as the input
 * schema of a tool the model is forced to call, and the call's input is the reply.
 */
export class AnthropicClient extends HostedLlmClient<AnthropicTransport> {
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions) {
    super("anthropic", options, connectAnthropic);
    this.maxTokens = options.defaultMaxTokens ?? 4096;
  }

  protected async exchange(call: HostedCall): Promise<LlmCompletionResult> {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: call.prompt }],
      max_tokens: this.maxTokens,
      temperature: call.temperature,
    };
    if (call.schema) {
      body.tools = [
        {
          name: STRUCTURED_OUTPUT_TOOL,
          description: "Return JSON that matches the provided schema.",
          input_schema: { ...call.schema, type: "object" },
        },
      ];
      body.tool_choice = { type: "tool", name: STRUCTURED_OUTPUT_TOOL };
    }

    const message = await this.transport.create(body, { timeout: call.timeoutMs });
    const finishReason = message.stop_reason ?? null;

    if (call.schema) {
      const parsed = toolInput(message);
      return { text: JSON.stringify(parsed), parsed, finishReason };
    }

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
    if (!text) {
      throw new LlmError("Anthropic response did not include assistant content.", message);
    }
    return { text, finishReason };
  }

  protected classifyFailure(error: unknown): HostedFailure {
    if (error instanceof APIConnectionError) return { kind: "connection" };
    if (error instanceof APIError) {
      const detail = apiErrorDetail(error.error, error.message);
      return { kind: "status", status: error.status, detail };
    }
    return error instanceof AnthropicError ? { kind: "rejected" } : { kind: "other" };
  }
}

function toolInput(message: Message): Record<string, unknown> {
  const call = message.content.find((block): block is ToolUseBlock => block.type === "tool_use");
  if (!call) {
    throw new LlmError(
      "Anthropic response did not include a tool_use block for structured output.",
      message,
    );
  }
  if (!isPlainObject(call.input)) {
    throw new LlmError("Anthropic tool_use input was not a JSON object.", message);
  }
  return call.input;
}

function connectAnthropic(credentials: { apiKey: string; baseURL?: string }): AnthropicTransport {
  // Retries happen in HostedLlmClient.
  const sdk = new Anthropic({ ...credentials, maxRetries: 0 });
  return { create: (body, options) => sdk.messages.create(body, options) };
}
