import OpenAI from "openai";
import { APIConnectionError, APIError, OpenAIError } from "openai/error";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

import {
  apiErrorDetail,
  HostedLlmClient,
  LlmError,
  parseJsonReply,
  type HostedCall,
  type HostedClientOptions,
  type HostedFailure,
  type LlmCompletionResult,
} from "./client.js";

export type OpenAiTransport = {
  create: (
    body: ChatCompletionCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<ChatCompletion>;
};

export type OpenAiClientOptions = HostedClientOptions<OpenAiTransport>;

/**
 * Chat Completions client. A schema turns on the `json_schema` response format, non-strict
 * because strict mode refuses free-form objects.
 */
export class OpenAiClient extends HostedLlmClient<OpenAiTransport> {
  constructor(options: OpenAiClientOptions) {
    super("openai", options, connectOpenAi);
  }

  protected async exchange(call: HostedCall): Promise<LlmCompletionResult> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: call.prompt }],
      temperature: call.temperature,
    };
    if (call.schema !== undefined) {
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema: call.schema, strict: false },
      };
    }

    const response = await this.transport.create(body, { timeout: call.timeoutMs });
    const [choice] = response.choices;
    const text = choice?.message.content;
    if (!text) {
      throw new LlmError("OpenAI response did not include assistant content.", response);
    }

    return {
      text,
      parsed: call.schema ? parseJsonReply(text, this.label) : undefined,
      finishReason: choice.finish_reason ?? null,
    };
  }

  protected classifyFailure(error: unknown): HostedFailure {
    // Client-side timeouts also arrive as connection errors.
    if (error instanceof APIConnectionError) return { kind: "connection" };
    if (error instanceof APIError) {
      const detail = apiErrorDetail(error.error, error.message);
      return { kind: "status", status: error.status, detail };
    }
    return error instanceof OpenAIError ? { kind: "rejected" } : { kind: "other" };
  }
}

function connectOpenAi(credentials: { apiKey: string; baseURL?: string }): OpenAiTransport {
  // Retries happen in HostedLlmClient.
  const sdk = new OpenAI({ ...credentials, maxRetries: 0 });
  return { create: (body, options) => sdk.chat.completions.create(body, options) };
}
