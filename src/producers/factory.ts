import type { ProducerConfig } from "../core/config.js";
import type { EventLog } from "../core/logger.js";
import { AnthropicClient } from "../llm/anthropic.js";
import type { LlmClient } from "../llm/client.js";
import { isMockLlmEnabled, MockLlmClient } from "../llm/mock.js";
import { OpenAiClient } from "../llm/openai.js";

import { FallbackPlanProducer, FallbackSpecProducer } from "./fallback.js";
import { LlmPlanProducer, LlmSpecProducer } from "./llm-producers.js";
import type { Producers } from "./types.js";

export function createProducers(args: {
  config: ProducerConfig;
  log: EventLog;
  env?: NodeJS.ProcessEnv;
}): Producers {
  const { config, log, env = process.env } = args;
  const mock = isMockLlmEnabled(env);

  if (config.provider === "fallback" && !mock) {
    return { plan: new FallbackPlanProducer(), spec: new FallbackSpecProducer() };
  }

  const options = {
    createClient: () => createProducerClient(config, { mock, env }),
    log,
    temperature: config.temperature,
    timeoutMs: config.timeout_ms,
  };
  return { plan: new LlmPlanProducer(options), spec: new LlmSpecProducer(options) };
}

export function createProducerClient(
  cfg: ProducerConfig,
  opts: { mock: boolean; env?: NodeJS.ProcessEnv },
): LlmClient {
  if (opts.mock || cfg.provider === "mock") {
    return new MockLlmClient(undefined, opts.env);
  }

  switch (cfg.provider) {
    case "openai":
      return new OpenAiClient({
        model: cfg.model,
        apiKey: cfg.api_key,
        baseURL: cfg.base_url,
        defaultTemperature: cfg.temperature,
        defaultTimeoutMs: cfg.timeout_ms,
      });
    case "anthropic":
      return new AnthropicClient({
        model: cfg.model,
        apiKey: cfg.api_key,
        baseURL: cfg.base_url,
        defaultTemperature: cfg.temperature,
        defaultTimeoutMs: cfg.timeout_ms,
        defaultMaxTokens: cfg.max_tokens,
      });
    case "fallback":
      throw new Error("The fallback producer does not use a model client.");
  }
}
