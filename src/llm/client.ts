import { OrchestratorError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { isPlainObject } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmCompletionOptions = {
  /** JSON schema the reply must follow. When set, `parsed` holds the decoded object. */
  schema?: Record<string, unknown>;
  temperature?: number;
  timeoutMs?: number;
};

export type LlmCompletionResult = {
  text: string;
  parsed?: unknown;
  finishReason: string | null;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

export class LlmError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

// =============================================================================
// HOSTED PROVIDERS
// =============================================================================

export type HostedProvider = "openai" | "anthropic";

export type HostedClientOptions<TTransport> = {
  model: string;
  /** Falls back to the provider's API key variable. Ignored when a transport is given. */
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  /** Attempts per request, including the first. */
  maxRetries?: number;
  transport?: TTransport;
};

/** A single request after option defaults are applied. */
export type HostedCall = {
  prompt: string;
  temperature: number;
  timeoutMs: number;
  schema?: Record<string, unknown>;
};

/** What a provider SDK error amounts to, independent of which SDK threw it. */
export type HostedFailure =
  | { kind: "connection" }
  | { kind: "status"; status: number | undefined; detail: string }
  | { kind: "rejected" }
  | { kind: "other" };

const PROVIDERS: Record<HostedProvider, { label: string; envVar: string; clientName: string }> = {
  openai: { label: "OpenAI", envVar: "OPENAI_API_KEY", clientName: "OpenAiClient" },
  anthropic: { label: "Anthropic", envVar: "ANTHROPIC_API_KEY", clientName: "AnthropicClient" },
};

const RETRIABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/**
 * Shared request path for hosted model APIs: applies defaults, checks the schema, retries
 * transient failures and maps SDK errors to LlmError (or a config error for bad keys).
 * Subclasses make one call and decode its reply.
 */
export abstract class HostedLlmClient<TTransport> implements LlmClient {
  protected readonly model: string;
  protected readonly transport: TTransport;
  protected readonly label: string;
  private readonly defaultTemperature: number;
  private readonly defaultTimeoutMs: number;
  private readonly attempts: number;

  protected constructor(
    private readonly provider: HostedProvider,
    options: HostedClientOptions<TTransport>,
    connect: (credentials: { apiKey: string; baseURL?: string }) => TTransport,
  ) {
    this.model = options.model;
    this.label = PROVIDERS[provider].label;
    this.defaultTemperature = options.defaultTemperature ?? 0;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 60_000;
    this.attempts = Math.max(1, options.maxRetries ?? 3);

    if (options.transport !== undefined) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env[PROVIDERS[provider].envVar];
      if (!apiKey) throw missingApiKeyError(provider);
      this.transport = connect({ apiKey, baseURL: options.baseURL });
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    if (options.schema !== undefined && !isPlainObject(options.schema)) {
      throw new LlmError("Structured output schema must be a plain JSON object.");
    }

    const call: HostedCall = {
      prompt,
      temperature: options.temperature ?? this.defaultTemperature,
      timeoutMs: options.timeoutMs ?? this.defaultTimeoutMs,
      schema: options.schema,
    };

    return runWithRetries({
      fn: () => this.exchange(call),
      maxRetries: this.attempts,
      isRetryable: (error) => this.isRetryable(error),
      wrapError: (error) => this.toClientError(error),
    });
  }

  protected abstract exchange(call: HostedCall): Promise<LlmCompletionResult>;

  protected abstract classifyFailure(error: unknown): HostedFailure;

  private isRetryable(error: unknown): boolean {
    const failure = this.classifyFailure(error);
    switch (failure.kind) {
      case "connection":
        return true;
      case "status":
        return failure.status !== undefined && RETRIABLE_STATUSES.has(failure.status);
      case "rejected":
        return false;
      case "other":
        return isTimeoutError(error);
    }
  }

  private toClientError(error: unknown): Error {
    if (error instanceof LlmError) return error;

    const failure = this.classifyFailure(error);
    if (failure.kind === "status") {
      const { status, detail } = failure;
      if (status === 401 || status === 403) return missingApiKeyError(this.provider, error);

      const rateLimited = status === 429 ? ` Rate limited by ${this.label}.` : "";
      return new LlmError(
        `${this.label} request failed (status ${status ?? "unknown"}): ${detail}${rateLimited}`,
        error,
      );
    }

    if (error instanceof Error) {
      return new LlmError(`${this.label} request failed: ${error.message}`, error);
    }
    return new LlmError(`${this.label} request failed due to an unknown error.`, error);
  }
}

export function missingApiKeyError(provider: HostedProvider, cause?: unknown): UserFacingError {
  const { label, envVar, clientName } = PROVIDERS[provider];
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${label} API key missing.`,
    message: `${label} API key is missing or invalid.`,
    hint: `Set ${envVar}, set producer.api_key in the config, or pass apiKey to ${clientName}.`,
    cause,
  });
}

/** Prefers the message inside an API error body over the SDK's summary. */
export function apiErrorDetail(body: unknown, fallback: string): string {
  return isPlainObject(body) && typeof body.message === "string" ? body.message : fallback;
}

// =============================================================================
// REPLY DECODING
// =============================================================================

/** Decodes a JSON reply, accepting one wrapped in a Markdown code fence. */
export function parseJsonReply(text: string, source = "Model"): unknown {
  try {
    return JSON.parse(stripCodeFence(text).trim());
  } catch (err) {
    throw new LlmError(`${source} returned invalid JSON.`, err);
  }
}

export function stripCodeFence(text: string): string {
  const match = /```(?:json)?[^\S\n]*\n?([\s\S]*?)```/.exec(text);
  return match ? match[1] : text;
}

// =============================================================================
// RETRIES
// =============================================================================

export async function runWithRetries<T>(args: {
  fn: () => Promise<T>;
  maxRetries: number;
  isRetryable: (error: unknown) => boolean;
  wrapError: (error: unknown) => Error;
}): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await args.fn();
    } catch (err) {
      if (attempt >= args.maxRetries || !args.isRetryable(err)) {
        throw args.wrapError(err);
      }
      await sleep(backoffMs(attempt));
    }
  }
}

export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return /timeout|ETIMEDOUT/i.test(error.message);
}

// 250ms doubling per attempt, capped at 4s.
function backoffMs(attempt: number): number {
  return 250 * 2 ** (Math.min(attempt, 5) - 1);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
