import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";

import { sleep } from "../core/utils.js";

import {
  createMissingApiKeyError,
  createRejectedApiKeyError,
  createResponseError,
  DEFAULT_CREDENTIALS,
  isTimeoutError,
  LlmError,
  RETRIABLE_STATUS_CODES,
  retryDelayMs,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
  type LlmCredentialInfo,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type OpenAiChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export type OpenAiChatRequest = {
  model: string;
  messages: OpenAiChatMessage[];
  temperature?: number;
  max_tokens?: number;
};

/** The slice of a chat completion this client reads. */
export type OpenAiChatReply = {
  choices: Array<{
    finish_reason: string | null;
    message: { content: string | null };
  }>;
  usage?: { prompt_tokens: number; completion_tokens: number };
};

export type OpenAiRequestOptions = {
  timeout?: number;
};

export type OpenAiTransport = {
  create: (body: OpenAiChatRequest, options?: OpenAiRequestOptions) => Promise<OpenAiChatReply>;
};

export type OpenAiClientOptions = {
  model: string;
  apiKey?: string;
  /** Any OpenAI-compatible endpoint, e.g. https://openrouter.ai/api/v1. */
  baseURL?: string;
  credentials?: LlmCredentialInfo;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: OpenAiTransport;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 1;

// =============================================================================
// CLIENT
// =============================================================================

export class OpenAiClient implements LlmClient {
  private readonly model: string;
  private readonly credentials: LlmCredentialInfo;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens?: number;
  private readonly maxRetries: number;
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    this.model = options.model;
    this.credentials = options.credentials ?? DEFAULT_CREDENTIALS.openai;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (!options.transport) {
      const apiKey = options.apiKey ?? process.env[this.credentials.envVar];
      if (!apiKey) {
        throw createMissingApiKeyError(this.credentials);
      }
      this.transport = createTransport({
        apiKey,
        baseURL: options.baseURL,
      });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = this.buildRequestOptions(options.timeoutMs);

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions));

    const choice = response.choices[0];
    const text = choice?.message.content?.trim() ?? "";
    if (!text) {
      throw createResponseError(
        this.credentials,
        `${this.credentials.label} response did not include assistant content.`,
        response,
      );
    }

    return {
      text,
      finishReason: choice?.finish_reason ?? null,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
          }
        : undefined,
    };
  }

  private buildRequestBody(prompt: string, options: LlmCompletionOptions): OpenAiChatRequest {
    const messages: OpenAiChatMessage[] = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    const body: OpenAiChatRequest = {
      model: this.model,
      messages,
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
    };

    const maxTokens = options.maxTokens ?? this.defaultMaxTokens;
    if (maxTokens !== undefined) {
      body.max_tokens = maxTokens;
    }

    return body;
  }

  private buildRequestOptions(timeoutMs?: number): OpenAiRequestOptions | undefined {
    const timeout = timeoutMs ?? this.defaultTimeoutMs;
    if (!timeout) return undefined;
    return { timeout };
  }

  private async runWithRetries<T>(fn: () => Promise<T>): Promise<T> {
    let attempt = 1;
    let lastError: unknown;

    while (attempt <= this.maxRetries) {
      try {
        return await fn();
      } catch (err) {
        lastError = err;
        if (!this.isRetryable(err) || attempt === this.maxRetries) {
          throw this.wrapError(err);
        }
        await sleep(retryDelayMs(attempt));
      }
      attempt += 1;
    }

    throw this.wrapError(lastError ?? new Error(`Unknown ${this.credentials.label} failure`));
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof APIError && error.status !== undefined) {
      return RETRIABLE_STATUS_CODES.has(error.status);
    }
    return isTimeoutError(error);
  }

  private wrapError(error: unknown): Error {
    const label = this.credentials.label;

    if (error instanceof APIError) {
      if (error.status === 401 || error.status === 403) {
        return createRejectedApiKeyError(this.credentials, error.status, error);
      }

      const status = error.status ?? "unknown";
      const detail =
        error.error && typeof error.error === "object" && "message" in error.error
          ? String(error.error.message)
          : error.message;
      const suffix = status === 429 ? ` Rate limited by ${label}.` : "";
      return new LlmError(`${label} request failed (status ${status}): ${detail}${suffix}`, error);
    }

    if (error instanceof OpenAIError) {
      return new LlmError(`${label} request failed: ${error.message}`, error);
    }

    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }

    return new LlmError(`${label} request failed due to an unknown error.`, error);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function createTransport(args: { apiKey: string; baseURL?: string }): OpenAiTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Manual retries handled in OpenAiClient.
  });

  return {
    create: (body, options) => client.chat.completions.create({ ...body, stream: false }, options),
  };
}
