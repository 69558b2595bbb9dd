import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";

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

export type AnthropicMessageRequest = {
  model: string;
  max_tokens: number;
  messages: Array<{ role: "user"; content: string }>;
  system?: string;
  temperature?: number;
};

/** The slice of a Messages API reply this client reads. */
export type AnthropicMessageReply = {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
  usage?: { input_tokens: number; output_tokens: number };
};

export type AnthropicRequestOptions = {
  timeout?: number;
};

export type AnthropicTransport = {
  create: (
    body: AnthropicMessageRequest,
    options?: AnthropicRequestOptions,
  ) => Promise<AnthropicMessageReply>;
};

export type AnthropicClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  credentials?: LlmCredentialInfo;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  defaultMaxTokens?: number;
  maxRetries?: number;
  transport?: AnthropicTransport;
};

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 1;

// =============================================================================
// CLIENT
// =============================================================================

export class AnthropicClient implements LlmClient {
  private readonly model: string;
  private readonly credentials: LlmCredentialInfo;
  private readonly defaultTemperature?: number;
  private readonly defaultTimeoutMs: number;
  private readonly defaultMaxTokens: number;
  private readonly maxRetries: number;
  private readonly transport: AnthropicTransport;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.credentials = options.credentials ?? DEFAULT_CREDENTIALS.anthropic;
    this.defaultTemperature = options.defaultTemperature;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);

    if (!options.transport) {
      const apiKey = options.apiKey ?? process.env[this.credentials.envVar];
      if (!apiKey) {
        throw createMissingApiKeyError(this.credentials);
      }

      this.transport = createTransport({ apiKey, baseURL: options.baseURL });
    } else {
      this.transport = options.transport;
    }
  }

  async complete(prompt: string, options: LlmCompletionOptions = {}): Promise<LlmCompletionResult> {
    const body = this.buildRequestBody(prompt, options);
    const requestOptions = this.buildRequestOptions(options.timeoutMs);

    const response = await this.runWithRetries(() => this.transport.create(body, requestOptions));

    const text = extractText(response.content);
    if (!text) {
      throw createResponseError(
        this.credentials,
        `${this.credentials.label} response did not include assistant content.`,
        response,
      );
    }

    return {
      text,
      finishReason: response.stop_reason ?? null,
      usage: response.usage
        ? {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
          }
        : undefined,
    };
  }

  private buildRequestBody(prompt: string, options: LlmCompletionOptions): AnthropicMessageRequest {
    const body: AnthropicMessageRequest = {
      model: this.model,
      messages: [{ role: "user", content: prompt }],
      max_tokens: options.maxTokens ?? this.defaultMaxTokens,
      temperature: options.temperature ?? this.defaultTemperature ?? 0,
    };

    if (options.system) {
      body.system = options.system;
    }

    return body;
  }

  private buildRequestOptions(timeoutMs?: number): AnthropicRequestOptions | undefined {
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

    throw this.wrapError(lastError ?? new Error("Unknown Anthropic failure"));
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

    if (error instanceof AnthropicError) {
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

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Manual retries handled in AnthropicClient.
  });

  return {
    create: (body, options) => client.messages.create({ ...body, stream: false }, options),
  };
}

function extractText(content: AnthropicMessageReply["content"]): string {
  return content
    .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
    .join("")
    .trim();
}
