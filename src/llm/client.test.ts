import { APIError as AnthropicApiError } from "@anthropic-ai/sdk";
import { APIError as OpenAiApiError } from "openai/error";
import { describe, expect, it } from "vitest";

import { defaultConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import {
  AnthropicClient,
  type AnthropicMessageReply,
  type AnthropicMessageRequest,
  type AnthropicRequestOptions,
} from "./anthropic.js";
import { LlmError } from "./client.js";
import { createLlmClient, resolveCredentials } from "./factory.js";
import { DEFAULT_MOCK_RESPONSE, MockLlmClient } from "./mock.js";
import {
  OpenAiClient,
  type OpenAiChatReply,
  type OpenAiChatRequest,
  type OpenAiRequestOptions,
} from "./openai.js";

// =============================================================================
// FAKES
// =============================================================================

class FakeOpenAiTransport {
  lastBody?: OpenAiChatRequest;
  lastOptions?: OpenAiRequestOptions;
  calls = 0;

  constructor(private readonly outcomes: Array<OpenAiChatReply | Error>) {}

  async create(body: OpenAiChatRequest, options?: OpenAiRequestOptions): Promise<OpenAiChatReply> {
    this.lastBody = body;
    this.lastOptions = options;
    const outcome = this.outcomes[Math.min(this.calls, this.outcomes.length - 1)];
    this.calls += 1;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

function makeOpenAiReply(content: string | null): OpenAiChatReply {
  return {
    choices: [{ finish_reason: "stop", message: { content } }],
    usage: { prompt_tokens: 10, completion_tokens: 5 },
  };
}

class FakeAnthropicTransport {
  lastBody?: AnthropicMessageRequest;
  lastOptions?: AnthropicRequestOptions;

  constructor(private readonly outcome: AnthropicMessageReply | Error) {}

  async create(
    body: AnthropicMessageRequest,
    options?: AnthropicRequestOptions,
  ): Promise<AnthropicMessageReply> {
    this.lastBody = body;
    this.lastOptions = options;
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }
}

function makeAnthropicReply(text: string): AnthropicMessageReply {
  return {
    content: [{ type: "text", text }],
    stop_reason: "end_turn",
    usage: { input_tokens: 12, output_tokens: 7 },
  };
}

// =============================================================================
// TESTS
// =============================================================================

describe("OpenAiClient", () => {
  it("sends the system prompt, sampling settings and timeout", async () => {
    const transport = new FakeOpenAiTransport([makeOpenAiReply("  <general>7</general>\n")]);
    const client = new OpenAiClient({
      model: "test-model",
      transport,
      defaultTemperature: 0.7,
      defaultTimeoutMs: 30_000,
      defaultMaxTokens: 900,
    });

    const result = await client.complete("Score this.", {
      system: "You are a critic.",
      temperature: 0.2,
      timeoutMs: 1_500,
    });

    expect(transport.lastBody).toEqual({
      model: "test-model",
      messages: [
        { role: "system", content: "You are a critic." },
        { role: "user", content: "Score this." },
      ],
      temperature: 0.2,
      max_tokens: 900,
    });
    expect(transport.lastOptions).toEqual({ timeout: 1_500 });
    expect(result).toEqual({
      text: "<general>7</general>",
      finishReason: "stop",
      usage: { inputTokens: 10, outputTokens: 5 },
    });
  });

  it("wraps empty responses with a user-facing summary", async () => {
    const transport = new FakeOpenAiTransport([makeOpenAiReply(null)]);
    const client = new OpenAiClient({ model: "test-model", transport });

    const error = await client.complete("Hello!").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.code).toBe(USER_FACING_ERROR_CODES.remote);
    expect(error.title).toBe("OpenAI response invalid.");
    expect(error.message).toMatch(/assistant content/i);
  });

  it("maps a rejected key to a config error naming the variable", async () => {
    const apiError = new OpenAiApiError(401, { message: "Missing API key" }, "Unauthorized", undefined);
    const transport = new FakeOpenAiTransport([apiError]);
    const client = new OpenAiClient({
      model: "test-model",
      transport,
      credentials: { label: "OpenRouter", envVar: "OPENROUTER_API_KEY" },
    });

    const error = await client.complete("Hi there").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.title).toBe("OpenRouter API key rejected.");
    expect(error.hint).toBe("Check OPENROUTER_API_KEY and its permissions.");
  });

  it("retries retriable statuses up to maxRetries", async () => {
    const overloaded = new OpenAiApiError(503, { message: "overloaded" }, "Unavailable", undefined);
    const transport = new FakeOpenAiTransport([overloaded, makeOpenAiReply("ok")]);
    const client = new OpenAiClient({ model: "test-model", transport, maxRetries: 2 });

    const result = await client.complete("Hi");

    expect(transport.calls).toBe(2);
    expect(result.text).toBe("ok");
  });

  it("makes a single attempt by default and reports the status", async () => {
    const limited = new OpenAiApiError(429, { message: "slow down" }, "Too Many Requests", undefined);
    const transport = new FakeOpenAiTransport([limited, makeOpenAiReply("never")]);
    const client = new OpenAiClient({ model: "test-model", transport });

    const error = await client.complete("Hi").catch((err: unknown) => err);

    expect(transport.calls).toBe(1);
    expect(error).toBeInstanceOf(LlmError);
    expect(error instanceof Error ? error.message : "").toBe(
      "OpenAI request failed (status 429): slow down Rate limited by OpenAI.",
    );
  });

  it("requires an API key when no transport is injected", () => {
    expect(() => new OpenAiClient({ model: "test-model" })).toThrow(
      "OpenAI API key is required but OPENAI_API_KEY is not set.",
    );
  });
});

describe("AnthropicClient", () => {
  it("sends system, max_tokens, temperature and timeout", async () => {
    const transport = new FakeAnthropicTransport(makeAnthropicReply("A story."));
    const client = new AnthropicClient({
      model: "test-claude",
      transport,
      defaultTemperature: 0.6,
      defaultTimeoutMs: 20_000,
      defaultMaxTokens: 2_000,
    });

    const result = await client.complete("Write.", { system: "You write fiction.", timeoutMs: 750 });

    expect(transport.lastBody).toEqual({
      model: "test-claude",
      messages: [{ role: "user", content: "Write." }],
      max_tokens: 2_000,
      temperature: 0.6,
      system: "You write fiction.",
    });
    expect(transport.lastOptions).toEqual({ timeout: 750 });
    expect(result).toEqual({
      text: "A story.",
      finishReason: "end_turn",
      usage: { inputTokens: 12, outputTokens: 7 },
    });
  });

  it("maps a rejected key to a config error", async () => {
    const apiError = new AnthropicApiError(403, { message: "Forbidden" }, "Forbidden", undefined);
    const client = new AnthropicClient({
      model: "test-claude",
      transport: new FakeAnthropicTransport(apiError),
    });

    const error = await client.complete("Hi there").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    if (!(error instanceof UserFacingError)) return;
    expect(error.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(error.hint).toBe("Check ANTHROPIC_API_KEY and its permissions.");
  });
});

describe("createLlmClient", () => {
  it("returns the mock client when MOCK_LLM is set", async () => {
    process.env.MOCK_LLM = "1";

    const client = createLlmClient(defaultConfig().quality.llm);
    const result = await client.complete("two words");

    expect(client).toBeInstanceOf(MockLlmClient);
    expect(result.text).toBe(DEFAULT_MOCK_RESPONSE);
    expect(result.usage?.inputTokens).toBe(2);
  });

  it("fails fast when the OpenRouter key is unset", () => {
    expect(() => createLlmClient(defaultConfig().quality.llm)).toThrow(
      "OpenRouter API key is required but OPENROUTER_API_KEY is not set.",
    );
  });

  it("builds a real client when the key is present", () => {
    process.env.ANTHROPIC_API_KEY = "test-secret";
    const config = { ...defaultConfig().quality.llm, provider: "anthropic" as const };

    expect(createLlmClient(config)).toBeInstanceOf(AnthropicClient);
  });
});

describe("resolveCredentials", () => {
  it("picks the label and variable from provider and base URL", () => {
    const llm = defaultConfig().quality.llm;

    expect(resolveCredentials(llm)).toEqual({ label: "OpenRouter", envVar: "OPENROUTER_API_KEY" });
    expect(resolveCredentials({ ...llm, base_url: "https://api.openai.com/v1" })).toEqual({
      label: "OpenAI",
      envVar: "OPENAI_API_KEY",
    });
    expect(resolveCredentials({ ...llm, provider: "anthropic", api_key_env: "MY_KEY" })).toEqual({
      label: "Anthropic",
      envVar: "MY_KEY",
    });
  });
});

describe("MockLlmClient", () => {
  it("prefers an explicit response over the environment", async () => {
    process.env.MOCK_LLM_OUTPUT = "from env";

    expect((await new MockLlmClient("fixed").complete("x")).text).toBe("fixed");
    expect((await new MockLlmClient().complete("x")).text).toBe("from env");
  });
});
