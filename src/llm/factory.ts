import { DEFAULT_OPENAI_BASE_URL, type LlmConfig } from "../core/config.js";

import { AnthropicClient } from "./anthropic.js";
import { DEFAULT_CREDENTIALS, type LlmClient, type LlmCredentialInfo } from "./client.js";
import { isMockLlmEnabled, MockLlmClient } from "./mock.js";
import { OpenAiClient } from "./openai.js";

/**
 * Builds the client for an `llm` config section. Throws a user-facing error when the
 * key variable is unset, so a run fails before any item is attempted.
 */
export function createLlmClient(config: LlmConfig): LlmClient {
  if (isMockLlmEnabled()) {
    return new MockLlmClient();
  }

  const credentials = resolveCredentials(config);
  const shared = {
    model: config.model,
    credentials,
    defaultTemperature: config.temperature,
    defaultTimeoutMs: config.timeout_ms,
    defaultMaxTokens: config.max_tokens,
    maxRetries: config.max_retries,
  };

  if (config.provider === "anthropic") {
    return new AnthropicClient({ ...shared, baseURL: config.base_url });
  }

  return new OpenAiClient({ ...shared, baseURL: config.base_url ?? DEFAULT_OPENAI_BASE_URL });
}

export function resolveCredentials(config: LlmConfig): LlmCredentialInfo {
  if (config.provider === "anthropic") {
    return {
      label: DEFAULT_CREDENTIALS.anthropic.label,
      envVar: config.api_key_env ?? DEFAULT_CREDENTIALS.anthropic.envVar,
    };
  }

  const baseUrl = config.base_url ?? DEFAULT_OPENAI_BASE_URL;
  if (baseUrl.includes("openrouter.ai")) {
    return { label: "OpenRouter", envVar: config.api_key_env ?? "OPENROUTER_API_KEY" };
  }

  return {
    label: DEFAULT_CREDENTIALS.openai.label,
    envVar: config.api_key_env ?? DEFAULT_CREDENTIALS.openai.envVar,
  };
}
