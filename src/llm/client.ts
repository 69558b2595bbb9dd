import {
  EvalSweepError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  createMissingCredentialError,
} from "../core/errors.js";
import type { RemoteUsage } from "../core/scheduler.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmProvider = "openai" | "anthropic";

export type LlmCompletionOptions = {
  system?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
};

export type LlmCompletionResult = {
  text: string;
  finishReason: string | null;
  usage?: RemoteUsage;
};

export interface LlmClient {
  complete(prompt: string, options?: LlmCompletionOptions): Promise<LlmCompletionResult>;
}

/** How a client names itself in errors, and which variable holds its key. */
export type LlmCredentialInfo = {
  label: string;
  envVar: string;
};

// =============================================================================
// ERRORS
// =============================================================================

export class LlmError extends EvalSweepError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

// =============================================================================
// USER-FACING ERROR HELPERS
// =============================================================================

const RESPONSE_HINT = "Retry the request or check the provider status.";

export const DEFAULT_CREDENTIALS: Record<LlmProvider, LlmCredentialInfo> = {
  openai: { label: "OpenAI", envVar: "OPENAI_API_KEY" },
  anthropic: { label: "Anthropic", envVar: "ANTHROPIC_API_KEY" },
};

export function createMissingApiKeyError(info: LlmCredentialInfo): UserFacingError {
  return createMissingCredentialError(info.envVar, info.label);
}

export function createRejectedApiKeyError(
  info: LlmCredentialInfo,
  status: number,
  cause?: unknown,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${info.label} API key rejected.`,
    message: `${info.label} rejected the API key (status ${status}).`,
    hint: `Check ${info.envVar} and its permissions.`,
    cause,
  });
}

export function createResponseError(
  info: LlmCredentialInfo,
  message: string,
  cause?: unknown,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.remote,
    title: `${info.label} response invalid.`,
    message,
    hint: RESPONSE_HINT,
    cause,
  });
}

// =============================================================================
// RETRIES
// =============================================================================

export const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export function retryDelayMs(attempt: number): number {
  const capped = Math.min(attempt, 5);
  return 250 * 2 ** (capped - 1);
}

export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
}
