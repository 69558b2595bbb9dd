/*
Purpose: one POST per text to an AI-text detection endpoint.
Assumptions: the endpoint answers a JSON object; the key travels in an x-api-key header.
Usage: await new DetectorClient({ apiUrl, apiKey }).analyze(text).
*/

import { EvalSweepError, createMissingCredentialError } from "../core/errors.js";
import type { JsonObject } from "../core/logger.js";
import { isJsonObject } from "../core/record.js";

// =============================================================================
// TYPES
// =============================================================================

export type DetectorClientOptions = {
  apiUrl: string;
  apiKey?: string;
  apiKeyEnv?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

// =============================================================================
// ERRORS
// =============================================================================

export class DetectorError extends EvalSweepError {
  constructor(
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "DetectorError";
  }
}

// =============================================================================
// CLIENT
// =============================================================================

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_API_KEY_ENV = "PANGRAM_API_KEY";
const MAX_ERROR_BODY_CHARS = 200;

export class DetectorClient {
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DetectorClientOptions) {
    const envVar = options.apiKeyEnv ?? DEFAULT_API_KEY_ENV;
    const apiKey = options.apiKey ?? process.env[envVar];
    if (!apiKey) {
      throw createMissingCredentialError(envVar, "Detector");
    }

    this.apiUrl = options.apiUrl;
    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async analyze(text: string): Promise<JsonObject> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-api-key": this.apiKey },
        body: JSON.stringify({ text, public_dashboard_link: false }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new DetectorError(`Detector request failed: ${detail}`, undefined, err);
    }

    const raw = await response.text();
    if (!response.ok) {
      throw new DetectorError(
        `Detector request failed (status ${response.status}): ${truncate(raw)}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      const message = `Detector returned invalid JSON: ${truncate(raw)}`;
      throw new DetectorError(message, response.status, err);
    }

    if (!isJsonObject(body)) {
      throw new DetectorError("Detector returned a non-object JSON body.", response.status);
    }

    return body;
  }
}

function truncate(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_ERROR_BODY_CHARS
    ? `${trimmed.slice(0, MAX_ERROR_BODY_CHARS)}...`
    : trimmed;
}
