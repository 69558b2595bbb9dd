import fs from "node:fs/promises";
import path from "node:path";

import { countWords } from "../core/utils.js";

import type { LlmClient, LlmCompletionOptions, LlmCompletionResult } from "./client.js";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/** Parses as a full critique, so mock quality runs complete in one pass. */
export const DEFAULT_MOCK_RESPONSE = [
  "<analysis>Mock analysis.</analysis>",
  "<coherence>5</coherence>",
  "<style>5</style>",
  "<general>5</general>",
].join("\n");

export function isMockLlmEnabled(): boolean {
  const flag = process.env.MOCK_LLM;
  if (!flag) return false;

  return TRUE_VALUES.has(flag.trim().toLowerCase());
}

export class MockLlmClient implements LlmClient {
  readonly prompts: string[] = [];

  constructor(private readonly response?: string) {}

  async complete(
    prompt: string,
    _options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult> {
    this.prompts.push(prompt);
    const text = await this.loadResponse();

    return {
      text,
      finishReason: "mock",
      usage: { inputTokens: countWords(prompt), outputTokens: countWords(text) },
    };
  }

  private async loadResponse(): Promise<string> {
    if (this.response !== undefined) {
      return this.response;
    }

    const fixturePath = process.env.MOCK_LLM_OUTPUT_PATH;
    if (fixturePath) {
      return (await fs.readFile(path.resolve(fixturePath), "utf8")).trim();
    }

    const inline = process.env.MOCK_LLM_OUTPUT;
    if (inline) {
      return inline.trim();
    }

    return DEFAULT_MOCK_RESPONSE;
  }
}
