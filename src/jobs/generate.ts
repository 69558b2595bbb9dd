/*
Purpose: one story per line of a prompt list.
Assumptions: leading "1." / "1)" numbering is stripped; prompt_id is the prompt's ordinal among
non-blank lines, while the item id stays the physical line.
*/

import type { GenerateConfig, LlmConfig } from "../core/config.js";
import { loadTextItems } from "../core/item-source.js";
import type { JsonObject } from "../core/logger.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { RecordLayout } from "../core/record.js";
import type { RemoteCaller } from "../core/scheduler.js";
import { countWords } from "../core/utils.js";
import type { LlmClient } from "../llm/client.js";
import { createLlmClient } from "../llm/factory.js";

import type { JobDefinition } from "./types.js";

export const GENERATE_LAYOUT: RecordLayout = {
  contextKeys: ["prompt_id"],
  inputKeys: ["prompt"],
  resultKeys: ["story"],
};

const PROMPT_NUMBERING = /^\s*\d+[.)]\s*/;

export type GenerateJobDeps = {
  createClient?: (config: LlmConfig) => LlmClient;
};

export function createGenerateJob(
  config: GenerateConfig,
  deps: GenerateJobDeps = {},
): JobDefinition {
  const createClient = deps.createClient ?? createLlmClient;

  return {
    name: "generate",
    inputPath: config.input,
    outputPath: config.output,
    passes: config.passes,
    layout: GENERATE_LAYOUT,
    accept: hasStoryText,
    loadItems: () => {
      let ordinal = 0;
      return loadTextItems(config.input, (line) => {
        const prompt = stripPromptNumbering(line);
        if (prompt.length === 0) return null;

        ordinal += 1;
        return { inputs: { prompt }, context: { prompt_id: ordinal }, requests: { story: prompt } };
      });
    },
    createCaller: () => createStoryCaller(createClient(config.llm), config),
  };
}

export function stripPromptNumbering(line: string): string {
  return line.replace(PROMPT_NUMBERING, "").trim();
}

export function createStoryCaller(client: LlmClient, config: GenerateConfig): RemoteCaller {
  const [minWords, maxWords] = config.word_range;

  return async (prompt) => {
    const [system, user] = await Promise.all([
      renderPromptTemplate("generate-system"),
      renderPromptTemplate("generate-user", {
        prompt,
        target_words: config.target_words,
        min_words: minWords,
        max_words: maxWords,
      }),
    ]);

    const completion = await client.complete(user, {
      system,
      temperature: config.llm.temperature,
      maxTokens: config.llm.max_tokens,
      timeoutMs: config.llm.timeout_ms,
    });

    return {
      value: {
        text: completion.text,
        word_count: countWords(completion.text),
        finish_reason: completion.finishReason,
      },
      usage: completion.usage,
    };
  };
}

export function hasStoryText(value: JsonObject): boolean {
  return typeof value.text === "string" && value.text.trim().length > 0;
}
