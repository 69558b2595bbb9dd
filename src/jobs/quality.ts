/*
Purpose: critic scores for single stories or original/rewritten pairs.
Assumptions: a row with both original_story and unslopped_story is a pair; otherwise a `story`
field (a string, or a generated record's { text }) makes a single.
Usage: runJob(createQualityJob(config.quality), { logsDir }).
*/

import type { LlmConfig, QualityConfig } from "../core/config.js";
import { loadJsonlItems, type ItemDraft, type JsonlItemExtractor } from "../core/item-source.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { RecordLayout } from "../core/record.js";
import type { RemoteCaller } from "../core/scheduler.js";
import { hasAllScores, parseCritique } from "../core/tags.js";
import { isPlainObject } from "../core/utils.js";
import type { LlmClient } from "../llm/client.js";
import { createLlmClient } from "../llm/factory.js";

import { pickJsonContext, type JobDefinition } from "./types.js";

// =============================================================================
// LAYOUT
// =============================================================================

export const QUALITY_LAYOUT: RecordLayout = {
  contextKeys: ["prompt_id", "prompt"],
  inputKeys: ["original_story", "unslopped_story", "story"],
  resultKeys: ["original_eval", "unslopped_eval", "story_eval"],
};

export type QualityJobDeps = {
  createClient?: (config: LlmConfig) => LlmClient;
};

// =============================================================================
// JOB
// =============================================================================

export function createQualityJob(config: QualityConfig, deps: QualityJobDeps = {}): JobDefinition {
  const createClient = deps.createClient ?? createLlmClient;

  return {
    name: "quality",
    inputPath: config.input,
    outputPath: config.output,
    passes: config.passes,
    layout: QUALITY_LAYOUT,
    accept: hasAllScores,
    loadItems: () => loadJsonlItems(config.input, extractQualityItem),
    createCaller: () => createCritiqueCaller(createClient(config.llm), config.llm),
  };
}

export const extractQualityItem: JsonlItemExtractor = (row): ItemDraft | null => {
  const original = row.original_story;
  const rewritten = row.unslopped_story;
  if (typeof original === "string" && typeof rewritten === "string") {
    return {
      inputs: { original_story: original, unslopped_story: rewritten },
      context: {},
      requests: { original_eval: original, unslopped_eval: rewritten },
    };
  }

  const story = readStoryText(row.story);
  if (story === null) return null;

  return {
    inputs: { story },
    context: pickJsonContext(row, ["prompt_id", "prompt"]),
    requests: { story_eval: story },
  };
};

export function createCritiqueCaller(client: LlmClient, llm: LlmConfig): RemoteCaller {
  return async (text) => {
    const [system, prompt] = await Promise.all([
      renderPromptTemplate("quality-system"),
      renderPromptTemplate("quality-user", { story: text }),
    ]);

    const completion = await client.complete(prompt, {
      system,
      temperature: llm.temperature,
      maxTokens: llm.max_tokens,
      timeoutMs: llm.timeout_ms,
    });
    const critique = parseCritique(completion.text);

    return {
      value: { raw_response: completion.text, ...critique },
      usage: completion.usage,
    };
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function readStoryText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (isPlainObject(value) && typeof value.text === "string") return value.text;
  return null;
}
