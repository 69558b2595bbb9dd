import type { DetectConfig, DetectorConfig } from "../core/config.js";
import { loadJsonlItems, type JsonlItemExtractor } from "../core/item-source.js";
import type { JsonObject } from "../core/logger.js";
import type { RecordLayout } from "../core/record.js";
import type { RemoteCaller } from "../core/scheduler.js";
import { DetectorClient } from "../detector/client.js";

import type { JobDefinition } from "./types.js";

export const DETECT_LAYOUT: RecordLayout = {
  contextKeys: [],
  inputKeys: ["original_story", "unslopped_story"],
  resultKeys: ["original_detection", "unslopped_detection"],
};

export type DetectJobDeps = {
  fetch?: typeof fetch;
};

export function createDetectJob(config: DetectConfig, deps: DetectJobDeps = {}): JobDefinition {
  return {
    name: "detect",
    inputPath: config.input,
    outputPath: config.output,
    passes: config.passes,
    layout: DETECT_LAYOUT,
    accept: hasDetectionScore,
    loadItems: () => loadJsonlItems(config.input, extractDetectItem),
    createCaller: () => createDetectionCaller(config.detector, deps),
  };
}

export function createDetectionCaller(
  detector: DetectorConfig,
  deps: DetectJobDeps = {},
): RemoteCaller {
  const client = new DetectorClient({
    apiUrl: detector.api_url,
    apiKeyEnv: detector.api_key_env,
    timeoutMs: detector.timeout_ms,
    fetch: deps.fetch,
  });
  return async (text) => ({ value: await client.analyze(text) });
}

export const extractDetectItem: JsonlItemExtractor = (row) => {
  const original = row.original_story;
  const rewritten = row.unslopped_story;
  if (typeof original !== "string" || typeof rewritten !== "string") return null;

  return {
    inputs: { original_story: original, unslopped_story: rewritten },
    context: {},
    requests: { original_detection: original, unslopped_detection: rewritten },
  };
};

/** A stored detector reply only counts once it carries the AI fraction. */
export function hasDetectionScore(value: JsonObject): boolean {
  return Object.hasOwn(value, "fraction_ai");
}
