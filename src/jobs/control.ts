/*
Purpose: score a control rewrite next to the results of an earlier quality or detect run.
Assumptions: line N of the control file lines up with record id N of the existing snapshot;
only rows with an `unslopped_story` take part.
Usage: runJob(createQualityControlJob(config.quality_control), { logsDir }).
*/

import type { DetectControlConfig, QualityControlConfig } from "../core/config.js";
import { loadJsonlItems, type JsonlItemExtractor } from "../core/item-source.js";
import type { RecordLayout } from "../core/record.js";
import { hasAllScores } from "../core/tags.js";
import { createLlmClient } from "../llm/factory.js";

import { createDetectionCaller, hasDetectionScore, type DetectJobDeps } from "./detect.js";
import { createCritiqueCaller, type QualityJobDeps } from "./quality.js";
import type { JobDefinition } from "./types.js";

// =============================================================================
// LAYOUTS
// =============================================================================

export const QUALITY_CONTROL_LAYOUT: RecordLayout = {
  contextKeys: [],
  inputKeys: ["control_story"],
  resultKeys: ["control_eval"],
};

export const DETECT_CONTROL_LAYOUT: RecordLayout = {
  contextKeys: [],
  inputKeys: ["control_story"],
  resultKeys: ["control_detection"],
};

// =============================================================================
// JOBS
// =============================================================================

export function createQualityControlJob(
  config: QualityControlConfig,
  deps: QualityJobDeps = {},
): JobDefinition {
  const createClient = deps.createClient ?? createLlmClient;

  return {
    name: "quality-control",
    inputPath: config.input,
    outputPath: config.output,
    passes: config.passes,
    layout: QUALITY_CONTROL_LAYOUT,
    accept: hasAllScores,
    augmentsSnapshot: true,
    loadItems: () => loadJsonlItems(config.input, controlItemExtractor("control_eval")),
    createCaller: () => createCritiqueCaller(createClient(config.llm), config.llm),
  };
}

export function createDetectControlJob(
  config: DetectControlConfig,
  deps: DetectJobDeps = {},
): JobDefinition {
  return {
    name: "detect-control",
    inputPath: config.input,
    outputPath: config.output,
    passes: config.passes,
    layout: DETECT_CONTROL_LAYOUT,
    accept: hasDetectionScore,
    augmentsSnapshot: true,
    loadItems: () => loadJsonlItems(config.input, controlItemExtractor("control_detection")),
    createCaller: () => createDetectionCaller(config.detector, deps),
  };
}

/** Echoes the control rewrite as `control_story`, which is what drift is checked against. */
export function controlItemExtractor(resultKey: string): JsonlItemExtractor {
  return (row) => {
    const story = row.unslopped_story;
    if (typeof story !== "string") return null;

    return {
      inputs: { control_story: story },
      context: {},
      requests: { [resultKey]: story },
    };
  };
}
