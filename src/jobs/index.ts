import type { EvalSweepConfig } from "../core/config.js";

import { createDetectControlJob, createQualityControlJob } from "./control.js";
import { createDetectJob } from "./detect.js";
import { createGenerateJob } from "./generate.js";
import { createQualityJob } from "./quality.js";
import type { JobDefinition, JobName } from "./types.js";

export const JOB_NAMES: readonly JobName[] = [
  "quality",
  "detect",
  "generate",
  "quality-control",
  "detect-control",
];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some((name) => name === value);
}

export function createJob(name: JobName, config: EvalSweepConfig): JobDefinition {
  switch (name) {
    case "quality":
      return createQualityJob(config.quality);
    case "detect":
      return createDetectJob(config.detect);
    case "generate":
      return createGenerateJob(config.generate);
    case "quality-control":
      return createQualityControlJob(config.quality_control);
    case "detect-control":
      return createDetectControlJob(config.detect_control);
  }
}
