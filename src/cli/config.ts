import path from "node:path";

import type { EvalSweepConfig, JobSectionKey } from "../core/config.js";
import { loadResolvedConfig, type ConfigSource } from "../core/config-discovery.js";
import type { JobName } from "../jobs/types.js";

// =============================================================================
// CONFIG RESOLUTION (CLI)
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type CliConfig = {
  config: EvalSweepConfig;
  configPath: string | null;
  source: ConfigSource;
};

export function loadConfigForCli(args: LoadConfigForCliArgs): CliConfig {
  const resolved = loadResolvedConfig({ explicitPath: args.explicitConfigPath, cwd: args.cwd });
  return { config: resolved.config, configPath: resolved.configPath, source: resolved.source };
}

export function describeConfigSource(resolved: CliConfig): string {
  return resolved.configPath ?? "built-in defaults";
}

// =============================================================================
// FLAG OVERRIDES
// =============================================================================

export type JobOverrides = {
  input?: string;
  output?: string;
  model?: string;
  concurrency?: number;
  maxPasses?: number;
  backoff?: number;
};

/** Applies command-line flags on top of the job's config section; paths resolve against cwd. */
export function applyJobOverrides(
  config: EvalSweepConfig,
  job: JobName,
  overrides: JobOverrides,
  cwd: string = process.cwd(),
): EvalSweepConfig {
  switch (job) {
    case "quality":
      return {
        ...config,
        quality: withLlmOverride(withCommonOverrides(config.quality, overrides, cwd), overrides),
      };
    case "detect":
      return { ...config, detect: withCommonOverrides(config.detect, overrides, cwd) };
    case "generate":
      return {
        ...config,
        generate: withLlmOverride(withCommonOverrides(config.generate, overrides, cwd), overrides),
      };
    case "quality-control":
      return {
        ...config,
        quality_control: withLlmOverride(
          withCommonOverrides(config.quality_control, overrides, cwd),
          overrides,
        ),
      };
    case "detect-control":
      return {
        ...config,
        detect_control: withCommonOverrides(config.detect_control, overrides, cwd),
      };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

type JobSection = EvalSweepConfig[JobSectionKey];

function withCommonOverrides<T extends JobSection>(
  section: T,
  overrides: JobOverrides,
  cwd: string,
): T {
  return {
    ...section,
    input: overrides.input ? path.resolve(cwd, overrides.input) : section.input,
    output: overrides.output ? path.resolve(cwd, overrides.output) : section.output,
    passes: {
      concurrency: overrides.concurrency ?? section.passes.concurrency,
      max_passes: overrides.maxPasses ?? section.passes.max_passes,
      backoff_seconds: overrides.backoff ?? section.passes.backoff_seconds,
    },
  };
}

function withLlmOverride<T extends EvalSweepConfig["quality" | "generate" | "quality_control"]>(
  section: T,
  overrides: JobOverrides,
): T {
  if (!overrides.model) return section;
  return { ...section, llm: { ...section.llm, model: overrides.model } };
}
