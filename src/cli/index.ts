import { Command, InvalidArgumentError } from "commander";

import type { EvalSweepConfig } from "../core/config.js";
import { isJobName, JOB_NAMES } from "../jobs/index.js";
import type { JobName } from "../jobs/types.js";

import {
  applyJobOverrides,
  describeConfigSource,
  loadConfigForCli,
  type JobOverrides,
} from "./config.js";
import { runCommand } from "./run.js";
import { statusCommand } from "./status.js";

type JobCommandSpec = {
  name: JobName;
  description: string;
  usesModel: boolean;
};

const JOB_COMMANDS: JobCommandSpec[] = [
  {
    name: "quality",
    description: "Score stories with an LLM critic (coherence, style, general)",
    usesModel: true,
  },
  {
    name: "detect",
    description: "Run original/unslopped story pairs through the AI-text detector",
    usesModel: false,
  },
  {
    name: "generate",
    description: "Write one short story per line of a prompt list",
    usesModel: true,
  },
  {
    name: "quality-control",
    description: "Add a critique of each control rewrite to an existing quality snapshot",
    usesModel: true,
  },
  {
    name: "detect-control",
    description: "Add a detector reading of each control rewrite to an existing detect snapshot",
    usesModel: false,
  },
];

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (overrides: JobOverrides, job: JobName): EvalSweepConfig => {
    const globals = program.opts<{ config?: string }>();
    const resolved = loadConfigForCli({ explicitConfigPath: globals.config });
    console.log(`Config: ${describeConfigSource(resolved)}`);
    return applyJobOverrides(resolved.config, job, overrides);
  };

  program
    .name("evalsweep")
    .description("Resumable concurrent batch evaluation over JSONL datasets")
    .version("0.1.0")
    .option("--config <path>", "Config file (defaults to ./evalsweep.yaml when present)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  for (const jobCommand of JOB_COMMANDS) {
    const command = program
      .command(jobCommand.name)
      .description(jobCommand.description)
      .option("--input <path>", "Input file (overrides config)")
      .option("--output <path>", "Output snapshot file (overrides config)")
      .option("--concurrency <n>", "Max in-flight remote calls", parsePositiveInt)
      .option("--max-passes <n>", "Max passes before giving up on stragglers", parsePositiveInt)
      .option("--backoff <seconds>", "Sleep between passes", parseNonNegativeNumber)
      .option("--run-id <id>", "Run log id (default: timestamp)");

    if (jobCommand.usesModel) {
      command.option("--model <name>", "Model name (overrides config)");
    }

    command.action(async (opts: JobOverrides & { runId?: string }) => {
      const config = resolveConfig(opts, jobCommand.name);
      await runCommand(jobCommand.name, config, { runId: opts.runId });
    });
  }

  program
    .command("status")
    .description("Show which items of a job are still pending, without calling the remote")
    .argument("<job>", `One of: ${JOB_NAMES.join(", ")}`, parseJobName)
    .option("--input <path>", "Input file (overrides config)")
    .option("--output <path>", "Output snapshot file (overrides config)")
    .action(async (job: JobName, opts: JobOverrides) => {
      const config = resolveConfig(opts, job);
      await statusCommand(job, config);
    });

  return program;
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a number of zero or more.");
  }
  return parsed;
}

function parseJobName(value: string): JobName {
  if (!isJobName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${JOB_NAMES.join(", ")}.`);
  }
  return value;
}
