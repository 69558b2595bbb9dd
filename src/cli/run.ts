import type { EvalSweepConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  createSourceError,
  SourceError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import type { PassReporter, RunSummary } from "../core/pass-orchestrator.js";
import { createJob } from "../jobs/index.js";
import { runJob } from "../jobs/run-job.js";
import type { JobName } from "../jobs/types.js";

import { renderItemLine, renderPassBanner, renderRunSummary } from "./output.js";

export type RunCommandOptions = {
  runId?: string;
};

export async function runCommand(
  job: JobName,
  config: EvalSweepConfig,
  opts: RunCommandOptions = {},
): Promise<RunSummary> {
  const definition = createJob(job, config);

  try {
    console.log(`Job: ${job}`);
    console.log(`Input: ${definition.inputPath}`);
    console.log(`Output: ${definition.outputPath}`);

    const { logPath, summary } = await runJob(definition, {
      logsDir: config.logs_dir,
      runId: opts.runId,
      reporter: createConsoleReporter(),
    });

    console.log("");
    for (const line of renderRunSummary(summary)) console.log(line);
    console.log(`Run log: ${logPath}`);
    return summary;
  } catch (error) {
    throw normalizeRunCommandError(error, job, definition.inputPath);
  }
}

// =============================================================================
// OUTPUT
// =============================================================================

function createConsoleReporter(): PassReporter {
  return {
    passStarted: (pass, pending, total) => {
      console.log("");
      console.log(renderPassBanner(pass, pending, total));
    },
    itemSettled: (update) => console.log(renderItemLine(update)),
    passFinished: (pass, result) => {
      console.log(`Pass ${pass} done: ${result.calls} calls, ${result.failures} failed`);
    },
  };
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

function normalizeRunCommandError(
  error: unknown,
  job: JobName,
  inputPath: string,
): UserFacingError {
  if (error instanceof UserFacingError) return error;
  if (error instanceof SourceError) return createSourceError(error, inputPath);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: `${job} run failed.`,
    message: formatErrorMessage(error),
    hint: "Rerun with --debug for the cause and stack trace; completed items are kept.",
    cause: error,
  });
}
