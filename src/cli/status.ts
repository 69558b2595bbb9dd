import type { EvalSweepConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  createSourceError,
  SourceError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { createJob } from "../jobs/index.js";
import { inspectJob, type JobStatus } from "../jobs/run-job.js";
import type { JobName } from "../jobs/types.js";

import { renderJobStatus } from "./output.js";

const STATUS_COMMAND_FAILURE_TITLE = "Status command failed.";

export async function statusCommand(job: JobName, config: EvalSweepConfig): Promise<JobStatus> {
  const definition = createJob(job, config);

  try {
    const status = await inspectJob(definition);
    for (const line of renderJobStatus(status)) console.log(line);
    return status;
  } catch (error) {
    throw normalizeStatusCommandError(error, definition.inputPath);
  }
}

function normalizeStatusCommandError(error: unknown, inputPath: string): UserFacingError {
  if (error instanceof SourceError) return createSourceError(error, inputPath);
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: STATUS_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint,
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: STATUS_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    cause: error,
  });
}
