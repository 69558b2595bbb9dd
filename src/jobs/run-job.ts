import path from "node:path";

import { formatErrorMessage } from "../core/error-format.js";
import { createEmptySnapshotError } from "../core/errors.js";
import { JsonlLogger, logRunEvent } from "../core/logger.js";
import {
  PassOrchestrator,
  type PassReporter,
  type RunSummary,
} from "../core/pass-orchestrator.js";
import { ResultStore } from "../core/result-store.js";
import { createRequestWorker } from "../core/scheduler.js";
import { writeSnapshot } from "../core/snapshot-writer.js";
import { defaultRunId } from "../core/utils.js";

import type { JobDefinition, JobName } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type RunJobOptions = {
  logsDir: string;
  runId?: string;
  reporter?: PassReporter;
  sleep?: (durationMs: number) => Promise<void>;
};

export type JobRunResult = {
  runId: string;
  logPath: string;
  summary: RunSummary;
};

export type JobStatus = {
  job: JobName;
  outputPath: string;
  items: number;
  completed: number;
  pending: number[];
  /** Pending items whose stored record carries at least one error. */
  failed: number[];
  skippedSnapshotLines: number;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function jobLogPath(logsDir: string, job: JobName, runId: string): string {
  return path.join(logsDir, `${job}-${runId}.jsonl`);
}

export async function runJob(job: JobDefinition, options: RunJobOptions): Promise<JobRunResult> {
  const runId = options.runId ?? defaultRunId();
  const logPath = jobLogPath(options.logsDir, job.name, runId);
  const logger = new JsonlLogger(logPath, { runId, job: job.name });

  logRunEvent(logger, "run.start", {
    input: job.inputPath,
    output: job.outputPath,
    concurrency: job.passes.concurrency,
    max_passes: job.passes.max_passes,
    backoff_seconds: job.passes.backoff_seconds,
  });

  const orchestrator = new PassOrchestrator(
    {
      loadItems: job.loadItems,
      loadStore: () => loadJobStore(job),
      createWorker: () => createRequestWorker(job.createCaller()),
      accept: job.accept,
      write: (items, store) =>
        writeSnapshot(job.outputPath, items, store, { keepStoredRecords: job.augmentsSnapshot }),
    },
    {
      settings: {
        concurrency: job.passes.concurrency,
        maxPasses: job.passes.max_passes,
        backoffMs: job.passes.backoff_seconds * 1000,
      },
      logger,
      reporter: options.reporter,
      sleep: options.sleep,
    },
  );

  try {
    const summary = await orchestrator.run();
    return { runId, logPath, summary };
  } catch (err) {
    logRunEvent(logger, "run.failed", {
      phase: orchestrator.phase ?? "loading",
      error: formatErrorMessage(err),
    });
    throw err;
  } finally {
    logger.close();
  }
}

/** Reports the pending set from the input and the current snapshot, without calling the remote. */
export async function inspectJob(job: JobDefinition): Promise<JobStatus> {
  const items = await job.loadItems();
  const store = await ResultStore.load(job.outputPath, job.layout);

  const pendingItems = items.filter((item) => !store.isComplete(item, job.accept));
  const failed = pendingItems
    .filter((item) => {
      const record = store.get(item.id);
      return record !== undefined && Object.values(record.results).some((result) => !result.ok);
    })
    .map((item) => item.id);

  return {
    job: job.name,
    outputPath: job.outputPath,
    items: items.length,
    completed: items.length - pendingItems.length,
    pending: pendingItems.map((item) => item.id),
    failed,
    skippedSnapshotLines: store.skippedLines,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function loadJobStore(job: JobDefinition): Promise<ResultStore> {
  const store = await ResultStore.load(job.outputPath, job.layout);
  if (job.augmentsSnapshot && store.size === 0) {
    throw createEmptySnapshotError(job.outputPath);
  }
  return store;
}
