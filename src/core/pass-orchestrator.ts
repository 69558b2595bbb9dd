/**
 * PassOrchestrator drives the resumable multi-pass loop shared by every job.
 * Purpose: compute the pending set, fan it out, fold results, snapshot, repeat.
 * Assumptions: the orchestrator is the only writer of the store and the snapshot file;
 * workers only return values.
 * Usage: const summary = await new PassOrchestrator(collaborators, options).run().
 */

import { SourceError } from "./errors.js";
import { logRunEvent, type JsonlLogger, type JsonObject } from "./logger.js";
import type { BatchItem } from "./record.js";
import { acceptAnySuccess, type CompletionPredicate, type ResultStore } from "./result-store.js";
import {
  addUsage,
  emptyUsage,
  runPass,
  type ItemUpdate,
  type ItemWorker,
  type PassResult,
  type RemoteUsage,
} from "./scheduler.js";
import { SlotPool } from "./slot-pool.js";
import type { SnapshotWriteResult } from "./snapshot-writer.js";
import { sleep as defaultSleep } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PassPhase = "loading" | "pass_running" | "merging" | "writing" | "done";

export type PassSettings = {
  concurrency: number;
  /** Hard upper bound on passes; there is no unbounded retry mode. */
  maxPasses: number;
  backoffMs: number;
};

export type PassCollaborators = {
  loadItems: () => Promise<BatchItem[]>;
  loadStore: () => Promise<ResultStore>;
  /** Called while loading; throwing here (e.g. a missing credential) aborts before any work. */
  createWorker: () => ItemWorker;
  accept?: CompletionPredicate;
  merge?: (store: ResultStore, update: ItemUpdate, accept: CompletionPredicate) => void;
  write: (items: readonly BatchItem[], store: ResultStore) => Promise<SnapshotWriteResult>;
};

export type PassReporter = {
  passStarted?: (pass: number, pending: number, total: number) => void;
  itemSettled?: (update: ItemUpdate, pass: number) => void;
  passFinished?: (pass: number, result: PassResult) => void;
};

export type PassOrchestratorOptions = {
  settings: PassSettings;
  logger?: JsonlLogger;
  reporter?: PassReporter;
  sleep?: (durationMs: number) => Promise<void>;
};

export type RunStatus = "noop" | "complete" | "exhausted";

export type RunSummary = {
  status: RunStatus;
  passes: number;
  items: number;
  completed: number;
  stragglers: number[];
  calls: number;
  failures: number;
  usage: RemoteUsage;
  skippedSnapshotLines: number;
};

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class PassOrchestrator {
  private currentPhase: PassPhase | null = null;

  constructor(
    private readonly collaborators: PassCollaborators,
    private readonly options: PassOrchestratorOptions,
  ) {
    assertSettings(options.settings);
  }

  get phase(): PassPhase | null {
    return this.currentPhase;
  }

  async run(): Promise<RunSummary> {
    const { settings, logger, reporter } = this.options;
    const accept = this.collaborators.accept ?? acceptAnySuccess;
    const merge = this.collaborators.merge ?? mergeUpdate;
    const sleep = this.options.sleep ?? defaultSleep;

    this.enter("loading");
    const worker = this.collaborators.createWorker();
    const items = await this.collaborators.loadItems();
    if (items.length === 0) {
      throw new SourceError("Item source produced no items.");
    }

    const store = await this.collaborators.loadStore();
    if (store.skippedLines > 0) {
      logRunEvent(logger, "snapshot.skipped_lines", { count: store.skippedLines });
    }
    logRunEvent(logger, "run.loaded", { items: items.length, records: store.size });

    const slots = new SlotPool(settings.concurrency);
    let passes = 0;
    let calls = 0;
    let failures = 0;
    let usage = emptyUsage();
    let pending: BatchItem[] = [];

    while (true) {
      this.enter("pass_running", { pass: passes + 1 });
      pending = items.filter((item) => !store.isComplete(item, accept));
      if (pending.length === 0) break;

      passes += 1;
      reporter?.passStarted?.(passes, pending.length, items.length);
      logRunEvent(logger, "pass.start", { pass: passes, pending: pending.length });

      const pass = passes;
      const result = await runPass(pending, worker, {
        slots,
        pendingKeys: (item) => store.pendingKeys(item, accept),
        onItemSettled: (update) => {
          logItemSettled(logger, update, pass);
          reporter?.itemSettled?.(update, pass);
        },
      });

      this.enter("merging", { pass });
      for (const update of result.updates) {
        merge(store, update, accept);
      }
      calls += result.calls;
      failures += result.failures;
      usage = addUsage(usage, result.usage);
      reporter?.passFinished?.(pass, result);

      this.enter("writing", { pass });
      await this.writeSnapshot(items, store, false);

      pending = items.filter((item) => !store.isComplete(item, accept));
      if (pending.length === 0) break;

      if (passes >= settings.maxPasses) {
        logRunEvent(logger, "run.pass_budget_exhausted", {
          passes,
          stragglers: pending.map((item) => item.id),
        });
        break;
      }

      if (settings.backoffMs > 0) {
        await sleep(settings.backoffMs);
      }
    }

    this.enter("done");
    if (passes > 0) {
      await this.writeSnapshot(items, store, true);
    }

    const summary: RunSummary = {
      status: passes === 0 ? "noop" : pending.length === 0 ? "complete" : "exhausted",
      passes,
      items: items.length,
      completed: items.length - pending.length,
      stragglers: pending.map((item) => item.id),
      calls,
      failures,
      usage,
      skippedSnapshotLines: store.skippedLines,
    };

    logRunEvent(logger, "run.complete", {
      status: summary.status,
      passes: summary.passes,
      completed: summary.completed,
      stragglers: summary.stragglers,
      calls: summary.calls,
      failures: summary.failures,
      input_tokens: usage.inputTokens,
      output_tokens: usage.outputTokens,
    });

    return summary;
  }

  private enter(phase: PassPhase, fields: { pass?: number } = {}): void {
    this.currentPhase = phase;
    const payload: JsonObject = fields.pass === undefined ? {} : { pass: fields.pass };
    logRunEvent(this.options.logger, "phase.enter", { phase, ...payload });
  }

  private async writeSnapshot(
    items: readonly BatchItem[],
    store: ResultStore,
    final: boolean,
  ): Promise<void> {
    const written = await this.collaborators.write(items, store);
    logRunEvent(this.options.logger, "snapshot.write", {
      path: written.path,
      lines: written.lines,
      bytes: written.bytes,
      final,
    });
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function mergeUpdate(
  store: ResultStore,
  update: ItemUpdate,
  accept: CompletionPredicate = acceptAnySuccess,
): void {
  store.merge(update.item.id, update.item.inputs, update.results, update.item.context, accept);
}

function logItemSettled(logger: JsonlLogger | undefined, update: ItemUpdate, pass: number): void {
  if (update.failedKeys.length === 0) {
    logRunEvent(logger, "item.complete", {
      itemId: update.item.id,
      pass,
      keys: Object.keys(update.results),
    });
    return;
  }

  const errors: Record<string, string> = {};
  for (const key of update.failedKeys) {
    const result = update.results[key];
    if (result && !result.ok) errors[key] = result.error;
  }
  logRunEvent(logger, "item.failed", { itemId: update.item.id, pass, errors });
}

function assertSettings(settings: PassSettings): void {
  if (!Number.isInteger(settings.maxPasses) || settings.maxPasses < 1) {
    throw new Error(`maxPasses must be a positive integer (received ${settings.maxPasses})`);
  }
  if (!Number.isFinite(settings.backoffMs) || settings.backoffMs < 0) {
    throw new Error(`backoffMs must be zero or more (received ${settings.backoffMs})`);
  }
}
