import { formatErrorMessage } from "./error-format.js";
import type { JsonObject } from "./logger.js";
import { errorResult, okResult, type BatchItem, type SubResult } from "./record.js";
import type { SlotPool } from "./slot-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type RemoteUsage = {
  inputTokens: number;
  outputTokens: number;
};

export type RemoteOutcome = {
  value: JsonObject;
  usage?: RemoteUsage;
};

/** One network call for one sub-result key of an item. */
export type RemoteCaller = (text: string, key: string, item: BatchItem) => Promise<RemoteOutcome>;

export type ItemWorkerContext = {
  keys: string[];
  slots: SlotPool;
};

export type ItemWorkResult = {
  results: Record<string, SubResult>;
  calls: number;
  usage: RemoteUsage;
};

export type ItemWorker = (item: BatchItem, ctx: ItemWorkerContext) => Promise<ItemWorkResult>;

export type ItemUpdate = {
  item: BatchItem;
  results: Record<string, SubResult>;
  failedKeys: string[];
};

export type PassResult = {
  updates: ItemUpdate[];
  calls: number;
  failures: number;
  usage: RemoteUsage;
};

export type RunPassOptions = {
  slots: SlotPool;
  pendingKeys: (item: BatchItem) => string[];
  onItemSettled?: (update: ItemUpdate) => void;
};

// =============================================================================
// WORKERS
// =============================================================================

export function emptyUsage(): RemoteUsage {
  return { inputTokens: 0, outputTokens: 0 };
}

export function addUsage(left: RemoteUsage, right: RemoteUsage | undefined): RemoteUsage {
  if (!right) return left;
  return {
    inputTokens: left.inputTokens + right.inputTokens,
    outputTokens: left.outputTokens + right.outputTokens,
  };
}

/**
 * Issues one slot-bounded call per pending key, concurrently. Each call settles into
 * its own sub-result, so one failed key never hides a sibling's success.
 */
export function createRequestWorker(caller: RemoteCaller): ItemWorker {
  return async (item, { keys, slots }) => {
    const settled = await Promise.all(
      keys.map(async (key) => {
        try {
          const outcome = await slots.run(() => caller(item.requests[key], key, item));
          return { key, result: okResult(outcome.value), usage: outcome.usage };
        } catch (err) {
          return { key, result: errorResult(formatErrorMessage(err)), usage: undefined };
        }
      }),
    );

    const results: Record<string, SubResult> = {};
    let usage = emptyUsage();
    for (const entry of settled) {
      results[entry.key] = entry.result;
      usage = addUsage(usage, entry.usage);
    }

    return { results, calls: keys.length, usage };
  };
}

// =============================================================================
// PASS
// =============================================================================

/**
 * Runs one task per item and joins them all. Never rejects: a worker that throws
 * turns into error sub-results for that item's pending keys.
 */
export async function runPass(
  items: readonly BatchItem[],
  worker: ItemWorker,
  options: RunPassOptions,
): Promise<PassResult> {
  const settled = await Promise.all(
    items.map(async (item) => {
      const keys = options.pendingKeys(item);
      const work = await runItem(item, keys, worker, options.slots);
      const update: ItemUpdate = {
        item,
        results: work.results,
        failedKeys: Object.entries(work.results)
          .filter(([, result]) => !result.ok)
          .map(([key]) => key),
      };

      reportSettled(options.onItemSettled, update);
      return { update, calls: work.calls, usage: work.usage };
    }),
  );

  const result: PassResult = { updates: [], calls: 0, failures: 0, usage: emptyUsage() };
  for (const entry of settled) {
    result.updates.push(entry.update);
    result.calls += entry.calls;
    result.failures += entry.update.failedKeys.length;
    result.usage = addUsage(result.usage, entry.usage);
  }
  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Reporter failures are warned about, never rethrown.
function reportSettled(
  onItemSettled: RunPassOptions["onItemSettled"],
  update: ItemUpdate,
): void {
  if (!onItemSettled) return;
  try {
    onItemSettled(update);
  } catch (err) {
    console.warn(`Item ${update.item.id} reporter failed: ${formatErrorMessage(err)}`);
  }
}

async function runItem(
  item: BatchItem,
  keys: string[],
  worker: ItemWorker,
  slots: SlotPool,
): Promise<ItemWorkResult> {
  try {
    return await worker(item, { keys, slots });
  } catch (err) {
    const message = formatErrorMessage(err);
    const results: Record<string, SubResult> = {};
    for (const key of keys) {
      results[key] = errorResult(message);
    }
    return { results, calls: 0, usage: emptyUsage() };
  }
}
