import fse from "fs-extra";

import { parseJsonlObjects } from "./jsonl.js";
import type { JsonObject } from "./logger.js";
import {
  emptyRecord,
  inputsEqual,
  parseRecord,
  serializeRecord,
  type BatchItem,
  type EvalRecord,
  type InputFields,
  type RecordLayout,
  type SubResult,
} from "./record.js";

// =============================================================================
// TYPES
// =============================================================================

/** Job-specific test on a success payload, e.g. "all three scores were extracted". */
export type CompletionPredicate = (value: JsonObject, key: string) => boolean;

export const acceptAnySuccess: CompletionPredicate = () => true;

// =============================================================================
// STORE
// =============================================================================

export class ResultStore {
  private readonly records = new Map<number, EvalRecord>();

  constructor(
    readonly layout: RecordLayout,
    /** Snapshot lines dropped on load because they did not parse as records. */
    readonly skippedLines = 0,
  ) {}

  static async load(snapshotPath: string, layout: RecordLayout): Promise<ResultStore> {
    const raw = await fse.readFile(snapshotPath, "utf8").catch((error: unknown) => {
      if (isMissingFile(error)) return null;
      throw error;
    });

    if (raw === null) {
      return new ResultStore(layout);
    }

    const { rows, skipped } = parseJsonlObjects(raw);
    let skippedLines = skipped;
    const records: EvalRecord[] = [];

    for (const row of rows) {
      const record = parseRecord(row.value, layout);
      if (record) {
        records.push(record);
      } else {
        skippedLines += 1;
      }
    }

    const store = new ResultStore(layout, skippedLines);
    for (const record of records) {
      store.records.set(record.id, record);
    }
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  get(id: number): EvalRecord | undefined {
    return this.records.get(id);
  }

  ids(): number[] {
    return [...this.records.keys()];
  }

  /**
   * Folds new sub-results into the record for `id`. Changed inputs discard the
   * previous sub-results; otherwise new values win. The one exception is an error
   * arriving for a key whose stored success `accept` already takes.
   * Extras always survive.
   */
  merge(
    id: number,
    inputs: InputFields,
    results: Record<string, SubResult>,
    context: JsonObject = {},
    accept: CompletionPredicate = acceptAnySuccess,
  ): EvalRecord {
    const existing = this.records.get(id);
    const carried = existing && inputsEqual(existing.inputs, inputs) ? existing : undefined;

    const merged: Record<string, SubResult> = { ...(carried?.results ?? {}) };
    for (const [key, next] of Object.entries(results)) {
      const previous = merged[key];
      if (!next.ok && previous?.ok && accept(previous.value, key)) continue;
      merged[key] = next;
    }

    const record: EvalRecord = {
      id,
      inputs: { ...inputs },
      context: { ...(carried?.context ?? {}), ...context },
      results: merged,
      extras: { ...(existing?.extras ?? {}) },
      storedKeys: existing?.storedKeys ?? [],
    };

    this.records.set(id, record);
    return record;
  }

  /** Request keys of `item` that still lack an accepted success. */
  pendingKeys(item: BatchItem, accept: CompletionPredicate = acceptAnySuccess): string[] {
    const keys = Object.keys(item.requests);
    const record = this.records.get(item.id);
    if (!record || !inputsEqual(record.inputs, item.inputs)) {
      return keys;
    }

    return keys.filter((key) => {
      const result = record.results[key];
      return !result || !result.ok || !accept(result.value, key);
    });
  }

  isComplete(item: BatchItem, accept: CompletionPredicate = acceptAnySuccess): boolean {
    return this.records.has(item.id) && this.pendingKeys(item, accept).length === 0;
  }

  serialize(item: BatchItem): JsonObject {
    const record = this.records.get(item.id) ?? emptyRecord(item.id, item.inputs, item.context);

    return serializeRecord(record, this.layout);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function isMissingFile(error: unknown): boolean {
  return error !== null && typeof error === "object" && "code" in error && error.code === "ENOENT";
}
