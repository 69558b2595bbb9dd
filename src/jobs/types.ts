import type { PassesConfig } from "../core/config.js";
import type { JsonObject } from "../core/logger.js";
import type { BatchItem, RecordLayout } from "../core/record.js";
import type { CompletionPredicate } from "../core/result-store.js";
import type { RemoteCaller } from "../core/scheduler.js";

export type JobName = "quality" | "detect" | "generate" | "quality-control" | "detect-control";

/** Everything the pass loop needs to know about one concrete batch. */
export type JobDefinition = {
  name: JobName;
  inputPath: string;
  outputPath: string;
  passes: PassesConfig;
  layout: RecordLayout;
  accept: CompletionPredicate;
  /**
   * Set by jobs that add sub-results to records another job wrote: the snapshot must
   * already hold records, and records no item names are written back too.
   */
  augmentsSnapshot?: boolean;
  loadItems: () => Promise<BatchItem[]>;
  /** Builds the remote client; throws when its credential is missing. */
  createCaller: () => RemoteCaller;
};

export function pickJsonContext(row: Record<string, unknown>, keys: readonly string[]): JsonObject {
  const context: JsonObject = {};
  for (const key of keys) {
    const value = row[key];
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      context[key] = value;
    } else if (value === null) {
      context[key] = null;
    }
  }
  return context;
}
