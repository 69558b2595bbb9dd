import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { toJsonl } from "./jsonl.js";
import type { JsonObject } from "./logger.js";
import { serializeRecord, type BatchItem } from "./record.js";
import type { ResultStore } from "./result-store.js";

// =============================================================================
// TYPES
// =============================================================================

export type SnapshotWriteResult = {
  path: string;
  lines: number;
  bytes: number;
};

export type SnapshotOptions = {
  /** Also write stored records that no item names; lines are then ordered by id. */
  keepStoredRecords?: boolean;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/** One line per item, in item order; store iteration order never leaks into output. */
export function snapshotLines(
  items: readonly BatchItem[],
  store: ResultStore,
  options: SnapshotOptions = {},
): JsonObject[] {
  const rows = items.map((item) => ({ id: item.id, line: store.serialize(item) }));
  if (!options.keepStoredRecords) return rows.map((row) => row.line);

  const listed = new Set(items.map((item) => item.id));
  for (const id of store.ids()) {
    const record = store.get(id);
    if (record && !listed.has(id)) {
      rows.push({ id, line: serializeRecord(record, store.layout) });
    }
  }
  return rows.sort((left, right) => left.id - right.id).map((row) => row.line);
}

export async function writeSnapshot(
  snapshotPath: string,
  items: readonly BatchItem[],
  store: ResultStore,
  options: SnapshotOptions = {},
): Promise<SnapshotWriteResult> {
  const lines = snapshotLines(items, store, options);
  const content = toJsonl(lines);
  await writeFileAtomic(snapshotPath, content);

  return {
    path: snapshotPath,
    lines: lines.length,
    bytes: Buffer.byteLength(content, "utf8"),
  };
}

// =============================================================================
// FILE IO
// =============================================================================

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(filePath));

  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
