import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { SourceError } from "./errors.js";
import { JsonlLogger } from "./logger.js";
import {
  PassOrchestrator,
  type PassCollaborators,
  type PassSettings,
} from "./pass-orchestrator.js";
import type { BatchItem, RecordLayout } from "./record.js";
import { ResultStore } from "./result-store.js";
import { createRequestWorker, type RemoteCaller } from "./scheduler.js";
import { writeSnapshot } from "./snapshot-writer.js";

// =============================================================================
// HELPERS
// =============================================================================

const LAYOUT: RecordLayout = {
  contextKeys: [],
  inputKeys: ["text"],
  resultKeys: ["text_eval"],
};

const SETTINGS: PassSettings = { concurrency: 4, maxPasses: 2, backoffMs: 0 };

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pass-orchestrator-"));
  tempDirs.push(dir);
  return dir;
}

function textItem(id: number, text: string): BatchItem {
  return { id, inputs: { text }, context: {}, requests: { text_eval: text } };
}

type ScriptedCaller = {
  call: RemoteCaller;
  calls: Array<{ id: number; attempt: number }>;
};

/** Fails each listed id on its first N attempts, succeeds afterwards. */
function scriptedCaller(failures: Record<number, number> = {}): ScriptedCaller {
  const attempts = new Map<number, number>();
  const calls: Array<{ id: number; attempt: number }> = [];

  const call: RemoteCaller = async (text, _key, item) => {
    const attempt = (attempts.get(item.id) ?? 0) + 1;
    attempts.set(item.id, attempt);
    calls.push({ id: item.id, attempt });

    if (attempt <= (failures[item.id] ?? 0)) {
      throw new Error(`HTTP 503 for ${text}`);
    }
    return { value: { score: text.length, attempt }, usage: { inputTokens: 2, outputTokens: 1 } };
  };

  return { call, calls };
}

function collaborators(
  snapshotPath: string,
  items: BatchItem[],
  caller: RemoteCaller,
): PassCollaborators {
  return {
    loadItems: async () => items,
    loadStore: () => ResultStore.load(snapshotPath, LAYOUT),
    createWorker: () => createRequestWorker(caller),
    write: (all, store) => writeSnapshot(snapshotPath, all, store),
  };
}

function readLines(filePath: string): string[] {
  return fs.readFileSync(filePath, "utf8").trimEnd().split("\n");
}

const ABC = [textItem(1, "a"), textItem(2, "b"), textItem(3, "c")];

// =============================================================================
// TESTS
// =============================================================================

describe("PassOrchestrator", () => {
  it("retries a failed item on the next pass and writes records in id order", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    const caller = scriptedCaller({ 2: 1 });

    const summary = await new PassOrchestrator(collaborators(snapshotPath, ABC, caller.call), {
      settings: SETTINGS,
    }).run();

    expect(summary).toEqual({
      status: "complete",
      passes: 2,
      items: 3,
      completed: 3,
      stragglers: [],
      calls: 4,
      failures: 1,
      usage: { inputTokens: 6, outputTokens: 3 },
      skippedSnapshotLines: 0,
    });
    expect(caller.calls.filter((entry) => entry.id === 2)).toEqual([
      { id: 2, attempt: 1 },
      { id: 2, attempt: 2 },
    ]);
    expect(readLines(snapshotPath)).toEqual([
      '{"id":1,"text":"a","text_eval":{"score":1,"attempt":1}}',
      '{"id":2,"text":"b","text_eval":{"score":1,"attempt":2}}',
      '{"id":3,"text":"c","text_eval":{"score":1,"attempt":1}}',
    ]);
  });

  it("is a no-op on a complete snapshot and leaves the file byte-identical", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    await new PassOrchestrator(collaborators(snapshotPath, ABC, scriptedCaller().call), {
      settings: SETTINGS,
    }).run();
    const before = fs.readFileSync(snapshotPath);
    const beforeMtime = fs.statSync(snapshotPath).mtimeMs;

    const caller = scriptedCaller();
    const summary = await new PassOrchestrator(collaborators(snapshotPath, ABC, caller.call), {
      settings: SETTINGS,
    }).run();

    expect(summary.status).toBe("noop");
    expect(summary.passes).toBe(0);
    expect(caller.calls).toEqual([]);
    expect(fs.readFileSync(snapshotPath).equals(before)).toBe(true);
    expect(fs.statSync(snapshotPath).mtimeMs).toBe(beforeMtime);
  });

  it("resumes from a partial snapshot and only calls the missing items", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    fs.writeFileSync(
      snapshotPath,
      [
        '{"id":1,"text":"a","text_eval":{"score":9}}',
        '{"id":2,"text":"b","text_eval":{"error":"timeout"}}',
        '{"id":3,"text":"c"}',
      ].join("\n"),
      "utf8",
    );
    const caller = scriptedCaller();

    const summary = await new PassOrchestrator(collaborators(snapshotPath, ABC, caller.call), {
      settings: SETTINGS,
    }).run();

    expect(caller.calls.map((entry) => entry.id).sort()).toEqual([2, 3]);
    expect(summary.passes).toBe(1);
    expect(readLines(snapshotPath)[0]).toBe('{"id":1,"text":"a","text_eval":{"score":9}}');
  });

  it("re-evaluates a record whose input text changed", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    fs.writeFileSync(snapshotPath, '{"id":1,"text":"old","text_eval":{"score":3}}\n', "utf8");
    const caller = scriptedCaller();

    await new PassOrchestrator(
      collaborators(snapshotPath, [textItem(1, "new!")], caller.call),
      { settings: SETTINGS },
    ).run();

    expect(caller.calls).toEqual([{ id: 1, attempt: 1 }]);
    expect(readLines(snapshotPath)).toEqual([
      '{"id":1,"text":"new!","text_eval":{"score":4,"attempt":1}}',
    ]);
  });

  it("stops at the pass budget and keeps the last error for stragglers", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    const caller = scriptedCaller({ 3: 5 });
    const sleeps: number[] = [];

    const summary = await new PassOrchestrator(collaborators(snapshotPath, ABC, caller.call), {
      settings: { concurrency: 2, maxPasses: 3, backoffMs: 250 },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    }).run();

    expect(summary.status).toBe("exhausted");
    expect(summary.passes).toBe(3);
    expect(summary.stragglers).toEqual([3]);
    expect(summary.completed).toBe(2);
    expect(sleeps).toEqual([250, 250]);
    expect(readLines(snapshotPath)[2]).toBe(
      '{"id":3,"text":"c","text_eval":{"error":"HTTP 503 for c"}}',
    );
  });

  it("fails before any call when the worker cannot be created", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    const caller = scriptedCaller();
    const orchestrator = new PassOrchestrator(
      {
        ...collaborators(snapshotPath, ABC, caller.call),
        createWorker: () => {
          throw new Error("OPENAI_API_KEY is not set");
        },
      },
      { settings: SETTINGS },
    );

    await expect(orchestrator.run()).rejects.toThrow("OPENAI_API_KEY is not set");
    expect(caller.calls).toEqual([]);
    expect(fs.existsSync(snapshotPath)).toBe(false);
  });

  it("rejects an empty item list with a SourceError", async () => {
    const snapshotPath = path.join(makeTempDir(), "out.jsonl");
    const orchestrator = new PassOrchestrator(
      collaborators(snapshotPath, [], scriptedCaller().call),
      { settings: SETTINGS },
    );

    await expect(orchestrator.run()).rejects.toBeInstanceOf(SourceError);
  });

  it("rejects a zero pass budget", () => {
    expect(
      () =>
        new PassOrchestrator(collaborators("unused.jsonl", ABC, scriptedCaller().call), {
          settings: { concurrency: 1, maxPasses: 0, backoffMs: 0 },
        }),
    ).toThrow("maxPasses must be a positive integer (received 0)");
  });

  it("logs phase transitions and item outcomes", async () => {
    const dir = makeTempDir();
    const snapshotPath = path.join(dir, "out.jsonl");
    const logPath = path.join(dir, "run.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", job: "detect" });

    const orchestrator = new PassOrchestrator(
      collaborators(snapshotPath, ABC, scriptedCaller({ 2: 1 }).call),
      { settings: SETTINGS, logger },
    );
    await orchestrator.run();
    logger.close();

    const events = readLines(logPath).map((line) => JSON.parse(line) as Record<string, unknown>);
    const phases = events
      .filter((event) => event.type === "phase.enter")
      .map((event) => event.phase);

    expect(orchestrator.phase).toBe("done");
    expect(phases).toEqual([
      "loading",
      "pass_running",
      "merging",
      "writing",
      "pass_running",
      "merging",
      "writing",
      "done",
    ]);
    expect(events.filter((event) => event.type === "item.failed")).toHaveLength(1);
    expect(events.filter((event) => event.type === "snapshot.write")).toHaveLength(3);
    expect(events.at(-1)?.type).toBe("run.complete");
  });
});
