import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { SourceError } from "../core/errors.js";
import type { BatchItem } from "../core/record.js";

import { inspectJob, jobLogPath, runJob } from "./run-job.js";
import type { JobDefinition } from "./types.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "run-job-"));
  tempDirs.push(dir);
  return dir;
}

function item(id: number, text: string): BatchItem {
  return { id, inputs: { text }, context: {}, requests: { text_eval: text } };
}

function fakeJob(dir: string, overrides: Partial<JobDefinition> = {}): JobDefinition {
  return {
    name: "quality",
    inputPath: path.join(dir, "in.jsonl"),
    outputPath: path.join(dir, "out.jsonl"),
    passes: { concurrency: 2, max_passes: 1, backoff_seconds: 0 },
    layout: { contextKeys: [], inputKeys: ["text"], resultKeys: ["text_eval"] },
    accept: () => true,
    loadItems: async () => [item(1, "a"), item(2, "b")],
    createCaller: () => async (text) => ({
      value: { echo: text },
      usage: { inputTokens: 1, outputTokens: 2 },
    }),
    ...overrides,
  };
}

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trimEnd()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("jobLogPath", () => {
  it("names the log after the job and run id", () => {
    expect(jobLogPath("/logs", "detect", "20260101-000000")).toBe(
      path.join("/logs", "detect-20260101-000000.jsonl"),
    );
  });
});

describe("runJob", () => {
  it("logs the run start and completion into the run log", async () => {
    const dir = makeTempDir();
    const job = fakeJob(dir);

    const result = await runJob(job, { logsDir: path.join(dir, "logs"), runId: "r1" });

    expect(result.logPath).toBe(path.join(dir, "logs", "quality-r1.jsonl"));
    expect(result.summary.status).toBe("complete");
    expect(result.summary.usage).toEqual({ inputTokens: 2, outputTokens: 4 });

    const events = readEvents(result.logPath);
    expect(events[0]).toMatchObject({
      type: "run.start",
      run_id: "r1",
      job: "quality",
      concurrency: 2,
      max_passes: 1,
    });
    expect(events.at(-1)).toMatchObject({ type: "run.complete", status: "complete", passes: 1 });
    expect(fs.readFileSync(job.outputPath, "utf8")).toBe(
      '{"id":1,"text":"a","text_eval":{"echo":"a"}}\n{"id":2,"text":"b","text_eval":{"echo":"b"}}\n',
    );
  });

  it("logs run.failed with the phase it stopped in and rethrows", async () => {
    const dir = makeTempDir();
    const job = fakeJob(dir, {
      loadItems: async () => {
        throw new SourceError("input unreadable");
      },
    });

    await expect(
      runJob(job, { logsDir: path.join(dir, "logs"), runId: "r2" }),
    ).rejects.toBeInstanceOf(SourceError);

    const events = readEvents(path.join(dir, "logs", "quality-r2.jsonl"));
    expect(events.at(-1)).toMatchObject({
      type: "run.failed",
      phase: "loading",
      error: "input unreadable",
    });
    expect(fs.existsSync(job.outputPath)).toBe(false);
  });
});

describe("inspectJob", () => {
  it("reports an untouched job as fully pending", async () => {
    const dir = makeTempDir();

    const status = await inspectJob(fakeJob(dir));

    expect(status).toEqual({
      job: "quality",
      outputPath: path.join(dir, "out.jsonl"),
      items: 2,
      completed: 0,
      pending: [1, 2],
      failed: [],
      skippedSnapshotLines: 0,
    });
  });

  it("separates failed items from never-attempted ones", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(
      path.join(dir, "out.jsonl"),
      '{"id":1,"text":"a","text_eval":{"echo":"a"}}\n' +
        '{"id":2,"text":"b","text_eval":{"error":"HTTP 502"}}\n' +
        "not json\n",
      "utf8",
    );

    const status = await inspectJob(fakeJob(dir));

    expect(status.completed).toBe(1);
    expect(status.pending).toEqual([2]);
    expect(status.failed).toEqual([2]);
    expect(status.skippedSnapshotLines).toBe(1);
  });
});
