import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { defaultConfig, type GenerateConfig } from "../core/config.js";
import { MockLlmClient } from "../llm/mock.js";

import {
  createGenerateJob,
  createStoryCaller,
  hasStoryText,
  stripPromptNumbering,
} from "./generate.js";
import { inspectJob, runJob } from "./run-job.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function generateConfig(prompts: string): GenerateConfig {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "generate-job-"));
  tempDirs.push(dir);
  const inputPath = path.join(dir, "prompts.txt");
  fs.writeFileSync(inputPath, prompts, "utf8");

  return {
    ...defaultConfig().generate,
    input: inputPath,
    output: path.join(dir, "stories.jsonl"),
    passes: { concurrency: 3, max_passes: 1, backoff_seconds: 0 },
  };
}

describe("stripPromptNumbering", () => {
  it("removes leading list numbers", () => {
    expect(stripPromptNumbering("12. A map with no roads")).toBe("A map with no roads");
    expect(stripPromptNumbering("3) The last bus")).toBe("The last bus");
    expect(stripPromptNumbering("1984 was a year")).toBe("1984 was a year");
  });
});

describe("createStoryCaller", () => {
  it("asks for the configured length and reports word count and finish reason", async () => {
    const client = new MockLlmClient("The bus did not come. She walked.");
    const config: GenerateConfig = {
      ...defaultConfig().generate,
      target_words: 500,
      word_range: [450, 550],
    };
    const caller = createStoryCaller(client, config);

    const outcome = await caller("The last bus", "story", {
      id: 1,
      inputs: {},
      context: {},
      requests: {},
    });

    expect(client.prompts[0]).toBe(
      "Prompt: The last bus\n\nWrite a short story of about 500 words (aim for 450-550 words).",
    );
    expect(outcome.value).toEqual({
      text: "The bus did not come. She walked.",
      word_count: 7,
      finish_reason: "mock",
    });
  });
});

describe("generate job", () => {
  it("numbers prompts by ordinal and writes one story record per prompt", async () => {
    const config = generateConfig("1. First prompt\n\n2) Second prompt\n");
    const job = createGenerateJob(config, { createClient: () => new MockLlmClient("Once.") });

    const { summary } = await runJob(job, {
      logsDir: path.join(path.dirname(config.output), "logs"),
    });

    expect(summary.status).toBe("complete");
    expect(fs.readFileSync(config.output, "utf8")).toBe(
      '{"id":1,"prompt_id":1,"prompt":"First prompt",' +
        '"story":{"text":"Once.","word_count":1,"finish_reason":"mock"}}\n' +
        '{"id":3,"prompt_id":2,"prompt":"Second prompt",' +
        '"story":{"text":"Once.","word_count":1,"finish_reason":"mock"}}\n',
    );
  });

  it("reports pending prompts without calling the model", async () => {
    const config = generateConfig("First prompt\nSecond prompt\n");
    fs.writeFileSync(
      config.output,
      '{"id":1,"prompt_id":1,"prompt":"First prompt","story":{"text":"Done."}}\n' +
        '{"id":2,"prompt_id":2,"prompt":"Second prompt","story":{"error":"HTTP 500"}}\n',
      "utf8",
    );
    const job = createGenerateJob(config, {
      createClient: () => {
        throw new Error("status must not build a client");
      },
    });

    const status = await inspectJob(job);

    expect(status).toEqual({
      job: "generate",
      outputPath: config.output,
      items: 2,
      completed: 1,
      pending: [2],
      failed: [2],
      skippedSnapshotLines: 0,
    });
  });
});

describe("hasStoryText", () => {
  it("rejects blank stories", () => {
    expect(hasStoryText({ text: "  " })).toBe(false);
    expect(hasStoryText({ text: "Once." })).toBe(true);
  });
});
