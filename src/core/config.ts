import { z } from "zod";

// =============================================================================
// SECTIONS
// =============================================================================

const PassesSchema = (defaults: { concurrency: number }) =>
  z
    .object({
      concurrency: z.number().int().positive().default(defaults.concurrency),
      max_passes: z.number().int().min(1).default(3),
      backoff_seconds: z.number().min(0).default(2),
    })
    .strict()
    .default({});

const LlmSchema = (defaults: { model: string; temperature: number; max_tokens: number }) =>
  z
    .object({
      provider: z.enum(["openai", "anthropic"]).default("openai"),
      model: z.string().min(1).default(defaults.model),
      // OpenAI-compatible endpoint; ignored by the anthropic provider unless set.
      base_url: z.string().url().optional(),
      api_key_env: z.string().min(1).optional(),
      temperature: z.number().min(0).max(2).default(defaults.temperature),
      max_tokens: z.number().int().positive().default(defaults.max_tokens),
      timeout_ms: z.number().int().positive().default(120_000),
      max_retries: z.number().int().min(1).default(1),
    })
    .strict()
    .default({});

const DetectorSchema = z
  .object({
    api_url: z.string().url().default("https://text.api.pangram.com/v3"),
    api_key_env: z.string().min(1).default("PANGRAM_API_KEY"),
    timeout_ms: z.number().int().positive().default(60_000),
  })
  .strict()
  .default({});

const QualitySchema = z
  .object({
    input: z.string().min(1).default("unslopped_stories.jsonl"),
    output: z.string().min(1).default("unslopped_stories_quality.jsonl"),
    passes: PassesSchema({ concurrency: 32 }),
    llm: LlmSchema({ model: "anthropic/claude-opus-4.5", temperature: 0.2, max_tokens: 900 }),
  })
  .strict()
  .default({});

const DetectSchema = z
  .object({
    input: z.string().min(1).default("unslopped_stories.jsonl"),
    output: z.string().min(1).default("unslopped_stories_detection.jsonl"),
    passes: PassesSchema({ concurrency: 8 }),
    detector: DetectorSchema,
  })
  .strict()
  .default({});

const WordRangeSchema = z
  .tuple([z.number().int().positive(), z.number().int().positive()])
  .refine(([min, max]) => min <= max, { message: "word_range must be [min, max] with min <= max" });

const GenerateSchema = z
  .object({
    input: z.string().min(1).default("writing_prompts.txt"),
    output: z.string().min(1).default("short_stories.jsonl"),
    passes: PassesSchema({ concurrency: 100 }),
    llm: LlmSchema({ model: "mistralai/mistral-large-2512", temperature: 0.9, max_tokens: 1500 }),
    target_words: z.number().int().positive().default(800),
    word_range: WordRangeSchema.default([750, 850]),
  })
  .strict()
  .default({});

// Control sections add a control_* sub-result to records of an existing snapshot, so their
// `output` is that snapshot and is rewritten in place.
const QualityControlSchema = z
  .object({
    input: z.string().min(1).default("unslopped_stories_control.jsonl"),
    output: z.string().min(1).default("unslopped_stories_quality.jsonl"),
    passes: PassesSchema({ concurrency: 32 }),
    llm: LlmSchema({ model: "anthropic/claude-opus-4.5", temperature: 0.2, max_tokens: 900 }),
  })
  .strict()
  .default({});

const DetectControlSchema = z
  .object({
    input: z.string().min(1).default("unslopped_stories_control.jsonl"),
    output: z.string().min(1).default("unslopped_stories_detection.jsonl"),
    passes: PassesSchema({ concurrency: 8 }),
    detector: DetectorSchema,
  })
  .strict()
  .default({});

// =============================================================================
// CONFIG
// =============================================================================

export const EvalSweepConfigSchema = z
  .object({
    logs_dir: z.string().min(1).default(".evalsweep/logs"),
    quality: QualitySchema,
    detect: DetectSchema,
    generate: GenerateSchema,
    quality_control: QualityControlSchema,
    detect_control: DetectControlSchema,
  })
  .strict();

export type EvalSweepConfig = z.infer<typeof EvalSweepConfigSchema>;
export type PassesConfig = EvalSweepConfig["quality"]["passes"];
export type LlmConfig = EvalSweepConfig["quality"]["llm"];
export type DetectorConfig = EvalSweepConfig["detect"]["detector"];
export type QualityConfig = EvalSweepConfig["quality"];
export type DetectConfig = EvalSweepConfig["detect"];
export type GenerateConfig = EvalSweepConfig["generate"];
export type QualityControlConfig = EvalSweepConfig["quality_control"];
export type DetectControlConfig = EvalSweepConfig["detect_control"];
export type JobSectionKey = Exclude<keyof EvalSweepConfig, "logs_dir">;

export const DEFAULT_OPENAI_BASE_URL = "https://openrouter.ai/api/v1";

export function defaultConfig(): EvalSweepConfig {
  return EvalSweepConfigSchema.parse({});
}
