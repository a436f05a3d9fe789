import { z } from "zod";

const pipelineConfigSchema = z.object({
  workers: z
    .object({
      count: z.number().int().min(1).max(64).default(4),
      pollTimeoutMs: z.number().int().positive().default(1000),
      shutdownTimeoutMs: z.number().int().positive().default(5000),
    })
    .default({}),
  github: z
    .object({
      // GitHub caps per_page at 100
      perPage: z.number().int().min(1).max(100).default(100),
      requestDelayMs: z.number().int().min(0).default(100),
      fallbackWaitMs: z.number().int().min(0).default(60_000),
      maxPullRequests: z.number().int().positive().default(1000),
    })
    .default({}),
  extraction: z
    .object({
      llmEnabled: z.boolean().default(true),
      model: z.string().min(1).default("claude-sonnet-4-20250514"),
      maxTokens: z.number().int().positive().default(1000),
      temperature: z.number().min(0).max(1).default(0.1),
      maxAttempts: z.number().int().min(1).max(10).default(3),
    })
    .default({}),
  retention: z
    .object({
      days: z.number().int().positive().default(30),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  return pipelineConfigSchema.parse(raw ?? {});
}
