import type { PipelineConfig } from "../config-loader/schema.js";

export const DEFAULT_CONFIG: PipelineConfig = {
  workers: {
    count: 4,
    pollTimeoutMs: 1000,
    shutdownTimeoutMs: 5000,
  },
  github: {
    perPage: 100,
    requestDelayMs: 100,
    fallbackWaitMs: 60_000,
    maxPullRequests: 1000,
  },
  extraction: {
    llmEnabled: true,
    model: "claude-sonnet-4-20250514",
    maxTokens: 1000,
    temperature: 0.1,
    maxAttempts: 3,
  },
  retention: {
    days: 30,
  },
};
