import { serve } from "@hono/node-server";
import { createApp } from "./api/routes.js";
import { CollectionOrchestrator } from "./collection/orchestrator.js";
import { loadPipelineConfig } from "./config-loader/loader.js";
import type { PipelineConfig } from "./config-loader/schema.js";
import { loadEnv, type Env } from "./config/env.js";
import { RuleExtractionEngine } from "./extraction/engine.js";
import { LlmRuleExtractor } from "./extraction/llm-extractor.js";
import { RateLimitedApiClient } from "./github/client.js";
import { createAnthropicCompletionClient } from "./llm/client.js";
import { TaskQueueProcessor } from "./processing/processor.js";
import { MemoryStoreHandle } from "./store/memory-store.js";
import { createPgPool, PgStoreHandle } from "./store/pg-store.js";
import type { StoreHandle } from "./store/types.js";
import { getLogger } from "./utils/logger.js";

function createStore(env: Env): StoreHandle {
  return env.POSTGRES_URL ? new PgStoreHandle(createPgPool(env.POSTGRES_URL)) : new MemoryStoreHandle();
}

function createEngine(env: Env, config: PipelineConfig): RuleExtractionEngine {
  if (!config.extraction.llmEnabled || !env.ANTHROPIC_API_KEY) {
    return new RuleExtractionEngine(null);
  }
  const extractor = new LlmRuleExtractor(createAnthropicCompletionClient(env.ANTHROPIC_API_KEY), {
    model: config.extraction.model,
    maxTokens: config.extraction.maxTokens,
    temperature: config.extraction.temperature,
    maxAttempts: config.extraction.maxAttempts,
  });
  return new RuleExtractionEngine(extractor);
}

async function main() {
  const env = loadEnv();
  const log = getLogger();
  const config = await loadPipelineConfig(env.PIPELINE_CONFIG_PATH);

  const store = createStore(env);
  await store.init();

  const client = new RateLimitedApiClient({
    token: env.GITHUB_TOKEN,
    baseUrl: env.GITHUB_API_BASE_URL,
    perPage: config.github.perPage,
    requestDelayMs: config.github.requestDelayMs,
    fallbackWaitMs: config.github.fallbackWaitMs,
  });
  const engine = createEngine(env, config);
  const processor = new TaskQueueProcessor(store, engine, {
    workerCount: config.workers.count,
    pollTimeoutMs: config.workers.pollTimeoutMs,
  });
  const orchestrator = new CollectionOrchestrator(client, store, processor, {
    maxPullRequests: config.github.maxPullRequests,
    retentionDays: config.retention.days,
  });

  processor.startWorkers();
  log.info(
    { store: store.kind, workers: config.workers.count, modelExtraction: engine.usesModel },
    "Pipeline ready"
  );

  const app = createApp({ orchestrator, processor, store });
  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "Rules miner server started");
  });

  const shutdown = async () => {
    log.info("Shutting down...");
    server.close();
    await processor.stopWorkers(config.workers.shutdownTimeoutMs);
    await store.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
