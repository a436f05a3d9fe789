import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { Hono } from "hono";
import { z } from "zod";
import { createApp } from "../../src/api/routes.js";
import { CollectionOrchestrator } from "../../src/collection/orchestrator.js";
import { RuleExtractionEngine } from "../../src/extraction/engine.js";
import { RateLimitedApiClient } from "../../src/github/client.js";
import { TaskQueueProcessor } from "../../src/processing/processor.js";
import { MemoryStoreHandle } from "../../src/store/memory-store.js";
import { FakeClock } from "../fixtures/clock.js";
import { createFakeGitHub, repoRoutes } from "../fixtures/fake-github.js";
import { widgetsRepo } from "../fixtures/repository.js";

describe("HTTP routes", () => {
  let app: Hono;
  let processor: TaskQueueProcessor;

  beforeEach(async () => {
    const store = new MemoryStoreHandle();
    await store.init();
    processor = new TaskQueueProcessor(store, new RuleExtractionEngine(), {
      workerCount: 2,
      pollTimeoutMs: 10,
    });
    const client = new RateLimitedApiClient({
      requestDelayMs: 0,
      clock: new FakeClock(),
      fetch: createFakeGitHub(repoRoutes(widgetsRepo())).fetch,
    });
    const orchestrator = new CollectionOrchestrator(client, store, processor, {
      maxPullRequests: 1000,
      retentionDays: 30,
    });
    app = createApp({ orchestrator, processor, store });
  });

  afterEach(async () => {
    await processor.stopWorkers(1000);
  });

  const post = (path: string, body: unknown) =>
    app.request(path, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  it("answers health checks", async () => {
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", store: "memory" });
  });

  it("runs a collection and lists the mined rules", async () => {
    const collect = await post("/api/collect", { owner: "acme", repo: "widgets" });

    expect(collect.status).toBe(200);
    expect(await collect.json()).toMatchObject({ status: "completed", pullRequests: 2, comments: 5 });

    const rules = await app.request("/api/rules?limit=2");
    expect(rules.status).toBe(200);
    expect(await rules.json()).toHaveLength(2);

    const progress = await app.request("/api/sync/progress");
    expect(await progress.json()).toMatchObject({ state: "done", repository: "acme/widgets" });
  });

  it("validates the collect body", async () => {
    const res = await post("/api/collect", { owner: "acme" });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_FAILED" } });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await app.request("/api/collect", { method: "POST", body: "{oops" });

    expect(res.status).toBe(400);
  });

  it("processes a valid batch", async () => {
    const res = await post("/api/process-batch", {
      kind: "update-statistics",
      items: [
        { ruleId: 1, repositoryId: 1, ruleText: "Avoid globals.", confidence: 0.6, seenAt: "2024-03-01T00:00:00Z" },
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ total: 1, success: 1, errors: 0 });
  });

  it("rejects a batch with invalid items before queueing anything", async () => {
    const res = await post("/api/process-batch", {
      kind: "normalize-snippet",
      items: [{ commentExternalId: 1, filePath: "a.ts", lineStart: 0, lineEnd: 1, content: "x" }],
    });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      error: { code: "VALIDATION_FAILED", issues: [{ path: "items.0.lineStart" }] },
    });
    expect(processor.getProcessingStats().processed).toBe(0);
  });

  it("rejects an unknown task kind", async () => {
    const res = await post("/api/process-batch", { kind: "reticulate", items: [{}] });

    expect(res.status).toBe(422);
  });

  it("reports processing stats and collection status", async () => {
    const stats = await app.request("/api/processing/stats");
    expect(await stats.json()).toEqual({
      processed: 0,
      errors: 0,
      queueSize: 0,
      workerCount: 0,
      running: false,
    });

    const status = await app.request("/api/collection/status");
    expect(await status.json()).toMatchObject({ repositories: 0, rateLimit: { remaining: 4990 } });
  });

  it("toggles rule validity", async () => {
    await post("/api/collect", { owner: "acme", repo: "widgets" });
    const [rule] = z
      .array(z.object({ ruleId: z.number() }))
      .min(1)
      .parse(await (await app.request("/api/rules")).json());

    const res = await app.request(`/api/rules/${rule.ruleId}/validity`, {
      method: "PATCH",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ isValid: false }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ id: rule.ruleId, isValid: false });
    expect(await (await app.request("/api/rules")).json()).toHaveLength(2);
  });

  it("returns 404 for an unknown rule", async () => {
    const res = await app.request("/api/rules/999/validity", {
      method: "PATCH",
      body: JSON.stringify({ isValid: true }),
    });

    expect(res.status).toBe(404);
  });

  it("runs retention cleanup with an empty body", async () => {
    const res = await app.request("/api/cleanup", { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ deleted: { repositories: 0 } });
  });
});
