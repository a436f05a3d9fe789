import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CollectionOrchestrator } from "../../src/collection/orchestrator.js";
import { RuleExtractionEngine } from "../../src/extraction/engine.js";
import { RateLimitedApiClient } from "../../src/github/client.js";
import { TaskQueueProcessor } from "../../src/processing/processor.js";
import { MemoryStoreHandle } from "../../src/store/memory-store.js";
import { FakeClock } from "../fixtures/clock.js";
import { createFakeGitHub, repoRoutes, type FakeRoute } from "../fixtures/fake-github.js";
import { widgetsRepo } from "../fixtures/repository.js";

describe("CollectionOrchestrator", () => {
  let store: MemoryStoreHandle;
  let processor: TaskQueueProcessor;

  beforeEach(async () => {
    store = new MemoryStoreHandle();
    await store.init();
    processor = new TaskQueueProcessor(store, new RuleExtractionEngine(), {
      workerCount: 3,
      pollTimeoutMs: 10,
    });
  });

  afterEach(async () => {
    await processor.stopWorkers(1000);
  });

  function orchestratorFor(route: FakeRoute, maxPullRequests = 1000) {
    const github = createFakeGitHub(route);
    const client = new RateLimitedApiClient({
      token: "test-token",
      requestDelayMs: 0,
      clock: new FakeClock(),
      fetch: github.fetch,
    });
    return new CollectionOrchestrator(client, store, processor, {
      maxPullRequests,
      retentionDays: 30,
    });
  }

  async function counts() {
    const session = await store.openSession();
    try {
      return await session.countEntities();
    } finally {
      session.release();
    }
  }

  it("collects pull requests, comments, snippets and threads", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));

    const result = await orchestrator.collectRepositoryData("acme", "widgets");

    expect(result).toMatchObject({
      repository: "acme/widgets",
      status: "completed",
      pullRequests: 2,
      comments: 5,
      snippets: 8,
      threads: 5,
      skippedComments: 1,
      errors: [],
      taskErrors: 0,
    });
    expect(result.finishedAt.getTime()).toBeGreaterThanOrEqual(result.startedAt.getTime());
    expect(await counts()).toEqual({
      repositories: 1,
      pullRequests: 2,
      reviewComments: 5,
      codeSnippets: 8,
      commentThreads: 5,
      extractedRules: 3,
      ruleStatistics: 3,
    });
    expect(orchestrator.getProgress()).toMatchObject({
      state: "done",
      repository: "acme/widgets",
      totalPullRequests: 2,
      processedPullRequests: 2,
    });
  });

  it("is idempotent across repeated runs", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));

    await orchestrator.collectRepositoryData("acme", "widgets");
    const first = await counts();
    await orchestrator.collectRepositoryData("acme", "widgets");

    expect(await counts()).toEqual(first);
    const session = await store.openSession();
    const top = await session.listTopRules({ limit: 10 });
    session.release();
    expect(top.every((rule) => rule.occurrenceCount === 1)).toBe(true);
  });

  it("extracts rules with snippet-aware confidence", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));
    await orchestrator.collectRepositoryData("acme", "widgets");

    const session = await store.openSession();
    const top = await session.listTopRules({ limit: 10 });
    session.release();

    const texts = top.map((rule) => rule.ruleText).sort();
    expect(texts).toEqual([
      "Avoid using any in public signatures.",
      "Remember to close the file handle here.",
      "Should always validate user input.",
    ]);
    const validate = top.find((rule) => rule.ruleText === "Should always validate user input.");
    // base + snippets + file path + author
    expect(validate?.avgConfidence).toBe(0.7);
    const handle = top.find((rule) => rule.ruleText.startsWith("Remember"));
    expect(handle?.category).toBe("error_handling");
  });

  it("submits short and bot-authored review comments like any other", async () => {
    const fixture = widgetsRepo();
    fixture.pulls = [fixture.pulls[0]];
    fixture.reviewComments = {
      1: [
        {
          id: 7101,
          body: "Avoid globals.",
          path: "src/state.ts",
          position: 1,
          user: { login: "bob", type: "User" },
          created_at: "2024-03-01T12:00:00Z",
        },
        {
          id: 7102,
          body: "You should never log secrets here",
          path: "src/log.ts",
          position: 2,
          user: { login: "audit[bot]", type: "Bot" },
          created_at: "2024-03-01T12:05:00Z",
        },
      ],
    };
    fixture.issueComments = {};
    const orchestrator = orchestratorFor(repoRoutes(fixture));

    const result = await orchestrator.collectRepositoryData("acme", "widgets");

    expect(result).toMatchObject({ comments: 2, skippedComments: 0, taskErrors: 0 });
    expect(await counts()).toMatchObject({ reviewComments: 2, extractedRules: 2 });
    const session = await store.openSession();
    const top = await session.listTopRules({ limit: 10 });
    session.release();
    expect(top.map((rule) => rule.ruleText).sort()).toEqual([
      "Avoid globals.",
      "Should never log secrets here.",
    ]);
  });

  it("stores a deleted author as ghost without the known-author bonus", async () => {
    const fixture = widgetsRepo();
    fixture.pulls = [fixture.pulls[0]];
    fixture.reviewComments = {
      1: [
        {
          id: 7201,
          body: "You should always validate user input.",
          path: "src/form.ts",
          position: 1,
          user: null,
          created_at: "2024-03-01T12:00:00Z",
        },
      ],
    };
    fixture.issueComments = {};
    const orchestrator = orchestratorFor(repoRoutes(fixture));

    await orchestrator.collectRepositoryData("acme", "widgets");

    const session = await store.openSession();
    const comment = await session.findReviewCommentByExternalId(7201);
    const top = await session.listTopRules({ limit: 10 });
    session.release();
    expect(comment?.authorLogin).toBe("ghost");
    // base + file path only
    expect(top).toHaveLength(1);
    expect(top[0].avgConfidence).toBe(0.55);
  });

  it("stops before writing anything when the repository is not accessible", async () => {
    const orchestrator = orchestratorFor(() => ({ status: 404, body: { message: "Not Found" } }));

    const result = await orchestrator.collectRepositoryData("acme", "secret");

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(["Cannot access repository acme/secret"]);
    expect(result.pullRequests).toBe(0);
    expect(await counts()).toMatchObject({ repositories: 0, pullRequests: 0 });
    expect(orchestrator.getProgress().state).toBe("failed");
  });

  it("records a failing pull request and keeps going", async () => {
    const routes = repoRoutes(widgetsRepo());
    const orchestrator = orchestratorFor((url) =>
      url.pathname === "/repos/acme/widgets/pulls/2/comments"
        ? { status: 500, body: { message: "Server Error" } }
        : routes(url)
    );

    const result = await orchestrator.collectRepositoryData("acme", "widgets");

    expect(result.status).toBe("completed");
    expect(result.pullRequests).toBe(1);
    expect(result.errors).toEqual([
      "PR #2: Request to /repos/acme/widgets/pulls/2/comments failed with status 500",
    ]);
    expect((await counts()).reviewComments).toBe(4);
  });

  it("rejects a merged pull request that is still open", async () => {
    const fixture = widgetsRepo();
    fixture.pulls = [
      {
        id: 9100,
        number: 7,
        title: "Odd state",
        state: "open",
        user: { login: "alice" },
        merged_at: "2024-03-02T10:00:00Z",
      },
    ];
    const orchestrator = orchestratorFor(repoRoutes(fixture));

    const result = await orchestrator.collectRepositoryData("acme", "widgets");

    expect(result.errors).toEqual(["PR #7: merged pull request is not closed"]);
    expect((await counts()).pullRequests).toBe(0);
  });

  it("caps the number of pull requests walked", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()), 1);

    const result = await orchestrator.collectRepositoryData("acme", "widgets");

    expect(result.pullRequests).toBe(1);
    expect((await counts()).pullRequests).toBe(1);
  });

  it("refuses a second run while one is active", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));

    const [first, second] = await Promise.all([
      orchestrator.collectRepositoryData("acme", "widgets"),
      orchestrator.collectRepositoryData("acme", "widgets"),
    ]);

    expect(first.status).toBe("completed");
    expect(second.status).toBe("failed");
    expect(second.errors).toEqual(["A collection is already running for acme/widgets"]);
  });

  it("reports entity counts with the live rate limit", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));
    await orchestrator.collectRepositoryData("acme", "widgets");

    const status = await orchestrator.getCollectionStatus();

    expect(status).toMatchObject({ repositories: 1, pullRequests: 2, extractedRules: 3 });
    expect(status.rateLimit).toEqual({ limit: 5000, remaining: 4990, reset: 1_700_003_600, used: 10 });
  });

  it("falls back to the tracked rate limit when the status call fails", async () => {
    const orchestrator = orchestratorFor(() => ({ status: 500, body: { message: "down" } }));

    const status = await orchestrator.getCollectionStatus();

    expect(status.rateLimit).toMatchObject({
      remaining: null,
      error: "Request to /rate_limit failed with status 500",
    });
  });

  it("cleans up data older than the retention window", async () => {
    const orchestrator = orchestratorFor(repoRoutes(widgetsRepo()));
    await orchestrator.collectRepositoryData("acme", "widgets");

    const kept = await orchestrator.cleanupOldData();
    expect(kept.deleted).toEqual({
      codeSnippets: 0,
      commentThreads: 0,
      reviewComments: 0,
      pullRequests: 0,
      repositories: 0,
    });

    const removed = await orchestrator.cleanupOldData(-1);
    expect(removed.deleted.repositories).toBe(1);
    expect(await counts()).toMatchObject({ repositories: 0, extractedRules: 0, ruleStatistics: 0 });
  });
});
