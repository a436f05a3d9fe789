import type { RateLimitedApiClient } from "../github/client.js";
import type { GitHubPullRequest } from "../github/types.js";
import type { TaskQueueProcessor } from "../processing/processor.js";
import { GHOST_LOGIN } from "../store/types.js";
import type { EntityCounts, Repository, StoreHandle, StoreSession } from "../store/types.js";
import { extractSnippets } from "../utils/diff-parser.js";
import { AccessDeniedError, errorMessage, ValidationFailedError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import type {
  CleanupResult,
  CollectionProgress,
  CollectionStatus,
  RunResult,
} from "./types.js";

const log = createChildLogger({ module: "collection" });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrchestratorOptions {
  maxPullRequests: number;
  retentionDays: number;
}

interface RunCounts {
  pullRequests: number;
  comments: number;
  snippets: number;
  threads: number;
  skippedComments: number;
}

/**
 * Walks a repository's closed pull requests and feeds their review comments
 * into the task processor. One run at a time; per-PR failures are recorded
 * and the walk continues.
 */
export class CollectionOrchestrator {
  private progress: CollectionProgress = idleProgress();

  constructor(
    private readonly client: RateLimitedApiClient,
    private readonly store: StoreHandle,
    private readonly processor: TaskQueueProcessor,
    private readonly opts: OrchestratorOptions
  ) {}

  getProgress(): CollectionProgress {
    return { ...this.progress };
  }

  async collectRepositoryData(owner: string, repo: string): Promise<RunResult> {
    const fullName = `${owner}/${repo}`;
    const startedAt = new Date();
    const counts: RunCounts = {
      pullRequests: 0,
      comments: 0,
      snippets: 0,
      threads: 0,
      skippedComments: 0,
    };
    const errors: string[] = [];

    if (this.isRunning()) {
      errors.push(`A collection is already running for ${this.progress.repository}`);
      return buildResult(fullName, "failed", counts, errors, startedAt, 0, 0);
    }

    this.progress = {
      state: "validating-access",
      repository: fullName,
      totalPullRequests: 0,
      processedPullRequests: 0,
      startedAt,
    };
    log.info({ repo: fullName }, "Collection started");

    if (!(await this.client.validateRepositoryAccess(owner, repo))) {
      errors.push(new AccessDeniedError(fullName).message);
      this.progress.state = "failed";
      log.error({ repo: fullName }, "Collection aborted: repository not accessible");
      return buildResult(fullName, "failed", counts, errors, startedAt, 0, 0);
    }

    const before = this.processor.getProcessingStats();
    this.processor.startWorkers();
    this.progress.state = "syncing";

    let session: StoreSession | null = null;
    try {
      session = await this.store.openSession();
      const repository = await this.syncRepository(session, owner, repo);
      const pulls = await this.client.listClosedPullRequests(
        owner,
        repo,
        this.opts.maxPullRequests
      );
      this.progress.totalPullRequests = pulls.length;

      for (const pr of pulls) {
        try {
          await this.syncPullRequest(session, repository, pr, counts);
          counts.pullRequests++;
        } catch (err) {
          errors.push(`PR #${pr.number}: ${errorMessage(err)}`);
          log.warn({ repo: fullName, pr: pr.number, err: errorMessage(err) }, "Pull request sync failed");
        }
        this.progress.processedPullRequests++;
      }
    } catch (err) {
      errors.push(errorMessage(err));
      log.error({ repo: fullName, err: errorMessage(err) }, "Collection failed");
    } finally {
      session?.release();
    }

    this.progress.state = "aggregating";
    await this.processor.drain();

    const after = this.processor.getProcessingStats();
    const status = counts.pullRequests === 0 && errors.length > 0 ? "failed" : "completed";
    this.progress.state = status === "failed" ? "failed" : "done";

    const result = buildResult(
      fullName,
      status,
      counts,
      errors,
      startedAt,
      after.processed - before.processed,
      after.errors - before.errors
    );
    log.info(
      {
        repo: fullName,
        pullRequests: result.pullRequests,
        comments: result.comments,
        errors: result.errors.length,
        durationMs: result.durationMs,
      },
      "Collection finished"
    );
    return result;
  }

  async getCollectionStatus(): Promise<CollectionStatus> {
    const session = await this.store.openSession();
    let counts: EntityCounts;
    try {
      counts = await session.countEntities();
    } finally {
      session.release();
    }

    try {
      return { ...counts, rateLimit: await this.client.getRateLimitStatus() };
    } catch (err) {
      return {
        ...counts,
        rateLimit: { ...this.client.getRateLimitState(), error: errorMessage(err) },
      };
    }
  }

  /** Deletes collected records created more than `days` ago. */
  async cleanupOldData(days = this.opts.retentionDays): Promise<CleanupResult> {
    const cutoff = new Date(Date.now() - days * DAY_MS);
    const session = await this.store.openSession();
    try {
      const deleted = await session.deleteCreatedBefore(cutoff);
      log.info({ days, cutoff, ...deleted }, "Old data cleaned up");
      return { cutoff, deleted };
    } finally {
      session.release();
    }
  }

  private isRunning(): boolean {
    const { state } = this.progress;
    return state === "validating-access" || state === "syncing" || state === "aggregating";
  }

  private async syncRepository(
    session: StoreSession,
    owner: string,
    repo: string
  ): Promise<Repository> {
    const data = await this.client.getRepository(owner, repo);
    return session.upsertRepository({
      externalId: data.id,
      owner: data.owner.login,
      name: data.name,
      fullName: data.full_name,
      description: data.description ?? null,
      htmlUrl: data.html_url ?? null,
      language: data.language ?? null,
      isActive: !data.archived,
    });
  }

  private async syncPullRequest(
    session: StoreSession,
    repository: Repository,
    pr: GitHubPullRequest,
    counts: RunCounts
  ): Promise<void> {
    if (pr.merged_at && pr.state !== "closed") {
      throw new ValidationFailedError("merged pull request is not closed", [
        { path: "state", message: `expected closed, got ${pr.state}` },
      ]);
    }

    const pullRequest = await session.upsertPullRequest({
      externalId: pr.id,
      repositoryId: repository.id,
      number: pr.number,
      title: pr.title,
      body: pr.body ?? null,
      state: pr.state,
      authorLogin: pr.user?.login ?? GHOST_LOGIN,
      htmlUrl: pr.html_url ?? null,
      openedAt: toDate(pr.created_at),
      closedAt: toDate(pr.closed_at),
      mergedAt: toDate(pr.merged_at),
    });

    const comments = await this.client.listAllComments(repository.owner, repository.name, pr.number);
    const anchors = new Set<string>();

    for (const comment of comments) {
      // Conversation comments have no diff anchor to attach to
      if (comment.path === null || comment.position === null) {
        counts.skippedComments++;
        continue;
      }

      const snippets = comment.diffHunk ? extractSnippets(comment.diffHunk, comment.path) : [];
      this.processor.submit({
        kind: "normalize-comment",
        payload: {
          externalId: comment.id,
          repositoryId: repository.id,
          pullRequestId: pullRequest.id,
          authorLogin: comment.authorLogin,
          body: comment.body,
          path: comment.path,
          position: comment.position,
          line: comment.line,
          side: comment.side,
          diffHunk: comment.diffHunk,
          htmlUrl: comment.htmlUrl,
          postedAt: toDate(comment.createdAt),
          snippets,
          context: {
            prTitle: pullRequest.title,
            prNumber: pullRequest.number,
            repositoryName: repository.fullName,
            hasCodeSnippets: snippets.length > 0,
          },
        },
      });

      counts.comments++;
      counts.snippets += snippets.length;
      anchors.add(`${comment.path}:${comment.position}`);
    }

    counts.threads += anchors.size;
    log.debug(
      { pr: pr.number, comments: comments.length, anchored: anchors.size },
      "Pull request synced"
    );
  }
}

function toDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function idleProgress(): CollectionProgress {
  return {
    state: "idle",
    repository: null,
    totalPullRequests: 0,
    processedPullRequests: 0,
    startedAt: null,
  };
}

function buildResult(
  repository: string,
  status: RunResult["status"],
  counts: RunCounts,
  errors: string[],
  startedAt: Date,
  tasksProcessed: number,
  taskErrors: number
): RunResult {
  const finishedAt = new Date();
  return {
    repository,
    status,
    ...counts,
    tasksProcessed,
    taskErrors,
    errors,
    startedAt,
    finishedAt,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };
}
