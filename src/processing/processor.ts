import { createChildLogger } from "../utils/logger.js";
import { errorMessage, PipelineError, ValidationFailedError } from "../utils/errors.js";
import { ruleKey } from "../extraction/heuristics.js";
import type { RuleExtractionEngine } from "../extraction/engine.js";
import { GHOST_LOGIN } from "../store/types.js";
import type { StoreHandle, StoreSession, ReviewComment } from "../store/types.js";
import { AsyncTaskQueue } from "./task-queue.js";
import {
  parseTask,
  type ExtractRulePayload,
  type NormalizeCommentPayload,
  type NormalizeSnippetPayload,
  type NormalizeThreadPayload,
  type PipelineTask,
  type TaskKind,
  type UpdateStatisticsPayload,
} from "./tasks.js";

const log = createChildLogger({ module: "processor" });

/** Tells a worker loop to exit. */
export const SHUTDOWN = Symbol("shutdown");

interface BatchTracker {
  success: number;
  errors: number;
}

interface QueuedTask {
  kind: TaskKind;
  payload: unknown;
  batch?: BatchTracker;
}

type QueueItem = QueuedTask | typeof SHUTDOWN;

export interface ProcessorOptions {
  workerCount: number;
  pollTimeoutMs: number;
}

export interface BatchResult {
  total: number;
  success: number;
  errors: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface ProcessingStats {
  processed: number;
  errors: number;
  queueSize: number;
  workerCount: number;
  running: boolean;
}

/**
 * Runs pipeline tasks on a pool of async workers sharing one FIFO queue.
 * Handlers chain follow-on tasks (snippets, thread, rule, statistics) back
 * onto the same queue, so a batch's `join` covers the whole cascade.
 */
export class TaskQueueProcessor {
  private readonly queue = new AsyncTaskQueue<QueueItem>();
  private workers: Promise<void>[] = [];
  private running = false;
  private processed = 0;
  private errors = 0;

  constructor(
    private readonly store: StoreHandle,
    private readonly engine: RuleExtractionEngine,
    private readonly opts: ProcessorOptions
  ) {}

  startWorkers(): void {
    if (this.running) return;
    this.running = true;
    this.workers = Array.from({ length: this.opts.workerCount }, (_, id) => this.runWorker(id));
    log.info({ workers: this.opts.workerCount }, "Workers started");
  }

  /**
   * Signals every worker, waits up to `timeoutMs` for them to exit, then
   * drops whatever is still queued.
   */
  async stopWorkers(timeoutMs = 5000): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (let i = 0; i < this.workers.length; i++) this.queue.put(SHUTDOWN);

    const exited = await waitWithTimeout(Promise.all(this.workers), timeoutMs);
    if (!exited) {
      log.warn({ timeoutMs }, "Workers did not exit before the shutdown timeout");
    }

    const abandoned = this.queue.clear().filter((item) => item !== SHUTDOWN).length;
    if (abandoned > 0) {
      log.warn({ abandoned }, "Dropped queued tasks on shutdown");
    }
    this.workers = [];
    log.info("Workers stopped");
  }

  submit(task: PipelineTask): void {
    this.queue.put({ kind: task.kind, payload: task.payload });
  }

  async processBatch(items: unknown[], kind: TaskKind): Promise<BatchResult> {
    const startedAt = new Date();
    this.startWorkers();

    const batch: BatchTracker = { success: 0, errors: 0 };
    for (const payload of items) {
      this.queue.put({ kind, payload, batch });
    }
    await this.queue.join();

    const finishedAt = new Date();
    const result: BatchResult = {
      total: items.length,
      success: batch.success,
      errors: batch.errors,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
    log.info({ kind, total: result.total, errors: result.errors, durationMs: result.durationMs }, "Batch processed");
    return result;
  }

  /** Resolves once every queued task, follow-ons included, has finished. */
  drain(): Promise<void> {
    return this.queue.join();
  }

  getProcessingStats(): ProcessingStats {
    return {
      processed: this.processed,
      errors: this.errors,
      queueSize: this.queue.size,
      workerCount: this.running ? this.workers.length : 0,
      running: this.running,
    };
  }

  private async runWorker(id: number): Promise<void> {
    for (;;) {
      const item = await this.queue.get(this.opts.pollTimeoutMs);
      if (item === undefined) {
        if (!this.running) return;
        continue;
      }
      if (item === SHUTDOWN) {
        this.queue.taskDone();
        log.debug({ worker: id }, "Worker exiting");
        return;
      }

      try {
        await this.execute(item, id);
      } finally {
        this.queue.taskDone();
      }
    }
  }

  private async execute(item: QueuedTask, worker: number): Promise<void> {
    let session: StoreSession | null = null;
    try {
      const task = parseTask(item.kind, item.payload);
      session = await this.store.openSession();
      await this.handle(task, session);
      this.processed++;
      if (item.batch) item.batch.success++;
    } catch (err) {
      this.processed++;
      this.errors++;
      if (item.batch) item.batch.errors++;
      log.error(
        {
          worker,
          kind: item.kind,
          code: err instanceof PipelineError ? err.code : undefined,
          issues: err instanceof ValidationFailedError ? err.issues : undefined,
          err: errorMessage(err),
        },
        "Task failed"
      );
    } finally {
      session?.release();
    }
  }

  private handle(task: PipelineTask, session: StoreSession): Promise<void> {
    switch (task.kind) {
      case "normalize-comment":
        return this.normalizeComment(task.payload, session);
      case "normalize-snippet":
        return this.normalizeSnippet(task.payload, session);
      case "normalize-thread":
        return this.normalizeThread(task.payload, session);
      case "extract-rule":
        return this.extractRule(task.payload, session);
      case "update-statistics":
        return this.updateStatistics(task.payload, session);
      default: {
        const unreachable: never = task;
        throw new Error(`Unhandled task: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async normalizeComment(p: NormalizeCommentPayload, session: StoreSession): Promise<void> {
    const comment = await session.upsertReviewComment({
      externalId: p.externalId,
      pullRequestId: p.pullRequestId,
      authorLogin: p.authorLogin ?? GHOST_LOGIN,
      body: p.body,
      path: p.path,
      position: p.position,
      line: p.line,
      side: p.side,
      diffHunk: p.diffHunk,
      htmlUrl: p.htmlUrl,
      postedAt: p.postedAt,
    });

    for (const snippet of p.snippets) {
      this.submit({
        kind: "normalize-snippet",
        payload: {
          commentExternalId: comment.externalId,
          filePath: snippet.path,
          lineStart: snippet.startLine,
          lineEnd: snippet.endLine,
          content: snippet.content,
          language: snippet.language,
        },
      });
    }

    this.submit({
      kind: "normalize-thread",
      payload: {
        commentExternalId: comment.externalId,
        path: comment.path,
        position: comment.position,
        isResolved: false,
      },
    });

    this.submit({
      kind: "extract-rule",
      payload: {
        commentExternalId: comment.externalId,
        repositoryId: p.repositoryId,
        body: comment.body,
        context: {
          ...p.context,
          filePath: comment.path,
          lineNumber: comment.line,
          position: comment.position,
          author: p.authorLogin,
          hasCodeSnippets: p.snippets.length > 0 || p.context.hasCodeSnippets === true,
        },
      },
    });
  }

  private async normalizeSnippet(p: NormalizeSnippetPayload, session: StoreSession): Promise<void> {
    const comment = await requireComment(session, p.commentExternalId);
    await session.upsertCodeSnippet({
      reviewCommentId: comment.id,
      filePath: p.filePath,
      lineStart: p.lineStart,
      lineEnd: p.lineEnd,
      content: p.content,
      language: p.language,
    });
  }

  private async normalizeThread(p: NormalizeThreadPayload, session: StoreSession): Promise<void> {
    const comment = await requireComment(session, p.commentExternalId);
    await session.upsertCommentThread({
      pullRequestId: comment.pullRequestId,
      reviewCommentId: comment.id,
      path: p.path,
      position: p.position,
      isResolved: p.isResolved,
    });
  }

  private async extractRule(p: ExtractRulePayload, session: StoreSession): Promise<void> {
    const comment = await requireComment(session, p.commentExternalId);
    const candidate = await this.engine.extract(p.body, p.context);
    if (!candidate) {
      log.debug({ comment: comment.externalId }, "No rule in comment");
      return;
    }

    const saved = await session.saveExtractedRule({
      reviewCommentId: comment.id,
      ruleKey: ruleKey(candidate.ruleText),
      ...candidate,
    });

    // Re-extracting a known comment updates the rule but is not a new occurrence
    if (!saved.created) return;

    this.submit({
      kind: "update-statistics",
      payload: {
        ruleId: saved.rule.id,
        repositoryId: p.repositoryId,
        ruleText: saved.rule.ruleText,
        confidence: saved.rule.confidence,
        seenAt: comment.postedAt ?? new Date(),
      },
    });
  }

  private async updateStatistics(p: UpdateStatisticsPayload, session: StoreSession): Promise<void> {
    await session.recordRuleOccurrence({
      ruleId: p.ruleId,
      repositoryId: p.repositoryId,
      ruleKey: ruleKey(p.ruleText),
      confidence: p.confidence,
      seenAt: p.seenAt,
    });
  }
}

async function requireComment(session: StoreSession, externalId: number): Promise<ReviewComment> {
  const comment = await session.findReviewCommentByExternalId(externalId);
  if (!comment) {
    throw new ValidationFailedError(`Review comment ${externalId} has not been stored`, [
      { path: "commentExternalId", message: "unknown review comment" },
    ]);
  }
  return comment;
}

async function waitWithTimeout(work: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([work.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
