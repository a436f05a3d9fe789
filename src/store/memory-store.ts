import { createChildLogger } from "../utils/logger.js";
import { applyOccurrence } from "./statistics.js";
import type {
  CodeSnippet,
  CodeSnippetInput,
  CommentThread,
  CommentThreadInput,
  EntityCounts,
  ExtractedRule,
  ExtractedRuleInput,
  PullRequest,
  PullRequestInput,
  Repository,
  RepositoryInput,
  RetentionResult,
  ReviewComment,
  ReviewCommentInput,
  RuleOccurrenceInput,
  RuleStatistics,
  SavedRule,
  StoreHandle,
  StoreSession,
  TopRule,
} from "./types.js";

const log = createChildLogger({ module: "memory-store" });

interface Tables {
  repositories: Map<number, Repository>;
  pullRequests: Map<number, PullRequest>;
  reviewComments: Map<number, ReviewComment>;
  codeSnippets: Map<number, CodeSnippet>;
  commentThreads: Map<number, CommentThread>;
  extractedRules: Map<number, ExtractedRule>;
  ruleStatistics: Map<number, RuleStatistics>;
  nextId: number;
}

function emptyTables(): Tables {
  return {
    repositories: new Map(),
    pullRequests: new Map(),
    reviewComments: new Map(),
    codeSnippets: new Map(),
    commentThreads: new Map(),
    extractedRules: new Map(),
    ruleStatistics: new Map(),
    nextId: 1,
  };
}

function find<T>(table: Map<number, T>, predicate: (row: T) => boolean): T | undefined {
  for (const row of table.values()) {
    if (predicate(row)) return row;
  }
  return undefined;
}

function deleteWhere<T>(table: Map<number, T>, predicate: (row: T) => boolean): number[] {
  const removed: number[] = [];
  for (const [id, row] of table) {
    if (predicate(row)) {
      table.delete(id);
      removed.push(id);
    }
  }
  return removed;
}

/**
 * In-process store with the same keys and cascade rules as the Postgres
 * schema. Used when no database is configured, and by the tests.
 */
export class MemoryStoreHandle implements StoreHandle {
  readonly kind = "memory" as const;
  private tables = emptyTables();
  private active = 0;
  private opened = 0;

  async init(): Promise<void> {
    log.warn("POSTGRES_URL not set, using in-memory store (data is lost on exit)");
  }

  async openSession(): Promise<StoreSession> {
    this.active++;
    this.opened++;
    let released = false;
    return new MemorySession(this.tables, () => {
      if (released) return;
      released = true;
      this.active--;
    });
  }

  async close(): Promise<void> {
    this.tables = emptyTables();
  }

  /** Sessions currently open. */
  get activeSessions(): number {
    return this.active;
  }

  get sessionsOpened(): number {
    return this.opened;
  }
}

class MemorySession implements StoreSession {
  constructor(
    private readonly t: Tables,
    private readonly onRelease: () => void
  ) {}

  release(): void {
    this.onRelease();
  }

  private nextId(): number {
    return this.t.nextId++;
  }

  async upsertRepository(input: RepositoryInput): Promise<Repository> {
    const now = new Date();
    const existing = find(this.t.repositories, (r) => r.externalId === input.externalId);
    const row: Repository = existing
      ? { ...existing, ...input, updatedAt: now }
      : { ...input, id: this.nextId(), createdAt: now, updatedAt: now };
    this.t.repositories.set(row.id, row);
    return row;
  }

  async upsertPullRequest(input: PullRequestInput): Promise<PullRequest> {
    const now = new Date();
    const existing = find(this.t.pullRequests, (p) => p.externalId === input.externalId);
    const row: PullRequest = existing
      ? { ...existing, ...input, updatedAt: now }
      : { ...input, id: this.nextId(), createdAt: now, updatedAt: now };
    this.t.pullRequests.set(row.id, row);
    return row;
  }

  async upsertReviewComment(input: ReviewCommentInput): Promise<ReviewComment> {
    const now = new Date();
    const existing = find(this.t.reviewComments, (c) => c.externalId === input.externalId);
    const row: ReviewComment = existing
      ? { ...existing, ...input, updatedAt: now }
      : { ...input, id: this.nextId(), createdAt: now, updatedAt: now };
    this.t.reviewComments.set(row.id, row);
    return row;
  }

  async findReviewCommentByExternalId(externalId: number): Promise<ReviewComment | null> {
    return find(this.t.reviewComments, (c) => c.externalId === externalId) ?? null;
  }

  async upsertCodeSnippet(input: CodeSnippetInput): Promise<CodeSnippet> {
    const existing = find(
      this.t.codeSnippets,
      (s) =>
        s.reviewCommentId === input.reviewCommentId &&
        s.lineStart === input.lineStart &&
        s.lineEnd === input.lineEnd
    );
    const row: CodeSnippet = existing
      ? { ...existing, ...input }
      : { ...input, id: this.nextId(), createdAt: new Date() };
    this.t.codeSnippets.set(row.id, row);
    return row;
  }

  async upsertCommentThread(input: CommentThreadInput): Promise<CommentThread> {
    const now = new Date();
    const existing = find(
      this.t.commentThreads,
      (th) =>
        th.pullRequestId === input.pullRequestId &&
        th.path === input.path &&
        th.position === input.position
    );
    // The first comment at a position owns the thread.
    const row: CommentThread = existing
      ? { ...existing, isResolved: input.isResolved, updatedAt: now }
      : { ...input, id: this.nextId(), createdAt: now, updatedAt: now };
    this.t.commentThreads.set(row.id, row);
    return row;
  }

  async saveExtractedRule(input: ExtractedRuleInput): Promise<SavedRule> {
    const now = new Date();
    const existing = find(this.t.extractedRules, (r) => r.reviewCommentId === input.reviewCommentId);
    if (existing) {
      const rule: ExtractedRule = { ...existing, ...input, updatedAt: now };
      this.t.extractedRules.set(rule.id, rule);
      return { rule, created: false };
    }
    const rule: ExtractedRule = {
      ...input,
      id: this.nextId(),
      isValid: true,
      createdAt: now,
      updatedAt: now,
    };
    this.t.extractedRules.set(rule.id, rule);
    return { rule, created: true };
  }

  async setRuleValidity(ruleId: number, isValid: boolean): Promise<ExtractedRule | null> {
    const existing = this.t.extractedRules.get(ruleId);
    if (!existing) return null;
    const rule: ExtractedRule = { ...existing, isValid, updatedAt: new Date() };
    this.t.extractedRules.set(rule.id, rule);
    return rule;
  }

  async recordRuleOccurrence(input: RuleOccurrenceInput): Promise<RuleStatistics> {
    const existing = find(
      this.t.ruleStatistics,
      (s) => s.repositoryId === input.repositoryId && s.ruleKey === input.ruleKey
    );
    if (existing) {
      const next = {
        ...applyOccurrence(existing, input.confidence, input.seenAt),
        ruleId: existing.ruleId ?? input.ruleId,
      };
      this.t.ruleStatistics.set(next.id, next);
      return next;
    }

    const now = new Date();
    const stats: RuleStatistics = {
      id: this.nextId(),
      ruleId: input.ruleId,
      repositoryId: input.repositoryId,
      ruleKey: input.ruleKey,
      occurrenceCount: 1,
      firstSeen: input.seenAt,
      lastSeen: input.seenAt,
      avgConfidence: input.confidence,
      createdAt: now,
      updatedAt: now,
    };
    this.t.ruleStatistics.set(stats.id, stats);
    return stats;
  }

  async listTopRules(opts: { repositoryId?: number; limit: number }): Promise<TopRule[]> {
    const rows: TopRule[] = [];
    for (const stats of this.t.ruleStatistics.values()) {
      if (opts.repositoryId !== undefined && stats.repositoryId !== opts.repositoryId) continue;
      const rule = this.representativeRule(stats);
      if (!rule) continue;
      rows.push({
        ruleId: rule.id,
        repositoryId: stats.repositoryId,
        ruleText: rule.ruleText,
        category: rule.category,
        severity: rule.severity,
        occurrenceCount: stats.occurrenceCount,
        avgConfidence: stats.avgConfidence,
        firstSeen: stats.firstSeen,
        lastSeen: stats.lastSeen,
      });
    }
    return rows
      .sort((a, b) => b.occurrenceCount - a.occurrenceCount || b.avgConfidence - a.avgConfidence)
      .slice(0, opts.limit);
  }

  async countEntities(): Promise<EntityCounts> {
    return {
      repositories: this.t.repositories.size,
      pullRequests: this.t.pullRequests.size,
      reviewComments: this.t.reviewComments.size,
      codeSnippets: this.t.codeSnippets.size,
      commentThreads: this.t.commentThreads.size,
      extractedRules: this.t.extractedRules.size,
      ruleStatistics: this.t.ruleStatistics.size,
    };
  }

  async deleteCreatedBefore(cutoff: Date): Promise<RetentionResult> {
    const old = (row: { createdAt: Date }) => row.createdAt < cutoff;

    const codeSnippets = deleteWhere(this.t.codeSnippets, old).length;
    const commentThreads = deleteWhere(this.t.commentThreads, old).length;
    const reviewComments = deleteWhere(this.t.reviewComments, old);
    this.cascadeComments(reviewComments);
    const pullRequests = deleteWhere(this.t.pullRequests, old);
    this.cascadePullRequests(pullRequests);
    const repositories = deleteWhere(this.t.repositories, old);
    this.cascadeRepositories(repositories);

    return {
      codeSnippets,
      commentThreads,
      reviewComments: reviewComments.length,
      pullRequests: pullRequests.length,
      repositories: repositories.length,
    };
  }

  private cascadeComments(commentIds: number[]): void {
    if (commentIds.length === 0) return;
    const ids = new Set(commentIds);
    deleteWhere(this.t.codeSnippets, (s) => ids.has(s.reviewCommentId));
    deleteWhere(this.t.commentThreads, (th) => ids.has(th.reviewCommentId));
    const ruleIds = new Set(deleteWhere(this.t.extractedRules, (r) => ids.has(r.reviewCommentId)));
    // Aggregates outlive the rules they were counted from
    for (const stats of this.t.ruleStatistics.values()) {
      if (stats.ruleId !== null && ruleIds.has(stats.ruleId)) {
        this.t.ruleStatistics.set(stats.id, { ...stats, ruleId: null });
      }
    }
  }

  /** The linked rule when it is still valid, else the oldest valid rule with the same key. */
  private representativeRule(stats: RuleStatistics): ExtractedRule | undefined {
    const linked = stats.ruleId === null ? undefined : this.t.extractedRules.get(stats.ruleId);
    if (linked?.isValid) return linked;
    return find(
      this.t.extractedRules,
      (r) =>
        r.isValid &&
        r.ruleKey === stats.ruleKey &&
        this.repositoryOfComment(r.reviewCommentId) === stats.repositoryId
    );
  }

  private repositoryOfComment(commentId: number): number | undefined {
    const comment = this.t.reviewComments.get(commentId);
    if (!comment) return undefined;
    return this.t.pullRequests.get(comment.pullRequestId)?.repositoryId;
  }

  private cascadePullRequests(pullRequestIds: number[]): void {
    if (pullRequestIds.length === 0) return;
    const ids = new Set(pullRequestIds);
    deleteWhere(this.t.commentThreads, (th) => ids.has(th.pullRequestId));
    this.cascadeComments(deleteWhere(this.t.reviewComments, (c) => ids.has(c.pullRequestId)));
  }

  private cascadeRepositories(repositoryIds: number[]): void {
    if (repositoryIds.length === 0) return;
    const ids = new Set(repositoryIds);
    deleteWhere(this.t.ruleStatistics, (s) => ids.has(s.repositoryId));
    this.cascadePullRequests(deleteWhere(this.t.pullRequests, (p) => ids.has(p.repositoryId)));
  }
}
