import type { RuleSeverity } from "../extraction/types.js";

/** Login stored for authors whose GitHub account is gone. */
export const GHOST_LOGIN = "ghost";

export interface Repository {
  id: number;
  externalId: number;
  owner: string;
  name: string;
  fullName: string;
  description: string | null;
  htmlUrl: string | null;
  language: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type PullRequestState = "open" | "closed";

export interface PullRequest {
  id: number;
  externalId: number;
  repositoryId: number;
  number: number;
  title: string;
  body: string | null;
  state: PullRequestState;
  authorLogin: string;
  htmlUrl: string | null;
  openedAt: Date | null;
  closedAt: Date | null;
  mergedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ReviewComment {
  id: number;
  externalId: number;
  pullRequestId: number;
  authorLogin: string;
  body: string;
  path: string;
  position: number;
  line: number | null;
  side: string | null;
  diffHunk: string | null;
  htmlUrl: string | null;
  postedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CodeSnippet {
  id: number;
  reviewCommentId: number;
  filePath: string;
  lineStart: number;
  lineEnd: number;
  content: string;
  language: string | null;
  createdAt: Date;
}

export interface CommentThread {
  id: number;
  pullRequestId: number;
  reviewCommentId: number;
  path: string;
  position: number;
  isResolved: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExtractedRule {
  id: number;
  reviewCommentId: number;
  ruleText: string;
  /** Normalised text; occurrences with the same key share one statistics row. */
  ruleKey: string;
  category: string;
  severity: RuleSeverity;
  confidence: number;
  extractor: string;
  rawOutput: string;
  explanation: string | null;
  examples: string[];
  relatedConcepts: string[];
  isValid: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Aggregate for one (repository, ruleKey). `ruleId` points at a rule that
 * carries the key; it is cleared when that rule is deleted and re-pointed by
 * the next occurrence.
 */
export interface RuleStatistics {
  id: number;
  ruleId: number | null;
  repositoryId: number;
  ruleKey: string;
  occurrenceCount: number;
  firstSeen: Date;
  lastSeen: Date;
  avgConfidence: number;
  createdAt: Date;
  updatedAt: Date;
}

type Generated = "id" | "createdAt" | "updatedAt";

export type RepositoryInput = Omit<Repository, Generated>;
export type PullRequestInput = Omit<PullRequest, Generated>;
export type ReviewCommentInput = Omit<ReviewComment, Generated>;
export type CodeSnippetInput = Omit<CodeSnippet, "id" | "createdAt">;
export type CommentThreadInput = Omit<CommentThread, Generated>;
export type ExtractedRuleInput = Omit<ExtractedRule, Generated | "isValid">;

export interface RuleOccurrenceInput {
  ruleId: number;
  repositoryId: number;
  ruleKey: string;
  confidence: number;
  seenAt: Date;
}

export interface SavedRule {
  rule: ExtractedRule;
  created: boolean;
}

export interface EntityCounts {
  repositories: number;
  pullRequests: number;
  reviewComments: number;
  codeSnippets: number;
  commentThreads: number;
  extractedRules: number;
  ruleStatistics: number;
}

export interface RetentionResult {
  codeSnippets: number;
  commentThreads: number;
  reviewComments: number;
  pullRequests: number;
  repositories: number;
}

/** A statistics row shown through one of its valid rules. */
export interface TopRule {
  ruleId: number;
  repositoryId: number;
  ruleText: string;
  category: string;
  severity: RuleSeverity;
  occurrenceCount: number;
  avgConfidence: number;
  firstSeen: Date;
  lastSeen: Date;
}

/**
 * One unit of store access. A session is never shared between concurrently
 * running tasks; callers release it when done.
 */
export interface StoreSession {
  upsertRepository(input: RepositoryInput): Promise<Repository>;
  upsertPullRequest(input: PullRequestInput): Promise<PullRequest>;
  upsertReviewComment(input: ReviewCommentInput): Promise<ReviewComment>;
  findReviewCommentByExternalId(externalId: number): Promise<ReviewComment | null>;
  upsertCodeSnippet(input: CodeSnippetInput): Promise<CodeSnippet>;
  upsertCommentThread(input: CommentThreadInput): Promise<CommentThread>;
  saveExtractedRule(input: ExtractedRuleInput): Promise<SavedRule>;
  setRuleValidity(ruleId: number, isValid: boolean): Promise<ExtractedRule | null>;
  recordRuleOccurrence(input: RuleOccurrenceInput): Promise<RuleStatistics>;
  listTopRules(opts: { repositoryId?: number; limit: number }): Promise<TopRule[]>;
  countEntities(): Promise<EntityCounts>;
  deleteCreatedBefore(cutoff: Date): Promise<RetentionResult>;
  release(): void;
}

export interface StoreHandle {
  readonly kind: "postgres" | "memory";
  init(): Promise<void>;
  openSession(): Promise<StoreSession>;
  close(): Promise<void>;
}
