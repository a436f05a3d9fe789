import type { RateLimitStatus } from "../github/types.js";
import type { EntityCounts, RetentionResult } from "../store/types.js";
import type { RateLimitState } from "../utils/rate-limiter.js";

export type CollectionState =
  | "idle"
  | "validating-access"
  | "syncing"
  | "aggregating"
  | "done"
  | "failed";

export interface CollectionProgress {
  state: CollectionState;
  repository: string | null;
  totalPullRequests: number;
  processedPullRequests: number;
  startedAt: Date | null;
}

export type RunStatus = "completed" | "failed";

export interface RunResult {
  repository: string;
  status: RunStatus;
  pullRequests: number;
  comments: number;
  snippets: number;
  threads: number;
  skippedComments: number;
  /** Tasks the workers finished while this run was syncing and draining */
  tasksProcessed: number;
  taskErrors: number;
  errors: string[];
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export type RateLimitReport = RateLimitStatus | (RateLimitState & { error: string });

export interface CollectionStatus extends EntityCounts {
  rateLimit: RateLimitReport;
}

export interface CleanupResult {
  cutoff: Date;
  deleted: RetentionResult;
}
