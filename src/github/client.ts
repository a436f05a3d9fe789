import { Octokit } from "@octokit/rest";
import type { z } from "zod";
import {
  issueCommentSchema,
  pullRequestSchema,
  rateLimitResponseSchema,
  repositorySchema,
  reviewCommentSchema,
  type CollectedComment,
  type GitHubIssueComment,
  type GitHubPullRequest,
  type GitHubRepository,
  type GitHubReviewComment,
  type RateLimitStatus,
} from "./types.js";
import {
  errorMessage,
  RateLimitedError,
  RequestFailedError,
  ValidationFailedError,
} from "../utils/errors.js";
import { createChildLogger, toOctokitLog } from "../utils/logger.js";
import { RateLimiter, type Clock, type RateLimitState } from "../utils/rate-limiter.js";

const log = createChildLogger({ module: "github-client" });

/** GitHub's per_page ceiling. */
export const MAX_PAGE_SIZE = 100;

export interface ApiClientOptions {
  token?: string;
  baseUrl?: string;
  perPage?: number;
  requestDelayMs?: number;
  fallbackWaitMs?: number;
  clock?: Clock;
  /** Replaces the global fetch; tests pass an in-process stand-in. */
  fetch?: typeof fetch;
}

type QueryParams = Record<string, string | number>;
type HeaderBag = Record<string, string | number | undefined>;

interface FailedResponse {
  status: number;
  body: string;
  headers: HeaderBag | undefined;
}

/**
 * GitHub REST client that paces itself against the reported quota. Every
 * GET waits out an exhausted window and keeps a minimum gap between calls,
 * concurrent callers included; a rate-limit rejection is retried once after
 * the window resets.
 */
export class RateLimitedApiClient {
  private readonly octokit: Octokit;
  private readonly limiter: RateLimiter;
  private readonly perPage: number;
  /** Settles when the latest queued request has finished. */
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: ApiClientOptions = {}) {
    if (!opts.token) {
      log.warn("No GitHub token configured, requests are unauthenticated");
    }

    this.perPage = Math.min(opts.perPage ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    this.limiter = new RateLimiter({
      requestDelayMs: opts.requestDelayMs ?? 100,
      fallbackWaitMs: opts.fallbackWaitMs ?? 60_000,
      clock: opts.clock,
    });
    this.octokit = new Octokit({
      auth: opts.token,
      baseUrl: opts.baseUrl,
      userAgent: "review-rules-miner",
      log: toOctokitLog(log),
      request: opts.fetch ? { fetch: opts.fetch } : undefined,
    });
  }

  /** One GET that must answer with a JSON array. */
  async fetchPage(url: string, params: QueryParams = {}): Promise<unknown[]> {
    const data = await this.get(url, params);
    if (!Array.isArray(data)) {
      throw new RequestFailedError(200, "Expected a JSON array", url);
    }
    return data;
  }

  /** Follows `page` until a short page, or until `limit` records are collected. */
  async fetchAllPages(
    url: string,
    params: QueryParams = {},
    opts: { limit?: number } = {}
  ): Promise<unknown[]> {
    const all: unknown[] = [];

    for (let page = 1; ; page++) {
      const items = await this.fetchPage(url, { ...params, per_page: this.perPage, page });
      all.push(...items);

      if (opts.limit !== undefined && all.length >= opts.limit) {
        return all.slice(0, opts.limit);
      }
      if (items.length < this.perPage) return all;
    }
  }

  async getRepository(owner: string, repo: string): Promise<GitHubRepository> {
    const url = `/repos/${enc(owner)}/${enc(repo)}`;
    return parseOne(repositorySchema, await this.get(url, {}), url);
  }

  async validateRepositoryAccess(owner: string, repo: string): Promise<boolean> {
    try {
      await this.getRepository(owner, repo);
      return true;
    } catch (err) {
      log.warn({ owner, repo, err: errorMessage(err) }, "Repository access check failed");
      return false;
    }
  }

  async listClosedPullRequests(
    owner: string,
    repo: string,
    limit?: number
  ): Promise<GitHubPullRequest[]> {
    const items = await this.fetchAllPages(
      `/repos/${enc(owner)}/${enc(repo)}/pulls`,
      { state: "closed", sort: "updated", direction: "desc" },
      { limit }
    );
    return parseItems(pullRequestSchema, items, "pull request");
  }

  async listReviewComments(
    owner: string,
    repo: string,
    pullNumber: number
  ): Promise<GitHubReviewComment[]> {
    const items = await this.fetchAllPages(
      `/repos/${enc(owner)}/${enc(repo)}/pulls/${pullNumber}/comments`
    );
    return parseItems(reviewCommentSchema, items, "review comment");
  }

  async listIssueComments(
    owner: string,
    repo: string,
    pullNumber: number
  ): Promise<GitHubIssueComment[]> {
    const items = await this.fetchAllPages(
      `/repos/${enc(owner)}/${enc(repo)}/issues/${pullNumber}/comments`
    );
    return parseItems(issueCommentSchema, items, "issue comment");
  }

  /** Review comments first, then the PR conversation's issue comments. */
  async listAllComments(
    owner: string,
    repo: string,
    pullNumber: number
  ): Promise<CollectedComment[]> {
    const review = await this.listReviewComments(owner, repo, pullNumber);
    const issue = await this.listIssueComments(owner, repo, pullNumber);

    return [
      ...review.map(
        (c): CollectedComment => ({
          source: "review",
          id: c.id,
          body: c.body,
          authorLogin: c.user?.login ?? null,
          authorIsBot: isBot(c.user),
          path: c.path,
          position: c.position ?? c.original_position ?? null,
          line: c.line ?? null,
          side: c.side ?? null,
          diffHunk: c.diff_hunk ?? null,
          htmlUrl: c.html_url ?? null,
          createdAt: c.created_at ?? null,
        })
      ),
      ...issue.map(
        (c): CollectedComment => ({
          source: "issue",
          id: c.id,
          body: c.body ?? "",
          authorLogin: c.user?.login ?? null,
          authorIsBot: isBot(c.user),
          path: null,
          position: null,
          line: null,
          side: null,
          diffHunk: null,
          htmlUrl: c.html_url ?? null,
          createdAt: c.created_at ?? null,
        })
      ),
    ];
  }

  /** Live quota from `/rate_limit`. */
  async getRateLimitStatus(): Promise<RateLimitStatus> {
    const body = parseOne(rateLimitResponseSchema, await this.get("/rate_limit", {}), "/rate_limit");
    return body.rate;
  }

  /** Locally tracked quota; makes no request. */
  getRateLimitState(): RateLimitState {
    return this.limiter.getState();
  }

  /** Requests run one at a time so the limiter's wait and completion mark never interleave. */
  private get(url: string, params: QueryParams): Promise<unknown> {
    const result = this.tail.then(() => this.send(url, params));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async send(url: string, params: QueryParams): Promise<unknown> {
    for (let attempt = 1; ; attempt++) {
      await this.limiter.waitIfNeeded();
      try {
        const response = await this.octokit.request(`GET ${url}`, params);
        this.limiter.update(response.headers);
        const data: unknown = response.data;
        return data;
      } catch (err) {
        const failure = toFailedResponse(err);
        this.limiter.update(failure.headers);

        if (isRateLimitRejection(failure)) {
          this.limiter.markExhausted();
          if (attempt >= 2) throw new RateLimitedError(url);
          log.warn({ url, state: this.limiter.getState() }, "Rate limited, retrying after reset");
          continue;
        }

        throw new RequestFailedError(failure.status, failure.body, url, { cause: err });
      } finally {
        this.limiter.markRequestComplete();
      }
    }
  }
}

function enc(segment: string): string {
  return encodeURIComponent(segment);
}

function isBot(user: { login: string; type?: string } | null | undefined): boolean {
  if (!user) return false;
  return user.type === "Bot" || user.login.endsWith("[bot]");
}

function isRateLimitRejection(failure: FailedResponse): boolean {
  if (failure.status === 429) return true;
  return failure.status === 403 && /rate limit/i.test(failure.body);
}

interface HttpErrorShape {
  status?: unknown;
  response?: { data?: unknown; headers?: unknown } | null;
}

function isHttpError(err: unknown): err is HttpErrorShape {
  return typeof err === "object" && err !== null && "status" in err;
}

function isHeaderBag(value: unknown): value is HeaderBag {
  return typeof value === "object" && value !== null;
}

/** Octokit errors carry the response; transport failures have none (status 0). */
function toFailedResponse(err: unknown): FailedResponse {
  if (!isHttpError(err) || !err.response || typeof err.status !== "number") {
    return { status: 0, body: errorMessage(err), headers: undefined };
  }
  const data = err.response.data;
  return {
    status: err.status,
    body: typeof data === "string" ? data : JSON.stringify(data ?? null),
    headers: isHeaderBag(err.response.headers) ? err.response.headers : undefined,
  };
}

function parseOne<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, url: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationFailedError(
      `Unexpected response shape from ${url}`,
      result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    );
  }
  return result.data;
}

function parseItems<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  items: unknown[],
  what: string
): T[] {
  const parsed: T[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    } else {
      log.warn({ what, issues: result.error.issues.length }, "Skipping malformed API record");
    }
  }
  return parsed;
}
