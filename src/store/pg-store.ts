import pg from "pg";
import { createChildLogger } from "../utils/logger.js";
import { isSeverity } from "../extraction/vocabulary.js";
import type { RuleSeverity } from "../extraction/types.js";
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

const log = createChildLogger({ module: "pg-store" });

// GitHub ids overflow int4; BIGINT columns come back as strings unless parsed.
pg.types.setTypeParser(pg.types.builtins.INT8, (value) => parseInt(value, 10));

export interface SqlResult<R> {
  rows: R[];
  rowCount: number | null;
}

/** One checked-out connection. Never shared between concurrent sessions. */
export interface SqlConnection {
  query<R>(text: string, values?: unknown[]): Promise<SqlResult<R>>;
  /** Runs a multi-statement script without parameters. */
  exec(script: string): Promise<void>;
  release(): void;
}

export interface SqlPool {
  connect(): Promise<SqlConnection>;
  end(): Promise<void>;
}

/** node-postgres pool behind the store's connection interface. */
export function createPgPool(connectionString: string, max = 10): SqlPool {
  const pool = new pg.Pool({ connectionString, max });
  pool.on("error", (err) => log.error({ err }, "Idle PostgreSQL client error"));

  return {
    async connect(): Promise<SqlConnection> {
      const client = await pool.connect();
      return {
        query: async <R>(text: string, values?: unknown[]): Promise<SqlResult<R>> => {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        exec: async (script: string): Promise<void> => {
          await client.query(script);
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS repositories (
    id SERIAL PRIMARY KEY,
    external_id BIGINT NOT NULL UNIQUE,
    owner TEXT NOT NULL,
    name TEXT NOT NULL,
    full_name TEXT NOT NULL,
    description TEXT,
    html_url TEXT,
    language TEXT,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS pull_requests (
    id SERIAL PRIMARY KEY,
    external_id BIGINT NOT NULL UNIQUE,
    repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
    number INTEGER NOT NULL,
    title TEXT NOT NULL,
    body TEXT,
    state TEXT NOT NULL CHECK (state IN ('open', 'closed')),
    author_login TEXT NOT NULL,
    html_url TEXT,
    opened_at TIMESTAMPTZ,
    closed_at TIMESTAMPTZ,
    merged_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CHECK (merged_at IS NULL OR state = 'closed')
  );

  CREATE TABLE IF NOT EXISTS review_comments (
    id SERIAL PRIMARY KEY,
    external_id BIGINT NOT NULL UNIQUE,
    pull_request_id INTEGER NOT NULL REFERENCES pull_requests(id) ON DELETE CASCADE,
    author_login TEXT NOT NULL,
    body TEXT NOT NULL,
    path TEXT NOT NULL,
    position INTEGER NOT NULL,
    line INTEGER,
    side TEXT,
    diff_hunk TEXT,
    html_url TEXT,
    posted_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS code_snippets (
    id SERIAL PRIMARY KEY,
    review_comment_id INTEGER NOT NULL REFERENCES review_comments(id) ON DELETE CASCADE,
    file_path TEXT NOT NULL,
    line_start INTEGER NOT NULL CHECK (line_start > 0),
    line_end INTEGER NOT NULL CHECK (line_end >= line_start),
    content TEXT NOT NULL,
    language TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (review_comment_id, line_start, line_end)
  );

  CREATE TABLE IF NOT EXISTS comment_threads (
    id SERIAL PRIMARY KEY,
    pull_request_id INTEGER NOT NULL REFERENCES pull_requests(id) ON DELETE CASCADE,
    review_comment_id INTEGER NOT NULL REFERENCES review_comments(id) ON DELETE CASCADE,
    path TEXT NOT NULL,
    position INTEGER NOT NULL,
    is_resolved BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (pull_request_id, path, position)
  );

  CREATE TABLE IF NOT EXISTS extracted_rules (
    id SERIAL PRIMARY KEY,
    review_comment_id INTEGER NOT NULL UNIQUE REFERENCES review_comments(id) ON DELETE CASCADE,
    rule_text TEXT NOT NULL,
    rule_key TEXT NOT NULL,
    category TEXT NOT NULL,
    severity TEXT NOT NULL,
    confidence DOUBLE PRECISION NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
    extractor TEXT NOT NULL,
    raw_output TEXT NOT NULL,
    explanation TEXT,
    examples JSONB NOT NULL DEFAULT '[]',
    related_concepts JSONB NOT NULL DEFAULT '[]',
    is_valid BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE TABLE IF NOT EXISTS rule_statistics (
    id SERIAL PRIMARY KEY,
    rule_id INTEGER REFERENCES extracted_rules(id) ON DELETE SET NULL,
    repository_id INTEGER NOT NULL REFERENCES repositories(id) ON DELETE CASCADE,
    rule_key TEXT NOT NULL,
    occurrence_count INTEGER NOT NULL DEFAULT 1 CHECK (occurrence_count >= 1),
    first_seen TIMESTAMPTZ NOT NULL,
    last_seen TIMESTAMPTZ NOT NULL,
    avg_confidence DOUBLE PRECISION NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (repository_id, rule_key)
  );

  CREATE INDEX IF NOT EXISTS idx_pull_requests_repo ON pull_requests(repository_id);
  CREATE INDEX IF NOT EXISTS idx_review_comments_pr ON review_comments(pull_request_id);
  CREATE INDEX IF NOT EXISTS idx_extracted_rules_category ON extracted_rules(category);
  CREATE INDEX IF NOT EXISTS idx_extracted_rules_key ON extracted_rules(rule_key);
  CREATE INDEX IF NOT EXISTS idx_rule_statistics_seen ON rule_statistics(first_seen, last_seen);
`;

export class PgStoreHandle implements StoreHandle {
  readonly kind = "postgres" as const;

  constructor(private readonly pool: SqlPool) {}

  async init(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.exec(SCHEMA);
      log.info("PostgreSQL tables initialized");
    } finally {
      client.release();
    }
  }

  /** Checks out a dedicated connection for the session's lifetime. */
  async openSession(): Promise<StoreSession> {
    return new PgSession(await this.pool.connect());
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// ─── Row shapes ───

interface RepositoryRow {
  id: number;
  external_id: number;
  owner: string;
  name: string;
  full_name: string;
  description: string | null;
  html_url: string | null;
  language: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

interface PullRequestRow {
  id: number;
  external_id: number;
  repository_id: number;
  number: number;
  title: string;
  body: string | null;
  state: string;
  author_login: string;
  html_url: string | null;
  opened_at: Date | null;
  closed_at: Date | null;
  merged_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface ReviewCommentRow {
  id: number;
  external_id: number;
  pull_request_id: number;
  author_login: string;
  body: string;
  path: string;
  position: number;
  line: number | null;
  side: string | null;
  diff_hunk: string | null;
  html_url: string | null;
  posted_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface CodeSnippetRow {
  id: number;
  review_comment_id: number;
  file_path: string;
  line_start: number;
  line_end: number;
  content: string;
  language: string | null;
  created_at: Date;
}

interface CommentThreadRow {
  id: number;
  pull_request_id: number;
  review_comment_id: number;
  path: string;
  position: number;
  is_resolved: boolean;
  created_at: Date;
  updated_at: Date;
}

interface ExtractedRuleRow {
  id: number;
  review_comment_id: number;
  rule_text: string;
  rule_key: string;
  category: string;
  severity: string;
  confidence: number;
  extractor: string;
  raw_output: string;
  explanation: string | null;
  examples: unknown;
  related_concepts: unknown;
  is_valid: boolean;
  created_at: Date;
  updated_at: Date;
}

interface RuleStatisticsRow {
  id: number;
  rule_id: number | null;
  repository_id: number;
  rule_key: string;
  occurrence_count: number;
  first_seen: Date;
  last_seen: Date;
  avg_confidence: number;
  created_at: Date;
  updated_at: Date;
}

interface TopRuleRow {
  rule_id: number;
  repository_id: number;
  rule_text: string;
  category: string;
  severity: string;
  occurrence_count: number;
  avg_confidence: number;
  first_seen: Date;
  last_seen: Date;
}

function toSeverity(value: string): RuleSeverity {
  return isSeverity(value) ? value : "info";
}

function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function firstRow<T>(rows: T[], what: string): T {
  const row = rows[0];
  if (!row) throw new Error(`Expected a ${what} row to be returned`);
  return row;
}

const mapRepository = (r: RepositoryRow): Repository => ({
  id: r.id,
  externalId: r.external_id,
  owner: r.owner,
  name: r.name,
  fullName: r.full_name,
  description: r.description,
  htmlUrl: r.html_url,
  language: r.language,
  isActive: r.is_active,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

const mapPullRequest = (r: PullRequestRow): PullRequest => ({
  id: r.id,
  externalId: r.external_id,
  repositoryId: r.repository_id,
  number: r.number,
  title: r.title,
  body: r.body,
  state: r.state === "open" ? "open" : "closed",
  authorLogin: r.author_login,
  htmlUrl: r.html_url,
  openedAt: r.opened_at,
  closedAt: r.closed_at,
  mergedAt: r.merged_at,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

const mapReviewComment = (r: ReviewCommentRow): ReviewComment => ({
  id: r.id,
  externalId: r.external_id,
  pullRequestId: r.pull_request_id,
  authorLogin: r.author_login,
  body: r.body,
  path: r.path,
  position: r.position,
  line: r.line,
  side: r.side,
  diffHunk: r.diff_hunk,
  htmlUrl: r.html_url,
  postedAt: r.posted_at,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

const mapCodeSnippet = (r: CodeSnippetRow): CodeSnippet => ({
  id: r.id,
  reviewCommentId: r.review_comment_id,
  filePath: r.file_path,
  lineStart: r.line_start,
  lineEnd: r.line_end,
  content: r.content,
  language: r.language,
  createdAt: r.created_at,
});

const mapCommentThread = (r: CommentThreadRow): CommentThread => ({
  id: r.id,
  pullRequestId: r.pull_request_id,
  reviewCommentId: r.review_comment_id,
  path: r.path,
  position: r.position,
  isResolved: r.is_resolved,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

const mapExtractedRule = (r: ExtractedRuleRow): ExtractedRule => ({
  id: r.id,
  reviewCommentId: r.review_comment_id,
  ruleText: r.rule_text,
  ruleKey: r.rule_key,
  category: r.category,
  severity: toSeverity(r.severity),
  confidence: r.confidence,
  extractor: r.extractor,
  rawOutput: r.raw_output,
  explanation: r.explanation,
  examples: toStringArray(r.examples),
  relatedConcepts: toStringArray(r.related_concepts),
  isValid: r.is_valid,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

const mapRuleStatistics = (r: RuleStatisticsRow): RuleStatistics => ({
  id: r.id,
  ruleId: r.rule_id,
  repositoryId: r.repository_id,
  ruleKey: r.rule_key,
  occurrenceCount: r.occurrence_count,
  firstSeen: r.first_seen,
  lastSeen: r.last_seen,
  avgConfidence: r.avg_confidence,
  createdAt: r.created_at,
  updatedAt: r.updated_at,
});

class PgSession implements StoreSession {
  private released = false;

  constructor(private readonly client: SqlConnection) {}

  release(): void {
    if (this.released) return;
    this.released = true;
    this.client.release();
  }

  async upsertRepository(input: RepositoryInput): Promise<Repository> {
    const { rows } = await this.client.query<RepositoryRow>(
      `INSERT INTO repositories (
        external_id, owner, name, full_name, description, html_url, language, is_active
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8)
      ON CONFLICT (external_id) DO UPDATE SET
        owner = EXCLUDED.owner,
        name = EXCLUDED.name,
        full_name = EXCLUDED.full_name,
        description = EXCLUDED.description,
        html_url = EXCLUDED.html_url,
        language = EXCLUDED.language,
        is_active = EXCLUDED.is_active,
        updated_at = NOW()
      RETURNING *`,
      [
        input.externalId, input.owner, input.name, input.fullName,
        input.description, input.htmlUrl, input.language, input.isActive,
      ]
    );
    return mapRepository(firstRow(rows, "repository"));
  }

  async upsertPullRequest(input: PullRequestInput): Promise<PullRequest> {
    const { rows } = await this.client.query<PullRequestRow>(
      `INSERT INTO pull_requests (
        external_id, repository_id, number, title, body, state, author_login,
        html_url, opened_at, closed_at, merged_at
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)
      ON CONFLICT (external_id) DO UPDATE SET
        repository_id = EXCLUDED.repository_id,
        number = EXCLUDED.number,
        title = EXCLUDED.title,
        body = EXCLUDED.body,
        state = EXCLUDED.state,
        author_login = EXCLUDED.author_login,
        html_url = EXCLUDED.html_url,
        opened_at = EXCLUDED.opened_at,
        closed_at = EXCLUDED.closed_at,
        merged_at = EXCLUDED.merged_at,
        updated_at = NOW()
      RETURNING *`,
      [
        input.externalId, input.repositoryId, input.number, input.title, input.body,
        input.state, input.authorLogin, input.htmlUrl, input.openedAt,
        input.closedAt, input.mergedAt,
      ]
    );
    return mapPullRequest(firstRow(rows, "pull request"));
  }

  async upsertReviewComment(input: ReviewCommentInput): Promise<ReviewComment> {
    const { rows } = await this.client.query<ReviewCommentRow>(
      `INSERT INTO review_comments (
        external_id, pull_request_id, author_login, body, path, position, line,
        side, diff_hunk, html_url, posted_at
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)
      ON CONFLICT (external_id) DO UPDATE SET
        pull_request_id = EXCLUDED.pull_request_id,
        author_login = EXCLUDED.author_login,
        body = EXCLUDED.body,
        path = EXCLUDED.path,
        position = EXCLUDED.position,
        line = EXCLUDED.line,
        side = EXCLUDED.side,
        diff_hunk = EXCLUDED.diff_hunk,
        html_url = EXCLUDED.html_url,
        posted_at = EXCLUDED.posted_at,
        updated_at = NOW()
      RETURNING *`,
      [
        input.externalId, input.pullRequestId, input.authorLogin, input.body,
        input.path, input.position, input.line, input.side, input.diffHunk,
        input.htmlUrl, input.postedAt,
      ]
    );
    return mapReviewComment(firstRow(rows, "review comment"));
  }

  async findReviewCommentByExternalId(externalId: number): Promise<ReviewComment | null> {
    const { rows } = await this.client.query<ReviewCommentRow>(
      "SELECT * FROM review_comments WHERE external_id = $1",
      [externalId]
    );
    const row = rows[0];
    return row ? mapReviewComment(row) : null;
  }

  async upsertCodeSnippet(input: CodeSnippetInput): Promise<CodeSnippet> {
    const { rows } = await this.client.query<CodeSnippetRow>(
      `INSERT INTO code_snippets (
        review_comment_id, file_path, line_start, line_end, content, language
      ) VALUES ($1,$2,$3,$4,$5,$6)
      ON CONFLICT (review_comment_id, line_start, line_end) DO UPDATE SET
        file_path = EXCLUDED.file_path,
        content = EXCLUDED.content,
        language = EXCLUDED.language
      RETURNING *`,
      [
        input.reviewCommentId, input.filePath, input.lineStart, input.lineEnd,
        input.content, input.language,
      ]
    );
    return mapCodeSnippet(firstRow(rows, "code snippet"));
  }

  async upsertCommentThread(input: CommentThreadInput): Promise<CommentThread> {
    const { rows } = await this.client.query<CommentThreadRow>(
      `INSERT INTO comment_threads (
        pull_request_id, review_comment_id, path, position, is_resolved
      ) VALUES ($1,$2,$3,$4,$5)
      ON CONFLICT (pull_request_id, path, position) DO UPDATE SET
        is_resolved = EXCLUDED.is_resolved,
        updated_at = NOW()
      RETURNING *`,
      [input.pullRequestId, input.reviewCommentId, input.path, input.position, input.isResolved]
    );
    return mapCommentThread(firstRow(rows, "comment thread"));
  }

  async saveExtractedRule(input: ExtractedRuleInput): Promise<SavedRule> {
    const { rows } = await this.client.query<ExtractedRuleRow & { inserted: boolean }>(
      `INSERT INTO extracted_rules (
        review_comment_id, rule_text, rule_key, category, severity, confidence,
        extractor, raw_output, explanation, examples, related_concepts
      ) VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10::text::jsonb,$11::text::jsonb)
      ON CONFLICT (review_comment_id) DO UPDATE SET
        rule_text = EXCLUDED.rule_text,
        rule_key = EXCLUDED.rule_key,
        category = EXCLUDED.category,
        severity = EXCLUDED.severity,
        confidence = EXCLUDED.confidence,
        extractor = EXCLUDED.extractor,
        raw_output = EXCLUDED.raw_output,
        explanation = EXCLUDED.explanation,
        examples = EXCLUDED.examples,
        related_concepts = EXCLUDED.related_concepts,
        updated_at = NOW()
      RETURNING *, (xmax = 0) AS inserted`,
      [
        input.reviewCommentId, input.ruleText, input.ruleKey, input.category,
        input.severity, input.confidence, input.extractor, input.rawOutput, input.explanation,
        JSON.stringify(input.examples), JSON.stringify(input.relatedConcepts),
      ]
    );
    const row = firstRow(rows, "extracted rule");
    return { rule: mapExtractedRule(row), created: row.inserted };
  }

  async setRuleValidity(ruleId: number, isValid: boolean): Promise<ExtractedRule | null> {
    const { rows } = await this.client.query<ExtractedRuleRow>(
      `UPDATE extracted_rules SET is_valid = $2, updated_at = NOW()
      WHERE id = $1 RETURNING *`,
      [ruleId, isValid]
    );
    const row = rows[0];
    return row ? mapExtractedRule(row) : null;
  }

  /** Single statement, so concurrent workers cannot lose an increment. */
  async recordRuleOccurrence(input: RuleOccurrenceInput): Promise<RuleStatistics> {
    const { rows } = await this.client.query<RuleStatisticsRow>(
      `INSERT INTO rule_statistics (
        rule_id, repository_id, rule_key, occurrence_count, first_seen, last_seen, avg_confidence
      ) VALUES ($1,$2,$3,1,$4,$4,$5)
      ON CONFLICT (repository_id, rule_key) DO UPDATE SET
        rule_id = COALESCE(rule_statistics.rule_id, EXCLUDED.rule_id),
        occurrence_count = rule_statistics.occurrence_count + 1,
        avg_confidence = (rule_statistics.avg_confidence * rule_statistics.occurrence_count
          + EXCLUDED.avg_confidence) / (rule_statistics.occurrence_count + 1),
        first_seen = LEAST(rule_statistics.first_seen, EXCLUDED.first_seen),
        last_seen = GREATEST(rule_statistics.last_seen, EXCLUDED.last_seen),
        updated_at = NOW()
      RETURNING *`,
      [input.ruleId, input.repositoryId, input.ruleKey, input.seenAt, input.confidence]
    );
    return mapRuleStatistics(firstRow(rows, "rule statistics"));
  }

  async listTopRules(opts: { repositoryId?: number; limit: number }): Promise<TopRule[]> {
    const params: unknown[] = [opts.limit];
    let repoClause = "";
    if (opts.repositoryId !== undefined) {
      params.push(opts.repositoryId);
      repoClause = "AND s.repository_id = $2";
    }
    const { rows } = await this.client.query<TopRuleRow>(
      `SELECT r.id AS rule_id, s.repository_id, r.rule_text, r.category, r.severity,
        s.occurrence_count, s.avg_confidence, s.first_seen, s.last_seen
      FROM rule_statistics s
      JOIN LATERAL (
        SELECT er.id, er.rule_text, er.category, er.severity
        FROM extracted_rules er
        JOIN review_comments c ON c.id = er.review_comment_id
        JOIN pull_requests p ON p.id = c.pull_request_id
        WHERE er.is_valid AND er.rule_key = s.rule_key AND p.repository_id = s.repository_id
        ORDER BY er.id = s.rule_id DESC NULLS LAST, er.id
        LIMIT 1
      ) r ON TRUE
      WHERE TRUE ${repoClause}
      ORDER BY s.occurrence_count DESC, s.avg_confidence DESC, s.id
      LIMIT $1`,
      params
    );
    return rows.map((r) => ({
      ruleId: r.rule_id,
      repositoryId: r.repository_id,
      ruleText: r.rule_text,
      category: r.category,
      severity: toSeverity(r.severity),
      occurrenceCount: r.occurrence_count,
      avgConfidence: r.avg_confidence,
      firstSeen: r.first_seen,
      lastSeen: r.last_seen,
    }));
  }

  async countEntities(): Promise<EntityCounts> {
    const { rows } = await this.client.query<EntityCounts>(
      `SELECT
        (SELECT COUNT(*) FROM repositories)::int AS "repositories",
        (SELECT COUNT(*) FROM pull_requests)::int AS "pullRequests",
        (SELECT COUNT(*) FROM review_comments)::int AS "reviewComments",
        (SELECT COUNT(*) FROM code_snippets)::int AS "codeSnippets",
        (SELECT COUNT(*) FROM comment_threads)::int AS "commentThreads",
        (SELECT COUNT(*) FROM extracted_rules)::int AS "extractedRules",
        (SELECT COUNT(*) FROM rule_statistics)::int AS "ruleStatistics"`
    );
    return firstRow(rows, "count");
  }

  async deleteCreatedBefore(cutoff: Date): Promise<RetentionResult> {
    await this.client.query("BEGIN");
    try {
      const del = async (table: string): Promise<number> => {
        const result = await this.client.query(`DELETE FROM ${table} WHERE created_at < $1`, [cutoff]);
        return result.rowCount ?? 0;
      };
      const counts: RetentionResult = {
        codeSnippets: await del("code_snippets"),
        commentThreads: await del("comment_threads"),
        reviewComments: await del("review_comments"),
        pullRequests: await del("pull_requests"),
        repositories: await del("repositories"),
      };
      await this.client.query("COMMIT");
      return counts;
    } catch (err) {
      await this.client.query("ROLLBACK");
      throw err;
    }
  }
}
