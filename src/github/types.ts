import { z } from "zod";

const userSchema = z
  .object({
    login: z.string(),
    type: z.string().optional(),
  })
  .nullable()
  .optional();

export const repositorySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  full_name: z.string(),
  owner: z.object({ login: z.string() }),
  description: z.string().nullable().optional(),
  html_url: z.string().optional(),
  language: z.string().nullable().optional(),
  archived: z.boolean().default(false),
});

export const pullRequestSchema = z.object({
  id: z.number().int(),
  number: z.number().int().positive(),
  title: z.string(),
  body: z.string().nullable().optional(),
  state: z.enum(["open", "closed"]),
  user: userSchema,
  html_url: z.string().optional(),
  created_at: z.string().nullable().optional(),
  closed_at: z.string().nullable().optional(),
  merged_at: z.string().nullable().optional(),
});

export const reviewCommentSchema = z.object({
  id: z.number().int(),
  body: z.string().default(""),
  path: z.string(),
  position: z.number().int().nullable().optional(),
  original_position: z.number().int().nullable().optional(),
  line: z.number().int().nullable().optional(),
  side: z.string().nullable().optional(),
  diff_hunk: z.string().nullable().optional(),
  user: userSchema,
  html_url: z.string().optional(),
  created_at: z.string().nullable().optional(),
});

export const issueCommentSchema = z.object({
  id: z.number().int(),
  body: z.string().nullable().optional(),
  user: userSchema,
  html_url: z.string().optional(),
  created_at: z.string().nullable().optional(),
});

const rateSchema = z.object({
  limit: z.number(),
  remaining: z.number(),
  reset: z.number(),
  used: z.number().optional(),
});

export const rateLimitResponseSchema = z.object({
  rate: rateSchema,
});

export type GitHubRepository = z.infer<typeof repositorySchema>;
export type GitHubPullRequest = z.infer<typeof pullRequestSchema>;
export type GitHubReviewComment = z.infer<typeof reviewCommentSchema>;
export type GitHubIssueComment = z.infer<typeof issueCommentSchema>;
export type RateLimitStatus = z.infer<typeof rateSchema>;

/**
 * A pull request comment from either listing. Only review comments carry a
 * diff anchor (path, position, hunk).
 */
export interface CollectedComment {
  source: "review" | "issue";
  id: number;
  body: string;
  authorLogin: string | null;
  authorIsBot: boolean;
  path: string | null;
  position: number | null;
  line: number | null;
  side: string | null;
  diffHunk: string | null;
  htmlUrl: string | null;
  createdAt: string | null;
}
