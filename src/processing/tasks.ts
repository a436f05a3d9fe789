import { z } from "zod";
import { ValidationFailedError } from "../utils/errors.js";

const nonBlank = z.string().refine((value) => value.trim().length > 0, "must not be blank");
const positiveInt = z.number().int().positive();

export const ruleContextSchema = z.object({
  filePath: z.string().nullish(),
  lineNumber: z.number().int().nullish(),
  position: z.number().int().nullish(),
  prTitle: z.string().nullish(),
  prNumber: z.number().int().nullish(),
  repositoryName: z.string().nullish(),
  author: z.string().nullish(),
  hasCodeSnippets: z.boolean().optional(),
});

// Loose on purpose: each snippet is validated by its own normalize-snippet task.
const attachedSnippetSchema = z.object({
  path: z.string(),
  startLine: z.number().int(),
  endLine: z.number().int(),
  content: z.string(),
  language: z.string().nullable(),
});

export const normalizeCommentSchema = z.object({
  externalId: positiveInt,
  repositoryId: positiveInt,
  pullRequestId: positiveInt,
  // null for deleted accounts
  authorLogin: z.string().min(1).nullable().default(null),
  body: nonBlank,
  path: nonBlank,
  position: positiveInt,
  line: z.number().int().nullable().default(null),
  side: z.string().nullable().default(null),
  diffHunk: z.string().nullable().default(null),
  htmlUrl: z.string().nullable().default(null),
  postedAt: z.coerce.date().nullable().default(null),
  snippets: z.array(attachedSnippetSchema).default([]),
  context: ruleContextSchema.default({}),
});

export const normalizeSnippetSchema = z
  .object({
    commentExternalId: positiveInt,
    filePath: nonBlank,
    lineStart: positiveInt,
    lineEnd: positiveInt,
    content: nonBlank,
    language: z.string().nullable().default(null),
  })
  .refine((s) => s.lineStart <= s.lineEnd, {
    message: "lineStart must not exceed lineEnd",
    path: ["lineEnd"],
  });

export const normalizeThreadSchema = z.object({
  commentExternalId: positiveInt,
  path: nonBlank,
  position: positiveInt,
  isResolved: z.boolean().default(false),
});

export const extractRuleSchema = z.object({
  commentExternalId: positiveInt,
  repositoryId: positiveInt,
  body: z.string(),
  context: ruleContextSchema.default({}),
});

export const updateStatisticsSchema = z.object({
  ruleId: positiveInt,
  repositoryId: positiveInt,
  ruleText: nonBlank,
  confidence: z.number().min(0).max(1),
  seenAt: z.coerce.date(),
});

export const TASK_KINDS = [
  "normalize-comment",
  "normalize-snippet",
  "normalize-thread",
  "extract-rule",
  "update-statistics",
] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export type NormalizeCommentPayload = z.infer<typeof normalizeCommentSchema>;
export type NormalizeSnippetPayload = z.infer<typeof normalizeSnippetSchema>;
export type NormalizeThreadPayload = z.infer<typeof normalizeThreadSchema>;
export type ExtractRulePayload = z.infer<typeof extractRuleSchema>;
export type UpdateStatisticsPayload = z.infer<typeof updateStatisticsSchema>;

export type PipelineTask =
  | { kind: "normalize-comment"; payload: NormalizeCommentPayload }
  | { kind: "normalize-snippet"; payload: NormalizeSnippetPayload }
  | { kind: "normalize-thread"; payload: NormalizeThreadPayload }
  | { kind: "extract-rule"; payload: ExtractRulePayload }
  | { kind: "update-statistics"; payload: UpdateStatisticsPayload };

/** Validates an untyped payload and tags it with its kind. */
export function parseTask(kind: TaskKind, payload: unknown): PipelineTask {
  switch (kind) {
    case "normalize-comment":
      return { kind, payload: validatePayload(normalizeCommentSchema, kind, payload) };
    case "normalize-snippet":
      return { kind, payload: validatePayload(normalizeSnippetSchema, kind, payload) };
    case "normalize-thread":
      return { kind, payload: validatePayload(normalizeThreadSchema, kind, payload) };
    case "extract-rule":
      return { kind, payload: validatePayload(extractRuleSchema, kind, payload) };
    case "update-statistics":
      return { kind, payload: validatePayload(updateStatisticsSchema, kind, payload) };
  }
}

export function validatePayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  kind: TaskKind,
  payload: unknown
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new ValidationFailedError(
      `Invalid ${kind} payload`,
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}
