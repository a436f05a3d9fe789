import { z } from "zod";
import type { CompletionClient } from "../llm/client.js";
import { buildRuleExtractionPrompt, RULE_EXTRACTION_SYSTEM_PROMPT } from "../llm/prompts.js";
import { ExtractionFallbackError } from "../utils/errors.js";
import type { Clock } from "../utils/rate-limiter.js";
import { withRetry } from "../utils/retry.js";
import { roundConfidence } from "./heuristics.js";
import type { RuleCandidate, RuleContext, RuleSeverity } from "./types.js";
import { firstKeywordMatch, getVocabulary, isSeverity } from "./vocabulary.js";

const llmRuleSchema = z.object({
  rule_text: z.string().trim().min(1),
  rule_category: z.string().trim().min(1),
  rule_severity: z.string().trim().min(1),
  explanation: z.string().nullish(),
  examples: z.array(z.string()).nullish(),
  related_concepts: z.array(z.string()).nullish(),
});

export type LlmRuleResponse = z.infer<typeof llmRuleSchema>;

export type LlmExtraction = { kind: "rule"; candidate: RuleCandidate } | { kind: "no-rule" };

export interface LlmExtractorOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  maxAttempts: number;
  retryBaseDelayMs?: number;
  clock?: Clock;
}

/**
 * Model-backed rule extraction. Throws ExtractionFallbackError whenever the
 * model cannot be reached or its answer is unusable; the engine turns that
 * into a heuristic fallback.
 */
export class LlmRuleExtractor {
  constructor(
    private readonly client: CompletionClient,
    private readonly opts: LlmExtractorOptions
  ) {}

  get model(): string {
    return this.opts.model;
  }

  async extract(commentText: string, context: RuleContext): Promise<LlmExtraction> {
    const prompt = buildRuleExtractionPrompt(commentText, context);

    let text: string;
    try {
      text = await withRetry(
        () =>
          this.client.complete({
            model: this.opts.model,
            system: RULE_EXTRACTION_SYSTEM_PROMPT,
            prompt,
            maxTokens: this.opts.maxTokens,
            temperature: this.opts.temperature,
          }),
        {
          maxAttempts: this.opts.maxAttempts,
          baseDelayMs: this.opts.retryBaseDelayMs ?? 1000,
          clock: this.opts.clock,
          label: "rule-extraction",
        }
      );
    } catch (err) {
      throw new ExtractionFallbackError("Model call failed", { cause: err });
    }

    const parsed = parseModelJson(text);
    if (parsed === null) return { kind: "no-rule" };
    if (isRecord(parsed) && parsed.rule_text === null) return { kind: "no-rule" };

    const result = llmRuleSchema.safeParse(parsed);
    if (!result.success) {
      const fields = result.error.issues.map((i) => i.path.join(".")).join(", ");
      throw new ExtractionFallbackError(`Model answer failed validation: ${fields}`);
    }

    return { kind: "rule", candidate: this.toCandidate(result.data, text, context) };
  }

  private toCandidate(data: LlmRuleResponse, raw: string, context: RuleContext): RuleCandidate {
    const ruleText = data.rule_text.endsWith(".") ? data.rule_text : `${data.rule_text}.`;
    return {
      ruleText,
      category: normalizeCategory(data.rule_category),
      severity: normalizeSeverity(data.rule_severity),
      confidence: scoreModelAnswer(data, context),
      extractor: this.opts.model,
      rawOutput: raw,
      explanation: data.explanation ?? null,
      examples: data.examples ?? [],
      relatedConcepts: data.related_concepts ?? [],
    };
  }
}

export function normalizeCategory(raw: string): string {
  return firstKeywordMatch(getVocabulary().llmCategories, raw.trim()) ?? "general";
}

export function normalizeSeverity(raw: string): RuleSeverity {
  const matched = firstKeywordMatch(getVocabulary().llmSeverities, raw.trim());
  return matched && isSeverity(matched) ? matched : "info";
}

export function scoreModelAnswer(data: LlmRuleResponse, context: RuleContext): number {
  let confidence = 0.6; // base plus the three required fields
  if (data.explanation) confidence += 0.05;
  if (data.examples && data.examples.length > 0) confidence += 0.05;
  if (data.related_concepts && data.related_concepts.length > 0) confidence += 0.05;
  if (data.rule_text.length > 50) confidence += 0.05;
  if (context.filePath) confidence += 0.05;
  if (["security", "performance"].includes(data.rule_category.trim().toLowerCase())) {
    confidence += 0.05;
  }
  return roundConfidence(confidence);
}

/** Parses the model's text as JSON, tolerating code fences and surrounding prose. */
export function parseModelJson(text: string): unknown {
  const stripped = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  try {
    return JSON.parse(stripped);
  } catch {
    const match = stripped.match(/\{[\s\S]*\}/);
    if (!match) throw new ExtractionFallbackError("Model answer is not JSON");
    try {
      return JSON.parse(match[0]);
    } catch (err) {
      throw new ExtractionFallbackError("Model answer is not JSON", { cause: err });
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
