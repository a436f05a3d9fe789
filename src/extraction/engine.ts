import { createChildLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import {
  assessSeverity,
  calculateConfidence,
  categorizeRule,
  extractHeuristicRule,
} from "./heuristics.js";
import type { LlmRuleExtractor } from "./llm-extractor.js";
import type { RuleCandidate, RuleContext } from "./types.js";

const log = createChildLogger({ module: "rule-engine" });

export const HEURISTIC_EXTRACTOR = "heuristic";

/**
 * Turns a review comment into a rule candidate. Uses the model-backed
 * extractor when one is configured and falls back to the heuristic tiers on
 * any failure; never throws for a comment it cannot read.
 */
export class RuleExtractionEngine {
  constructor(private readonly llm: LlmRuleExtractor | null = null) {}

  get usesModel(): boolean {
    return this.llm !== null;
  }

  async extract(commentText: string, context: RuleContext = {}): Promise<RuleCandidate | null> {
    if (!commentText.trim()) return null;

    if (this.llm) {
      try {
        const result = await this.llm.extract(commentText, context);
        return result.kind === "rule" ? result.candidate : null;
      } catch (err) {
        log.warn(
          { err: errorMessage(err), model: this.llm.model },
          "Model extraction failed, falling back to heuristics"
        );
      }
    }

    return this.extractHeuristic(commentText, context);
  }

  extractHeuristic(commentText: string, context: RuleContext = {}): RuleCandidate | null {
    const match = extractHeuristicRule(commentText);
    if (!match) return null;

    return {
      ruleText: match.ruleText,
      category: categorizeRule(match.ruleText),
      severity: assessSeverity(match.ruleText),
      confidence: calculateConfidence(match.ruleText, context),
      extractor: HEURISTIC_EXTRACTOR,
      rawOutput: JSON.stringify({ rule: match.ruleText, pattern: match.source }),
      explanation: null,
      examples: [],
      relatedConcepts: [],
    };
  }
}
