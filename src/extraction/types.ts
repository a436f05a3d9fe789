export const RULE_SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type RuleSeverity = (typeof RULE_SEVERITIES)[number];

/** What the engine knows about the comment a rule is extracted from. */
export interface RuleContext {
  filePath?: string | null;
  lineNumber?: number | null;
  position?: number | null;
  prTitle?: string | null;
  prNumber?: number | null;
  repositoryName?: string | null;
  author?: string | null;
  hasCodeSnippets?: boolean;
}

export interface RuleCandidate {
  ruleText: string;
  category: string;
  severity: RuleSeverity;
  /** 0..1 */
  confidence: number;
  /** "heuristic" or the model name */
  extractor: string;
  rawOutput: string;
  explanation: string | null;
  examples: string[];
  relatedConcepts: string[];
}

export interface HeuristicMatch {
  ruleText: string;
  /** Name of the pattern that matched, or "imperative" for the sentence tier */
  source: string;
}
