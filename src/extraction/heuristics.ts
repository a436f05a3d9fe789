import { firstKeywordMatch, getVocabulary, isSeverity } from "./vocabulary.js";
import type { HeuristicMatch, RuleContext, RuleSeverity } from "./types.js";

// A clause runs until sentence punctuation or a line break.
const CLAUSE = "[^.!?\\n]";

interface RulePattern {
  name: string;
  regex: RegExp;
}

/** Ordered: the first pattern that matches wins. */
export const RULE_PATTERNS: readonly RulePattern[] = [
  { name: "should-always-never", regex: new RegExp(`\\bshould\\s+(?:always|never)\\s+${CLAUSE}+`, "i") },
  { name: "avoid", regex: new RegExp(`\\bavoid\\s+${CLAUSE}+`, "i") },
  { name: "use-instead", regex: new RegExp(`\\buse\\s+${CLAUSE}+?\\s+instead\\b${CLAUSE}*`, "i") },
  { name: "prefer-over", regex: new RegExp(`\\bprefer\\s+${CLAUSE}+?\\s+over\\s+${CLAUSE}+`, "i") },
  { name: "follow-convention", regex: new RegExp(`\\bfollow\\s+${CLAUSE}*?\\bconventions?\\b${CLAUSE}*`, "i") },
  { name: "ensure-is", regex: new RegExp(`\\bensure\\s+${CLAUSE}+?\\s+is\\s+${CLAUSE}+`, "i") },
  { name: "make-sure-to", regex: new RegExp(`\\bmake\\s+sure\\s+to\\s+${CLAUSE}+`, "i") },
  { name: "remember-to", regex: new RegExp(`\\bremember\\s+to\\s+${CLAUSE}+`, "i") },
  { name: "do-not", regex: new RegExp(`\\b(?:do\\s+not|don't)\\s+${CLAUSE}+`, "i") },
  { name: "always", regex: new RegExp(`\\balways\\s+${CLAUSE}+`, "i") },
  { name: "never", regex: new RegExp(`\\bnever\\s+${CLAUSE}+`, "i") },
];

const MIN_IMPERATIVE_SENTENCE_LENGTH = 10;

/**
 * Pattern tier first, then the first imperative sentence. Returns null when
 * the comment carries no recognisable rule.
 */
export function extractHeuristicRule(text: string): HeuristicMatch | null {
  if (!text.trim()) return null;

  for (const pattern of RULE_PATTERNS) {
    const match = text.match(pattern.regex);
    if (match) {
      const ruleText = toRuleSentence(match[0]);
      if (ruleText) return { ruleText, source: pattern.name };
    }
  }

  const verbs = new Set(getVocabulary().imperativeVerbs);
  for (const sentence of text.split(/[.!?]+/)) {
    const trimmed = sentence.trim();
    if (trimmed.length <= MIN_IMPERATIVE_SENTENCE_LENGTH) continue;

    const firstWord = (trimmed.split(/\s+/)[0] ?? "").toLowerCase().replace(/[^a-z]/g, "");
    if (verbs.has(firstWord)) {
      const ruleText = toRuleSentence(trimmed);
      if (ruleText) return { ruleText, source: "imperative" };
    }
  }

  return null;
}

/** Capitalised, period-terminated form of a matched clause. */
export function toRuleSentence(fragment: string): string | null {
  const cleaned = fragment.replace(/\s+/g, " ").trim().replace(/[\s,;:]+$/, "");
  if (!cleaned) return null;
  const capitalised = cleaned[0].toUpperCase() + cleaned.slice(1);
  return capitalised.endsWith(".") ? capitalised : `${capitalised}.`;
}

export function categorizeRule(ruleText: string): string {
  return firstKeywordMatch(getVocabulary().categories, ruleText) ?? "general";
}

export function assessSeverity(ruleText: string): RuleSeverity {
  const matched = firstKeywordMatch(getVocabulary().severities, ruleText);
  if (matched && isSeverity(matched)) return matched;
  if (ruleText.length > 100) return "medium";
  if (ruleText.length > 50) return "low";
  return "info";
}

export function calculateConfidence(ruleText: string, context: RuleContext): number {
  let confidence = 0.5;
  if (ruleText.length > 50) confidence += 0.1;
  if (context.hasCodeSnippets) confidence += 0.1;
  if (context.filePath) confidence += 0.05;
  if (context.author) confidence += 0.05;
  return roundConfidence(confidence);
}

/** Two decimals, clamped to [0, 1]. */
export function roundConfidence(value: number): number {
  return Math.min(1, Math.max(0, Math.round(value * 100) / 100));
}

/** Key under which occurrences of the same rule are counted together. */
export function ruleKey(ruleText: string): string {
  return ruleText.toLowerCase().replace(/\s+/g, " ").trim().replace(/\.+$/, "");
}
