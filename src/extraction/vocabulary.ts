import { z } from "zod";
import { loadDataFile } from "../utils/data-files.js";
import { RULE_SEVERITIES, type RuleSeverity } from "./types.js";

const keywordTable = z.record(z.string(), z.array(z.string()));

const vocabularySchema = z.object({
  imperativeVerbs: z.array(z.string()),
  categories: keywordTable,
  severities: keywordTable,
  llmCategories: keywordTable,
  llmSeverities: keywordTable,
});

export type RuleVocabulary = z.infer<typeof vocabularySchema>;

let _vocabulary: RuleVocabulary | null = null;

export function getVocabulary(): RuleVocabulary {
  _vocabulary ??= loadDataFile("rule-vocabulary.json", vocabularySchema);
  return _vocabulary;
}

/** First table entry (in file order) with a keyword contained in `text`. */
export function firstKeywordMatch(
  table: Record<string, string[]>,
  text: string
): string | null {
  const lower = text.toLowerCase();
  for (const [key, keywords] of Object.entries(table)) {
    if (keywords.some((keyword) => lower.includes(keyword))) return key;
  }
  return null;
}

export function isSeverity(value: string): value is RuleSeverity {
  return RULE_SEVERITIES.some((severity) => severity === value);
}
