import type { RuleContext } from "../extraction/types.js";

export const RULE_EXTRACTION_SYSTEM_PROMPT =
  "You are an expert software engineer specializing in code quality and best practices. " +
  "You turn code review comments into reusable coding rules and answer with JSON only.";

const CATEGORY_LIST =
  "naming, style, performance, security, best_practices, error_handling, testing, documentation, architecture, readability, general";

export function buildRuleExtractionPrompt(commentText: string, context: RuleContext): string {
  return `Extract a specific coding rule or guideline from the following pull request review comment.

## Context
- Repository: ${context.repositoryName ?? "unknown"}
- Pull Request: ${context.prTitle ?? "unknown"}${context.prNumber ? ` (#${context.prNumber})` : ""}
- File: ${context.filePath ?? "n/a"}
- Line: ${context.lineNumber ?? "n/a"}

## Comment
"""
${commentText.slice(0, 4000)}
"""

## Requirements
The rule must be specific, actionable, applicable to similar code in the future, and written in clear imperative language.

## Output Format
Respond with ONLY a JSON object:
{
  "rule_text": "The extracted rule in clear, imperative language",
  "rule_category": "one of: ${CATEGORY_LIST}",
  "rule_severity": "one of: critical, high, medium, low, info",
  "explanation": "Brief explanation of why this rule matters",
  "examples": ["Example of good code", "Example of bad code"],
  "related_concepts": ["Related programming concepts or patterns"]
}

If the comment contains no coding rule, respond with: null`;
}
