import { detectLanguage } from "./languages.js";

export interface AddedLine {
  lineNumber: number;
  content: string;
}

export interface SnippetCandidate {
  path: string;
  startLine: number;
  endLine: number;
  content: string;
  language: string | null;
}

const HUNK_HEADER = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/;

/**
 * Collects the lines a hunk adds, numbered on the new side of the diff.
 * A header resets the counter to its `+c` start; only `+` lines advance it.
 */
export function parseAddedLines(diffHunk: string): AddedLine[] {
  const added: AddedLine[] = [];
  let newLine: number | null = null;

  for (const line of diffHunk.split("\n")) {
    const header = line.match(HUNK_HEADER);
    if (header) {
      newLine = parseInt(header[3], 10);
      continue;
    }

    if (newLine === null) continue;

    if (line.startsWith("+") && !line.startsWith("++")) {
      added.push({ lineNumber: newLine, content: line.slice(1).replace(/\r$/, "") });
      newLine++;
    }
  }

  return added;
}

/** Groups runs of consecutive added lines into snippet candidates. */
export function extractSnippets(diffHunk: string, filePath: string): SnippetCandidate[] {
  const groups: AddedLine[][] = [];

  for (const line of parseAddedLines(diffHunk)) {
    const current = groups[groups.length - 1];
    const last = current?.[current.length - 1];
    if (current && last && line.lineNumber === last.lineNumber + 1) {
      current.push(line);
    } else {
      groups.push([line]);
    }
  }

  const language = detectLanguage(filePath);
  const snippets: SnippetCandidate[] = [];
  for (const group of groups) {
    const content = group.map((l) => l.content).join("\n");
    if (!content.trim()) continue;
    snippets.push({
      path: filePath,
      startLine: group[0].lineNumber,
      endLine: group[group.length - 1].lineNumber,
      content,
      language,
    });
  }
  return snippets;
}
