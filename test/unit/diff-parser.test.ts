import { describe, it, expect } from "vitest";
import { extractSnippets, parseAddedLines } from "../../src/utils/diff-parser.js";
import { detectLanguage } from "../../src/utils/languages.js";
import {
  CONTEXT_AND_REMOVALS_HUNK,
  REMOVALS_ONLY_HUNK,
  TWO_RUN_HUNK,
} from "../fixtures/diff-hunks.js";

describe("diff-parser", () => {
  it("numbers added lines from the hunk header", () => {
    const lines = parseAddedLines(TWO_RUN_HUNK);

    expect(lines.map((l) => l.lineNumber)).toEqual([10, 11, 12, 15, 16]);
    expect(lines[0]).toEqual({ lineNumber: 10, content: "const width = 10;" });
  });

  it("splits added lines into snippets at gaps", () => {
    const snippets = extractSnippets(TWO_RUN_HUNK, "src/area.ts");

    expect(snippets).toHaveLength(2);
    expect(snippets.map((s) => [s.startLine, s.endLine])).toEqual([
      [10, 12],
      [15, 16],
    ]);
    expect(snippets[0].content).toBe(
      "const width = 10;\nconst height = 20;\nconst area = width * height;"
    );
    expect(snippets[1].path).toBe("src/area.ts");
    expect(snippets[1].language).toBe("typescript");
  });

  it("does not advance the counter on context or removed lines", () => {
    const lines = parseAddedLines(CONTEXT_AND_REMOVALS_HUNK);

    expect(lines).toEqual([
      { lineNumber: 20, content: "return file.trim();" },
      { lineNumber: 21, content: "" },
      { lineNumber: 22, content: "// trailing note" },
    ]);
  });

  it("ignores added lines before the first header", () => {
    const hunk = "+orphan line\n@@ -1 +7 @@\n+kept";

    expect(parseAddedLines(hunk)).toEqual([{ lineNumber: 7, content: "kept" }]);
  });

  it("treats ++ lines as diff metadata", () => {
    const hunk = "@@ -1,1 +1,2 @@\n++++ b/file.ts\n+real";

    expect(parseAddedLines(hunk)).toEqual([{ lineNumber: 1, content: "real" }]);
  });

  it("returns no snippets when nothing was added", () => {
    expect(extractSnippets(REMOVALS_ONLY_HUNK, "a.py")).toEqual([]);
    expect(extractSnippets("", "a.py")).toEqual([]);
  });

  it("drops groups whose content is blank", () => {
    const hunk = "@@ -1,0 +1,2 @@\n+\n+   ";

    expect(extractSnippets(hunk, "a.py")).toEqual([]);
  });

  it("strips carriage returns from CRLF diffs", () => {
    const hunk = "@@ -1,0 +3,1 @@\r\n+value = 1\r\n";

    expect(parseAddedLines(hunk)).toEqual([{ lineNumber: 3, content: "value = 1" }]);
  });
});

describe("detectLanguage", () => {
  it("maps extensions case-insensitively", () => {
    expect(detectLanguage("src/app.PY")).toBe("python");
    expect(detectLanguage("lib/Main.java")).toBe("java");
    expect(detectLanguage("web/index.tsx")).toBe("typescript");
  });

  it("recognises extension-less build files by name", () => {
    expect(detectLanguage("docker/Dockerfile")).toBe("dockerfile");
    expect(detectLanguage("Makefile")).toBe("makefile");
  });

  it("returns null for unknown files", () => {
    expect(detectLanguage("LICENSE")).toBeNull();
    expect(detectLanguage("data.unknownext")).toBeNull();
  });
});
