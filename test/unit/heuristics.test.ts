import { describe, it, expect } from "vitest";
import {
  assessSeverity,
  calculateConfidence,
  categorizeRule,
  extractHeuristicRule,
  ruleKey,
  toRuleSentence,
} from "../../src/extraction/heuristics.js";

describe("extractHeuristicRule", () => {
  it("extracts should-always clauses", () => {
    expect(extractHeuristicRule("You should always validate user input.")).toEqual({
      ruleText: "Should always validate user input.",
      source: "should-always-never",
    });
  });

  it("stops a clause at sentence punctuation", () => {
    const match = extractHeuristicRule("Avoid nested ternaries here! They are hard to follow.");

    expect(match).toEqual({ ruleText: "Avoid nested ternaries here.", source: "avoid" });
  });

  it("applies patterns in order, not by position in the text", () => {
    const match = extractHeuristicRule("Never log secrets. You should never commit tokens.");

    expect(match?.source).toBe("should-always-never");
    expect(match?.ruleText).toBe("Should never commit tokens.");
  });

  it("recognises the remaining pattern families", () => {
    const cases: Array<[string, string, string]> = [
      ["Please use const instead of let here", "use-instead", "Use const instead of let here."],
      ["I prefer early returns over nested ifs", "prefer-over", "Prefer early returns over nested ifs."],
      ["Follow the naming conventions of the module", "follow-convention", "Follow the naming conventions of the module."],
      ["Ensure the buffer is flushed", "ensure-is", "Ensure the buffer is flushed."],
      ["Make sure to close the connection", "make-sure-to", "Make sure to close the connection."],
      ["Please remember to bump the version", "remember-to", "Remember to bump the version."],
      ["Don't mutate the props object", "do-not", "Don't mutate the props object."],
      ["We always pin dependency versions", "always", "Always pin dependency versions."],
    ];

    for (const [text, source, ruleText] of cases) {
      expect(extractHeuristicRule(text)).toEqual({ ruleText, source });
    }
  });

  it("trims trailing separators from the match", () => {
    expect(extractHeuristicRule("Avoid globals;")?.ruleText).toBe("Avoid globals.");
  });

  it("falls back to the first imperative sentence", () => {
    const match = extractHeuristicRule("Looks fine. Refactor this loop into a helper. Thanks");

    expect(match).toEqual({ ruleText: "Refactor this loop into a helper.", source: "imperative" });
  });

  it("skips imperative sentences of ten characters or fewer", () => {
    expect(extractHeuristicRule("Fix this.")).toBeNull();
  });

  it("returns null for comments without a rule", () => {
    expect(extractHeuristicRule("Looks good to me, nice work")).toBeNull();
    expect(extractHeuristicRule("   ")).toBeNull();
  });

  it("is deterministic for identical input", () => {
    const text = "Make sure to handle the error from fetch.";
    const first = extractHeuristicRule(text);

    for (let i = 0; i < 5; i++) {
      expect(extractHeuristicRule(text)).toEqual(first);
    }
  });
});

describe("toRuleSentence", () => {
  it("capitalises and terminates", () => {
    expect(toRuleSentence("use   snake case ")).toBe("Use snake case.");
    expect(toRuleSentence("Already done.")).toBe("Already done.");
    expect(toRuleSentence(" ,; ")).toBeNull();
  });
});

describe("categorizeRule", () => {
  it("takes the first category whose keyword appears", () => {
    expect(categorizeRule("Use descriptive variable names.")).toBe("naming");
    expect(categorizeRule("Catch the exception close to the call.")).toBe("error_handling");
    expect(categorizeRule("Add a unit test for the parser.")).toBe("testing");
  });

  it("defaults to general", () => {
    expect(categorizeRule("Should always validate user input.")).toBe("general");
  });
});

describe("assessSeverity", () => {
  it("uses keywords before length", () => {
    expect(assessSeverity("You must pin versions.")).toBe("critical");
    expect(assessSeverity("This is an important check.")).toBe("high");
    expect(assessSeverity("Should always validate user input.")).toBe("medium");
    expect(assessSeverity("A minor tweak.")).toBe("low");
  });

  it("falls back to length bands", () => {
    expect(assessSeverity("Keep it tidy.")).toBe("info");
    expect(assessSeverity("x".repeat(51))).toBe("low");
    expect(assessSeverity("x".repeat(101))).toBe("medium");
  });
});

describe("calculateConfidence", () => {
  it("adds bonuses for length and context", () => {
    const rule = "Should always validate user input.";

    expect(calculateConfidence(rule, {})).toBe(0.5);
    expect(calculateConfidence(rule, { filePath: "src/a.ts", author: "bob" })).toBe(0.6);
    expect(
      calculateConfidence("x".repeat(60), {
        filePath: "src/a.ts",
        author: "bob",
        hasCodeSnippets: true,
      })
    ).toBe(0.8);
  });

  it("stays within [0, 1]", () => {
    const value = calculateConfidence("y".repeat(500), {
      filePath: "f",
      author: "a",
      hasCodeSnippets: true,
    });

    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(1);
  });
});

describe("ruleKey", () => {
  it("normalises case, whitespace and the trailing period", () => {
    expect(ruleKey("Avoid   Global  State.")).toBe("avoid global state");
    expect(ruleKey("avoid global state")).toBe("avoid global state");
  });
});
