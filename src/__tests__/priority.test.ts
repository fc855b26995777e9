import { describe, expect, it } from "vitest";
import { classify } from "../classifier.js";
import { assess, assessComplexity, assessPriority, countSteps, hasStackTrace } from "../priority.js";
import type { ClassificationResult } from "../types.js";

function priorityOf(title: string, body = ""): string {
  return assessPriority(classify(title, body), `${title} ${body}`);
}

describe("assessPriority", () => {
  it("P0 for confident security issues", () => {
    expect(priorityOf("security vulnerability exploit")).toBe("P0");
  });

  it("does not raise a low-confidence security issue on its own", () => {
    expect(priorityOf("CVE-2024-0001 exploit")).toBe("P3");
    const cls: ClassificationResult = {
      scores: { security: 0.5, performance: 0.4 },
      labels: ["security", "performance"],
      confidence: 0.5,
    };
    expect(assessPriority(cls, "slow exploit")).toBe("P2");
  });

  it("a low-confidence security label does not mask a critical bug", () => {
    const cls: ClassificationResult = {
      scores: { bug: 0.83, security: 0.5 },
      labels: ["bug", "security"],
      confidence: 0.83,
    };
    expect(assessPriority(cls, "app crash, error, broken")).toBe("P0");
    expect(assessPriority(cls, "error, fails with exception")).toBe("P1");
  });

  it("P0 for a critical bug with a weak security match under a low classifier threshold", () => {
    const title = "Security vulnerability: app crash, error, broken, fails with exception";
    const cls = classify(title, "", 0.3);
    expect(cls.scores).toMatchObject({ bug: 0.83, security: 0.5 });
    expect(cls.labels).toEqual(["bug", "security"]);
    expect(assess(cls, title, "").priority).toBe("P0");
  });

  it("P0 for confident bugs with a critical keyword", () => {
    expect(priorityOf("crash error broken fail")).toBe("P0");
  });

  it("P1 for other bugs", () => {
    expect(priorityOf("Login fails with exception")).toBe("P1");
    expect(priorityOf("bug: crash on save")).toBe("P1");
  });

  it("P2 for performance", () => {
    expect(priorityOf("slow performance")).toBe("P2");
  });

  it("P3 for everything else", () => {
    expect(priorityOf("Typo in README")).toBe("P3");
    expect(priorityOf("Hello world")).toBe("P3");
  });

  it("security outranks bug when both are labeled", () => {
    const cls: ClassificationResult = { scores: { bug: 0.8, security: 0.7 }, labels: ["bug", "security"], confidence: 0.8 };
    expect(assessPriority(cls, "crash")).toBe("P0");
  });

  it("honors a custom policy", () => {
    const cls: ClassificationResult = { scores: { bug: 0.4 }, labels: ["bug"], confidence: 0.4 };
    expect(assessPriority(cls, "outage in prod", { high_confidence: 0.3, critical_keywords: ["Outage"] })).toBe("P0");
  });
});

describe("assessComplexity", () => {
  it("simple for short one-liners", () => {
    expect(assessComplexity("Typo in README", "")).toBe("simple");
    expect(assessComplexity("Typo in README", "the word recieve")).toBe("simple");
  });

  it("medium for multi-line bodies without complexity signals", () => {
    expect(assessComplexity("Crash", "happens on save\nonly on linux")).toBe("medium");
    expect(assessComplexity("x".repeat(300), "")).toBe("medium");
  });

  it("complex when there are enough reproduction steps", () => {
    expect(assessComplexity("Crash", "1. open the app\n2. click save\n3) watch it die")).toBe("complex");
  });

  it("complex with a stack trace", () => {
    expect(assessComplexity("Crash", "TypeError: x is undefined\n    at save (src/app.js:10:5)")).toBe("complex");
    expect(assessComplexity("Crash", 'Traceback (most recent call last):\n  File "app.py", line 3')).toBe("complex");
  });

  it("complex for cross-cutting keywords", () => {
    expect(assessComplexity("Race condition in the job runner", "")).toBe("complex");
  });

  it("complex for very long reports", () => {
    expect(assessComplexity("Long", "a".repeat(2000))).toBe("complex");
  });
});

describe("helpers", () => {
  it("countSteps counts numbered lines", () => {
    expect(countSteps("1. a\n2) b\nnot a step\n10. c")).toBe(3);
    expect(countSteps("1.5 is a version")).toBe(0);
  });

  it("hasStackTrace ignores prose", () => {
    expect(hasStackTrace("look at the docs (page 3)")).toBe(false);
    expect(hasStackTrace("thread 'main' panicked at src/main.rs:2:5")).toBe(true);
  });
});

describe("assess", () => {
  it("combines priority and complexity", () => {
    const cls = classify("App crashes on startup", "");
    expect(assess(cls, "App crashes on startup", "")).toEqual({ priority: "P1", complexity: "simple" });
  });

  it("lets a severity hint override the computed priority", () => {
    const cls = classify("Typo in README", "");
    expect(assess(cls, "Typo in README", "", {}, { priority: "P0" }).priority).toBe("P0");
  });
});
