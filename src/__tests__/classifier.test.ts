import { describe, expect, it } from "vitest";
import { classify, DEFAULT_CATEGORIES, validateCategories } from "../classifier.js";
import { ConfigurationError } from "../errors.js";

describe("classify", () => {
  it("falls back to the unique top category below the threshold", () => {
    const result = classify("Login fails with exception", "");
    expect(result.scores).toEqual({
      bug: 0.33,
      feature: 0,
      docs: 0,
      question: 0,
      performance: 0,
      security: 0,
    });
    expect(result.confidence).toBe(0.33);
    expect(result.labels).toEqual(["bug"]);
  });

  it("selects through the threshold when a category clears it", () => {
    const result = classify("bug error crash broken fail exception", "");
    expect(result.scores.bug).toBe(1);
    expect(result.confidence).toBe(1);
    expect(result.labels).toEqual(["bug"]);
  });

  it("returns every category tied at the maximum in config order", () => {
    const result = classify("How to add docs", "");
    expect(result.scores).toMatchObject({ feature: 0.2, docs: 0.2, question: 0.2 });
    expect(result.labels).toEqual(["feature", "docs", "question"]);
    expect(result.confidence).toBe(0.2);
  });

  it("returns no labels when nothing matches", () => {
    const result = classify("Hello world", "");
    expect(result.labels).toEqual([]);
    expect(result.confidence).toBe(0);
  });

  it("keeps every category above a lower threshold", () => {
    const result = classify("bug error crash", "slow performance lag", 0.3);
    expect(result.scores.bug).toBe(0.5);
    expect(result.scores.performance).toBe(0.6);
    expect(result.labels).toEqual(["bug", "performance"]);
  });

  it("matches upper-case keywords case-insensitively", () => {
    const result = classify("CVE-2024-0001 exploit in parser", "");
    expect(result.scores.security).toBe(0.5);
    expect(result.labels).toEqual(["security"]);
  });

  it("reads keywords from the body too", () => {
    const result = classify("Something odd", "the readme guide is out of date");
    expect(result.scores.docs).toBe(0.4);
    expect(result.labels).toEqual(["docs"]);
  });

  it("scores an empty keyword list as zero", () => {
    const result = classify("it crashed", "", 0.6, { bug: ["crash"], misc: [] });
    expect(result.scores).toEqual({ bug: 1, misc: 0 });
    expect(result.labels).toEqual(["bug"]);
  });

  it("handles an empty category table", () => {
    expect(classify("anything", "", 0.6, {})).toEqual({ scores: {}, labels: [], confidence: 0 });
  });

  it("is deterministic", () => {
    const a = classify("Search is slow", "and it fails sometimes");
    const b = classify("Search is slow", "and it fails sometimes");
    expect(a).toEqual(b);
  });
});

describe("validateCategories", () => {
  it("accepts the default table", () => {
    expect(() => validateCategories(DEFAULT_CATEGORIES)).not.toThrow();
  });

  it("rejects an empty category name", () => {
    expect(() => validateCategories({ "": ["x"] })).toThrow(ConfigurationError);
  });

  it("rejects an empty keyword", () => {
    expect(() => validateCategories({ bug: ["crash", " "] })).toThrow('category "bug" has an empty keyword');
  });

  it("is applied by classify", () => {
    expect(() => classify("x", "", 0.6, { " ": ["x"] })).toThrow(ConfigurationError);
  });
});
