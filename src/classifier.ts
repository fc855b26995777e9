import { ConfigurationError } from "./errors.js";
import type { ClassificationResult } from "./types.js";

export type CategoryTable = Record<string, string[]>;

export const DEFAULT_CATEGORIES: CategoryTable = {
  bug: ["error", "crash", "broken", "fail", "exception", "bug"],
  feature: ["feature", "enhancement", "add", "support", "implement"],
  docs: ["documentation", "docs", "readme", "guide", "tutorial"],
  question: ["how", "why", "question", "help", "confused"],
  performance: ["slow", "performance", "lag", "optimize", "speed"],
  security: ["security", "vulnerability", "exploit", "CVE"],
};

export const DEFAULT_MIN_CONFIDENCE = 0.6;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function validateCategories(categories: CategoryTable): void {
  for (const [name, keywords] of Object.entries(categories)) {
    if (!name.trim()) throw new ConfigurationError("category name must not be empty");
    if (!Array.isArray(keywords)) {
      throw new ConfigurationError(`category "${name}" must map to a list of keywords`);
    }
    for (const keyword of keywords) {
      if (typeof keyword !== "string" || !keyword.trim()) {
        throw new ConfigurationError(`category "${name}" has an empty keyword`);
      }
    }
  }
}

/**
 * Keyword-ratio classifier. A category's score is the share of its keywords
 * found as substrings of the lower-cased `title body` text.
 *
 * When nothing reaches `minConfidence`, every category tied at the best
 * non-zero score is returned instead, so callers that need precision should
 * check `confidence` before trusting `labels`.
 */
export function classify(
  title: string,
  body = "",
  minConfidence = DEFAULT_MIN_CONFIDENCE,
  categories: CategoryTable = DEFAULT_CATEGORIES,
): ClassificationResult {
  validateCategories(categories);
  const text = `${title} ${body}`.toLowerCase();

  const raw = new Map<string, number>();
  for (const [category, keywords] of Object.entries(categories)) {
    if (keywords.length === 0) {
      raw.set(category, 0);
      continue;
    }
    const hits = keywords.filter((k) => text.includes(k.toLowerCase())).length;
    raw.set(category, hits / keywords.length);
  }

  let labels = [...raw].filter(([, score]) => score >= minConfidence).map(([category]) => category);

  const max = raw.size > 0 ? Math.max(...raw.values()) : 0;
  if (labels.length === 0 && max > 0) {
    labels = [...raw].filter(([, score]) => score === max).map(([category]) => category);
  }

  const scores: Record<string, number> = {};
  for (const [category, score] of raw) scores[category] = round2(score);

  return { scores, labels, confidence: round2(max) };
}
