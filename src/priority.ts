import type { ClassificationResult, Complexity, Priority } from "./types.js";

export interface PriorityPolicy {
  high_confidence: number;
  critical_keywords: string[];
}

export interface ComplexityPolicy {
  simple_max_length: number;
  complex_min_length: number;
  min_steps: number;
  cross_cutting_keywords: string[];
}

export interface SeverityHints {
  priority?: Priority;
}

export interface Assessment {
  priority: Priority;
  complexity: Complexity;
}

export const DEFAULT_PRIORITY_POLICY: PriorityPolicy = {
  high_confidence: 0.6,
  critical_keywords: ["crash", "broken", "data loss", "corrupt", "outage", "segfault", "panic"],
};

export const DEFAULT_COMPLEXITY_POLICY: ComplexityPolicy = {
  simple_max_length: 280,
  complex_min_length: 2000,
  min_steps: 3,
  cross_cutting_keywords: [
    "architecture",
    "refactor",
    "migration",
    "breaking change",
    "across all",
    "multiple modules",
    "race condition",
    "concurrency",
  ],
};

const STACK_TRACE_PATTERNS = [
  /^\s+at\s+\S.*\(.*:\d+(:\d+)?\)\s*$/m,
  /Traceback \(most recent call last\)/,
  /^\s*File ".+", line \d+/m,
  /Exception in thread "/,
  /panicked at /,
  /^\s*#\d+\s+0x[0-9a-f]+\s+in\s/im,
];

export function hasStackTrace(text: string): boolean {
  return STACK_TRACE_PATTERNS.some((re) => re.test(text));
}

export function countSteps(text: string): number {
  return text.split("\n").filter((line) => /^\s*\d+[.)]\s+\S/.test(line)).length;
}

export function assessPriority(
  classification: ClassificationResult,
  text: string,
  policy: PriorityPolicy = DEFAULT_PRIORITY_POLICY,
): Priority {
  const lower = text.toLowerCase();
  const has = (label: string) => classification.labels.includes(label);
  const confident = (label: string) => (classification.scores[label] ?? 0) >= policy.high_confidence;

  const critical = policy.critical_keywords.some((k) => lower.includes(k.toLowerCase()));

  if (has("security") && confident("security")) return "P0";
  if (has("bug") && confident("bug") && critical) return "P0";
  if (has("bug")) return "P1";
  if (has("performance")) return "P2";
  return "P3";
}

export function assessComplexity(
  title: string,
  body: string,
  policy: ComplexityPolicy = DEFAULT_COMPLEXITY_POLICY,
): Complexity {
  const text = `${title}\n${body}`.trim();
  const lower = text.toLowerCase();

  if (
    hasStackTrace(text) ||
    countSteps(body) >= policy.min_steps ||
    policy.cross_cutting_keywords.some((k) => lower.includes(k.toLowerCase())) ||
    text.length >= policy.complex_min_length
  ) {
    return "complex";
  }

  const bodyLines = body.split("\n").filter((line) => line.trim()).length;
  if (text.length <= policy.simple_max_length && bodyLines <= 1) return "simple";
  return "medium";
}

export function assess(
  classification: ClassificationResult,
  title: string,
  body: string,
  policy: { priority?: PriorityPolicy; complexity?: ComplexityPolicy } = {},
  hints: SeverityHints = {},
): Assessment {
  const priority = hints.priority ?? assessPriority(classification, `${title} ${body}`, policy.priority);
  return { priority, complexity: assessComplexity(title, body, policy.complexity) };
}
