import type { SieveConfig } from "./config.js";
import type { GitHubIssueSource } from "./github.js";
import type { IssueSource, Priority, TriageDecision } from "./types.js";

const PRIORITY_COLORS: Record<Priority, { color: string; description: string }> = {
  P0: { color: "b60205", description: "Critical: needs attention now" },
  P1: { color: "d93f0b", description: "High priority" },
  P2: { color: "fbca04", description: "Medium priority" },
  P3: { color: "c5def5", description: "Low priority" },
};

const COMPLEXITY_COLORS = {
  simple: { color: "c2e0c6", description: "Small, single-symptom report" },
  medium: { color: "bfd4f2", description: "Moderate effort expected" },
  complex: { color: "5319e7", description: "Stack traces, multi-step repro or cross-cutting change" },
} as const;

export async function ensureLabelsExist(github: GitHubIssueSource, config: SieveConfig): Promise<void> {
  await github.ensureLabel(config.labels.duplicate, "cfd3d7", "Likely duplicate of an earlier issue");
  for (const [priority, meta] of Object.entries(PRIORITY_COLORS)) {
    await github.ensureLabel(`${config.labels.priority_prefix}${priority}`, meta.color, meta.description);
  }
  for (const [complexity, meta] of Object.entries(COMPLEXITY_COLORS)) {
    await github.ensureLabel(`${config.labels.complexity_prefix}${complexity}`, meta.color, meta.description);
  }
}

export interface LabelAction {
  number: number;
  label: string;
  reason: string;
}

export function buildLabelActions(decision: TriageDecision, config: SieveConfig): LabelAction[] {
  const number = decision.issue.number;
  const actions: LabelAction[] = decision.classification.labels.map((label) => ({
    number,
    label,
    reason: `classified as ${label} (score ${(decision.classification.scores[label] ?? 0).toFixed(2)})`,
  }));

  actions.push({
    number,
    label: `${config.labels.priority_prefix}${decision.priority}`,
    reason: "priority assessment",
  });
  actions.push({
    number,
    label: `${config.labels.complexity_prefix}${decision.complexity}`,
    reason: "complexity heuristic",
  });

  if (decision.duplicates.length > 0) {
    const top = decision.duplicates[0];
    actions.push({
      number,
      label: config.labels.duplicate,
      reason: `similar to #${top.issueNumber} (${(top.score * 100).toFixed(1)}%)`,
    });
  }
  return actions;
}

/** Applies actions grouped per issue, one API call each. */
export async function applyLabelActions(
  source: IssueSource,
  actions: LabelAction[],
  dryRun = false,
): Promise<LabelAction[]> {
  if (dryRun) return actions;

  const byIssue = new Map<number, string[]>();
  for (const action of actions) {
    const labels = byIssue.get(action.number) ?? [];
    if (!labels.includes(action.label)) labels.push(action.label);
    byIssue.set(action.number, labels);
  }

  for (const [number, labels] of byIssue) {
    await source.applyLabels(number, labels);
    // Rate limit: 200ms between label API calls
    await new Promise((r) => setTimeout(r, 200));
  }

  return actions;
}
