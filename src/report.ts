import type { BatchResult, TriageDecision } from "./types.js";

function issueLink(number: number, repoFull?: string): string {
  return repoFull ? `[#${number}](https://github.com/${repoFull}/issues/${number})` : `#${number}`;
}

/**
 * Markdown comment summarising a decision. Degraded stages are spelled out so
 * a partial triage is never mistaken for a full one.
 */
export function renderTriageComment(decision: TriageDecision, repoFull?: string): string {
  const { classification } = decision;
  const labels = classification.labels.length > 0 ? classification.labels.map((l) => `\`${l}\``).join(", ") : "none";

  let out = `### triage summary\n\n`;
  out += `| field | value |\n|-------|-------|\n`;
  out += `| labels | ${labels} |\n`;
  out += `| confidence | ${classification.confidence.toFixed(2)} |\n`;
  out += `| priority | ${decision.priority} |\n`;
  out += `| complexity | ${decision.complexity} |\n`;
  out += `\n`;

  if (decision.skipped.includes("duplicate_checked")) {
    out += `duplicate check: skipped (memory disabled)\n`;
  } else if (decision.duplicates.length === 0) {
    out += `duplicate check: no similar issues found\n`;
  } else {
    out += `possible duplicates:\n\n`;
    for (const match of decision.duplicates) {
      const title = match.title ? ` ${match.title}` : "";
      out += `- ${issueLink(match.issueNumber, repoFull)}${title} (${(match.score * 100).toFixed(1)}% similar)\n`;
    }
  }

  out += decision.stored ? `\nstored in issue memory.\n` : `\nnot stored in issue memory.\n`;

  if (decision.errors.length > 0) {
    out += `\n> degraded: ${decision.errors.map((e) => `${e.stage} (${e.message})`).join("; ")}\n`;
  }
  return out;
}

export function summarizeBatch(result: BatchResult): string {
  const parts = [`${result.succeeded} triaged`, `${result.failed} failed`];
  if (result.cancelled > 0) parts.push(`${result.cancelled} cancelled`);
  return parts.join(", ");
}
