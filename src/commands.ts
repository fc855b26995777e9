import { existsSync, unlinkSync } from "node:fs";
import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import ora from "ora";
import { defaultConfig, loadConfig, loadEnvConfig, parseRepo, type EnvConfig, type SieveConfig } from "./config.js";
import { detectDuplicates } from "./duplicates.js";
import { embed } from "./embeddings.js";
import { ConfigurationError } from "./errors.js";
import { GitHubIssueSource } from "./github.js";
import { applyLabelActions, buildLabelActions, ensureLabelsExist, type LabelAction } from "./labels.js";
import { createLogger, type Logger } from "./logger.js";
import { SqliteMemoryStore } from "./memory.js";
import { TriagePipeline } from "./pipeline.js";
import { renderTriageComment, summarizeBatch } from "./report.js";
import { VectorStore, defaultDbPath } from "./store.js";
import type { BatchResult, SimilarityMatch, TransitionEvent, TriageDecision, TriageOutcome } from "./types.js";

export const EMBEDDING_MODEL = "sha256-placeholder";

export interface PipelineContext {
  config: SieveConfig;
  env: EnvConfig;
  logger: Logger;
  owner: string;
  repo: string;
  repoFull: string;
  source: GitHubIssueSource;
  memory?: SqliteMemoryStore;
  pipeline: TriagePipeline;
}

export interface ContextOptions {
  repo?: string;
  configPath?: string;
  memory?: boolean;
  onTransition?: (event: TransitionEvent) => void;
}

/** Loads triage.config.yaml when present, otherwise the built-in defaults. */
export function loadConfigOrDefault(configPath?: string): SieveConfig {
  const p = configPath || resolve(process.cwd(), "triage.config.yaml");
  return existsSync(p) ? loadConfig(p) : defaultConfig();
}

export function parseIssueNumber(raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`invalid issue number: ${raw}`);
  return n;
}

/** Deletes the database file and its WAL sidecars. */
export function removeDatabase(dbPath: string): void {
  unlinkSync(dbPath);
  for (const suffix of ["-wal", "-shm"]) {
    if (existsSync(dbPath + suffix)) unlinkSync(dbPath + suffix);
  }
}

export function resolveDbPath(config: SieveConfig, env: EnvConfig): string {
  return env.SIEVE_DB_PATH || config.memory.path || defaultDbPath();
}

export function openMemory(config: SieveConfig, env: EnvConfig, repoFull: string, logger: Logger): SqliteMemoryStore {
  const store = new VectorStore({
    path: resolveDbPath(config, env),
    dimensions: config.memory.dimensions,
    repo: repoFull,
    embeddingModel: EMBEDDING_MODEL,
  });
  return new SqliteMemoryStore(store, logger);
}

export function resolveRepo(config: SieveConfig, repoOverride?: string): { owner: string; repo: string } {
  const repo = repoOverride || config.repo;
  if (!repo) throw new ConfigurationError("no repository configured. set `repo` in triage.config.yaml or pass --repo");
  return parseRepo(repo);
}

export function createPipelineContext(opts: ContextOptions = {}): PipelineContext {
  const config = loadConfigOrDefault(opts.configPath);
  const env = loadEnvConfig();
  const logger = createLogger(env.SIEVE_LOG_LEVEL);
  const { owner, repo } = resolveRepo(config, opts.repo);
  const repoFull = `${owner}/${repo}`;

  if (!env.GITHUB_TOKEN) throw new ConfigurationError("GITHUB_TOKEN is required. add it to .env");
  const source = new GitHubIssueSource(env.GITHUB_TOKEN, owner, repo, logger);

  const memoryOn = opts.memory !== false && config.memory.enabled;
  const memory = memoryOn ? openMemory(config, env, repoFull, logger) : undefined;
  const pipeline = new TriagePipeline({ config, store: memory, source, logger, onTransition: opts.onTransition });
  return { config, env, logger, owner, repo, repoFull, source, memory, pipeline };
}

export function closeContext(ctx: PipelineContext): void {
  ctx.memory?.close();
}

export interface PublishOptions {
  applyLabels?: boolean;
  comment?: boolean;
  dryRun?: boolean;
}

function priorityColor(priority: TriageDecision["priority"]): (s: string) => string {
  return priority === "P0" ? chalk.red : priority === "P1" ? chalk.yellow : priority === "P2" ? chalk.cyan : chalk.dim;
}

function printDecision(decision: TriageDecision): void {
  const { issue, classification } = decision;
  console.log(chalk.bold(`\n  #${issue.number}: ${issue.title}`));

  const table = new Table({ colWidths: [14, 60] });
  table.push(
    ["Labels", classification.labels.join(", ") || chalk.dim("none")],
    ["Confidence", classification.confidence.toFixed(2)],
    ["Priority", priorityColor(decision.priority)(decision.priority)],
    ["Complexity", decision.complexity],
    [
      "Duplicates",
      decision.skipped.includes("duplicate_checked")
        ? chalk.dim("skipped (memory off)")
        : decision.duplicates.map((d) => `#${d.issueNumber} ${(d.score * 100).toFixed(1)}%`).join(", ") || "none",
    ],
    ["Stored", decision.stored ? chalk.green("yes") : chalk.yellow("no")],
  );
  console.log(table.toString());

  for (const err of decision.errors) {
    console.log(chalk.yellow(`  ⚠ ${err.stage}: ${err.message}`));
  }
}

async function publish(ctx: PipelineContext, decisions: TriageDecision[], opts: PublishOptions): Promise<void> {
  if (!opts.applyLabels && !opts.comment && !opts.dryRun) return;

  if (opts.applyLabels || opts.dryRun) {
    if (opts.applyLabels && !opts.dryRun) await ensureLabelsExist(ctx.source, ctx.config);
    const actions: LabelAction[] = decisions.flatMap((d) => buildLabelActions(d, ctx.config));
    const applied = await applyLabelActions(ctx.source, actions, opts.dryRun);
    const verb = opts.dryRun ? "Would apply" : "Applied";
    console.log(chalk.green(`\n${verb} ${applied.length} labels`));
    if (opts.dryRun) {
      for (const a of applied) console.log(chalk.dim(`  #${a.number} +${a.label} (${a.reason})`));
    }
  }

  if (opts.comment) {
    for (const decision of decisions) {
      const body = renderTriageComment(decision, ctx.repoFull);
      if (opts.dryRun) {
        console.log(chalk.dim(`\n--- comment for #${decision.issue.number} ---\n${body}`));
      } else {
        await ctx.source.postComment(decision.issue.number, body);
      }
    }
    if (!opts.dryRun) console.log(chalk.green(`Posted ${decisions.length} comments`));
  }
}

export async function runTriage(ctx: PipelineContext, number: number, opts: PublishOptions = {}): Promise<TriageOutcome> {
  const spinner = ora(`Triaging #${number}...`).start();
  const outcome = await ctx.pipeline.triage(number);

  if (outcome.status === "failed") {
    spinner.fail(`#${number} failed at ${outcome.stage}: ${outcome.error.message}`);
    process.exitCode = 1;
    return outcome;
  }

  spinner.succeed(`Triaged #${number}${outcome.errors.length > 0 ? chalk.yellow(" (degraded)") : ""}`);
  printDecision(outcome);
  await publish(ctx, [outcome], opts);
  return outcome;
}

export async function runRetriage(
  ctx: PipelineContext,
  opts: PublishOptions & { signal?: AbortSignal } = {},
): Promise<BatchResult> {
  const spinner = ora(`Listing open issues in ${ctx.repoFull}...`).start();
  const result = await ctx.pipeline.retriageOpen({
    signal: opts.signal,
    onProgress: (fetched) => {
      spinner.text = `Listed ${fetched} open issues, retriaging...`;
    },
  });
  if (result.failed > 0) {
    spinner.warn(`Retriage finished: ${summarizeBatch(result)}`);
  } else {
    spinner.succeed(`Retriage finished: ${summarizeBatch(result)}`);
  }

  const table = new Table({
    head: ["#", "Priority", "Complexity", "Labels", "Dupes", "Status"],
    colWidths: [8, 10, 12, 28, 8, 30],
  });
  for (const r of result.results) {
    if (r.status === "failed") {
      table.push([r.issueNumber, "-", "-", "-", "-", chalk.red(`failed: ${r.stage}`)]);
    } else {
      table.push([
        r.issue.number,
        priorityColor(r.priority)(r.priority),
        r.complexity,
        r.classification.labels.join(", ").slice(0, 26),
        r.duplicates.length,
        r.errors.length > 0 ? chalk.yellow("degraded") : chalk.green("ok"),
      ]);
    }
  }
  console.log(table.toString());

  const decisions = result.results.filter((r): r is TriageDecision => r.status === "done");
  await publish(ctx, decisions, opts);
  if (result.failed > 0) process.exitCode = 1;
  return result;
}

export async function runSearch(
  memory: SqliteMemoryStore,
  text: string,
  opts: { threshold: number; limit: number },
): Promise<SimilarityMatch[]> {
  // raw text, not an issue: there is no own number to exclude
  const { values } = embed(text, memory.dimensions);
  const matches = await detectDuplicates(values, -1, memory, { threshold: opts.threshold, maxResults: opts.limit });
  if (matches.length === 0) {
    console.log(chalk.dim(`No stored issues at or above ${opts.threshold}`));
    return matches;
  }
  const table = new Table({ head: ["#", "Similarity", "Title"], colWidths: [8, 12, 56] });
  for (const m of matches) {
    table.push([m.issueNumber, `${(m.score * 100).toFixed(1)}%`, (m.title ?? "").slice(0, 54)]);
  }
  console.log(table.toString());
  return matches;
}
