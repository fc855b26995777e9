#!/usr/bin/env node
import { copyFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import chalk from "chalk";
import { Command } from "commander";
import { classify } from "./classifier.js";
import {
  closeContext,
  createPipelineContext,
  loadConfigOrDefault,
  openMemory,
  parseIssueNumber,
  removeDatabase,
  resolveDbPath,
  resolveRepo,
  runRetriage,
  runSearch,
  runTriage,
  type PipelineContext,
} from "./commands.js";
import { loadEnvConfig } from "./config.js";
import { embed } from "./embeddings.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

const program = new Command();

program
  .name("sieve")
  .description("Issue triage: keyword classification, duplicate detection against issue memory, priority and complexity")
  .version("0.1.0");

interface PublishFlags {
  repo?: string;
  applyLabels?: boolean;
  comment?: boolean;
  dryRun?: boolean;
  memory: boolean;
}

function fail(err: unknown): void {
  console.error(chalk.red(`error: ${errorMessage(err)}`));
  process.exitCode = 1;
}

// ── init ────────────────────────────────────────────────────────
program
  .command("init")
  .description("Create .env and triage.config.yaml in the current directory")
  .action(() => {
    const root = fileURLToPath(new URL("..", import.meta.url));
    const envExample = resolve(root, ".env.example");
    const configExample = resolve(root, "triage.config.yaml");

    if (!existsSync(".env") && existsSync(envExample)) {
      copyFileSync(envExample, ".env");
      console.log(chalk.green("✓") + " Created .env (add your GitHub token)");
    } else if (existsSync(".env")) {
      console.log(chalk.yellow("⊘") + " .env already exists");
    }

    if (!existsSync("triage.config.yaml") && existsSync(configExample)) {
      copyFileSync(configExample, "triage.config.yaml");
      console.log(chalk.green("✓") + " Created triage.config.yaml (edit repo and keyword tables)");
    } else if (existsSync("triage.config.yaml")) {
      console.log(chalk.yellow("⊘") + " triage.config.yaml already exists");
    }

    console.log("\n" + chalk.bold("Next steps:"));
    console.log("  1. Edit .env with your GitHub token");
    console.log("  2. Edit triage.config.yaml with your repo and categories");
    console.log("  3. Run: sieve triage <issue-number>");
  });

// ── classify ────────────────────────────────────────────────────
program
  .command("classify <title> [body]")
  .description("Classify issue text locally and print the result as JSON")
  .option("-c, --config <path>", "Config file")
  .action((title: string, body: string | undefined, opts: { config?: string }) => {
    try {
      const config = loadConfigOrDefault(opts.config);
      const result = classify(title, body ?? "", config.classifier.min_confidence, config.classifier.categories);
      console.log(JSON.stringify(result, null, 2));
      if (result.labels.length === 0) process.exitCode = 1;
    } catch (err) {
      fail(err);
    }
  });

// ── embed ───────────────────────────────────────────────────────
program
  .command("embed <text>")
  .description("Print the placeholder embedding for some text")
  .option("-d, --dimensions <number>", "Vector dimension", "384")
  .action((text: string, opts: { dimensions: string }) => {
    try {
      const vector = embed(text, parseInt(opts.dimensions, 10));
      const head = vector.values.slice(0, 8).map((v) => v.toFixed(4));
      console.log(JSON.stringify({ dimension: vector.dimension, head }, null, 2));
    } catch (err) {
      fail(err);
    }
  });

// ── triage ──────────────────────────────────────────────────────
program
  .command("triage <issue-number>")
  .description("Fetch one issue, triage it and optionally publish labels and a comment")
  .option("-r, --repo <owner/repo>", "Repository")
  .option("--apply-labels", "Apply labels on GitHub")
  .option("--comment", "Post a triage summary comment")
  .option("--dry-run", "Show what would be published without doing it")
  .option("--no-memory", "Skip the duplicate check and the memory write")
  .action(async (raw: string, opts: PublishFlags) => {
    let ctx: PipelineContext | undefined;
    try {
      ctx = createPipelineContext({ repo: opts.repo, memory: opts.memory });
      await runTriage(ctx, parseIssueNumber(raw), {
        applyLabels: opts.applyLabels,
        comment: opts.comment,
        dryRun: opts.dryRun,
      });
    } catch (err) {
      fail(err);
    } finally {
      if (ctx) closeContext(ctx);
    }
  });

// ── retriage ────────────────────────────────────────────────────
program
  .command("retriage")
  .description("Retriage every open issue in the repository")
  .option("-r, --repo <owner/repo>", "Repository")
  .option("--apply-labels", "Apply labels on GitHub")
  .option("--comment", "Post a triage summary comment on each issue")
  .option("--dry-run", "Show what would be published without doing it")
  .option("--no-memory", "Skip the duplicate check and the memory write")
  .action(async (opts: PublishFlags) => {
    const controller = new AbortController();
    const onSigint = () => {
      console.log(chalk.yellow("\nStopping after in-flight issues finish..."));
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    let ctx: PipelineContext | undefined;
    try {
      ctx = createPipelineContext({ repo: opts.repo, memory: opts.memory });
      await runRetriage(ctx, {
        applyLabels: opts.applyLabels,
        comment: opts.comment,
        dryRun: opts.dryRun,
        signal: controller.signal,
      });
    } catch (err) {
      fail(err);
    } finally {
      process.off("SIGINT", onSigint);
      if (ctx) closeContext(ctx);
    }
  });

// ── search ──────────────────────────────────────────────────────
program
  .command("search <text>")
  .description("Find stored issues similar to some text")
  .option("-r, --repo <owner/repo>", "Repository")
  .option("-t, --threshold <number>", "Similarity threshold")
  .option("-n, --limit <number>", "Maximum results")
  .action(async (text: string, opts: { repo?: string; threshold?: string; limit?: string }) => {
    try {
      const config = loadConfigOrDefault();
      const env = loadEnvConfig();
      const { owner, repo } = resolveRepo(config, opts.repo);
      const memory = openMemory(config, env, `${owner}/${repo}`, createLogger(env.SIEVE_LOG_LEVEL));
      try {
        await runSearch(memory, text, {
          threshold: opts.threshold ? parseFloat(opts.threshold) : config.duplicates.threshold,
          limit: opts.limit ? parseInt(opts.limit, 10) : config.duplicates.max_results,
        });
      } finally {
        memory.close();
      }
    } catch (err) {
      fail(err);
    }
  });

// ── status ──────────────────────────────────────────────────────
program
  .command("status")
  .description("Show issue memory stats")
  .option("-r, --repo <owner/repo>", "Repository")
  .action(async (opts: { repo?: string }) => {
    try {
      const config = loadConfigOrDefault();
      const env = loadEnvConfig();
      const { owner, repo } = resolveRepo(config, opts.repo);
      const repoFull = `${owner}/${repo}`;
      const memory = openMemory(config, env, repoFull, createLogger(env.SIEVE_LOG_LEVEL));
      try {
        const stats = await memory.stats();
        console.log(chalk.bold("issue-sieve status\n"));
        console.log(`  Repo:       ${repoFull}`);
        console.log(`  Database:   ${resolveDbPath(config, env)}`);
        console.log(`  Issues:     ${stats.totalIssues} stored`);
        console.log(`  Dimensions: ${stats.dimensions}`);
        console.log(`  Last write: ${stats.lastStoredAt ?? "never"}`);
        console.log(`  Memory:     ${config.memory.enabled ? "enabled" : "disabled"}`);
      } finally {
        memory.close();
      }
    } catch (err) {
      fail(err);
    }
  });

// ── reset ───────────────────────────────────────────────────────
program
  .command("reset")
  .description("Delete the local issue memory database")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(async (opts: { yes?: boolean }) => {
    let dbPath: string;
    try {
      dbPath = resolveDbPath(loadConfigOrDefault(), loadEnvConfig());
    } catch (err) {
      fail(err);
      return;
    }
    if (!existsSync(dbPath)) {
      console.log(chalk.yellow("No database found at " + dbPath));
      return;
    }

    if (!opts.yes) {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const answer = await new Promise<string>((resolve) => {
        rl.question(chalk.yellow("Delete the issue memory database? (y/N) "), resolve);
      });
      rl.close();
      if (answer.toLowerCase() !== "y") {
        console.log("Cancelled.");
        return;
      }
    }

    try {
      removeDatabase(dbPath);
    } catch (err) {
      fail(err);
      return;
    }
    console.log(chalk.green("✓") + " Database deleted. Issues will be stored again on the next triage.");
  });

await program.parseAsync();
