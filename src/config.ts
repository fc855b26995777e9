import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DEFAULT_CATEGORIES, DEFAULT_MIN_CONFIDENCE, validateCategories } from "./classifier.js";
import { DEFAULT_DUPLICATE_THRESHOLD, DEFAULT_MAX_RESULTS } from "./duplicates.js";
import { DEFAULT_DIMENSIONS } from "./embeddings.js";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";
import { DEFAULT_COMPLEXITY_POLICY, DEFAULT_PRIORITY_POLICY } from "./priority.js";

const ClassifierSchema = z.object({
  min_confidence: z.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE),
  categories: z.record(z.string(), z.array(z.string())).default(DEFAULT_CATEGORIES),
});

const DuplicatesSchema = z.object({
  threshold: z.number().min(-1).max(1).default(DEFAULT_DUPLICATE_THRESHOLD),
  max_results: z.number().int().min(0).default(DEFAULT_MAX_RESULTS),
});

const PrioritySchema = z.object({
  high_confidence: z.number().min(0).max(1).default(DEFAULT_PRIORITY_POLICY.high_confidence),
  critical_keywords: z.array(z.string()).default(DEFAULT_PRIORITY_POLICY.critical_keywords),
});

const ComplexitySchema = z.object({
  simple_max_length: z.number().int().min(0).default(DEFAULT_COMPLEXITY_POLICY.simple_max_length),
  complex_min_length: z.number().int().min(1).default(DEFAULT_COMPLEXITY_POLICY.complex_min_length),
  min_steps: z.number().int().min(1).default(DEFAULT_COMPLEXITY_POLICY.min_steps),
  cross_cutting_keywords: z.array(z.string()).default(DEFAULT_COMPLEXITY_POLICY.cross_cutting_keywords),
});

const MemorySchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().optional(),
  dimensions: z.number().int().positive().default(DEFAULT_DIMENSIONS),
  timeout_ms: z.number().int().positive().default(5000),
});

const LabelsSchema = z.object({
  duplicate: z.string().default("sieve:duplicate"),
  priority_prefix: z.string().default("priority:"),
  complexity_prefix: z.string().default("complexity:"),
});

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  repo: z.string().optional(),
  classifier: ClassifierSchema.optional().transform((v) => ClassifierSchema.parse(v ?? {})),
  duplicates: DuplicatesSchema.optional().transform((v) => DuplicatesSchema.parse(v ?? {})),
  priority: PrioritySchema.optional().transform((v) => PrioritySchema.parse(v ?? {})),
  complexity: ComplexitySchema.optional().transform((v) => ComplexitySchema.parse(v ?? {})),
  memory: MemorySchema.optional().transform((v) => MemorySchema.parse(v ?? {})),
  labels: LabelsSchema.optional().transform((v) => LabelsSchema.parse(v ?? {})),
  concurrency: z.number().int().min(1).default(4),
});

export type SieveConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  SIEVE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  SIEVE_DB_PATH: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function describeIssue(error: z.ZodError, fallback: string): string {
  const issue = error.issues[0];
  const where = issue?.path.join(".") || fallback;
  return `${where}: ${issue?.message ?? "unknown error"}`;
}

/** Validates a raw config object and fills defaults. */
export function parseConfig(raw: unknown): SieveConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(`invalid config at ${describeIssue(result.error, "config")}`);
  }
  const parsed = result.data;
  if (parsed.version > 1) {
    throw new ConfigurationError(
      `config version ${parsed.version} requires a newer version of issue-sieve. run \`npm install -g issue-sieve\` to upgrade.`,
    );
  }
  validateCategories(parsed.classifier.categories);
  return parsed;
}

export function defaultConfig(): SieveConfig {
  return parseConfig({});
}

export function loadConfig(configPath?: string): SieveConfig {
  const p = configPath || resolve(process.cwd(), "triage.config.yaml");
  if (!existsSync(p)) {
    throw new ConfigurationError(`config not found at ${p}. run \`sieve init\` or pass \`--repo owner/name\``);
  }
  return parseConfig(parseYaml(readFileSync(p, "utf-8")));
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  const result = EnvSchema.safeParse(process.env);
  if (!result.success) {
    throw new ConfigurationError(`invalid environment: ${describeIssue(result.error, "env")}`);
  }
  return result.data;
}

export function parseRepo(repo: string): { owner: string; repo: string } {
  let cleaned = repo.trim();
  cleaned = cleaned.replace(/^https?:\/\/github\.com\//, "");
  cleaned = cleaned.replace(/^github\.com\//, "");
  cleaned = cleaned.replace(/\.git$/, "");
  cleaned = cleaned.replace(/\/$/, "");

  const parts = cleaned.split("/").filter(Boolean);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(`invalid repo format: "${repo}". expected owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}
