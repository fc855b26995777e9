import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it, vi } from "vitest";
import { defaultConfig, loadConfig, loadEnvConfig, parseConfig, parseRepo } from "../config.js";
import { ConfigurationError } from "../errors.js";

function tmpDir(): string {
  const dir = resolve(tmpdir(), `sieve-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = defaultConfig();
    expect(config.version).toBe(1);
    expect(config.classifier.min_confidence).toBe(0.6);
    expect(Object.keys(config.classifier.categories)).toEqual([
      "bug",
      "feature",
      "docs",
      "question",
      "performance",
      "security",
    ]);
    expect(config.duplicates).toEqual({ threshold: 0.85, max_results: 5 });
    expect(config.memory).toEqual({ enabled: true, dimensions: 384, timeout_ms: 5000 });
    expect(config.labels).toEqual({
      duplicate: "sieve:duplicate",
      priority_prefix: "priority:",
      complexity_prefix: "complexity:",
    });
    expect(config.concurrency).toBe(4);
  });

  it("keeps defaults for unset keys inside a section", () => {
    const config = parseConfig({ duplicates: { threshold: 0.9 } });
    expect(config.duplicates).toEqual({ threshold: 0.9, max_results: 5 });
  });

  it("replaces the category table wholesale", () => {
    const config = parseConfig({ classifier: { categories: { infra: ["docker", "ci"] } } });
    expect(config.classifier.categories).toEqual({ infra: ["docker", "ci"] });
    expect(config.classifier.min_confidence).toBe(0.6);
  });

  it("reports the path of an invalid value", () => {
    expect(() => parseConfig({ duplicates: { threshold: 2 } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ duplicates: { threshold: 2 } })).toThrow("invalid config at duplicates.threshold");
    expect(() => parseConfig({ concurrency: 0 })).toThrow("invalid config at concurrency");
  });

  it("rejects a newer config version", () => {
    expect(() => parseConfig({ version: 2 })).toThrow("config version 2 requires a newer version");
  });

  it("rejects empty keywords", () => {
    expect(() => parseConfig({ classifier: { categories: { bug: [""] } } })).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const d of dirs) rmSync(d, { recursive: true, force: true });
    dirs.length = 0;
  });

  it("reads YAML", () => {
    const dir = tmpDir();
    dirs.push(dir);
    const path = resolve(dir, "triage.config.yaml");
    writeFileSync(
      path,
      ["repo: acme/widgets", "memory:", "  enabled: false", "priority:", "  high_confidence: 0.5", ""].join("\n"),
    );
    const config = loadConfig(path);
    expect(config.repo).toBe("acme/widgets");
    expect(config.memory.enabled).toBe(false);
    expect(config.priority.high_confidence).toBe(0.5);
    expect(config.priority.critical_keywords).toContain("crash");
  });

  it("ships a sample config that matches the defaults", () => {
    const sample = loadConfig(fileURLToPath(new URL("../../triage.config.yaml", import.meta.url)));
    expect(sample.repo).toBe("owner/name");
    expect({ ...sample, repo: undefined }).toEqual(defaultConfig());
  });

  it("throws when the file is missing", () => {
    const missing = resolve(tmpdir(), "sieve-does-not-exist", "triage.config.yaml");
    expect(() => loadConfig(missing)).toThrow(`config not found at ${missing}`);
  });
});

describe("loadEnvConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads variables from the environment", () => {
    vi.stubEnv("GITHUB_TOKEN", "test-token");
    vi.stubEnv("SIEVE_LOG_LEVEL", "debug");
    const env = loadEnvConfig(resolve(tmpdir(), "sieve-no-such.env"));
    expect(env.GITHUB_TOKEN).toBe("test-token");
    expect(env.SIEVE_LOG_LEVEL).toBe("debug");
  });

  it("rejects an unknown log level", () => {
    vi.stubEnv("SIEVE_LOG_LEVEL", "loud");
    expect(() => loadEnvConfig(resolve(tmpdir(), "sieve-no-such.env"))).toThrow(
      "invalid environment: SIEVE_LOG_LEVEL",
    );
  });
});

describe("parseRepo", () => {
  it("accepts owner/repo and GitHub URLs", () => {
    expect(parseRepo("acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseRepo("https://github.com/acme/widgets.git")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseRepo("github.com/acme/widgets/")).toEqual({ owner: "acme", repo: "widgets" });
  });

  it("rejects anything else", () => {
    expect(() => parseRepo("widgets")).toThrow(ConfigurationError);
    expect(() => parseRepo("a/b/c")).toThrow('invalid repo format: "a/b/c"');
  });
});
