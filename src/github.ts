import { Octokit } from "@octokit/rest";
import { SourceUnavailableError, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Issue, IssueSource } from "./types.js";

interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: Date;
}

export interface ListOptions {
  maxItems?: number;
  batchSize?: number;
  onProgress?: (fetched: number) => void;
}

interface RawIssue {
  number: number;
  title: string;
  body?: string | null;
  pull_request?: unknown;
}

export function toIssue(raw: RawIssue): Issue {
  return { number: raw.number, title: raw.title, body: raw.body || "" };
}

export function isPullRequest(raw: RawIssue): boolean {
  return raw.pull_request != null;
}

export function httpStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/** IssueSource backed by the GitHub REST API. Every failure surfaces as SourceUnavailableError. */
export class GitHubIssueSource implements IssueSource {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private logger: Logger;
  private rateLimit: RateLimitInfo = { remaining: 5000, limit: 5000, resetAt: new Date() };

  constructor(token: string, owner: string, repo: string, logger: Logger = silentLogger()) {
    this.octokit = new Octokit({ auth: token });
    this.owner = owner;
    this.repo = repo;
    this.logger = logger;
  }

  get repoFull(): string {
    return `${this.owner}/${this.repo}`;
  }

  private updateRateLimit(headers: Record<string, string | number | undefined>) {
    const remaining = headers["x-ratelimit-remaining"];
    const limit = headers["x-ratelimit-limit"];
    const reset = headers["x-ratelimit-reset"];
    if (remaining != null) this.rateLimit.remaining = parseInt(String(remaining), 10);
    if (limit != null) this.rateLimit.limit = parseInt(String(limit), 10);
    if (reset != null) this.rateLimit.resetAt = new Date(parseInt(String(reset), 10) * 1000);
  }

  async withBackoff<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; attempt < 3; attempt++) {
      try {
        return await fn();
      } catch (err) {
        const status = httpStatus(err);
        if (status === 403 && this.rateLimit.remaining === 0) {
          const waitMs = Math.max(0, this.rateLimit.resetAt.getTime() - Date.now()) + 1000;
          this.logger.warn({ waitSeconds: Math.ceil(waitMs / 1000) }, "rate limited, waiting for reset");
          await sleep(waitMs);
          continue;
        }
        if (status === 403 && attempt < 2) {
          await sleep((attempt + 1) * 5000);
          continue;
        }
        throw err;
      }
    }
    throw new Error("Max retries exceeded");
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.withBackoff(fn);
    } catch (err) {
      throw new SourceUnavailableError(`GitHub ${what} failed for ${this.repoFull}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async fetchIssue(number: number): Promise<Issue> {
    const response = await this.call(`fetch of #${number}`, () =>
      this.octokit.issues.get({ owner: this.owner, repo: this.repo, issue_number: number }),
    );
    this.updateRateLimit(response.headers);
    return toIssue(response.data);
  }

  async listOpenIssues(opts: ListOptions = {}): Promise<Issue[]> {
    const { maxItems = 5000, batchSize = 100, onProgress } = opts;
    const items: Issue[] = [];
    let page = 1;

    while (items.length < maxItems) {
      const response = await this.call("issue listing", () =>
        this.octokit.issues.listForRepo({
          owner: this.owner,
          repo: this.repo,
          state: "open",
          sort: "created",
          direction: "asc",
          per_page: Math.min(batchSize, 100),
          page,
        }),
      );
      this.updateRateLimit(response.headers);

      if (response.data.length === 0) break;
      for (const raw of response.data) {
        if (isPullRequest(raw)) continue;
        items.push(toIssue(raw));
      }
      onProgress?.(items.length);
      page++;
    }

    return items.slice(0, maxItems);
  }

  async applyLabels(number: number, labels: string[]): Promise<void> {
    if (labels.length === 0) return;
    await this.call(`labeling of #${number}`, () =>
      this.octokit.issues.addLabels({ owner: this.owner, repo: this.repo, issue_number: number, labels }),
    );
  }

  async postComment(number: number, text: string): Promise<void> {
    await this.call(`comment on #${number}`, () =>
      this.octokit.issues.createComment({ owner: this.owner, repo: this.repo, issue_number: number, body: text }),
    );
  }

  async ensureLabel(label: string, color: string, description: string): Promise<void> {
    try {
      await this.octokit.issues.getLabel({ owner: this.owner, repo: this.repo, name: label });
    } catch (err) {
      if (httpStatus(err) !== 404) throw new SourceUnavailableError(`label lookup failed: ${errorMessage(err)}`);
      await this.call(`creation of label ${label}`, () =>
        this.octokit.issues.createLabel({ owner: this.owner, repo: this.repo, name: label, color, description }),
      );
    }
  }
}
