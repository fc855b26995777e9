import PQueue from "p-queue";
import { classify, validateCategories } from "./classifier.js";
import { defaultConfig, type SieveConfig } from "./config.js";
import { detectDuplicates } from "./duplicates.js";
import { HashEmbeddingProvider, prepareEmbeddingText } from "./embeddings.js";
import { ConfigurationError, SourceUnavailableError, TriageError, errorKind, errorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { withTimeout } from "./memory.js";
import { assess, type Assessment, type SeverityHints } from "./priority.js";
import type {
  BatchResult,
  ClassificationResult,
  EmbeddingProvider,
  FailureRecord,
  Issue,
  IssueSource,
  MemoryStore,
  SimilarityMatch,
  StageError,
  TransitionEvent,
  TriageDecision,
  TriageOutcome,
  TriageStage,
  TriageState,
} from "./types.js";

export interface PipelineOptions {
  config?: SieveConfig;
  /** Without a store the duplicate check and the memory write are skipped. */
  store?: MemoryStore;
  embedder?: EmbeddingProvider;
  source?: IssueSource;
  logger?: Logger;
  /** Called after every state transition. */
  onTransition?: (event: TransitionEvent) => void;
  now?: () => Date;
}

export interface TriageOptions {
  hints?: SeverityHints;
}

export interface BatchOptions extends TriageOptions {
  signal?: AbortSignal;
  concurrency?: number;
}

export interface RetriageOpenOptions extends BatchOptions {
  /** Reported while open issues are being listed. */
  onProgress?: (fetched: number) => void;
}

function stageError(stage: TriageStage, err: unknown): StageError {
  return { stage, kind: errorKind(err), message: errorMessage(err) };
}

/**
 * Per-issue state machine:
 * fetched → classified → duplicate_checked → priority_assessed → stored → done,
 * with failed(stage) reachable from any step. Memory problems degrade the
 * decision (empty duplicates, stored=false, an entry in `errors`); only source
 * failures and classification/assessment errors fail the issue.
 */
export class TriagePipeline {
  readonly config: SieveConfig;
  private store?: MemoryStore;
  private embedder: EmbeddingProvider;
  private source?: IssueSource;
  private logger: Logger;
  private onTransition?: (event: TransitionEvent) => void;
  private now: () => Date;

  constructor(opts: PipelineOptions = {}) {
    this.config = opts.config ?? defaultConfig();
    validateCategories(this.config.classifier.categories);

    this.store = this.config.memory.enabled ? opts.store : undefined;
    this.embedder =
      opts.embedder ?? new HashEmbeddingProvider(this.store?.dimensions ?? this.config.memory.dimensions);
    if (this.store && this.embedder.dimensions !== this.store.dimensions) {
      throw new ConfigurationError(
        `embedder produces ${this.embedder.dimensions}-dim vectors but the memory store expects ${this.store.dimensions}`,
      );
    }

    this.source = opts.source;
    this.logger = opts.logger ?? silentLogger();
    this.onTransition = opts.onTransition;
    this.now = opts.now ?? (() => new Date());
  }

  get memoryEnabled(): boolean {
    return this.store !== undefined;
  }

  private emit(event: TransitionEvent, log: Logger): void {
    log.trace({ from: event.from, to: event.to }, "triage transition");
    if (!this.onTransition) return;
    try {
      this.onTransition(event);
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "transition observer threw");
    }
  }

  private async fetchIssue(number: number): Promise<Issue> {
    if (!this.source) throw new SourceUnavailableError(`no issue source configured to fetch #${number}`);
    try {
      return await this.source.fetchIssue(number);
    } catch (err) {
      if (err instanceof TriageError) throw err;
      throw new SourceUnavailableError(`failed to fetch issue #${number}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async triage(input: Issue | number, opts: TriageOptions = {}): Promise<TriageOutcome> {
    const issueNumber = typeof input === "number" ? input : input.number;
    const log = this.logger.child({ issueNumber });
    let state: TriageState | "start" = "start";

    const move = (to: TriageStage, error?: StageError) => {
      this.emit({ issueNumber, from: state, to, stage: to, error }, log);
      state = to;
    };

    const fail = (stage: TriageStage, err: unknown): FailureRecord => {
      const error = stageError(stage, err);
      this.emit({ issueNumber, from: state, to: "failed", stage, error }, log);
      state = "failed";
      log.error({ stage, kind: error.kind, err: error.message }, "triage failed");
      return { status: "failed", issueNumber, stage, error: { kind: error.kind, message: error.message } };
    };

    let issue: Issue;
    try {
      issue = typeof input === "number" ? await this.fetchIssue(input) : input;
    } catch (err) {
      return fail("fetched", err);
    }
    move("fetched");

    const { classifier } = this.config;
    let classification: ClassificationResult;
    try {
      classification = classify(issue.title, issue.body, classifier.min_confidence, classifier.categories);
    } catch (err) {
      return fail("classified", err);
    }
    move("classified");

    const skipped: TriageStage[] = [];
    const errors: StageError[] = [];
    let duplicates: SimilarityMatch[] = [];
    let vector: number[] | undefined;
    const timeoutMs = this.config.memory.timeout_ms;

    if (!this.store) {
      skipped.push("duplicate_checked");
    } else {
      let stageErr: StageError | undefined;
      try {
        vector = await withTimeout(this.embedder.embed(prepareEmbeddingText(issue)), timeoutMs, "embedding");
        duplicates = await withTimeout(
          detectDuplicates(vector, issue.number, this.store, {
            threshold: this.config.duplicates.threshold,
            maxResults: this.config.duplicates.max_results,
          }),
          timeoutMs,
          "duplicate query",
        );
      } catch (err) {
        stageErr = stageError("duplicate_checked", err);
        errors.push(stageErr);
        log.warn({ kind: stageErr.kind, err: stageErr.message }, "duplicate check degraded");
      }
      move("duplicate_checked", stageErr);
    }

    let assessment: Assessment;
    try {
      assessment = assess(
        classification,
        issue.title,
        issue.body,
        { priority: this.config.priority, complexity: this.config.complexity },
        opts.hints,
      );
    } catch (err) {
      return fail("priority_assessed", err);
    }
    move("priority_assessed");

    let stored = false;
    if (!this.store) {
      skipped.push("stored");
    } else {
      let stageErr: StageError | undefined;
      if (!vector) {
        stageErr = { stage: "stored", kind: "skipped", message: "no embedding available to store" };
      } else {
        try {
          await withTimeout(
            this.store.upsert({
              issueNumber: issue.number,
              title: issue.title,
              body: issue.body,
              embedding: { dimension: vector.length, values: vector },
              labels: classification.labels,
              priority: assessment.priority,
              storedAt: this.now().toISOString(),
            }),
            timeoutMs,
            "memory write",
          );
          stored = true;
        } catch (err) {
          stageErr = stageError("stored", err);
        }
      }
      if (stageErr) {
        errors.push(stageErr);
        log.warn({ kind: stageErr.kind, err: stageErr.message }, "memory write skipped");
      }
      move("stored", stageErr);
    }

    move("done");
    log.info(
      {
        labels: classification.labels,
        priority: assessment.priority,
        complexity: assessment.complexity,
        duplicates: duplicates.length,
        stored,
      },
      "issue triaged",
    );

    const decision: TriageDecision = {
      status: "done",
      issue,
      classification,
      priority: assessment.priority,
      complexity: assessment.complexity,
      duplicates,
      stored,
      skipped,
      errors,
    };
    return decision;
  }

  /**
   * Triage every input independently on a bounded pool. One issue's failure
   * never stops the batch; an aborted signal stops new issues from starting.
   */
  async retriageBatch(inputs: Array<Issue | number>, opts: BatchOptions = {}): Promise<BatchResult> {
    const queue = new PQueue({ concurrency: opts.concurrency ?? this.config.concurrency });
    const slots: Array<TriageOutcome | undefined> = new Array(inputs.length);
    let cancelled = 0;

    await queue.addAll(
      inputs.map((input, i) => async () => {
        if (opts.signal?.aborted) {
          cancelled++;
          return;
        }
        slots[i] = await this.triageSafely(input, opts);
      }),
    );

    const results = slots.filter((r): r is TriageOutcome => r !== undefined);
    const succeeded = results.filter((r) => r.status === "done").length;
    const summary = { results, succeeded, failed: results.length - succeeded, cancelled };
    this.logger.info(
      { total: inputs.length, succeeded, failed: summary.failed, cancelled },
      "batch retriage finished",
    );
    return summary;
  }

  /** Lists open issues from the source and retriages them all. */
  async retriageOpen(opts: RetriageOpenOptions = {}): Promise<BatchResult> {
    if (!this.source) throw new SourceUnavailableError("no issue source configured");
    let issues: Issue[];
    try {
      issues = await this.source.listOpenIssues({ onProgress: opts.onProgress });
    } catch (err) {
      if (err instanceof TriageError) throw err;
      throw new SourceUnavailableError(`failed to list open issues: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info({ count: issues.length }, "retriaging open issues");
    return this.retriageBatch(issues, opts);
  }

  private async triageSafely(input: Issue | number, opts: TriageOptions): Promise<TriageOutcome> {
    try {
      return await this.triage(input, opts);
    } catch (err) {
      const issueNumber = typeof input === "number" ? input : input.number;
      this.logger.error({ issueNumber, err: errorMessage(err) }, "unexpected triage error");
      return {
        status: "failed",
        issueNumber,
        stage: "fetched",
        error: { kind: errorKind(err), message: errorMessage(err) },
      };
    }
  }
}

export function triage(issue: Issue | number, opts: PipelineOptions & TriageOptions = {}): Promise<TriageOutcome> {
  return new TriagePipeline(opts).triage(issue, opts);
}

export function retriageBatch(
  issues: Array<Issue | number>,
  opts: PipelineOptions & BatchOptions = {},
): Promise<BatchResult> {
  return new TriagePipeline(opts).retriageBatch(issues, opts);
}
