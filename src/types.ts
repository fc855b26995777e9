export interface Issue {
  number: number;
  title: string;
  body: string;
}

export type Priority = "P0" | "P1" | "P2" | "P3";
export type Complexity = "simple" | "medium" | "complex";

export interface ClassificationResult {
  scores: Record<string, number>;
  labels: string[];
  confidence: number;
}

export interface EmbeddingVector {
  dimension: number;
  values: number[];
}

export interface IssueRecord {
  issueNumber: number;
  title: string;
  body: string;
  embedding: EmbeddingVector;
  labels: string[];
  priority?: Priority;
  storedAt: string;
}

export interface SimilarityMatch {
  issueNumber: number;
  score: number;
  title?: string;
}

export interface QueryOptions {
  minScore?: number;
  excludeNumbers?: number[];
}

export interface MemoryStats {
  totalIssues: number;
  dimensions: number;
  lastStoredAt?: string;
}

/**
 * Durable issue memory. Implementations serialize operations that touch the
 * same issue number; calls for different numbers may interleave.
 */
export interface MemoryStore {
  readonly dimensions: number;
  upsert(record: IssueRecord): Promise<void>;
  get(issueNumber: number): Promise<IssueRecord | undefined>;
  queryNearest(
    vector: ArrayLike<number>,
    dimension: number,
    maxResults: number,
    opts?: QueryOptions,
  ): Promise<SimilarityMatch[]>;
  stats(): Promise<MemoryStats>;
  close(): void;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  dimensions: number;
}

export interface IssueSource {
  fetchIssue(number: number): Promise<Issue>;
  listOpenIssues(opts?: { onProgress?: (fetched: number) => void }): Promise<Issue[]>;
  applyLabels(number: number, labels: string[]): Promise<void>;
  postComment(number: number, text: string): Promise<void>;
}

export type TriageStage =
  | "fetched"
  | "classified"
  | "duplicate_checked"
  | "priority_assessed"
  | "stored"
  | "done";

export type TriageState = TriageStage | "failed";

export interface StageError {
  stage: TriageStage;
  kind: string;
  message: string;
}

export interface TriageDecision {
  status: "done";
  issue: Issue;
  classification: ClassificationResult;
  priority: Priority;
  complexity: Complexity;
  duplicates: SimilarityMatch[];
  stored: boolean;
  skipped: TriageStage[];
  errors: StageError[];
}

export interface FailureRecord {
  status: "failed";
  issueNumber: number;
  stage: TriageStage;
  error: { kind: string; message: string };
}

export type TriageOutcome = TriageDecision | FailureRecord;

export interface TransitionEvent {
  issueNumber: number;
  from: TriageState | "start";
  to: TriageState;
  stage: TriageStage;
  error?: StageError;
}

export interface BatchResult {
  results: TriageOutcome[];
  succeeded: number;
  failed: number;
  cancelled: number;
}
