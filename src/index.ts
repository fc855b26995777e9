// Public API: triage pipeline for programmatic use

export { classify, DEFAULT_CATEGORIES, validateCategories, type CategoryTable } from "./classifier.js";
export { defaultConfig, loadConfig, loadEnvConfig, parseConfig, parseRepo } from "./config.js";
export type { EnvConfig, SieveConfig } from "./config.js";
export { detectDuplicates, findDuplicates, type DuplicateOptions } from "./duplicates.js";
export { embed, HashEmbeddingProvider, prepareEmbeddingText } from "./embeddings.js";
export {
  ConfigurationError,
  IncompatibleDimensionError,
  SourceUnavailableError,
  StorageUnavailableError,
  TriageError,
} from "./errors.js";
export { GitHubIssueSource } from "./github.js";
export { applyLabelActions, buildLabelActions, type LabelAction } from "./labels.js";
export { createLogger } from "./logger.js";
export { KeyedSerializer, SqliteMemoryStore, withTimeout } from "./memory.js";
export { retriageBatch, triage, TriagePipeline } from "./pipeline.js";
export type { BatchOptions, PipelineOptions, RetriageOpenOptions, TriageOptions } from "./pipeline.js";
export { assess, assessComplexity, assessPriority } from "./priority.js";
export type { ComplexityPolicy, PriorityPolicy, SeverityHints } from "./priority.js";
export { renderTriageComment, summarizeBatch } from "./report.js";
export { cosineSimilarity } from "./similarity.js";
export { VectorStore, type VectorStoreOptions } from "./store.js";
export type {
  BatchResult,
  ClassificationResult,
  Complexity,
  EmbeddingProvider,
  EmbeddingVector,
  FailureRecord,
  Issue,
  IssueRecord,
  IssueSource,
  MemoryStore,
  Priority,
  SimilarityMatch,
  StageError,
  TransitionEvent,
  TriageDecision,
  TriageOutcome,
  TriageStage,
} from "./types.js";
