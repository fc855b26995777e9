import { HashEmbeddingProvider, prepareEmbeddingText } from "./embeddings.js";
import type { EmbeddingProvider, Issue, MemoryStore, SimilarityMatch } from "./types.js";

export const DEFAULT_DUPLICATE_THRESHOLD = 0.85;
export const DEFAULT_MAX_RESULTS = 5;

export interface DuplicateOptions {
  threshold?: number;
  maxResults?: number;
  embedder?: EmbeddingProvider;
}

/**
 * Ranks stored issues against an already computed embedding. The issue's own
 * number is never a candidate, since a re-triaged issue matches its previous
 * record at 1.0.
 */
export async function detectDuplicates(
  vector: number[],
  issueNumber: number,
  store: MemoryStore,
  opts: Omit<DuplicateOptions, "embedder"> = {},
): Promise<SimilarityMatch[]> {
  const threshold = opts.threshold ?? DEFAULT_DUPLICATE_THRESHOLD;
  const maxResults = opts.maxResults ?? DEFAULT_MAX_RESULTS;
  if (maxResults <= 0) return [];

  const matches = await store.queryNearest(vector, vector.length, maxResults, {
    minScore: threshold,
    excludeNumbers: [issueNumber],
  });

  return matches
    .filter((m) => m.issueNumber !== issueNumber && m.score >= threshold)
    .sort((a, b) => b.score - a.score || a.issueNumber - b.issueNumber)
    .slice(0, maxResults);
}

export async function findDuplicates(
  issue: Issue,
  store: MemoryStore,
  opts: DuplicateOptions = {},
): Promise<SimilarityMatch[]> {
  const embedder = opts.embedder ?? new HashEmbeddingProvider(store.dimensions);
  const vector = await embedder.embed(prepareEmbeddingText(issue));
  return detectDuplicates(vector, issue.number, store, opts);
}
