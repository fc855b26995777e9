import { createHash } from "node:crypto";
import { ConfigurationError } from "./errors.js";
import type { EmbeddingProvider, EmbeddingVector, Issue } from "./types.js";

export const DEFAULT_DIMENSIONS = 384;

function assertDimension(dimension: number): void {
  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new ConfigurationError(`embedding dimension must be a positive integer, got ${dimension}`);
  }
}

/**
 * Hash-derived placeholder embedding: SHA-256 of the text, cycled over the
 * requested dimension and mapped from [0,255] to [-1,1]. Identical text gives
 * an identical vector; it carries no semantic meaning.
 */
export function embed(text: string, dimension = DEFAULT_DIMENSIONS): EmbeddingVector {
  assertDimension(dimension);
  const digest = createHash("sha256").update(text, "utf8").digest();
  const values = new Array<number>(dimension);
  for (let i = 0; i < dimension; i++) {
    values[i] = (digest[i % digest.length] / 255.0) * 2 - 1;
  }
  return { dimension, values };
}

export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(dimensions = DEFAULT_DIMENSIONS) {
    assertDimension(dimensions);
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    return embed(text, this.dimensions).values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => embed(t, this.dimensions).values);
  }
}

export function prepareEmbeddingText(issue: Pick<Issue, "title" | "body">): string {
  return `${issue.title} ${issue.body}`;
}
