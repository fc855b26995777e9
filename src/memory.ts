import PQueue from "p-queue";
import { StorageUnavailableError, TriageError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { VectorStore } from "./store.js";
import type { IssueRecord, MemoryStats, MemoryStore, QueryOptions, SimilarityMatch } from "./types.js";

/**
 * Rejects with StorageUnavailableError when `promise` has not settled within
 * `ms`. The underlying operation is not cancelled.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StorageUnavailableError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * One PQueue(concurrency: 1) per key: work for the same key runs in order,
 * different keys run in parallel. Idle queues are dropped.
 */
export class KeyedSerializer {
  private queues = new Map<number, PQueue>();

  constructor(private logger: Logger = silentLogger()) {}

  async run<T>(key: number, fn: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
      this.logger.trace({ key }, "created serializer queue");
    }
    const q = queue;
    try {
      return await q.add(fn, { throwOnTimeout: true });
    } finally {
      if (q.size === 0 && q.pending === 0 && this.queues.get(key) === q) {
        this.queues.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}

function asStorageError(op: string, err: unknown): Error {
  if (err instanceof TriageError) return err;
  return new StorageUnavailableError(`memory store ${op} failed: ${errorMessage(err)}`, { cause: err });
}

/** MemoryStore over the SQLite VectorStore. */
export class SqliteMemoryStore implements MemoryStore {
  private serializer: KeyedSerializer;

  constructor(
    private store: VectorStore,
    private logger: Logger = silentLogger(),
  ) {
    this.serializer = new KeyedSerializer(logger);
  }

  get dimensions(): number {
    return this.store.dimensions;
  }

  async upsert(record: IssueRecord): Promise<void> {
    await this.serializer.run(record.issueNumber, async () => {
      try {
        this.store.upsert(record);
      } catch (err) {
        throw asStorageError("upsert", err);
      }
    });
    this.logger.debug({ issueNumber: record.issueNumber }, "issue stored in memory");
  }

  async get(issueNumber: number): Promise<IssueRecord | undefined> {
    return this.serializer.run(issueNumber, async () => {
      try {
        return this.store.get(issueNumber);
      } catch (err) {
        throw asStorageError("get", err);
      }
    });
  }

  async queryNearest(
    vector: ArrayLike<number>,
    dimension: number,
    maxResults: number,
    opts?: QueryOptions,
  ): Promise<SimilarityMatch[]> {
    try {
      return this.store.queryNearest(vector, dimension, maxResults, opts);
    } catch (err) {
      throw asStorageError("query", err);
    }
  }

  async stats(): Promise<MemoryStats> {
    try {
      return this.store.getStats();
    } catch (err) {
      throw asStorageError("stats", err);
    }
  }

  close(): void {
    this.store.close();
  }
}
