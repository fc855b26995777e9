import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import { IncompatibleDimensionError } from "./errors.js";
import { cosineSimilarity } from "./similarity.js";
import type { IssueRecord, MemoryStats, Priority, QueryOptions, SimilarityMatch } from "./types.js";

export interface VectorStoreOptions {
  path?: string;
  dimensions?: number;
  repo?: string;
  embeddingModel?: string;
  /** Stores at least this large pre-filter candidates through the vec0 index. */
  annThreshold?: number;
}

interface IssueRow {
  issue_number: number;
  title: string;
  body: string;
  labels_json: string;
  priority: Priority | null;
  embedding: Buffer;
  stored_at: string;
}

interface CandidateRow {
  issue_number: number;
  title: string;
  embedding: Buffer;
}

export function defaultDbPath(): string {
  return resolve(process.cwd(), "data", "sieve.db");
}

function encodeVector(values: ArrayLike<number>): Buffer {
  return Buffer.from(Float64Array.from(values).buffer);
}

// copy first: sqlite buffers are not guaranteed to be 8-byte aligned
function decodeVector(blob: Buffer): number[] {
  const bytes = new Uint8Array(blob);
  return Array.from(new Float64Array(bytes.buffer, 0, bytes.byteLength / 8));
}

// vec0 ranks by L2 distance, which orders unit vectors the same way cosine does
function unitFloat32(values: ArrayLike<number>): Buffer {
  let norm = 0;
  for (let i = 0; i < values.length; i++) norm += values[i] * values[i];
  const scale = norm > 0 ? 1 / Math.sqrt(norm) : 0;
  const out = Float32Array.from(values, (v) => v * scale);
  return Buffer.from(out.buffer);
}

function rankMatches(matches: SimilarityMatch[], maxResults: number): SimilarityMatch[] {
  return matches
    .sort((a, b) => b.score - a.score || a.issueNumber - b.issueNumber)
    .slice(0, Math.max(0, maxResults));
}

export class VectorStore {
  private db: Database.Database;
  readonly dimensions: number;
  readonly repo: string;
  private embeddingModel?: string;
  private annThreshold: number;

  constructor(opts: VectorStoreOptions = {}) {
    const p = opts.path || defaultDbPath();
    if (p !== ":memory:") mkdirSync(resolve(p, ".."), { recursive: true });
    this.db = new Database(p);
    this.dimensions = opts.dimensions ?? 384;
    this.repo = opts.repo ?? "default";
    this.embeddingModel = opts.embeddingModel;
    this.annThreshold = opts.annThreshold ?? 5000;
    this.init();
  }

  private init() {
    sqliteVec.load(this.db);
    this.db.pragma("journal_mode = WAL");

    this.db.exec("CREATE TABLE IF NOT EXISTS sieve_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)");

    const storedDim = this.getMeta("dimensions");
    if (storedDim && Number(storedDim) !== this.dimensions) {
      this.db.close();
      throw new IncompatibleDimensionError(Number(storedDim), this.dimensions);
    }

    if (this.embeddingModel) {
      const storedModel = this.getMeta("embedding_model");
      if (storedModel && storedModel !== this.embeddingModel) {
        this.db.close();
        throw new Error(
          `embedding model changed from ${storedModel} to ${this.embeddingModel}. ` +
            `run \`sieve reset\` to start fresh.`,
        );
      }
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS issues (
        repo TEXT NOT NULL,
        issue_number INTEGER NOT NULL,
        title TEXT NOT NULL,
        body TEXT NOT NULL,
        labels_json TEXT NOT NULL DEFAULT '[]',
        priority TEXT,
        embedding BLOB NOT NULL,
        stored_at TEXT NOT NULL,
        PRIMARY KEY (repo, issue_number)
      );

      CREATE VIRTUAL TABLE IF NOT EXISTS vec_issues USING vec0(
        id TEXT PRIMARY KEY,
        embedding float[${this.dimensions}]
      );

      CREATE INDEX IF NOT EXISTS idx_issues_stored_at ON issues(repo, stored_at DESC);
    `);

    this.setMeta("dimensions", String(this.dimensions));
    if (this.embeddingModel) this.setMeta("embedding_model", this.embeddingModel);
  }

  getMeta(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>("SELECT value FROM sieve_meta WHERE key = ?").get(key);
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO sieve_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      )
      .run(key, value);
  }

  private vecId(issueNumber: number): string {
    return `${this.repo}:${issueNumber}`;
  }

  private assertDimension(length: number): void {
    if (length !== this.dimensions) throw new IncompatibleDimensionError(this.dimensions, length);
  }

  /** Insert or replace the record for `record.issueNumber`. */
  upsert(record: IssueRecord): void {
    this.assertDimension(record.embedding.dimension);
    this.assertDimension(record.embedding.values.length);
    const id = this.vecId(record.issueNumber);

    const write = this.db.transaction(() => {
      this.db
        .prepare(`
        INSERT INTO issues (repo, issue_number, title, body, labels_json, priority, embedding, stored_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(repo, issue_number) DO UPDATE SET
          title = excluded.title,
          body = excluded.body,
          labels_json = excluded.labels_json,
          priority = excluded.priority,
          embedding = excluded.embedding,
          stored_at = excluded.stored_at
      `)
        .run(
          this.repo,
          record.issueNumber,
          record.title,
          record.body,
          JSON.stringify(record.labels),
          record.priority ?? null,
          encodeVector(record.embedding.values),
          record.storedAt,
        );

      this.db.prepare("DELETE FROM vec_issues WHERE id = ?").run(id);
      this.db
        .prepare("INSERT INTO vec_issues (id, embedding) VALUES (?, ?)")
        .run(id, unitFloat32(record.embedding.values));
    });
    write();
  }

  get(issueNumber: number): IssueRecord | undefined {
    const row = this.db
      .prepare<[string, number], IssueRow>("SELECT * FROM issues WHERE repo = ? AND issue_number = ?")
      .get(this.repo, issueNumber);
    if (!row) return undefined;
    const values = decodeVector(row.embedding);
    const labels: unknown = JSON.parse(row.labels_json);
    return {
      issueNumber: row.issue_number,
      title: row.title,
      body: row.body,
      embedding: { dimension: values.length, values },
      labels: Array.isArray(labels) ? labels.filter((l): l is string => typeof l === "string") : [],
      priority: row.priority ?? undefined,
      storedAt: row.stored_at,
    };
  }

  count(): number {
    const row = this.db
      .prepare<[string], { c: number }>("SELECT COUNT(*) AS c FROM issues WHERE repo = ?")
      .get(this.repo);
    return row?.c ?? 0;
  }

  /**
   * Exact cosine ranking over stored issues. Large stores ask the vec0 index
   * for candidates first, then re-score them exactly.
   */
  queryNearest(
    vector: ArrayLike<number>,
    dimension: number,
    maxResults: number,
    opts: QueryOptions = {},
  ): SimilarityMatch[] {
    this.assertDimension(dimension);
    this.assertDimension(vector.length);

    const excluded = new Set(opts.excludeNumbers ?? []);
    const minScore = opts.minScore ?? -1;
    const candidates =
      this.count() >= this.annThreshold
        ? this.annCandidates(vector, maxResults + excluded.size)
        : this.allCandidates();

    const matches: SimilarityMatch[] = [];
    for (const row of candidates) {
      if (excluded.has(row.issue_number)) continue;
      const score = cosineSimilarity(vector, decodeVector(row.embedding));
      if (score >= minScore) matches.push({ issueNumber: row.issue_number, score, title: row.title });
    }
    return rankMatches(matches, maxResults);
  }

  private allCandidates(): CandidateRow[] {
    return this.db
      .prepare<[string], CandidateRow>("SELECT issue_number, title, embedding FROM issues WHERE repo = ?")
      .all(this.repo);
  }

  private annCandidates(vector: ArrayLike<number>, wanted: number): CandidateRow[] {
    // vec0 is shared by every repo in the file, so over-fetch before filtering
    const k = Math.min(4096, Math.max(50, wanted * 10));
    const hits = this.db
      .prepare<[Buffer, number], { id: string }>(`
      SELECT id
      FROM vec_issues
      WHERE embedding MATCH ?
      ORDER BY distance
      LIMIT ?
    `)
      .all(unitFloat32(vector), k);

    const prefix = `${this.repo}:`;
    const lookup = this.db.prepare<[string, number], CandidateRow>(
      "SELECT issue_number, title, embedding FROM issues WHERE repo = ? AND issue_number = ?",
    );
    const rows: CandidateRow[] = [];
    for (const { id } of hits) {
      if (!id.startsWith(prefix)) continue;
      const row = lookup.get(this.repo, Number(id.slice(prefix.length)));
      if (row) rows.push(row);
    }
    return rows;
  }

  getStats(): MemoryStats {
    const row = this.db
      .prepare<[string], { c: number; last: string | null }>(
        "SELECT COUNT(*) AS c, MAX(stored_at) AS last FROM issues WHERE repo = ?",
      )
      .get(this.repo);
    return {
      totalIssues: row?.c ?? 0,
      dimensions: this.dimensions,
      lastStoredAt: row?.last ?? undefined,
    };
  }

  close(): void {
    this.db.close();
  }
}
