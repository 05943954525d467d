import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CacheUnavailableError } from "./errors";
import { componentLogger } from "./logger";
import { citationSchema, tokenUsageSchema } from "./schemas";
import type { Citation, TokenUsage } from "./types";

const log = componentLogger("cache-store");

export type CacheNamespace = "qa" | "summary" | "extraction";

export interface CacheKey {
  readonly ownerId: string;
  readonly documentId: string;
  readonly namespace: CacheNamespace;
  /** SHA-256 of the canonical JSON of the operation parameters. */
  readonly paramsHash: string;
}

export interface StoredCacheEntry {
  readonly key: CacheKey;
  /** Result serialized as JSON. */
  readonly value: string;
  readonly fingerprint: string;
  /** ISO timestamp. */
  readonly createdAt: string;
}

/** One answered question, kept so memory can be restored later. */
export interface QaHistoryRecord {
  readonly ownerId: string;
  readonly documentId: string;
  /** Fingerprint of the document version the question was asked against. */
  readonly fingerprint: string;
  readonly question: string;
  readonly answer: string;
  readonly citations: readonly Citation[];
  readonly tokenUsage: TokenUsage;
  readonly createdAt: string;
}

/**
 * Persisted structured cache. Implementations may throw
 * {@link CacheUnavailableError}; callers treat that as a miss.
 */
export interface CacheStore {
  read(key: CacheKey): Promise<StoredCacheEntry | null>;
  write(entry: StoredCacheEntry): Promise<void>;
  /** Remove every cache entry (all namespaces) for one document. Returns the number removed. */
  deleteDocument(ownerId: string, documentId: string): Promise<number>;
  /** Remove every cache entry, or only those of `ownerId`. Returns the number removed. */
  clear(ownerId?: string): Promise<number>;
  appendHistory(record: QaHistoryRecord): Promise<void>;
  /** Newest `limit` records for the document version, oldest first. */
  readHistory(ownerId: string, documentId: string, fingerprint: string, limit: number): Promise<QaHistoryRecord[]>;
  close(): void;
}

const namespaceSchema = z.enum(["qa", "summary", "extraction"]);

const cacheRowSchema = z.object({
  owner_id: z.string(),
  document_id: z.string(),
  namespace: namespaceSchema,
  params_hash: z.string(),
  value: z.string(),
  fingerprint: z.string(),
  created_at: z.string(),
});

const historyRowSchema = z.object({
  owner_id: z.string(),
  document_id: z.string(),
  fingerprint: z.string(),
  question: z.string(),
  answer: z.string(),
  citations: z.string(),
  token_usage: z.string(),
  created_at: z.string(),
});

const SCHEMA = `
CREATE TABLE IF NOT EXISTS cache_entries (
  owner_id    TEXT NOT NULL,
  document_id TEXT NOT NULL,
  namespace   TEXT NOT NULL,
  params_hash TEXT NOT NULL,
  value       TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  created_at  TEXT NOT NULL,
  PRIMARY KEY (owner_id, document_id, namespace, params_hash)
);
CREATE TABLE IF NOT EXISTS qa_history (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_id    TEXT NOT NULL,
  document_id TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  question    TEXT NOT NULL,
  answer      TEXT NOT NULL,
  citations   TEXT NOT NULL,
  token_usage TEXT NOT NULL,
  created_at  TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_qa_history_document ON qa_history (owner_id, document_id, id);
`;

function parseJson<T>(raw: string, schema: z.ZodType<T>): T | null {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Cache store on a single SQLite database file (`:memory:` for an ephemeral
 * one). Every failure is rethrown as {@link CacheUnavailableError}.
 */
export class SqliteCacheStore implements CacheStore {
  private readonly db: Database.Database;

  public constructor(filename: string) {
    if (filename !== ":memory:") fs.mkdirSync(path.dirname(filename), { recursive: true });
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA);
    log.debug({ filename }, "cache database opened");
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw new CacheUnavailableError(
        `Cache ${operation} failed: ${e instanceof Error ? e.message : String(e)}`,
        e,
      );
    }
  }

  public async read(key: CacheKey): Promise<StoredCacheEntry | null> {
    const row = this.guard("read", () =>
      this.db
        .prepare(
          `SELECT * FROM cache_entries
           WHERE owner_id = @ownerId AND document_id = @documentId
             AND namespace = @namespace AND params_hash = @paramsHash`,
        )
        .get({ ...key }),
    );
    if (row === undefined) return null;
    const parsed = cacheRowSchema.safeParse(row);
    if (!parsed.success) {
      log.warn({ key }, "ignoring malformed cache row");
      return null;
    }
    const r = parsed.data;
    return {
      key: {
        ownerId: r.owner_id,
        documentId: r.document_id,
        namespace: r.namespace,
        paramsHash: r.params_hash,
      },
      value: r.value,
      fingerprint: r.fingerprint,
      createdAt: r.created_at,
    };
  }

  public async write(entry: StoredCacheEntry): Promise<void> {
    this.guard("write", () =>
      this.db
        .prepare(
          `INSERT OR REPLACE INTO cache_entries
             (owner_id, document_id, namespace, params_hash, value, fingerprint, created_at)
           VALUES (@ownerId, @documentId, @namespace, @paramsHash, @value, @fingerprint, @createdAt)`,
        )
        .run({ ...entry.key, value: entry.value, fingerprint: entry.fingerprint, createdAt: entry.createdAt }),
    );
  }

  public async deleteDocument(ownerId: string, documentId: string): Promise<number> {
    return this.guard("delete", () =>
      this.db
        .prepare("DELETE FROM cache_entries WHERE owner_id = ? AND document_id = ?")
        .run(ownerId, documentId).changes,
    );
  }

  public async clear(ownerId?: string): Promise<number> {
    return this.guard("clear", () =>
      ownerId === undefined
        ? this.db.prepare("DELETE FROM cache_entries").run().changes
        : this.db.prepare("DELETE FROM cache_entries WHERE owner_id = ?").run(ownerId).changes,
    );
  }

  public async appendHistory(record: QaHistoryRecord): Promise<void> {
    this.guard("history append", () =>
      this.db
        .prepare(
          `INSERT INTO qa_history
             (owner_id, document_id, fingerprint, question, answer, citations, token_usage, created_at)
           VALUES (@ownerId, @documentId, @fingerprint, @question, @answer, @citations, @tokenUsage, @createdAt)`,
        )
        .run({
          ...record,
          citations: JSON.stringify(record.citations),
          tokenUsage: JSON.stringify(record.tokenUsage),
        }),
    );
  }

  public async readHistory(
    ownerId: string,
    documentId: string,
    fingerprint: string,
    limit: number,
  ): Promise<QaHistoryRecord[]> {
    const rows = this.guard("history read", () =>
      this.db
        .prepare(
          `SELECT * FROM qa_history
           WHERE owner_id = ? AND document_id = ? AND fingerprint = ?
           ORDER BY id DESC LIMIT ?`,
        )
        .all(ownerId, documentId, fingerprint, limit),
    );
    const records: QaHistoryRecord[] = [];
    for (const row of rows.reverse()) {
      const parsed = historyRowSchema.safeParse(row);
      if (!parsed.success) continue;
      const r = parsed.data;
      const citations = parseJson(r.citations, z.array(citationSchema));
      const tokenUsage = parseJson(r.token_usage, tokenUsageSchema);
      if (!citations || !tokenUsage) continue;
      records.push({
        ownerId: r.owner_id,
        documentId: r.document_id,
        fingerprint: r.fingerprint,
        question: r.question,
        answer: r.answer,
        citations,
        tokenUsage,
        createdAt: r.created_at,
      });
    }
    return records;
  }

  public close(): void {
    this.db.close();
  }
}

function entryKey(key: CacheKey): string {
  return JSON.stringify([key.ownerId, key.documentId, key.namespace, key.paramsHash]);
}

/** Process-local cache store for tests and cache-less deployments. */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, StoredCacheEntry>();
  private readonly history: QaHistoryRecord[] = [];

  private remove(predicate: (e: StoredCacheEntry) => boolean): number {
    let removed = 0;
    for (const [k, e] of this.entries) {
      if (predicate(e)) {
        this.entries.delete(k);
        removed++;
      }
    }
    return removed;
  }

  public async read(key: CacheKey): Promise<StoredCacheEntry | null> {
    return this.entries.get(entryKey(key)) ?? null;
  }

  public async write(entry: StoredCacheEntry): Promise<void> {
    this.entries.set(entryKey(entry.key), entry);
  }

  public async deleteDocument(ownerId: string, documentId: string): Promise<number> {
    return this.remove((e) => e.key.ownerId === ownerId && e.key.documentId === documentId);
  }

  public async clear(ownerId?: string): Promise<number> {
    return this.remove((e) => ownerId === undefined || e.key.ownerId === ownerId);
  }

  public async appendHistory(record: QaHistoryRecord): Promise<void> {
    this.history.push(record);
  }

  public async readHistory(
    ownerId: string,
    documentId: string,
    fingerprint: string,
    limit: number,
  ): Promise<QaHistoryRecord[]> {
    const matching = this.history.filter(
      (r) => r.ownerId === ownerId && r.documentId === documentId && r.fingerprint === fingerprint,
    );
    return limit <= 0 ? [] : matching.slice(-limit);
  }

  public close(): void {
    this.entries.clear();
  }
}
