/**
 * Result cache for Q&A, summary and extraction operations.
 *
 * Two tiers: a bounded in-process map in front of a persisted
 * {@link CacheStore}. Entries remember the document fingerprint they were
 * computed against; an entry whose fingerprint no longer matches is a miss,
 * so a replaced document never serves stale results even before
 * `invalidateDocument` runs. Store failures degrade to recomputation.
 */
import { createHash } from "node:crypto";
import type { z } from "zod";
import type { CacheKey, CacheNamespace, CacheStore, QaHistoryRecord } from "./cache-store";
import { componentLogger } from "./logger";

const log = componentLogger("cache");

export interface Cached<T> {
  readonly value: T;
  /** True when served from either tier without calling `compute`. */
  readonly cached: boolean;
}

export interface CacheLayerOptions {
  /** In-process entries kept before the oldest are evicted (default 500; 0 disables the tier). */
  memoryEntries?: number;
}

interface MemoryEntry {
  readonly key: CacheKey;
  readonly value: string;
  readonly fingerprint: string;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    isPlainObject(v)
      ? Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
      : v,
  );
}

export function cacheKey(
  ownerId: string,
  documentId: string,
  namespace: CacheNamespace,
  params: Record<string, unknown>,
): CacheKey {
  const paramsHash = createHash("sha256").update(canonicalJson(params)).digest("hex");
  return { ownerId, documentId, namespace, paramsHash };
}

function memoryKey(key: CacheKey): string {
  return JSON.stringify([key.ownerId, key.documentId, key.namespace, key.paramsHash]);
}

function decode<T>(raw: string, schema: z.ZodType<T>): T | null {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class CacheLayer {
  private readonly store: CacheStore;
  private readonly capacity: number;
  private readonly memory = new Map<string, MemoryEntry>();

  public constructor(store: CacheStore, opts: CacheLayerOptions = {}) {
    this.store = store;
    this.capacity = Math.max(0, opts.memoryEntries ?? 500);
  }

  /** Number of entries in the in-process tier. */
  public get memorySize(): number {
    return this.memory.size;
  }

  /**
   * Serve `key` from cache when an entry computed against `fingerprint`
   * exists and passes `schema`; otherwise run `compute` and store its result.
   * Errors from `compute` propagate and nothing is stored.
   */
  public async getOrCompute<T>(
    key: CacheKey,
    fingerprint: string,
    compute: () => Promise<T>,
    schema: z.ZodType<T>,
  ): Promise<Cached<T>> {
    const mk = memoryKey(key);
    const front = this.memory.get(mk);
    if (front) {
      const value = front.fingerprint === fingerprint ? decode(front.value, schema) : null;
      if (value !== null) return { value, cached: true };
      this.memory.delete(mk);
    }

    const stored = await this.readStore(key);
    if (stored && stored.fingerprint === fingerprint) {
      const value = decode(stored.value, schema);
      if (value !== null) {
        this.remember({ key, value: stored.value, fingerprint });
        return { value, cached: true };
      }
      log.warn({ namespace: key.namespace, documentId: key.documentId }, "discarding invalid cache entry");
    }

    const value = await compute();
    const serialized = JSON.stringify(value);
    this.remember({ key, value: serialized, fingerprint });
    try {
      await this.store.write({ key, value: serialized, fingerprint, createdAt: new Date().toISOString() });
    } catch (e) {
      log.warn({ namespace: key.namespace, err: String(e) }, "cache write failed");
    }
    return { value, cached: false };
  }

  /** Drop every namespace for one document from both tiers. */
  public async invalidateDocument(ownerId: string, documentId: string): Promise<void> {
    this.forget((k) => k.ownerId === ownerId && k.documentId === documentId);
    try {
      const removed = await this.store.deleteDocument(ownerId, documentId);
      log.debug({ ownerId, documentId, removed }, "document cache invalidated");
    } catch (e) {
      log.warn({ ownerId, documentId, err: String(e) }, "cache invalidation failed");
    }
  }

  /** Drop everything, or everything belonging to `ownerId`. */
  public async clear(ownerId?: string): Promise<void> {
    this.forget((k) => ownerId === undefined || k.ownerId === ownerId);
    try {
      await this.store.clear(ownerId);
    } catch (e) {
      log.warn({ ownerId, err: String(e) }, "cache clear failed");
    }
  }

  public async recordHistory(record: QaHistoryRecord): Promise<void> {
    try {
      await this.store.appendHistory(record);
    } catch (e) {
      log.warn({ documentId: record.documentId, err: String(e) }, "history append failed");
    }
  }

  public async readHistory(
    ownerId: string,
    documentId: string,
    fingerprint: string,
    limit: number,
  ): Promise<QaHistoryRecord[]> {
    try {
      return await this.store.readHistory(ownerId, documentId, fingerprint, limit);
    } catch (e) {
      log.warn({ documentId, err: String(e) }, "history read failed");
      return [];
    }
  }

  private async readStore(key: CacheKey) {
    try {
      return await this.store.read(key);
    } catch (e) {
      log.warn({ namespace: key.namespace, err: String(e) }, "cache store unavailable, recomputing");
      return null;
    }
  }

  private remember(entry: MemoryEntry): void {
    if (this.capacity === 0) return;
    const mk = memoryKey(entry.key);
    this.memory.delete(mk);
    this.memory.set(mk, entry);
    while (this.memory.size > this.capacity) {
      const oldest = this.memory.keys().next();
      if (oldest.done) break;
      this.memory.delete(oldest.value);
    }
  }

  private forget(match: (key: CacheKey) => boolean): void {
    for (const [mk, entry] of this.memory) {
      if (match(entry.key)) this.memory.delete(mk);
    }
  }
}
