import { cosine } from "./embeddings";
import { IndexNotFoundError, InvalidArgumentError } from "./errors";
import { componentLogger } from "./logger";
import {
  decodeIndex,
  encodeIndex,
  type IndexEntry,
  type IndexMeta,
  type IndexStore,
} from "./persistence";
import type { Chunk, ScoredChunk } from "./types";

const log = componentLogger("vector-index");

/** What a persisted index must match to be reused instead of rebuilt. */
export type IndexExpectations = Partial<Omit<IndexMeta, "documentId" | "dimension">>;

const EXPECTATION_KEYS = ["fingerprint", "modelName", "chunkSize", "chunkOverlap"] as const;

interface Snapshot {
  readonly meta: IndexMeta;
  readonly entries: readonly IndexEntry[];
}

/**
 * In-memory vector index over the chunks of a single document.
 *
 * The index is an immutable snapshot: `build` and `load` assemble a complete
 * replacement before swapping it in, so a failed build leaves the previous
 * snapshot untouched and searches never see a half-built index.
 */
export class VectorIndex {
  private snapshot: Snapshot | null = null;

  public isBuilt(): boolean {
    return this.snapshot !== null;
  }

  public get size(): number {
    return this.snapshot?.entries.length ?? 0;
  }

  public getMeta(): IndexMeta | null {
    return this.snapshot?.meta ?? null;
  }

  public getChunks(): Chunk[] {
    return this.snapshot?.entries.map((e) => e.chunk) ?? [];
  }

  /**
   * @throws {InvalidArgumentError} If vectors and chunks disagree in count or dimension.
   */
  public build(
    meta: Omit<IndexMeta, "dimension">,
    chunks: readonly Chunk[],
    vectors: readonly Float32Array[],
  ): void {
    if (chunks.length !== vectors.length) {
      throw new InvalidArgumentError(
        `Cannot build index: ${chunks.length} chunks but ${vectors.length} vectors`,
      );
    }
    const dimension = vectors[0]?.length ?? 0;
    const entries: IndexEntry[] = [];
    for (let i = 0; i < chunks.length; i++) {
      if (vectors[i].length !== dimension) {
        throw new InvalidArgumentError(
          `Cannot build index: vector ${i} has dimension ${vectors[i].length}, expected ${dimension}`,
        );
      }
      entries.push({ chunk: chunks[i], vector: Float32Array.from(vectors[i]) });
    }
    entries.sort((a, b) => a.chunk.index - b.chunk.index);
    this.snapshot = { meta: { ...meta, dimension }, entries };
    log.debug({ documentId: meta.documentId, chunks: entries.length, dimension }, "index built");
  }

  /**
   * Top-`k` chunks by cosine similarity to `query`, best first; equal scores
   * keep chunk order. `k` is clamped to [0, size].
   *
   * @throws {IndexNotFoundError} Before `build`/`load`.
   */
  public search(query: Float32Array, k: number): ScoredChunk[] {
    const snap = this.snapshot;
    if (!snap) throw new IndexNotFoundError();
    const limit = Math.max(0, Math.min(Math.floor(k), snap.entries.length));
    if (limit === 0) return [];
    return snap.entries
      .map((e) => ({ chunk: e.chunk, score: cosine(query, e.vector) }))
      .sort((a, b) => b.score - a.score || a.chunk.index - b.chunk.index)
      .slice(0, limit);
  }

  /**
   * Write the current snapshot to `store` under its document id.
   *
   * @throws {IndexNotFoundError} Before `build`/`load`.
   */
  public async persist(store: IndexStore): Promise<void> {
    const snap = this.snapshot;
    if (!snap) throw new IndexNotFoundError();
    await store.write(snap.meta.documentId, encodeIndex(snap.meta, snap.entries));
    log.debug({ documentId: snap.meta.documentId }, "index persisted");
  }

  /**
   * Replace the snapshot with the persisted index for `documentId`.
   *
   * @returns false (leaving the current snapshot as it was) when nothing is
   *          stored, the stored data cannot be read, or its metadata does not
   *          match `expect`; the caller should rebuild.
   */
  public async load(
    store: IndexStore,
    documentId: string,
    expect: IndexExpectations = {},
  ): Promise<boolean> {
    let raw: string | null;
    try {
      raw = await store.read(documentId);
    } catch (e) {
      log.warn({ documentId, err: String(e) }, "failed to read persisted index, rebuilding");
      return false;
    }
    if (raw === null) return false;

    const decoded = decodeIndex(raw);
    if (!decoded || decoded.meta.documentId !== documentId) {
      log.warn({ documentId }, "persisted index is unreadable, rebuilding");
      return false;
    }
    const mismatched = EXPECTATION_KEYS.filter(
      (key) => expect[key] !== undefined && expect[key] !== decoded.meta[key],
    );
    if (mismatched.length > 0) {
      log.info(
        { documentId, mismatched },
        "persisted index incompatible with current settings, rebuilding",
      );
      return false;
    }
    this.snapshot = decoded;
    log.debug({ documentId, chunks: decoded.entries.length }, "index loaded from store");
    return true;
  }

  /** Drop the snapshot. */
  public clear(): void {
    this.snapshot = null;
  }
}
