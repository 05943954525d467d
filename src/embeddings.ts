import {
  EmbeddingFailedError,
  ProviderQuotaExceededError,
  RagError,
  isRetryable,
} from "./errors";
import { componentLogger } from "./logger";
import { RetryPolicy, abortReason } from "./retry";

const log = componentLogger("embeddings");

/**
 * Narrow interface to an external embedding service. Implementations classify
 * their own failures into ProviderUnavailable / RateLimited /
 * ProviderQuotaExceeded and must return one vector per input, in order.
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;
}

export interface EmbeddingGatewayOptions {
  retry?: RetryPolicy;
  /** Texts per provider request (default 20). */
  batchSize?: number;
  /** Provider requests in flight at once during indexing (default 4). */
  concurrency?: number;
}

/**
 * Stateless text → vector conversion with the shared retry policy applied to
 * each provider request. Batches may complete out of order; results are
 * written back by input position so the output always matches the input order.
 */
export class EmbeddingGateway {
  private readonly provider: EmbeddingProvider;
  private readonly retry: RetryPolicy;
  private readonly batchSize: number;
  private readonly concurrency: number;

  public constructor(provider: EmbeddingProvider, opts: EmbeddingGatewayOptions = {}) {
    this.provider = provider;
    this.retry = opts.retry ?? new RetryPolicy();
    this.batchSize = Math.max(1, opts.batchSize ?? 20);
    this.concurrency = Math.max(1, opts.concurrency ?? 4);
  }

  /** @returns Resolved underlying model identifier. */
  public getModelName(): string {
    return this.provider.modelName;
  }

  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text], signal);
    return vector;
  }

  /**
   * Embed many texts in batches with bounded concurrency. A failed batch
   * stops the remaining ones.
   *
   * @throws {ProviderQuotaExceededError} Immediately, without retrying.
   * @throws {EmbeddingFailedError} When retries are exhausted or the provider misbehaves.
   */
  public async embedBatch(
    texts: readonly string[],
    signal?: AbortSignal,
    onProgress?: (done: number, total: number) => void,
  ): Promise<Float32Array[]> {
    if (texts.length === 0) return [];

    const batches: { texts: readonly string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push({ texts: texts.slice(i, i + this.batchSize), startIdx: i });
    }

    const results: Float32Array[] = new Array<Float32Array>(texts.length);
    let completed = 0;
    let next = 0;

    // The first failing batch aborts the rest: no new requests start and
    // in-flight ones are cancelled.
    if (signal?.aborted) throw abortReason(signal);
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const worker = async () => {
      while (next < batches.length && !controller.signal.aborted) {
        const batch = batches[next++];
        let vectors: Float32Array[];
        try {
          vectors = await this.embedOne(batch.texts, controller.signal);
        } catch (err) {
          if (!controller.signal.aborted) controller.abort(err);
          throw err;
        }
        vectors.forEach((v, j) => {
          results[batch.startIdx + j] = v;
        });
        completed += batch.texts.length;
        onProgress?.(completed, texts.length);
      }
    };

    try {
      await Promise.all(
        Array.from({ length: Math.min(this.concurrency, batches.length) }, () => worker()),
      );
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
    }
    return results;
  }

  private async embedOne(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    let vectors: Float32Array[];
    try {
      vectors = await this.retry.run(
        `embed(${this.provider.modelName})`,
        (s) => this.provider.embedBatch(texts, s),
        signal,
      );
    } catch (err) {
      if (signal?.aborted) throw err;
      if (err instanceof ProviderQuotaExceededError) throw err;
      if (isRetryable(err)) {
        log.error({ err: err.message }, "embedding provider failed after retries");
        throw new EmbeddingFailedError(`Embedding failed: ${err.message}`, err);
      }
      if (err instanceof RagError) throw err;
      throw new EmbeddingFailedError(
        `Embedding failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    if (vectors.length !== texts.length) {
      throw new EmbeddingFailedError(
        `Embedding provider returned ${vectors.length} vectors for ${texts.length} inputs`,
      );
    }
    return vectors;
  }
}

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length; a zero vector scores 0.
 *
 * @returns Similarity in range [-1, 1]
 */
export function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
