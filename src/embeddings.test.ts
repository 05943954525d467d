import { describe, it, expect } from "vitest";
import { EmbeddingGateway, cosine, type EmbeddingProvider } from "./embeddings";
import { RetryPolicy } from "./retry";
import {
  EmbeddingFailedError,
  ProviderQuotaExceededError,
  ProviderUnavailableError,
  SupersededError,
} from "./errors";
import { KeywordEmbeddingProvider } from "./testing/fakes";

const retry = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0 });

/** Embeds "t<n>" as [n]; each request waits `delayMs(texts)` first. */
class NumberedProvider implements EmbeddingProvider {
  public readonly modelName = "numbered-test";
  public calls = 0;
  private readonly delayMs: (texts: readonly string[]) => number;
  private failures: Error[] = [];

  public constructor(delayMs: (texts: readonly string[]) => number = () => 0) {
    this.delayMs = delayMs;
  }

  public failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    const ms = this.delayMs(texts);
    if (ms > 0) await new Promise((resolve) => setTimeout(resolve, ms));
    return texts.map((t) => Float32Array.of(Number(t.slice(1))));
  }
}

function numbered(n: number): string[] {
  return Array.from({ length: n }, (_, i) => `t${i}`);
}

function valuesOf(vectors: readonly Float32Array[]): number[] {
  return vectors.map((v) => v[0]);
}

describe("EmbeddingGateway", () => {
  it("keeps input order when later batches finish first", async () => {
    // Earlier batches are slower: t0-t1 waits 25 ms, t8-t9 waits 5 ms.
    const provider = new NumberedProvider((texts) => 30 - Number(texts[0].slice(1)) * 3 - 5);
    const gateway = new EmbeddingGateway(provider, { retry, batchSize: 2, concurrency: 3 });
    const progress: number[] = [];

    const vectors = await gateway.embedBatch(numbered(10), undefined, (done, total) => {
      expect(total).toBe(10);
      progress.push(done);
    });

    expect(valuesOf(vectors)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(provider.calls).toBe(5);
    expect(progress).toEqual([2, 4, 6, 8, 10]);
  });

  it("embeds a single text", async () => {
    const gateway = new EmbeddingGateway(new NumberedProvider(), { retry });
    await expect(gateway.embed("t7").then((v) => v[0])).resolves.toBe(7);
    await expect(gateway.embedBatch([])).resolves.toEqual([]);
  });

  it("retries a transient failure and then succeeds", async () => {
    const provider = new KeywordEmbeddingProvider();
    provider.failNext(new ProviderUnavailableError("down"));
    const gateway = new EmbeddingGateway(provider, { retry });

    const [vector] = await gateway.embedBatch(["monthly rent"]);

    expect(provider.calls).toBe(2);
    expect(vector).toEqual(provider.vectorFor("monthly rent"));
  });

  it("reports EmbeddingFailed once retries are exhausted", async () => {
    const provider = new KeywordEmbeddingProvider();
    const last = new ProviderUnavailableError("still down");
    provider.failNext(new ProviderUnavailableError("down"), last);
    const gateway = new EmbeddingGateway(provider, { retry });

    const err = await gateway.embedBatch(["monthly rent"]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EmbeddingFailedError);
    expect(err).toMatchObject({ code: "EMBEDDING_FAILED", message: "Embedding failed: still down" });
    expect(err instanceof Error ? err.cause : undefined).toBe(last);
    expect(provider.calls).toBe(2);
  });

  it("passes a quota error through without retrying", async () => {
    const provider = new KeywordEmbeddingProvider();
    const quota = new ProviderQuotaExceededError("quota exhausted");
    provider.failNext(quota);
    const gateway = new EmbeddingGateway(provider, { retry });

    await expect(gateway.embedBatch(["monthly rent"])).rejects.toBe(quota);
    expect(provider.calls).toBe(1);
  });

  it("rejects a provider that returns the wrong number of vectors", async () => {
    const short: EmbeddingProvider = {
      modelName: "short-test",
      embedBatch: async () => [Float32Array.of(1)],
    };
    const gateway = new EmbeddingGateway(short, { retry });

    await expect(gateway.embedBatch(["a", "b"])).rejects.toThrow(
      new EmbeddingFailedError("Embedding provider returned 1 vectors for 2 inputs"),
    );
  });

  it("stops issuing requests after the first failed batch", async () => {
    // The first request fails at once; every later one takes 10 ms.
    const provider = new NumberedProvider((texts) => (texts[0] === "t0" ? 0 : 10));
    const quota = new ProviderQuotaExceededError("quota exhausted");
    provider.failNext(quota);
    const gateway = new EmbeddingGateway(provider, { retry, batchSize: 1, concurrency: 2 });

    await expect(gateway.embedBatch(numbered(27))).rejects.toBe(quota);
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(provider.calls).toBe(2);
  });

  it("does not call the provider when the caller has already aborted", async () => {
    const provider = new NumberedProvider();
    const gateway = new EmbeddingGateway(provider, { retry });
    const controller = new AbortController();
    const reason = new SupersededError("load");
    controller.abort(reason);

    await expect(gateway.embedBatch(numbered(3), controller.signal)).rejects.toBe(reason);
    expect(provider.calls).toBe(0);
  });

  it("stops when the caller aborts mid-way", async () => {
    const provider = new NumberedProvider(() => 10);
    const gateway = new EmbeddingGateway(provider, { retry, batchSize: 1, concurrency: 1 });
    const controller = new AbortController();
    const reason = new SupersededError("load");

    const embedding = gateway.embedBatch(numbered(5), controller.signal);
    controller.abort(reason);

    await expect(embedding).rejects.toBe(reason);
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(provider.calls).toBe(1);
  });
});

describe("cosine", () => {
  it("scores direction, not magnitude", () => {
    expect(cosine(Float32Array.of(1, 0), Float32Array.of(3, 0))).toBeCloseTo(1, 6);
    expect(cosine(Float32Array.of(1, 0), Float32Array.of(0, 2))).toBe(0);
    expect(cosine(Float32Array.of(0, 0), Float32Array.of(1, 1))).toBe(0);
  });
});
