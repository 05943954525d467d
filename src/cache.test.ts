import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { CacheLayer, cacheKey, canonicalJson } from "./cache";
import { MemoryCacheStore, type CacheKey, type StoredCacheEntry } from "./cache-store";
import { CacheUnavailableError } from "./errors";

const answerSchema = z.object({ answer: z.string() });

class BrokenStore extends MemoryCacheStore {
  public override async read(_key: CacheKey): Promise<StoredCacheEntry | null> {
    throw new CacheUnavailableError("database is locked");
  }

  public override async write(_entry: StoredCacheEntry): Promise<void> {
    throw new CacheUnavailableError("disk full");
  }
}

const qaKey = (question: string, ownerId = "user-1") =>
  cacheKey(ownerId, "lease-2024", "qa", { question, topK: 5 });

describe("canonicalJson / cacheKey", () => {
  it("sorts object keys at every level", () => {
    expect(canonicalJson({ b: 1, a: { d: 2, c: [{ f: 1, e: 2 }] } })).toBe(
      '{"a":{"c":[{"e":2,"f":1}],"d":2},"b":1}',
    );
  });

  it("hashes equal parameters to the same key regardless of order", () => {
    const a = cacheKey("u", "d", "qa", { question: "rent?", topK: 5 });
    const b = cacheKey("u", "d", "qa", { topK: 5, question: "rent?" });
    expect(a).toEqual(b);
    expect(a.paramsHash).toMatch(/^[0-9a-f]{64}$/);
    expect(cacheKey("u", "d", "qa", { question: "rent?", topK: 3 }).paramsHash).not.toBe(a.paramsHash);
  });
});

describe("CacheLayer", () => {
  it("computes once and then serves from cache", async () => {
    const cache = new CacheLayer(new MemoryCacheStore());
    const compute = vi.fn(async () => ({ answer: "SGD $3,500" }));

    await expect(cache.getOrCompute(qaKey("rent?"), "fp-1", compute, answerSchema)).resolves.toEqual({
      value: { answer: "SGD $3,500" },
      cached: false,
    });
    await expect(cache.getOrCompute(qaKey("rent?"), "fp-1", compute, answerSchema)).resolves.toEqual({
      value: { answer: "SGD $3,500" },
      cached: true,
    });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("serves persisted entries to a fresh process", async () => {
    const store = new MemoryCacheStore();
    await new CacheLayer(store).getOrCompute(qaKey("rent?"), "fp-1", async () => ({ answer: "x" }), answerSchema);

    const compute = vi.fn(async () => ({ answer: "y" }));
    const fresh = new CacheLayer(store);
    await expect(fresh.getOrCompute(qaKey("rent?"), "fp-1", compute, answerSchema)).resolves.toEqual({
      value: { answer: "x" },
      cached: true,
    });
    expect(compute).not.toHaveBeenCalled();
    expect(fresh.memorySize).toBe(1);
  });

  it("treats entries for another document version as misses", async () => {
    const store = new MemoryCacheStore();
    const cache = new CacheLayer(store);
    await cache.getOrCompute(qaKey("rent?"), "fp-1", async () => ({ answer: "old" }), answerSchema);

    const result = await cache.getOrCompute(qaKey("rent?"), "fp-2", async () => ({ answer: "new" }), answerSchema);
    expect(result).toEqual({ value: { answer: "new" }, cached: false });
    expect((await store.read(qaKey("rent?")))?.fingerprint).toBe("fp-2");
  });

  it("recomputes when a stored value fails validation", async () => {
    const store = new MemoryCacheStore();
    await store.write({ key: qaKey("rent?"), value: '{"answer":42}', fingerprint: "fp-1", createdAt: "t" });
    const result = await new CacheLayer(store).getOrCompute(
      qaKey("rent?"),
      "fp-1",
      async () => ({ answer: "fresh" }),
      answerSchema,
    );
    expect(result.cached).toBe(false);
  });

  it("invalidates every namespace of a document", async () => {
    const store = new MemoryCacheStore();
    const cache = new CacheLayer(store);
    const summaryKey = cacheKey("user-1", "lease-2024", "summary", { kind: "brief" });
    await cache.getOrCompute(qaKey("rent?"), "fp-1", async () => ({ answer: "a" }), answerSchema);
    await cache.getOrCompute(summaryKey, "fp-1", async () => ({ answer: "s" }), answerSchema);

    await cache.invalidateDocument("user-1", "lease-2024");
    expect(cache.memorySize).toBe(0);
    await expect(store.read(summaryKey)).resolves.toBeNull();

    const compute = vi.fn(async () => ({ answer: "b" }));
    await cache.getOrCompute(qaKey("rent?"), "fp-1", compute, answerSchema);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("clears a single owner", async () => {
    const store = new MemoryCacheStore();
    const cache = new CacheLayer(store);
    await cache.getOrCompute(qaKey("rent?", "user-1"), "fp", async () => ({ answer: "1" }), answerSchema);
    await cache.getOrCompute(qaKey("rent?", "user-2"), "fp", async () => ({ answer: "2" }), answerSchema);

    await cache.clear("user-1");
    await expect(store.read(qaKey("rent?", "user-1"))).resolves.toBeNull();
    await expect(store.read(qaKey("rent?", "user-2"))).resolves.not.toBeNull();
    expect(cache.memorySize).toBe(1);
  });

  it("keeps working when the store fails", async () => {
    const cache = new CacheLayer(new BrokenStore());
    const compute = vi.fn(async () => ({ answer: "a" }));
    await expect(cache.getOrCompute(qaKey("rent?"), "fp", compute, answerSchema)).resolves.toEqual({
      value: { answer: "a" },
      cached: false,
    });
    await expect(cache.getOrCompute(qaKey("rent?"), "fp", compute, answerSchema)).resolves.toEqual({
      value: { answer: "a" },
      cached: true,
    });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("evicts the oldest in-process entries past capacity", async () => {
    const cache = new CacheLayer(new BrokenStore(), { memoryEntries: 2 });
    const compute = vi.fn(async () => ({ answer: "a" }));
    for (const q of ["q1", "q2", "q3"]) await cache.getOrCompute(qaKey(q), "fp", compute, answerSchema);
    expect(cache.memorySize).toBe(2);

    await cache.getOrCompute(qaKey("q3"), "fp", compute, answerSchema);
    expect(compute).toHaveBeenCalledTimes(3);
    await cache.getOrCompute(qaKey("q1"), "fp", compute, answerSchema);
    expect(compute).toHaveBeenCalledTimes(4);
  });

  it("stores nothing when compute fails", async () => {
    const store = new MemoryCacheStore();
    const cache = new CacheLayer(store);
    await expect(
      cache.getOrCompute(qaKey("rent?"), "fp", async () => Promise.reject(new Error("boom")), answerSchema),
    ).rejects.toThrow("boom");
    await expect(store.read(qaKey("rent?"))).resolves.toBeNull();
    expect(cache.memorySize).toBe(0);
  });

  it("returns no history when the store cannot be read", async () => {
    const store = new MemoryCacheStore();
    store.readHistory = async () => {
      throw new CacheUnavailableError("gone");
    };
    await expect(new CacheLayer(store).readHistory("user-1", "lease-2024", "fp", 5)).resolves.toEqual([]);
  });
});
