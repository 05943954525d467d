import { afterEach, describe, it, expect } from "vitest";
import {
  MemoryCacheStore,
  SqliteCacheStore,
  type CacheKey,
  type CacheStore,
  type QaHistoryRecord,
} from "./cache-store";

const key = (over: Partial<CacheKey> = {}): CacheKey => ({
  ownerId: "user-1",
  documentId: "lease-2024",
  namespace: "qa",
  paramsHash: "abc123",
  ...over,
});

const record = (n: number, over: Partial<QaHistoryRecord> = {}): QaHistoryRecord => ({
  ownerId: "user-1",
  documentId: "lease-2024",
  fingerprint: "fp-1",
  question: `q${n}`,
  answer: `a${n}`,
  citations: [{ page: 2, excerpt: "Monthly Rent", chunkId: "lease-2024#3", score: 0.7 }],
  tokenUsage: { promptTokens: 10, completionTokens: 2, totalTokens: 12 },
  createdAt: "2024-03-01T00:00:00.000Z",
  ...over,
});

const stores: [string, () => CacheStore][] = [
  ["SqliteCacheStore", () => new SqliteCacheStore(":memory:")],
  ["MemoryCacheStore", () => new MemoryCacheStore()],
];

describe.each(stores)("%s", (_name, create) => {
  let store: CacheStore;

  afterEach(() => store.close());

  it("reads back what it wrote and overwrites by key", async () => {
    store = create();
    await expect(store.read(key())).resolves.toBeNull();

    await store.write({ key: key(), value: '"first"', fingerprint: "fp-1", createdAt: "t1" });
    await store.write({ key: key(), value: '"second"', fingerprint: "fp-2", createdAt: "t2" });
    await expect(store.read(key())).resolves.toEqual({
      key: key(),
      value: '"second"',
      fingerprint: "fp-2",
      createdAt: "t2",
    });
    await expect(store.read(key({ namespace: "summary" }))).resolves.toBeNull();
  });

  it("deletes every namespace of one document", async () => {
    store = create();
    for (const namespace of ["qa", "summary", "extraction"] as const) {
      await store.write({ key: key({ namespace }), value: "1", fingerprint: "fp", createdAt: "t" });
    }
    await store.write({ key: key({ documentId: "other" }), value: "1", fingerprint: "fp", createdAt: "t" });

    await expect(store.deleteDocument("user-1", "lease-2024")).resolves.toBe(3);
    await expect(store.read(key({ namespace: "summary" }))).resolves.toBeNull();
    await expect(store.read(key({ documentId: "other" }))).resolves.not.toBeNull();
  });

  it("clears one owner or everything", async () => {
    store = create();
    await store.write({ key: key(), value: "1", fingerprint: "fp", createdAt: "t" });
    await store.write({ key: key({ ownerId: "user-2" }), value: "1", fingerprint: "fp", createdAt: "t" });

    await expect(store.clear("user-1")).resolves.toBe(1);
    await expect(store.read(key({ ownerId: "user-2" }))).resolves.not.toBeNull();
    await expect(store.clear()).resolves.toBe(1);
    await expect(store.read(key({ ownerId: "user-2" }))).resolves.toBeNull();
  });

  it("returns the newest history records for a document version, oldest first", async () => {
    store = create();
    for (let n = 1; n <= 4; n++) await store.appendHistory(record(n));
    await store.appendHistory(record(5, { fingerprint: "fp-old" }));
    await store.appendHistory(record(6, { ownerId: "user-2" }));

    const history = await store.readHistory("user-1", "lease-2024", "fp-1", 3);
    expect(history.map((r) => r.question)).toEqual(["q2", "q3", "q4"]);
    expect(history[0]).toEqual(record(2));
  });
});
