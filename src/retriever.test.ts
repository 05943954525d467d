import { describe, it, expect } from "vitest";
import { Retriever } from "./retriever";
import { EmbeddingGateway } from "./embeddings";
import { VectorIndex } from "./vector-index";
import { chunkDocument } from "./chunker";
import { IndexNotFoundError } from "./errors";
import { RetryPolicy } from "./retry";
import { KeywordEmbeddingProvider, loadTenancyAgreement } from "./testing/fakes";

async function tenancyIndex(provider: KeywordEmbeddingProvider): Promise<VectorIndex> {
  const doc = loadTenancyAgreement();
  const chunks = chunkDocument(doc.id, doc.pages, { chunkSize: 200, chunkOverlap: 20 });
  const index = new VectorIndex();
  index.build(
    { documentId: doc.id, fingerprint: "fp", chunkSize: 200, chunkOverlap: 20, modelName: provider.modelName },
    chunks,
    chunks.map((c) => provider.vectorFor(c.text)),
  );
  return index;
}

describe("Retriever", () => {
  it("returns the passage holding the monthly rent first", async () => {
    const provider = new KeywordEmbeddingProvider();
    const retriever = new Retriever(new EmbeddingGateway(provider));
    const hits = await retriever.retrieve(await tenancyIndex(provider), "What is the monthly rent?", 5);

    expect(hits.map((h) => h.chunk.index)).toEqual([3, 2]);
    expect(hits[0].chunk.page).toBe(2);
    expect(hits[0].chunk.text).toContain("Monthly Rent: SGD $3,500");
    expect(hits[0].score).toBeCloseTo(Math.SQRT1_2, 4);
    expect(hits[1].score).toBeCloseTo(0.5, 4);
  });

  it("drops passages below the minimum score", async () => {
    const provider = new KeywordEmbeddingProvider();
    const index = await tenancyIndex(provider);
    const strict = new Retriever(new EmbeddingGateway(provider), { minScore: 0.6 });
    expect((await strict.retrieve(index, "What is the monthly rent?", 5)).map((h) => h.chunk.index)).toEqual([3]);

    const lenient = new Retriever(new EmbeddingGateway(provider));
    await expect(lenient.retrieve(index, "What is the weather today?", 5)).resolves.toEqual([]);
  });

  it("propagates index and provider errors unchanged", async () => {
    const provider = new KeywordEmbeddingProvider();
    const retriever = new Retriever(
      new EmbeddingGateway(provider, { retry: new RetryPolicy({ maxAttempts: 1 }) }),
    );
    await expect(retriever.retrieve(new VectorIndex(), "rent", 3)).rejects.toBeInstanceOf(IndexNotFoundError);
  });
});
