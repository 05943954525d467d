import type { EmbeddingGateway } from "./embeddings";
import type { ScoredChunk } from "./types";
import type { VectorIndex } from "./vector-index";

export interface RetrieverOptions {
  /** Results scoring below this cosine similarity are dropped (default 0.2). */
  minScore?: number;
}

/**
 * Query → top-k relevant chunks. Embeds the query through the gateway and
 * searches the given index; nothing is cached here and errors propagate as-is.
 */
export class Retriever {
  private readonly embeddings: EmbeddingGateway;
  private readonly minScore: number;

  public constructor(embeddings: EmbeddingGateway, opts: RetrieverOptions = {}) {
    this.embeddings = embeddings;
    this.minScore = opts.minScore ?? 0.2;
  }

  public async retrieve(
    index: VectorIndex,
    queryText: string,
    k: number,
    signal?: AbortSignal,
  ): Promise<ScoredChunk[]> {
    const query = await this.embeddings.embed(queryText, signal);
    return index.search(query, k).filter((hit) => hit.score >= this.minScore);
  }
}
