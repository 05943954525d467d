/**
 * Shared document / chunk types used by the chunker, index, generator and
 * caches.
 */

/** Extracted text of one page, as supplied by the ingestion front-end. */
export interface PageText {
  /** 1-based page number. */
  readonly pageNumber: number;
  readonly text: string;
}

/** An ingested contract. Immutable; a re-upload supersedes it. */
export interface ContractDocument {
  readonly id: string;
  /** Partition key from the account store; trusted as-is. */
  readonly ownerId: string;
  readonly pages: readonly PageText[];
  /** ISO timestamp. */
  readonly createdAt: string;
  /** Display name, usually the uploaded file name. */
  readonly title?: string;
}

/**
 * A bounded span of the document text. `start`/`end` are offsets into the
 * page texts joined with {@link PAGE_SEPARATOR}.
 */
export interface Chunk {
  /** `<documentId>#<index>` */
  readonly id: string;
  readonly documentId: string;
  /** Sequence index (0-based). */
  readonly index: number;
  /** Page on which the chunk starts. */
  readonly page: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

export const PAGE_SEPARATOR = "\n\n";

export interface ScoredChunk {
  readonly chunk: Chunk;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

export interface Citation {
  readonly page: number;
  /** Leading part of the chunk text, at most {@link MAX_EXCERPT_CHARS}. */
  readonly excerpt: string;
  readonly chunkId: string;
  readonly score?: number;
}

export const MAX_EXCERPT_CHARS = 500;

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export const ZERO_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export interface ConversationTurn {
  readonly question: string;
  readonly answer: string;
  readonly citations: readonly Citation[];
  /** ISO timestamp. */
  readonly timestamp: string;
}

export interface AnswerResult {
  readonly answer: string;
  readonly citations: readonly Citation[];
  readonly tokenUsage: TokenUsage;
  /** True when no passage was relevant enough and the provider was not called. */
  readonly insufficientContext: boolean;
}

export type SummaryKind = "brief" | "comprehensive" | "key_points";

export const SUMMARY_KINDS: readonly SummaryKind[] = ["brief", "comprehensive", "key_points"];

export interface SummaryResult {
  readonly kind: SummaryKind;
  readonly summary: string;
  readonly tokenUsage: TokenUsage;
}
