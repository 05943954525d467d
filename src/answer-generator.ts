import type { GenerationGateway } from "./generation";
import { answerPrompt } from "./prompts";
import {
  MAX_EXCERPT_CHARS,
  ZERO_USAGE,
  type AnswerResult,
  type Citation,
  type ConversationTurn,
  type ScoredChunk,
} from "./types";

/** Returned without calling the provider when retrieval finds nothing relevant. */
export const INSUFFICIENT_CONTEXT_ANSWER =
  "I couldn't find information about that in the contract. Try rephrasing the question or asking about a specific clause.";

export interface AnswerGeneratorOptions {
  /** Trailing conversation turns included in the prompt (default 5). */
  historyWindow?: number;
}

export function citationFor({ chunk, score }: ScoredChunk): Citation {
  return {
    page: chunk.page,
    excerpt: chunk.text.trim().slice(0, MAX_EXCERPT_CHARS),
    chunkId: chunk.id,
    score,
  };
}

/**
 * Builds the grounded prompt and makes exactly one generation call per
 * question that has relevant context.
 */
export class AnswerGenerator {
  private readonly gateway: GenerationGateway;
  private readonly historyWindow: number;

  public constructor(gateway: GenerationGateway, opts: AnswerGeneratorOptions = {}) {
    this.gateway = gateway;
    this.historyWindow = Math.max(0, opts.historyWindow ?? 5);
  }

  public async generate(
    question: string,
    retrieved: readonly ScoredChunk[],
    history: readonly ConversationTurn[],
    signal?: AbortSignal,
  ): Promise<AnswerResult> {
    if (retrieved.length === 0) {
      return {
        answer: INSUFFICIENT_CONTEXT_ANSWER,
        citations: [],
        tokenUsage: ZERO_USAGE,
        insufficientContext: true,
      };
    }
    const recent = this.historyWindow === 0 ? [] : history.slice(-this.historyWindow);
    const { text, tokenUsage } = await this.gateway.complete(
      answerPrompt(question, retrieved, recent),
      {},
      signal,
    );
    return {
      answer: text.trim(),
      citations: retrieved.map(citationFor),
      tokenUsage,
      insufficientContext: false,
    };
  }
}
