import { z } from "zod";
import type { GenerationGateway } from "./generation";
import { componentLogger } from "./logger";
import { partialSummaryPrompt, summaryPrompt } from "./prompts";
import { tokenUsageSchema } from "./schemas";
import { ZERO_USAGE, addUsage, type Chunk, type SummaryKind, type SummaryResult } from "./types";

const log = componentLogger("summarizer");

export const summaryKindSchema = z.enum(["brief", "comprehensive", "key_points"]);

export const summaryResultSchema = z.object({
  kind: summaryKindSchema,
  summary: z.string(),
  tokenUsage: tokenUsageSchema,
});

export const EMPTY_DOCUMENT_SUMMARY = "The document contains no text to summarize.";

export interface SummarizerOptions {
  /** Documents with at most this many chunks are summarized in one call (default 10). */
  stuffThreshold?: number;
  /** Chunks per partial summary for longer documents (default 8). */
  groupSize?: number;
}

function annotate(chunks: readonly Chunk[]): string {
  return chunks.map((c) => `[Page ${c.page}]\n${c.text.trim()}`).join("\n\n");
}

/**
 * Kind-specific contract summaries. Short documents go to the model whole;
 * longer ones are condensed group by group and the partial summaries are then
 * summarized with the kind's prompt.
 */
export class Summarizer {
  private readonly gateway: GenerationGateway;
  private readonly stuffThreshold: number;
  private readonly groupSize: number;

  public constructor(gateway: GenerationGateway, opts: SummarizerOptions = {}) {
    this.gateway = gateway;
    this.stuffThreshold = Math.max(1, opts.stuffThreshold ?? 10);
    this.groupSize = Math.max(1, opts.groupSize ?? 8);
  }

  public async summarize(
    kind: SummaryKind,
    chunks: readonly Chunk[],
    signal?: AbortSignal,
  ): Promise<SummaryResult> {
    if (chunks.length === 0) {
      return { kind, summary: EMPTY_DOCUMENT_SUMMARY, tokenUsage: ZERO_USAGE };
    }
    if (chunks.length <= this.stuffThreshold) {
      const { text, tokenUsage } = await this.gateway.complete(summaryPrompt(kind, annotate(chunks)), {}, signal);
      return { kind, summary: text.trim(), tokenUsage };
    }

    const groups: Chunk[][] = [];
    for (let i = 0; i < chunks.length; i += this.groupSize) {
      groups.push(chunks.slice(i, i + this.groupSize));
    }
    log.debug({ kind, chunks: chunks.length, groups: groups.length }, "map-reduce summary");

    let usage = ZERO_USAGE;
    const partials: string[] = [];
    for (const [i, group] of groups.entries()) {
      const { text, tokenUsage } = await this.gateway.complete(
        partialSummaryPrompt(annotate(group), i + 1, groups.length),
        {},
        signal,
      );
      partials.push(text.trim());
      usage = addUsage(usage, tokenUsage);
    }
    const { text, tokenUsage } = await this.gateway.complete(
      summaryPrompt(kind, partials.join("\n\n")),
      {},
      signal,
    );
    return { kind, summary: text.trim(), tokenUsage: addUsage(usage, tokenUsage) };
  }
}
