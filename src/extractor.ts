import { z } from "zod";
import type { EmbeddingGateway } from "./embeddings";
import type { GenerationGateway } from "./generation";
import { componentLogger } from "./logger";
import { extractionPrompt } from "./prompts";
import { tokenUsageSchema } from "./schemas";
import { MAX_EXCERPT_CHARS, type Chunk, type PageText } from "./types";
import type { VectorIndex } from "./vector-index";

const log = componentLogger("extractor");

const fieldCitationSchema = z.object({
  page: z.number().int(),
  excerpt: z.string().optional(),
});

export const extractedFieldSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("found"), value: z.string(), citation: fieldCitationSchema.optional() }),
  z.object({ status: z.literal("not_found") }),
]);

export type ExtractedField = z.infer<typeof extractedFieldSchema>;

export const extractedFieldSetSchema = z.object({
  parties: extractedFieldSchema,
  propertyAddress: extractedFieldSchema,
  monthlyRent: extractedFieldSchema,
  securityDeposit: extractedFieldSchema,
  leaseDuration: extractedFieldSchema,
  startDate: extractedFieldSchema,
  endDate: extractedFieldSchema,
  paymentDueDate: extractedFieldSchema,
  lateFee: extractedFieldSchema,
  otherFees: extractedFieldSchema,
  petPolicy: extractedFieldSchema,
  maintenance: extractedFieldSchema,
  termination: extractedFieldSchema,
  utilities: extractedFieldSchema,
  parking: extractedFieldSchema,
});

export type ExtractedFieldSet = z.infer<typeof extractedFieldSetSchema>;
export type ContractField = keyof ExtractedFieldSet;

export const CONTRACT_FIELDS = extractedFieldSetSchema.keyof().options;

export const extractionResultSchema = z.object({
  fields: extractedFieldSetSchema,
  tokenUsage: tokenUsageSchema,
});

export type ExtractionResult = z.infer<typeof extractionResultSchema>;

const FIELD_DESCRIPTIONS: Record<ContractField, string> = {
  parties: "names of the landlord and tenant",
  propertyAddress: "address of the rented property",
  monthlyRent: "monthly rent amount with currency",
  securityDeposit: "security deposit amount",
  leaseDuration: "length of the lease term",
  startDate: "date the lease starts",
  endDate: "date the lease ends",
  paymentDueDate: "when rent is due each month",
  lateFee: "late payment fee or penalty",
  otherFees: "any other fees or charges",
  petPolicy: "whether pets are allowed and on what conditions",
  maintenance: "maintenance and repair responsibilities",
  termination: "early termination conditions and notice period",
  utilities: "who pays for utilities",
  parking: "parking arrangements",
};

/** A reply entry: `{value, page}`, a bare value, or null. */
const replyFieldSchema = z.union([
  z.object({
    value: z.union([z.string(), z.number()]).nullable(),
    page: z.number().int().positive().nullable().optional(),
  }),
  z.string(),
  z.number(),
  z.null(),
]);

const EMPTY_VALUE = /^(n\/?a|none|null|unknown|not (found|specified|stated|mentioned))\.?$/i;

export interface ExtractorOptions {
  /** Characters of document text sent to the model (default 12000). */
  contextChars?: number;
  /** Chunks retrieved per field when the document exceeds the budget (default 3). */
  hitsPerField?: number;
  /** Minimum similarity for a retrieved chunk (default 0.2). */
  minScore?: number;
}

/** Strip a Markdown code fence and any prose around the outermost JSON object. */
export function extractJsonObject(reply: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(reply);
  const body = fenced ? fenced[1] : reply;
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  try {
    return JSON.parse(body.slice(start, end + 1));
  } catch {
    return null;
  }
}

function excerptOn(pages: readonly PageText[], page: number, value: string): string | undefined {
  const text = pages.find((p) => p.pageNumber === page)?.text;
  if (!text) return undefined;
  const needle = value.toLowerCase();
  const line = text.split("\n").find((l) => l.toLowerCase().includes(needle));
  return line?.trim().slice(0, MAX_EXCERPT_CHARS);
}

function toField(raw: unknown, pages: readonly PageText[]): ExtractedField {
  const parsed = replyFieldSchema.safeParse(raw);
  if (!parsed.success || parsed.data === null) return { status: "not_found" };
  const entry = typeof parsed.data === "object" ? parsed.data : { value: parsed.data, page: null };
  const value = entry.value === null ? "" : String(entry.value).trim();
  if (!value || EMPTY_VALUE.test(value)) return { status: "not_found" };
  if (entry.page == null) return { status: "found", value };
  const excerpt = excerptOn(pages, entry.page, value);
  return { status: "found", value, citation: excerpt ? { page: entry.page, excerpt } : { page: entry.page } };
}

/** Map a model reply onto the fixed field set; anything unusable becomes `not_found`. */
export function parseExtractionReply(reply: string, pages: readonly PageText[] = []): ExtractedFieldSet {
  const json = extractJsonObject(reply);
  const obj = z.record(z.unknown()).safeParse(json);
  if (!obj.success) log.warn("extraction reply was not a JSON object; reporting every field as not found");
  const source = obj.success ? obj.data : {};
  return extractedFieldSetSchema.parse(
    Object.fromEntries(CONTRACT_FIELDS.map((name) => [name, toField(source[name], pages)])),
  );
}

function pagedText(pages: readonly PageText[]): string {
  return pages.map((p) => `[Page ${p.pageNumber}]\n${p.text.trim()}`).join("\n\n");
}

function chunkBlock(chunk: Chunk): string {
  return `[Page ${chunk.page}]\n${chunk.text.trim()}`;
}

/**
 * One fixed-schema extraction call. A document that fits the context budget
 * is sent whole; a longer one is represented by the chunks that best match
 * each field, taken round-robin across fields (every field's best hit, then
 * every field's second) until the budget is spent, in document order.
 */
export class FieldExtractor {
  private readonly gateway: GenerationGateway;
  private readonly embeddings: EmbeddingGateway;
  private readonly contextChars: number;
  private readonly hitsPerField: number;
  private readonly minScore: number;

  public constructor(gateway: GenerationGateway, embeddings: EmbeddingGateway, opts: ExtractorOptions = {}) {
    this.gateway = gateway;
    this.embeddings = embeddings;
    this.contextChars = Math.max(1, opts.contextChars ?? 12000);
    this.hitsPerField = Math.max(1, opts.hitsPerField ?? 3);
    this.minScore = opts.minScore ?? 0.2;
  }

  public async extract(
    pages: readonly PageText[],
    index: VectorIndex,
    signal?: AbortSignal,
  ): Promise<ExtractionResult> {
    const full = pagedText(pages);
    const text = full.length <= this.contextChars ? full : await this.relevantContext(full, index, signal);
    const fieldList = CONTRACT_FIELDS.map((name) => `- ${name}: ${FIELD_DESCRIPTIONS[name]}`).join("\n");
    const { text: reply, tokenUsage } = await this.gateway.complete(
      extractionPrompt(fieldList, text),
      { maxTokens: 1500 },
      signal,
    );
    const fields = parseExtractionReply(reply, pages);
    return { fields, tokenUsage };
  }

  private async relevantContext(full: string, index: VectorIndex, signal?: AbortSignal): Promise<string> {
    const queries = CONTRACT_FIELDS.map((name) => `${name}: ${FIELD_DESCRIPTIONS[name]}`);
    const vectors = await this.embeddings.embedBatch(queries, signal);
    const ranked = vectors.map((v) => index.search(v, this.hitsPerField).filter((h) => h.score >= this.minScore));

    const picked = new Map<number, Chunk>();
    let used = 0;
    for (let rank = 0; rank < this.hitsPerField; rank++) {
      for (const hits of ranked) {
        const hit = hits[rank];
        if (!hit || picked.has(hit.chunk.index)) continue;
        const cost = chunkBlock(hit.chunk).length + (picked.size > 0 ? 2 : 0);
        if (used + cost > this.contextChars) continue;
        picked.set(hit.chunk.index, hit.chunk);
        used += cost;
      }
    }

    if (picked.size === 0) {
      log.warn({ contextChars: this.contextChars }, "no chunk matched any field; sending the start of the document");
      return full.slice(0, this.contextChars);
    }
    log.debug({ chunks: picked.size, chars: used }, "extraction context built from retrieved chunks");
    return [...picked.values()]
      .sort((a, b) => a.index - b.index)
      .map(chunkBlock)
      .join("\n\n");
  }
}
