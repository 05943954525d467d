/**
 * Per-session RAG state machine.
 *
 *   UNLOADED ──load──▶ INDEXING ──ok──▶ READY
 *                          │               │
 *                          └──fail──▶ ERROR ◀┘ (a later load may fail)
 *
 * `load` and `unload` are accepted in every state and always win: they bump
 * the session generation and abort the work of the previous one, whose
 * results are then discarded with {@link SupersededError}. Queries run one at
 * a time through the session queue and are rejected with {@link NotReadyError}
 * unless the session is READY.
 */
import { createHash } from "node:crypto";
import PQueue from "p-queue";
import { AnswerGenerator } from "./answer-generator";
import { CacheLayer, cacheKey } from "./cache";
import { chunkDocument } from "./chunker";
import type { EmbeddingGateway } from "./embeddings";
import { InvalidArgumentError, NotReadyError, RagError, SupersededError } from "./errors";
import { CONTRACT_FIELDS, FieldExtractor, extractionResultSchema, type ExtractionResult } from "./extractor";
import type { GenerationGateway } from "./generation";
import { componentLogger, type Logger } from "./logger";
import { ConversationMemory } from "./memory";
import { readStoredMeta, type IndexStore } from "./persistence";
import { Retriever } from "./retriever";
import { answerResultSchema } from "./schemas";
import { Summarizer, summaryResultSchema } from "./summarizer";
import {
  SUMMARY_KINDS,
  type AnswerResult,
  type ContractDocument,
  type ConversationTurn,
  type SummaryKind,
  type SummaryResult,
} from "./types";
import { VectorIndex } from "./vector-index";

export type SessionState = "UNLOADED" | "INDEXING" | "READY" | "ERROR";

export interface SessionSettings {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  minScore: number;
  memoryWindow: number;
  summaryStuffThreshold?: number;
  summaryGroupSize?: number;
  extractionContextChars?: number;
}

export interface SessionDeps {
  embeddings: EmbeddingGateway;
  generation: GenerationGateway;
  indexStore: IndexStore;
  cache: CacheLayer;
}

export interface LoadResult {
  documentId: string;
  fingerprint: string;
  chunkCount: number;
  /** True when the persisted index was reused instead of re-embedding. */
  fromStore: boolean;
  /** True when this exact document was already loaded and nothing was done. */
  alreadyLoaded: boolean;
}

export interface AskResult extends AnswerResult {
  cached: boolean;
}

export interface CachedSummary extends SummaryResult {
  cached: boolean;
}

export interface CachedExtraction extends ExtractionResult {
  cached: boolean;
}

export interface SessionStatus {
  ownerId: string;
  state: SessionState;
  documentId: string | null;
  title: string | null;
  fingerprint: string | null;
  chunkCount: number;
  memorySize: number;
  embeddingModel: string;
  generationModel: string;
  indexing: { embedded: number; total: number } | null;
  lastError: string | null;
}

/** SHA-256 over the document id and its ordered page numbers and texts. */
export function documentFingerprint(document: Pick<ContractDocument, "id" | "pages" | "title">): string {
  const hash = createHash("sha256").update(document.id);
  for (const page of document.pages) {
    hash.update(`\u0000${page.pageNumber}\u0000`).update(page.text);
  }
  return hash.digest("hex");
}

export function normalizeQuestion(question: string): string {
  return question.trim().replace(/\s+/g, " ");
}

/** Everything a READY-state operation needs, captured when it starts. */
interface Loaded {
  readonly generation: number;
  readonly signal: AbortSignal;
  readonly document: ContractDocument;
  readonly fingerprint: string;
  readonly index: VectorIndex;
  readonly memory: ConversationMemory;
}

export class RagSession {
  public readonly ownerId: string;
  private readonly deps: SessionDeps;
  private readonly settings: SessionSettings;
  private readonly retriever: Retriever;
  private readonly answers: AnswerGenerator;
  private readonly summarizer: Summarizer;
  private readonly extractor: FieldExtractor;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly log: Logger;

  private state: SessionState = "UNLOADED";
  private generation = 0;
  private controller = new AbortController();
  private loaded: Omit<Loaded, "generation" | "signal"> | null = null;
  private indexing: { embedded: number; total: number } | null = null;
  private lastError: RagError | null = null;

  public constructor(ownerId: string, deps: SessionDeps, settings: SessionSettings) {
    this.ownerId = ownerId;
    this.deps = deps;
    this.settings = settings;
    this.retriever = new Retriever(deps.embeddings, { minScore: settings.minScore });
    this.answers = new AnswerGenerator(deps.generation, { historyWindow: settings.memoryWindow });
    this.summarizer = new Summarizer(deps.generation, {
      stuffThreshold: settings.summaryStuffThreshold,
      groupSize: settings.summaryGroupSize,
    });
    this.extractor = new FieldExtractor(deps.generation, deps.embeddings, {
      contextChars: settings.extractionContextChars,
      minScore: settings.minScore,
    });
    this.log = componentLogger("session").child({ ownerId });
  }

  public getState(): SessionState {
    return this.state;
  }

  /**
   * Make `document` the active document: reuse its persisted index when it
   * matches the current settings, otherwise chunk, embed, build and persist.
   *
   * @throws {SupersededError} If another load or an unload started meanwhile.
   * @throws {RagError} Any build failure; the session is then in ERROR.
   */
  public async load(document: ContractDocument): Promise<LoadResult> {
    if (document.ownerId !== this.ownerId) {
      throw new InvalidArgumentError(`Document ${document.id} does not belong to owner ${this.ownerId}`);
    }
    if (!document.id.trim()) throw new InvalidArgumentError("Document id must not be empty");

    const fingerprint = documentFingerprint(document);
    if (this.state === "READY" && this.loaded?.document.id === document.id && this.loaded.fingerprint === fingerprint) {
      this.log.info({ documentId: document.id }, "document already loaded");
      return {
        documentId: document.id,
        fingerprint,
        chunkCount: this.loaded.index.size,
        fromStore: false,
        alreadyLoaded: true,
      };
    }

    const generation = this.supersede("INDEXING");
    const signal = this.controller.signal;
    const { chunkSize, chunkOverlap } = this.settings;
    const { embeddings, indexStore, cache } = this.deps;
    const modelName = embeddings.getModelName();
    this.log.info({ documentId: document.id, pages: document.pages.length }, "loading document");

    try {
      const previous = await readStoredMeta(indexStore, document.id).catch((e: unknown) => {
        this.log.warn({ documentId: document.id, err: String(e) }, "could not read persisted index");
        return null;
      });
      if (previous && previous.fingerprint !== fingerprint) {
        this.log.info({ documentId: document.id }, "document changed since last upload, invalidating caches");
        await cache.invalidateDocument(this.ownerId, document.id);
      }

      const index = new VectorIndex();
      const fromStore = await index.load(indexStore, document.id, { fingerprint, modelName, chunkSize, chunkOverlap });
      if (!fromStore) {
        const chunks = chunkDocument(document.id, document.pages, { chunkSize, chunkOverlap });
        this.ensureCurrent(generation, "load");
        this.indexing = { embedded: 0, total: chunks.length };
        const vectors = await embeddings.embedBatch(
          chunks.map((c) => c.text),
          signal,
          (embedded, total) => {
            if (generation === this.generation && this.state === "INDEXING") {
              this.indexing = { embedded, total };
            }
          },
        );
        this.ensureCurrent(generation, "load");
        index.build({ documentId: document.id, fingerprint, chunkSize, chunkOverlap, modelName }, chunks, vectors);
        try {
          await index.persist(indexStore);
        } catch (e) {
          this.log.warn({ documentId: document.id, err: String(e) }, "failed to persist index");
        }
      }
      this.ensureCurrent(generation, "load");

      this.loaded = {
        document,
        fingerprint,
        index,
        memory: new ConversationMemory(this.settings.memoryWindow),
      };
      this.state = "READY";
      this.indexing = null;
      this.log.info({ documentId: document.id, chunks: index.size, fromStore }, "document ready");
      return { documentId: document.id, fingerprint, chunkCount: index.size, fromStore, alreadyLoaded: false };
    } catch (err) {
      if (generation !== this.generation) {
        throw err instanceof SupersededError ? err : new SupersededError("load");
      }
      this.state = "ERROR";
      this.indexing = null;
      this.lastError =
        err instanceof RagError
          ? err
          : new RagError("EMBEDDING_FAILED", err instanceof Error ? err.message : String(err), { cause: err });
      this.log.error({ documentId: document.id, err: this.lastError.message }, "document load failed");
      throw err;
    }
  }

  /**
   * Answer a question about the active document. Served from the Q&A cache
   * when possible; a fresh answer is appended to memory and the history log.
   */
  public async ask(question: string): Promise<AskResult> {
    const q = normalizeQuestion(question);
    if (!q) throw new InvalidArgumentError("Question must not be empty");
    return this.exclusive("ask", async (ctx) => {
      const { topK } = this.settings;
      const key = cacheKey(this.ownerId, ctx.document.id, "qa", { question: q, topK });
      const { value, cached } = await this.deps.cache.getOrCompute(
        key,
        ctx.fingerprint,
        async () => {
          const hits = await this.retriever.retrieve(ctx.index, q, topK, ctx.signal);
          this.ensureCurrent(ctx.generation, "ask");
          const result = await this.answers.generate(q, hits, ctx.memory.snapshot(), ctx.signal);
          this.ensureCurrent(ctx.generation, "ask");
          return { ...result, citations: [...result.citations] };
        },
        answerResultSchema,
      );
      this.ensureCurrent(ctx.generation, "ask");

      if (!cached) {
        const timestamp = new Date().toISOString();
        const turn: ConversationTurn = { question: q, answer: value.answer, citations: value.citations, timestamp };
        ctx.memory.append(turn);
        await this.deps.cache.recordHistory({
          ownerId: this.ownerId,
          documentId: ctx.document.id,
          fingerprint: ctx.fingerprint,
          question: q,
          answer: value.answer,
          citations: value.citations,
          tokenUsage: value.tokenUsage,
          createdAt: timestamp,
        });
      }
      return { ...value, cached };
    });
  }

  public async summarize(kind: SummaryKind): Promise<CachedSummary> {
    if (!SUMMARY_KINDS.includes(kind)) {
      throw new InvalidArgumentError(`Unknown summary kind "${kind}" (expected ${SUMMARY_KINDS.join(", ")})`);
    }
    return this.exclusive("summarize", async (ctx) => {
      const key = cacheKey(this.ownerId, ctx.document.id, "summary", { kind });
      const { value, cached } = await this.deps.cache.getOrCompute(
        key,
        ctx.fingerprint,
        async () => {
          const result = await this.summarizer.summarize(kind, ctx.index.getChunks(), ctx.signal);
          this.ensureCurrent(ctx.generation, "summarize");
          return result;
        },
        summaryResultSchema,
      );
      this.ensureCurrent(ctx.generation, "summarize");
      return { ...value, cached };
    });
  }

  public async extract(): Promise<CachedExtraction> {
    return this.exclusive("extract", async (ctx) => {
      const key = cacheKey(this.ownerId, ctx.document.id, "extraction", { fields: CONTRACT_FIELDS });
      const { value, cached } = await this.deps.cache.getOrCompute(
        key,
        ctx.fingerprint,
        async () => {
          const result = await this.extractor.extract(ctx.document.pages, ctx.index, ctx.signal);
          this.ensureCurrent(ctx.generation, "extract");
          return result;
        },
        extractionResultSchema,
      );
      this.ensureCurrent(ctx.generation, "extract");
      return { ...value, cached };
    });
  }

  public async clearMemory(): Promise<void> {
    await this.exclusive("clear memory", async (ctx) => {
      ctx.memory.clear();
    });
  }

  /**
   * Refill memory with the most recent answered questions recorded for this
   * version of the document.
   *
   * @returns Number of turns now in memory.
   */
  public async restoreMemory(): Promise<number> {
    return this.exclusive("restore memory", async (ctx) => {
      const records = await this.deps.cache.readHistory(
        this.ownerId,
        ctx.document.id,
        ctx.fingerprint,
        ctx.memory.windowSize,
      );
      this.ensureCurrent(ctx.generation, "restore memory");
      ctx.memory.restore(
        records.map((r) => ({ question: r.question, answer: r.answer, citations: r.citations, timestamp: r.createdAt })),
      );
      return ctx.memory.size;
    });
  }

  /** Drop the active document and abort any work in flight. */
  public unload(): void {
    this.supersede("UNLOADED");
    this.log.info("session unloaded");
  }

  /** Remove cached results for the active document, or for every document of this owner when none is loaded. */
  /**
   * Drop cached results for the active document, or every cached result of
   * the owner when nothing is loaded.
   *
   * @throws {NotReadyError} While a document is being indexed.
   */
  public async clearCache(): Promise<void> {
    if (this.state === "INDEXING") throw new NotReadyError(this.state, "clear cache");
    const documentId = this.loaded?.document.id;
    if (documentId) await this.deps.cache.invalidateDocument(this.ownerId, documentId);
    else await this.deps.cache.clear(this.ownerId);
  }

  public status(): SessionStatus {
    const loaded = this.state === "READY" ? this.loaded : null;
    return {
      ownerId: this.ownerId,
      state: this.state,
      documentId: loaded?.document.id ?? null,
      title: loaded?.document.title ?? null,
      fingerprint: loaded?.fingerprint ?? null,
      chunkCount: loaded?.index.size ?? 0,
      memorySize: loaded?.memory.size ?? 0,
      embeddingModel: this.deps.embeddings.getModelName(),
      generationModel: this.deps.generation.getModelName(),
      indexing: this.indexing ? { ...this.indexing } : null,
      lastError: this.state === "ERROR" ? (this.lastError?.describe() ?? null) : null,
    };
  }

  /** Start a new generation: abort the old one and discard its document. */
  private supersede(next: "INDEXING" | "UNLOADED"): number {
    this.generation++;
    this.controller.abort(new SupersededError("operation"));
    this.controller = new AbortController();
    this.loaded = null;
    this.indexing = null;
    this.lastError = null;
    this.state = next;
    return this.generation;
  }

  private ensureCurrent(generation: number, operation: string): void {
    if (generation !== this.generation) throw new SupersededError(operation);
  }

  /** Run `fn` in the session queue against the READY document. */
  private async exclusive<T>(operation: string, fn: (ctx: Loaded) => Promise<T>): Promise<T> {
    return this.queue.add(
      async () => {
        const loaded = this.loaded;
        if (this.state !== "READY" || !loaded) throw new NotReadyError(this.state, operation);
        const generation = this.generation;
        try {
          return await fn({ ...loaded, generation, signal: this.controller.signal });
        } catch (err) {
          if (generation !== this.generation && !(err instanceof SupersededError)) {
            throw new SupersededError(operation);
          }
          throw err;
        }
      },
      { throwOnTimeout: true },
    );
  }
}
