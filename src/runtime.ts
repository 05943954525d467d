import type { Config } from "./config";
import { CacheLayer } from "./cache";
import { SqliteCacheStore, type CacheStore } from "./cache-store";
import { EmbeddingGateway, type EmbeddingProvider } from "./embeddings";
import { InvalidConfigurationError } from "./errors";
import { GenerationGateway, type GenerationProvider } from "./generation";
import { componentLogger } from "./logger";
import { FileIndexStore } from "./persistence";
import { OpenAIEmbeddingProvider, OpenAIGenerationProvider } from "./providers/openai";
import { RetryPolicy } from "./retry";
import { SessionRegistry } from "./sessions";

const log = componentLogger("runtime");

export interface Providers {
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

export interface Runtime {
  registry: SessionRegistry;
  embeddings: EmbeddingGateway;
  generation: GenerationGateway;
  cacheStore: CacheStore;
  close(): void;
}

/**
 * Build the OpenAI providers for embeddings and generation.
 *
 * @throws {InvalidConfigurationError} When OPENAI_API_KEY is not set.
 */
export function createProviders(config: Config): Providers {
  const apiKey = config.OPENAI_API_KEY;
  if (!apiKey) {
    throw new InvalidConfigurationError("OPENAI_API_KEY is required for embeddings and answer generation");
  }
  return {
    embedding: new OpenAIEmbeddingProvider({ apiKey, model: config.OPENAI_EMBEDDING_MODEL }),
    generation: new OpenAIGenerationProvider({ apiKey, model: config.OPENAI_MODEL }),
  };
}

/** Wire gateways, stores and the session registry from configuration. */
export function createRuntime(config: Config, providers: Providers): Runtime {
  const retry = new RetryPolicy({
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    baseDelayMs: config.RETRY_BASE_DELAY_MS,
    timeoutMs: config.PROVIDER_TIMEOUT_MS,
  });
  const embeddings = new EmbeddingGateway(providers.embedding, { retry });
  const generation = new GenerationGateway(providers.generation, {
    retry,
    maxTokens: config.MAX_TOKENS,
    temperature: config.TEMPERATURE,
  });
  const cacheStore = new SqliteCacheStore(config.CACHE_DB_PATH);
  const registry = new SessionRegistry(
    {
      embeddings,
      generation,
      indexStore: new FileIndexStore(config.INDEX_DIR),
      cache: new CacheLayer(cacheStore, { memoryEntries: config.CACHE_MEMORY_ENTRIES }),
    },
    {
      chunkSize: config.CHUNK_SIZE,
      chunkOverlap: config.CHUNK_OVERLAP,
      topK: config.TOP_K,
      minScore: config.MIN_SCORE,
      memoryWindow: config.MEMORY_WINDOW,
    },
  );
  log.info(
    { dataDir: config.DATA_DIR, embeddingModel: embeddings.getModelName(), generationModel: generation.getModelName() },
    "runtime ready",
  );
  return {
    registry,
    embeddings,
    generation,
    cacheStore,
    close: () => {
      try {
        cacheStore.close();
      } catch (e) {
        log.warn({ err: String(e) }, "error closing cache store");
      }
    },
  };
}
