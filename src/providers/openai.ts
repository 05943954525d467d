import { ChatOpenAI, OpenAIEmbeddings } from "@langchain/openai";
import { HumanMessage, type AIMessage } from "@langchain/core/messages";
import type { EmbeddingProvider } from "../embeddings";
import {
  ProviderQuotaExceededError,
  ProviderUnavailableError,
  RagError,
  RateLimitedError,
} from "../errors";
import type { Completion, CompletionOptions, GenerationProvider } from "../generation";
import { componentLogger } from "../logger";
import type { TokenUsage } from "../types";

const log = componentLogger("openai");

const NETWORK_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN"]);

function field(source: unknown, name: string): unknown {
  return typeof source === "object" && source !== null ? Reflect.get(source, name) : undefined;
}

function retryAfterMs(err: unknown): number | undefined {
  const headers = field(err, "headers");
  const raw =
    headers instanceof Headers ? headers.get("retry-after") : field(headers, "retry-after");
  const seconds = typeof raw === "string" ? Number(raw) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * Map an OpenAI client error onto the shared taxonomy. Errors that are not
 * recognisably transient or quota related come back unchanged.
 */
export function classifyProviderError(err: unknown): unknown {
  if (err instanceof RagError) return err;
  const status = field(err, "status");
  const code = field(err, "code");
  const message = err instanceof Error ? err.message : String(err);

  if (code === "insufficient_quota") return new ProviderQuotaExceededError(message, err);
  if (status === 429) return new RateLimitedError(message, retryAfterMs(err), err);
  if (status === 401 || status === 403) {
    return new ProviderUnavailableError(`Provider rejected the credentials: ${message}`, err);
  }
  if (typeof status === "number" && status >= 500) return new ProviderUnavailableError(message, err);
  if (
    (typeof code === "string" && NETWORK_CODES.has(code)) ||
    field(err, "name") === "APIConnectionError" ||
    field(err, "name") === "APIConnectionTimeoutError"
  ) {
    return new ProviderUnavailableError(message, err);
  }
  return err;
}

function usageOf(message: AIMessage): TokenUsage {
  const usage = message.usage_metadata;
  return {
    promptTokens: usage?.input_tokens ?? 0,
    completionTokens: usage?.output_tokens ?? 0,
    totalTokens: usage?.total_tokens ?? 0,
  };
}

function textOf(message: AIMessage): string {
  if (typeof message.content === "string") return message.content;
  return message.content
    .map((part) => {
      const text = field(part, "text");
      return typeof text === "string" ? text : "";
    })
    .join("");
}

export interface OpenAIProviderOptions {
  apiKey: string;
  model: string;
}

/** Chat-completion provider. Retries are left to the gateway's policy. */
export class OpenAIGenerationProvider implements GenerationProvider {
  public readonly modelName: string;
  private readonly apiKey: string;
  private readonly clients = new Map<string, ChatOpenAI>();

  public constructor(opts: OpenAIProviderOptions) {
    this.apiKey = opts.apiKey;
    this.modelName = opts.model;
    log.info({ model: this.modelName }, "generation provider initialized");
  }

  public async complete(prompt: string, opts: CompletionOptions, signal?: AbortSignal): Promise<Completion> {
    try {
      const response = await this.client(opts).invoke([new HumanMessage(prompt)], { signal });
      return { text: textOf(response), tokenUsage: usageOf(response) };
    } catch (err) {
      throw classifyProviderError(err);
    }
  }

  private client({ maxTokens, temperature }: CompletionOptions): ChatOpenAI {
    const key = `${maxTokens}:${temperature}`;
    let client = this.clients.get(key);
    if (!client) {
      client = new ChatOpenAI({
        model: this.modelName,
        apiKey: this.apiKey,
        maxTokens,
        temperature,
        maxRetries: 0,
      });
      this.clients.set(key, client);
    }
    return client;
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  public readonly modelName: string;
  private readonly embeddings: OpenAIEmbeddings;

  public constructor(opts: OpenAIProviderOptions) {
    this.modelName = opts.model;
    this.embeddings = new OpenAIEmbeddings({ model: opts.model, apiKey: opts.apiKey, maxRetries: 0 });
    log.info({ model: this.modelName }, "embedding provider initialized");
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    try {
      const vectors = await this.embeddings.embedDocuments([...texts]);
      return vectors.map((v) => Float32Array.from(v));
    } catch (err) {
      throw classifyProviderError(err);
    }
  }
}
