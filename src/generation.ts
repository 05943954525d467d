import {
  GenerationFailedError,
  ProviderQuotaExceededError,
  RagError,
  isRetryable,
} from "./errors";
import { componentLogger } from "./logger";
import { RetryPolicy } from "./retry";
import type { TokenUsage } from "./types";

const log = componentLogger("generation");

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
}

export interface Completion {
  text: string;
  tokenUsage: TokenUsage;
}

/** Narrow interface to an external text-generation service. */
export interface GenerationProvider {
  readonly modelName: string;
  complete(prompt: string, opts: CompletionOptions, signal?: AbortSignal): Promise<Completion>;
}

export interface GenerationGatewayOptions {
  retry?: RetryPolicy;
  maxTokens?: number;
  temperature?: number;
}

/** Prompt → text with the shared retry policy and default sampling settings. */
export class GenerationGateway {
  private readonly provider: GenerationProvider;
  private readonly retry: RetryPolicy;
  private readonly defaults: CompletionOptions;

  public constructor(provider: GenerationProvider, opts: GenerationGatewayOptions = {}) {
    this.provider = provider;
    this.retry = opts.retry ?? new RetryPolicy();
    this.defaults = { maxTokens: opts.maxTokens ?? 500, temperature: opts.temperature ?? 0.01 };
  }

  public getModelName(): string {
    return this.provider.modelName;
  }

  /**
   * @throws {ProviderQuotaExceededError} Immediately, without retrying.
   * @throws {GenerationFailedError} When retries are exhausted.
   */
  public async complete(
    prompt: string,
    overrides: Partial<CompletionOptions> = {},
    signal?: AbortSignal,
  ): Promise<Completion> {
    const opts = { ...this.defaults, ...overrides };
    try {
      return await this.retry.run(
        `complete(${this.provider.modelName})`,
        (s) => this.provider.complete(prompt, opts, s),
        signal,
      );
    } catch (err) {
      if (signal?.aborted) throw err;
      if (err instanceof ProviderQuotaExceededError) throw err;
      if (isRetryable(err)) {
        log.error({ err: err.message }, "generation provider failed after retries");
        throw new GenerationFailedError(`Generation failed: ${err.message}`, err);
      }
      if (err instanceof RagError) throw err;
      throw new GenerationFailedError(
        `Generation failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }
}
