/**
 * Error taxonomy shared by every layer of the RAG engine.
 *
 * Each error carries a stable `code` (used by the MCP boundary to pick a
 * protocol error code), a human-readable message and, where one exists, a
 * suggested remedy the caller can show to the user.
 */
export type RagErrorCode =
  | "INVALID_CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "PROVIDER_UNAVAILABLE"
  | "RATE_LIMITED"
  | "PROVIDER_QUOTA_EXCEEDED"
  | "EMBEDDING_FAILED"
  | "GENERATION_FAILED"
  | "INDEX_NOT_FOUND"
  | "NOT_READY"
  | "SUPERSEDED"
  | "CACHE_UNAVAILABLE";

export interface RagErrorOptions {
  remedy?: string;
  cause?: unknown;
}

export class RagError extends Error {
  public readonly code: RagErrorCode;
  public readonly remedy?: string;

  public constructor(code: RagErrorCode, message: string, opts: RagErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "RagError";
    this.code = code;
    this.remedy = opts.remedy;
  }

  /** Message plus remedy, suitable for showing to an end user. */
  public describe(): string {
    return this.remedy ? `${this.message} (${this.remedy})` : this.message;
  }
}

/** Bad chunking or tuning parameters. Never retried. */
export class InvalidConfigurationError extends RagError {
  public constructor(message: string) {
    super("INVALID_CONFIGURATION", message, { remedy: "check CHUNK_SIZE / CHUNK_OVERLAP settings" });
    this.name = "InvalidConfigurationError";
  }
}

export class InvalidArgumentError extends RagError {
  public constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/** Network, auth or timeout failure talking to a provider. Retryable. */
export class ProviderUnavailableError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("PROVIDER_UNAVAILABLE", message, {
      remedy: "check network connectivity and the API key",
      cause,
    });
    this.name = "ProviderUnavailableError";
  }
}

/** Provider asked us to slow down. Retryable, honouring `retryAfterMs`. */
export class RateLimitedError extends RagError {
  public readonly retryAfterMs?: number;

  public constructor(message: string, retryAfterMs?: number, cause?: unknown) {
    super("RATE_LIMITED", message, { remedy: "wait a moment and try again", cause });
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

/** Account quota exhausted. Terminal: surfaced without retrying. */
export class ProviderQuotaExceededError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("PROVIDER_QUOTA_EXCEEDED", message, {
      remedy: "check the API key's plan and billing quota",
      cause,
    });
    this.name = "ProviderQuotaExceededError";
  }
}

export class EmbeddingFailedError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("EMBEDDING_FAILED", message, {
      remedy: "check the embedding provider configuration and retry the upload",
      cause,
    });
    this.name = "EmbeddingFailedError";
  }
}

export class GenerationFailedError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("GENERATION_FAILED", message, {
      remedy: "check the API key/quota and try again",
      cause,
    });
    this.name = "GenerationFailedError";
  }
}

/** `search`/`persist` called before `build`/`load`. */
export class IndexNotFoundError extends RagError {
  public constructor(documentId?: string) {
    super(
      "INDEX_NOT_FOUND",
      documentId ? `No vector index for document ${documentId}` : "No vector index has been built",
    );
    this.name = "IndexNotFoundError";
  }
}

export class NotReadyError extends RagError {
  public constructor(state: string, operation: string) {
    super("NOT_READY", `Cannot ${operation} while session is ${state}`, {
      remedy: state === "INDEXING" ? "wait for indexing to finish" : "load a document first",
    });
    this.name = "NotReadyError";
  }
}

/** The operation was overtaken by a newer `load` and its result discarded. */
export class SupersededError extends RagError {
  public constructor(operation: string) {
    super("SUPERSEDED", `${operation} was superseded by a newer document load`);
    this.name = "SupersededError";
  }
}

export class CacheUnavailableError extends RagError {
  public constructor(message: string, cause?: unknown) {
    super("CACHE_UNAVAILABLE", message, { cause });
    this.name = "CacheUnavailableError";
  }
}

/** True for the provider failures the retry policy may re-attempt. */
export function isRetryable(err: unknown): err is ProviderUnavailableError | RateLimitedError {
  return err instanceof ProviderUnavailableError || err instanceof RateLimitedError;
}
