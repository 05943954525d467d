import { ProviderUnavailableError, RateLimitedError, isRetryable } from "./errors";
import { componentLogger } from "./logger";

const log = componentLogger("retry");

export interface RetryPolicyOptions {
  /** Total attempts including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt budget; exceeding it counts as ProviderUnavailable. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  timeoutMs: 30000,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Rejects with the abort reason when `signal` fires first. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}

/**
 * Run `fn` with a deadline. The signal handed to `fn` fires on timeout or when
 * `outer` aborts, so providers that honour it can stop early.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  outer?: AbortSignal,
): Promise<T> {
  if (outer?.aborted) throw abortReason(outer);
  const controller = new AbortController();
  const forward = () => controller.abort(outer?.reason);
  outer?.addEventListener("abort", forward, { once: true });
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new ProviderUnavailableError(`${label} timed out after ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(abortReason(controller.signal)), {
      once: true,
    });
  });
  // The losing branches of the race must not surface as unhandled rejections.
  deadline.catch(() => undefined);
  aborted.catch(() => undefined);
  try {
    return await Promise.race([fn(controller.signal), deadline, aborted]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener("abort", forward);
  }
}

/**
 * The single retry policy shared by the embedding and generation gateways.
 * ProviderUnavailable and RateLimited are re-attempted with capped
 * exponential backoff (or the provider's retry-after hint when longer, under
 * the same cap); every other error, ProviderQuotaExceeded included, is
 * rethrown immediately.
 */
export class RetryPolicy {
  public readonly options: RetryPolicyOptions;
  private readonly sleepFn: Sleep;

  public constructor(options: Partial<RetryPolicyOptions> = {}, sleepFn: Sleep = sleep) {
    this.options = { ...DEFAULT_RETRY_POLICY, ...options };
    this.sleepFn = sleepFn;
  }

  /**
   * Delay before attempt `attempt + 1`, given the failure of attempt `attempt`
   * (1-based). A retry-after hint can lengthen the wait up to `maxDelayMs`.
   */
  public delayFor(attempt: number, err: unknown): number {
    const { baseDelayMs, maxDelayMs } = this.options;
    const backoff = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
    if (err instanceof RateLimitedError && err.retryAfterMs !== undefined) {
      return Math.min(maxDelayMs, Math.max(backoff, err.retryAfterMs));
    }
    return backoff;
  }

  public async run<T>(
    label: string,
    fn: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const { maxAttempts, timeoutMs } = this.options;
    for (let attempt = 1; ; attempt++) {
      try {
        return await withTimeout(fn, timeoutMs, label, signal);
      } catch (err) {
        if (signal?.aborted || !isRetryable(err) || attempt >= maxAttempts) throw err;
        const delay = this.delayFor(attempt, err);
        log.warn({ label, attempt, delay, err: err.message }, "provider call failed, retrying");
        await this.sleepFn(delay, signal);
      }
    }
  }
}
