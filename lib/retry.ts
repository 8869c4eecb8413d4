import {
  RetryExhaustedError,
  toTransferError,
  type TransferError,
  type TransferPhase,
} from "@/lib/errors";

export interface RetryConfig {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Minimum wait after a rate-limited / quota failure. */
  rateLimitMinDelayMs: number;
  /** Jitter added on top of the exponential delay, as a fraction of it. */
  jitterRatio: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  rateLimitMinDelayMs: 30_000,
  jitterRatio: 0.2,
};

export interface RetryEvent {
  phase: TransferPhase;
  attempt: number;
  delayMs: number;
  error: TransferError;
}

export interface RetryHooks {
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryDeps {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Bounded retry with capped exponential backoff and jitter.
 *
 * Transient errors are retried until `maxAttempts` is reached, then surface
 * as a RetryExhaustedError. Permanent errors (item or run) are rethrown
 * untouched on the attempt that raised them.
 */
export class RetryExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly config: RetryConfig,
    deps: RetryDeps = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  async execute<T>(
    phase: TransferPhase,
    fn: (attempt: number) => Promise<T>,
    hooks: RetryHooks = {}
  ): Promise<T> {
    const delays: number[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (err) {
        const error = toTransferError(err, phase);
        if (!error.isRetryable()) throw error;

        if (attempt >= this.config.maxAttempts) {
          throw new RetryExhaustedError(attempt, delays, error);
        }

        const delayMs = this.calculateDelay(attempt, error);
        delays.push(delayMs);
        hooks.onRetry?.({ phase, attempt, delayMs, error });
        await this.sleep(delayMs);
      }
    }
  }

  /** Delay to wait after the given (1-based) failed attempt. */
  calculateDelay(attempt: number, error?: TransferError): number {
    const exponential = Math.min(
      this.config.baseDelayMs * Math.pow(2, attempt - 1),
      this.config.maxDelayMs
    );
    let delay = Math.floor(exponential + exponential * this.config.jitterRatio * this.random());

    if (error?.rateLimited) {
      delay = Math.max(delay, this.config.rateLimitMinDelayMs);
    }
    if (error?.retryAfterMs !== undefined) {
      delay = Math.max(delay, error.retryAfterMs);
    }
    return delay;
  }
}
