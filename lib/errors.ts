/**
 * Failure taxonomy for the transfer pipeline.
 *
 * Collaborators (source, publisher, credential provider) translate whatever
 * their transport throws into one of these classes at their own boundary, so
 * the retry loop and the engine only ever branch on `kind`.
 */

export type ErrorKind = "transient" | "permanent-item" | "permanent-run";

export type TransferPhase = "list" | "fetch" | "publish" | "auth";

export interface TransferErrorOptions {
  /** Marks rate-limit / quota failures, which wait longer before a retry. */
  rateLimited?: boolean;
  /** Server-suggested minimum wait before retrying. */
  retryAfterMs?: number;
  statusCode?: number;
  /** Provider-specific reason string, e.g. "quotaExceeded". */
  reason?: string;
  phase?: TransferPhase;
  cause?: unknown;
}

export class TransferError extends Error {
  public readonly kind: ErrorKind;
  public readonly rateLimited: boolean;
  public readonly retryAfterMs?: number;
  public readonly statusCode?: number;
  public readonly reason?: string;
  public readonly phase?: TransferPhase;

  constructor(kind: ErrorKind, message: string, options: TransferErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "TransferError";
    this.kind = kind;
    this.rateLimited = options.rateLimited ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.statusCode = options.statusCode;
    this.reason = options.reason;
    this.phase = options.phase;
  }

  isRetryable(): boolean {
    return this.kind === "transient";
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      rateLimited: this.rateLimited,
      retryAfterMs: this.retryAfterMs,
      statusCode: this.statusCode,
      reason: this.reason,
      phase: this.phase,
    };
  }
}

/** Network blip, timeout, 5xx, rate limit. */
export class TransientError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super("transient", message, options);
    this.name = "TransientError";
  }
}

/** Downloaded byte count disagrees with the listed size. Retried like a transient fetch failure. */
export class IntegrityError extends TransientError {
  constructor(
    public readonly expectedBytes: number,
    public readonly actualBytes: number
  ) {
    super(`Downloaded size ${actualBytes} does not match expected ${expectedBytes}`, {
      phase: "fetch",
    });
    this.name = "IntegrityError";
  }
}

/** Aborts the current item only. */
export class PermanentItemError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super("permanent-item", message, options);
    this.name = "PermanentItemError";
  }
}

/** Aborts the whole pass before (or instead of) any further item processing. */
export class PermanentRunError extends TransferError {
  constructor(message: string, options?: TransferErrorOptions) {
    super("permanent-run", message, options);
    this.name = "PermanentRunError";
  }
}

/** All attempts of a phase failed with transient errors. */
export class RetryExhaustedError extends TransferError {
  constructor(
    public readonly attempts: number,
    public readonly delays: number[],
    public readonly lastError: TransferError
  ) {
    super("permanent-item", `Gave up after ${attempts} attempts: ${lastError.message}`, {
      phase: lastError.phase,
      statusCode: lastError.statusCode,
      reason: lastError.reason,
      cause: lastError,
    });
    this.name = "RetryExhaustedError";
  }
}

/** Invalid or missing configuration; raised before anything runs. */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Normalize anything thrown inside a phase. Errors that were not classified
 * by a collaborator are treated as transient.
 */
export function toTransferError(err: unknown, phase?: TransferPhase): TransferError {
  if (err instanceof TransferError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientError(message || "Unknown error", { phase, cause: err });
}

/** Short, log-friendly description of any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof TransferError) {
    const details = [err.reason, err.statusCode].filter((v) => v !== undefined);
    return details.length > 0 ? `${err.message} (${details.join(", ")})` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
