import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import {
  PermanentItemError,
  TransientError,
  type TransferError,
  type TransferPhase,
} from "@/lib/errors";

/**
 * Shared axios instance. Every status resolves; callers inspect it and
 * classify failures with `classifyHttpFailure`.
 */
export function createHttpClient(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    validateStatus: () => true,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
  });
}

const TRANSIENT_NETWORK_CODES = new Set([
  "ECONNABORTED",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "ERR_NETWORK",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
]);

/** Parse a Retry-After header (seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name.toLowerCase()];
  if (typeof value === "string") return value;
  if (Array.isArray(value) && typeof value[0] === "string") return value[0];
  return undefined;
}

/**
 * Default mapping from an HTTP status to the failure taxonomy:
 * 408/429/5xx are transient (429 rate-limited), everything else permanent
 * for the item. Adapters refine this with provider-specific reasons.
 */
export function classifyHttpFailure(
  response: AxiosResponse,
  phase: TransferPhase,
  message: string,
  reason?: string
): TransferError {
  const { status } = response;
  const retryAfterMs = parseRetryAfter(headerValue(response, "retry-after"));
  const options = { statusCode: status, reason, phase, retryAfterMs };

  if (status === 429) {
    return new TransientError(message, { ...options, rateLimited: true });
  }
  if (status === 408 || status >= 500) {
    return new TransientError(message, options);
  }
  return new PermanentItemError(message, options);
}

/**
 * Classify something thrown by axios itself (no response): timeouts and
 * connection failures are transient, cancellation and the rest are left
 * to the caller's default handling.
 */
export function classifyRequestError(err: unknown, phase: TransferPhase): TransferError | undefined {
  if (!axios.isAxiosError(err)) return undefined;
  if (err.code && TRANSIENT_NETWORK_CODES.has(err.code)) {
    return new TransientError(`Network error during ${phase}: ${err.message}`, {
      phase,
      reason: err.code,
      cause: err,
    });
  }
  if (axios.isCancel(err) || err.code === "ERR_CANCELED") {
    return new PermanentItemError(`Request cancelled during ${phase}`, { phase, cause: err });
  }
  return undefined;
}
