// ── Retry with Exponential Backoff ───────────────────────────────────

import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000), doubled each retry */
  baseDelayMs?: number;
  /** Which HTTP status codes should trigger a retry */
  retryableStatuses?: number[];
  /** Label for logging (e.g. "summarize") */
  label?: string;
  /** Stops further attempts and interrupts the backoff wait */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1000,
  retryableStatuses: [429, 500, 502, 503, 504],
  label: "LLM call",
};

/**
 * Wraps an async function with exponential backoff retry logic.
 * Only retries on network errors or HTTP status codes in the retryable list.
 * An aborted signal rethrows its reason instead of retrying.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const { maxRetries, baseDelayMs, retryableStatuses, label, signal } = {
    ...DEFAULT_OPTIONS,
    ...opts,
  };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (signal?.aborted || !isRetryable(error, retryableStatuses)) {
        throw error;
      }

      if (attempt === maxRetries) {
        break;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying LLM call",
      );
      await sleep(delayMs, signal);
    }
  }

  throw lastError;
}

// ── Helpers ──────────────────────────────────────────────

export function isRetryable(error: unknown, retryableStatuses: number[]): boolean {
  // Network errors (fetch failures, timeouts)
  if (error instanceof TypeError) return true;
  if (error instanceof Error && error.message.includes("ECONNRESET"))
    return true;
  if (error instanceof Error && error.message.includes("ETIMEDOUT"))
    return true;

  const status = getStatusCode(error);
  return status !== undefined && retryableStatuses.includes(status);
}

function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  // OpenAI SDK errors carry `status`; some transports use `statusCode`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
