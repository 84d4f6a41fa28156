import type { BackoffStrategy } from "../config";
import { toError } from "../errors";

export interface RetryOptions {
  maxRetries: number;
  backoff: BackoffStrategy;
  baseDelayMs: number;
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceededError";
  }
}

export function computeBackoffMs(attempt: number, strategy: BackoffStrategy, baseDelayMs: number): number {
  return strategy === "exponential" ? baseDelayMs * Math.pow(2, attempt) : baseDelayMs;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `maxRetries` extra attempts have been spent.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.maxRetries || options.signal?.aborted || !options.isRetryable(error)) {
        throw error;
      }
      const delayMs = computeBackoffMs(attempt, options.backoff, options.baseDelayMs);
      options.onRetry?.(attempt + 1, toError(error), delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}

/**
 * Races `operation` against a timer and an optional parent signal. The signal
 * handed to `operation` is aborted when either fires, and the returned promise
 * rejects right away even if `operation` ignores it.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const aborted = new Promise<never>((_, reject) => {
    const onAbort = (): void => reject(toError(controller.signal.reason));
    if (controller.signal.aborted) {
      onAbort();
    } else {
      controller.signal.addEventListener("abort", onAbort, { once: true });
    }
  });
  const timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
