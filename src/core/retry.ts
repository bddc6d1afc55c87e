/**
 * Retry and timeout primitives shared by provider fetches, stage
 * invocations and embedding calls.
 *
 * Backoff doubles per attempt:
 *   attempt 1 fails: wait backoffMs * 1
 *   attempt 2 fails: wait backoffMs * 2
 *   attempt 3 fails: wait backoffMs * 4
 */

import { SessionCancelled, TimeoutError, isRetryableError } from "./errors.js";

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  backoffMs: number;
  /** Defaults to isRetryableError */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number
  ) {
    super(lastError instanceof Error ? lastError.message : String(lastError));
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempt budget is spent. Failures are rethrown wrapped in
 * RetryExhaustedError so callers always learn the attempt count.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy
): Promise<RetryOutcome<T>> {
  const shouldRetry = policy.shouldRetry ?? ((error: unknown) => isRetryableError(error));
  const maxAttempts = policy.maxRetries + 1;
  let attempt = 0;

  while (true) {
    attempt++;
    throwIfAborted(policy.signal);

    try {
      const value = await fn(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt) || policy.signal?.aborted) {
        throw new RetryExhaustedError(error, attempt);
      }

      const delayMs = policy.backoffMs * Math.pow(2, attempt - 1);
      policy.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs, policy.signal);
      }
    }
  }
}

/**
 * Bound a call by `timeoutMs`. The callee receives an AbortSignal that
 * fires on timeout or when the parent signal aborts.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = (): void => controller.abort(abortReason(parent));
  if (parent?.aborted) {
    throw abortReason(parent);
  }
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(abortReason(controller.signal)), {
      once: true,
    });
  });

  try {
    return await Promise.race([fn(controller.signal), timeout, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  return new SessionCancelled("unknown", typeof reason === "string" ? reason : "Operation aborted");
}
