import { setTimeout as sleep } from 'timers/promises';

import { ExternalServiceError, RequestCancelledError, errorMessage, isAbortError } from '../errors.js';

export interface RetryPolicy {
  /** Total attempts, first call included. */
  maxAttempts: number;
  timeoutMs: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface RetryOptions {
  /** Request-level cancellation. Aborting it stops retries immediately. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxBackoffMs, policy.backoffMs * 2 ** (attempt - 1));
}

// Settles as soon as the signal aborts, even if the operation ignores it
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/**
 * Runs `operation` with a per-attempt timeout and exponential backoff between
 * attempts. Throws ExternalServiceError once attempts are exhausted and
 * RequestCancelledError when the caller's signal aborts.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, onRetry } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) throw new RequestCancelledError();

    const timeout = AbortSignal.timeout(policy.timeoutMs);
    const attemptSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    try {
      return await raceAbort(operation(attemptSignal, attempt), attemptSignal);
    } catch (err) {
      if (signal?.aborted) throw new RequestCancelledError();
      lastError = timeout.aborted && isAbortError(err) ? new Error(`timed out after ${policy.timeoutMs}ms`) : err;
    }

    if (attempt < policy.maxAttempts) {
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(attempt, lastError, delayMs);
      try {
        await sleep(delayMs, undefined, signal ? { signal } : undefined);
      } catch (err) {
        if (isAbortError(err)) throw new RequestCancelledError();
        throw err;
      }
    }
  }

  throw new ExternalServiceError(
    `Backend call failed after ${policy.maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    policy.maxAttempts,
    { cause: lastError }
  );
}
