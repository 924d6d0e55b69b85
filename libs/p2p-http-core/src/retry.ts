import { P2PError, isRetryableError } from './errors';
import type { RetryPolicy } from './types';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 5,
  baseDelayMs: 1000,
  backoffFactor: 3,
  maxDelayMs: 60_000,
});

export interface RetryEvent {
  /** 1-based number of the attempt that just failed. */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: P2PError;
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Delay before retry `n` (1-based): `min(base * factor^(n-1), max)`.
 */
export function computeRetryDelay(retryNumber: number, policy: RetryPolicy): number {
  const raw = policy.baseDelayMs * Math.pow(policy.backoffFactor, Math.max(0, retryNumber - 1));
  return Math.min(raw, policy.maxDelayMs);
}

function cancelledError(signal: AbortSignal): P2PError {
  return new P2PError('timeout', { message: 'Request cancelled', cancelled: true, cause: signal.reason });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(handle);
      if (signal) reject(cancelledError(signal));
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `attempt` until it resolves, throws a non-retryable error, or has been
 * tried `policy.maxAttempts` times. The last error propagates unchanged.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  for (let attemptNumber = 1; ; attemptNumber += 1) {
    try {
      return await attempt(attemptNumber);
    } catch (error) {
      if (!isRetryableError(error) || attemptNumber >= maxAttempts) {
        throw error;
      }
      const delayMs = computeRetryDelay(attemptNumber, policy);
      options.onRetry?.({ attempt: attemptNumber, maxAttempts, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}
