import { AbortError, NetworkError, ProviderError, SDKError } from '../types/error.js';
import type { RetryPolicy } from '../types/config.js';

export type RetryOptions = {
  readonly policy: RetryPolicy;
  readonly signal?: AbortSignal;
  readonly onRetry?: (error: SDKError, attempt: number, delayMs: number) => void;
};

export function calculateBackoff(attempt: number, policy: RetryPolicy): number {
  const exponentialDelay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt);
  return Math.min(exponentialDelay, policy.maxDelayMs);
}

/**
 * Whether an error is worth another attempt. Transport failures are, since a
 * local model server is often still loading when the first request lands.
 */
export function isRetryable(error: unknown): error is SDKError {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  return error instanceof NetworkError;
}

/**
 * Retries a single operation with exponential backoff and 0-25% jitter.
 *
 * Wrap only the request setup of a stream, never the consumption loop:
 * once deltas have reached the caller a retry would duplicate them.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, onRetry, signal } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryable(error) || attempt >= policy.maxRetries) {
        throw error;
      }

      let delayMs = calculateBackoff(attempt, policy);

      const retryAfter = error instanceof ProviderError ? error.retryAfter : null;
      if (retryAfter !== null) {
        // a server asking for a longer pause than we are willing to wait
        if (retryAfter > policy.maxDelayMs) {
          throw error;
        }
        delayMs = retryAfter;
      }

      const finalDelayMs = delayMs + Math.random() * 0.25 * delayMs;
      onRetry?.(error, attempt + 1, finalDelayMs);
      await sleep(finalDelayMs, signal);
    }
  }
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortError('Retry was aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortError('Retry was aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
