/**
 * Retry logic with exponential backoff for media source calls
 */

import { MediaSourceError } from './errors';
import { ENV } from './env';

export interface RetryConfig {
  /** Maximum number of retry attempts (0 disables retrying) */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: ENV.fetchRetries,
  initialDelay: ENV.fetchRetryBaseMs,
  maxDelay: 60000,
  exponentialBase: 2,
  jitter: true,
};

export function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // equal jitter: between 50% and 100% of the computed delay
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

/**
 * Only media source failures are worth another attempt; metadata and
 * storage errors will fail the same way again.
 */
function shouldRetry(attempt: number, error: unknown, config: RetryConfig): boolean {
  return attempt < config.maxRetries && error instanceof MediaSourceError;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (signal?.aborted || !shouldRetry(attempt, error, config)) {
        throw error;
      }
      await sleep(calculateDelay(attempt, config), signal);
      if (signal?.aborted) throw error;
    }
  }
}
