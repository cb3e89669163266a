import { waitFor } from './abort.js';

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  factor?: number;
  onRetry?: (attempt: number, error: unknown) => void;
  /** Stops retrying, and cuts a pending backoff short, once aborted */
  signal?: AbortSignal;
}

export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 3,
    delayMs = 500,
    factor = 2,
    onRetry,
    signal
  } = options;

  let attempt = 0;
  let lastError: unknown;
  let delay = delayMs;

  while (attempt <= retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === retries || signal?.aborted) {
        break;
      }
      onRetry?.(attempt + 1, error);
      await waitFor(delay, signal);
      if (signal?.aborted) {
        break;
      }
      delay *= factor;
      attempt += 1;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
