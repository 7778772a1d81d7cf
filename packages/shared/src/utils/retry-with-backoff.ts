import { createAbortError } from '../errors/text-generation-error';

/**
 * Options for retryWithBackoff
 */
export interface RetryWithBackoffOptions {
  /**
   * Total attempts including the first one (default: 5)
   */
  maxAttempts?: number;

  /**
   * Wait before the second attempt in milliseconds, doubled after each
   * further failure (default: 1000)
   */
  initialDelayMs?: number;

  /**
   * Decide whether a failure is worth another attempt.
   * Errors it rejects are re-thrown immediately.
   */
  shouldRetry: (error: unknown) => boolean;

  /**
   * Called before waiting for the next attempt
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /**
   * Abort signal; an aborted signal stops retrying and cuts a pending wait
   * short with an AbortError
   */
  abortSignal?: AbortSignal;
}

/**
 * Wait for `ms`, rejecting with an AbortError as soon as the signal fires
 */
function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(createAbortError('Retry backoff was aborted'));
    };
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    if (abortSignal?.aborted) {
      onAbort();
      return;
    }
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an async operation with bounded exponential backoff
 *
 * Waits initialDelayMs * 2^(attempt - 1) between attempts. When every attempt
 * fails, the last error is re-thrown.
 *
 * @example
 * ```typescript
 * const text = await retryWithBackoff(() => generator.generate(request), {
 *   shouldRetry: (error) => error instanceof RateLimitError,
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryWithBackoffOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? 5);
  const initialDelayMs = options.initialDelayMs ?? 1000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const canRetry =
        attempt < maxAttempts &&
        !options.abortSignal?.aborted &&
        options.shouldRetry(error);

      if (!canRetry) {
        throw error;
      }

      const delayMs = initialDelayMs * 2 ** (attempt - 1);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.abortSignal);
    }
  }
}
