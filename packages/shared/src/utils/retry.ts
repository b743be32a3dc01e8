/**
 * Retry helper for recoverable failures (device not yet visible, transient timeouts)
 */

export interface RetryOptions {
  /** Additional attempts after the first one */
  readonly retries: number;
  readonly delayMs: number;
  readonly isRetryable?: (error: unknown) => boolean;
  readonly onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run `operation`, retrying failures that `isRetryable` accepts.
 * The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      const retryable = options.isRetryable ? options.isRetryable(error) : true;
      if (!retryable || attempt >= options.retries) {
        throw error;
      }

      attempt++;
      options.onRetry?.(error, attempt);
      await sleep(options.delayMs);
    }
  }
}

/**
 * Poll `check` until it returns true or `timeoutMs` elapses.
 * `shouldAbort` ends the wait early, e.g. when the watched process died.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  options: { timeoutMs: number; intervalMs: number; shouldAbort?: () => boolean }
): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;

  while (Date.now() < deadline) {
    if (options.shouldAbort?.()) {
      return false;
    }
    if (await check()) {
      return true;
    }
    if (options.shouldAbort?.()) {
      return false;
    }
    await sleep(Math.min(options.intervalMs, Math.max(0, deadline - Date.now())));
  }

  return false;
}
