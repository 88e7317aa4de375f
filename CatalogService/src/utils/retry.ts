export interface RetryOptions {
  retries: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  /** Returning false stops the loop and rethrows the error as is. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const defaultMinDelay = 200;
const defaultMaxDelay = 5_000;

export function backoffDelay(
  attempt: number,
  minDelayMs = defaultMinDelay,
  maxDelayMs = defaultMaxDelay
) {
  return Math.min(maxDelayMs, minDelayMs * 2 ** attempt);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
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

export async function withExponentialBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let attempt = 0;
  // Attempt counter is zero indexed to make logging easier.
  while (attempt <= options.retries) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (attempt === options.retries || !retryable || options.signal?.aborted) {
        throw error;
      }
      const nextAttempt = attempt + 1;
      const delay = backoffDelay(attempt, options.minDelayMs, options.maxDelayMs);
      options.onRetry?.(error, nextAttempt, delay);
      await sleep(delay, options.signal);
      attempt = nextAttempt;
    }
  }
  throw new Error("Exhausted retries without executing operation");
}
