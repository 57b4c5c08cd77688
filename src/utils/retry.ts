export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  backoffFactor?: number;
  maxDelayMs?: number;
  /** Errors failing this check are rethrown without another attempt. */
  retryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Wait before the attempt that follows `attempt` (1-based). */
export function backoffDelay(attempt: number, options: RetryOptions = {}) {
  const base = Math.max(0, options.delayMs ?? 250);
  const factor = options.backoffFactor ?? 2;
  const cap = options.maxDelayMs ?? 5_000;
  return Math.min(cap, Math.ceil(base * factor ** (attempt - 1)));
}

export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.retryable ? options.retryable(error) : true;
      if (attempt >= attempts || !retryable) throw error;
      options.onRetry?.(error, attempt);
      const wait = backoffDelay(attempt, options);
      if (wait > 0) await sleep(wait);
    }
  }
}
