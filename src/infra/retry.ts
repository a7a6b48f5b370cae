export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  /** Errors rejected here are rethrown immediately */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` until it resolves, backing off exponentially (base, 2x base, 4x base, ...)
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  let attempt = 1;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= options.maxAttempts) {
        throw error;
      }
      const delayMs = options.baseDelayMs * 2 ** (attempt - 1);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
