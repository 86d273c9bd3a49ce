export interface RetryOptions {
  maxRetries: number;
  baseMs: number;
  maxMs?: number;
  /** Return false to stop retrying on errors that will not go away. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, waitMs: number, error: unknown) => void;
}

export const backoffMs = (attempt: number, baseMs: number, maxMs: number) => {
  const power = Math.max(0, attempt - 1);
  return Math.min(maxMs, baseMs * 2 ** power);
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const retryWithBackoff = async <T>(task: () => Promise<T>, options: RetryOptions): Promise<T> => {
  const maxMs = options.maxMs ?? options.baseMs * 16;
  let attempt = 0;

  for (;;) {
    try {
      return await task();
    } catch (error) {
      attempt += 1;
      if (attempt > options.maxRetries || (options.shouldRetry && !options.shouldRetry(error))) {
        throw error;
      }
      const waitMs = backoffMs(attempt, options.baseMs, maxMs);
      options.onRetry?.(attempt, waitMs, error);
      await sleep(waitMs);
    }
  }
};
