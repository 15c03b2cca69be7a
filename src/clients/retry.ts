export interface RetryOptions {
  attempts: number;
  /** Delay before retry n is `baseDelayMs * n`. */
  baseDelayMs: number;
  onRetry?: (attempt: number, error: unknown) => void;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function retryWithLinearBackoff<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (attempt < options.attempts) {
        options.onRetry?.(attempt, error);
        await sleep(options.baseDelayMs * attempt);
      }
    }
  }

  throw lastError;
}
