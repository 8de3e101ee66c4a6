export interface RetryOptions {
  attempts: number;
  /**
   * Delay before the second attempt, doubled for every attempt after it
   */
  baseDelayMs: number;
  onRetry?: (error: unknown, attempt: number) => void;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  {attempts, baseDelayMs, onRetry}: RetryOptions
): Promise<T> {
  let err: unknown;

  for (let i = 0; i < attempts; i++) {
    try {
      return await fn();
    } catch (e) {
      err = e;

      if (i < attempts - 1) {
        onRetry?.(e, i + 1);
        await new Promise(resolve => setTimeout(resolve, baseDelayMs * 2 ** i));
      }
    }
  }

  throw err;
}
