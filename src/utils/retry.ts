// ============================================
// DEADZONE - Retry Helper
// ============================================

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  isRetryable: (error: unknown) => boolean;
}

/**
 * Run `task` until it succeeds, fails with a non-retryable error,
 * or runs out of attempts. The last error is rethrown.
 */
export async function withRetry<T>(
  task: () => Promise<T>,
  { attempts = 3, delayMs = 25, isRetryable }: RetryOptions
): Promise<T> {
  let attempt = 0;

  while (true) {
    try {
      return await task();
    } catch (error) {
      attempt += 1;
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, delayMs * attempt));
    }
  }
}
