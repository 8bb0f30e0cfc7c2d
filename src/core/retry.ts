export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  isRetryable: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Runs `fn` up to `maxAttempts` times. A retryable failure on attempt `n` waits
 * `baseDelayMs * n` before the next attempt; anything else is rethrown at once.
 */
export const withRetry = async <T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> => {
  const wait = policy.sleep ?? sleep;
  let lastError: unknown;
  let caught = false;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      caught = true;
      lastError = err;
      if (!policy.isRetryable(err) || attempt === policy.maxAttempts) break;
      const delayMs = policy.baseDelayMs * attempt;
      policy.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }

  if (caught) throw lastError;
  throw new Error('Unknown error occurred');
};
