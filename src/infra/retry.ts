export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs `operation` until it succeeds, `shouldRetry` rejects the error, or the
 * attempts are spent. Delay doubles after each failed attempt.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  shouldRetry: (error: unknown) => boolean,
  sleep: SleepFn = defaultSleep,
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) {
        throw error;
      }
      await sleep(policy.baseDelayMs * 2 ** (attempt - 1));
    }
  }
}
