export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number; // starting delay
  maxDelayMs?: number; // upper bound on delay
  /** Errors for which this returns false are thrown immediately */
  shouldRetry?: (err: unknown) => boolean;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Executes an asynchronous function with an exponential backoff strategy and randomized jitter.
 * Increases the delay between successive attempts up to a specified maximum, and gives up
 * at once on errors the `shouldRetry` predicate rejects.
 * @param fn - The asynchronous function or API call to execute
 * @param options - Attempt budget, delay bounds and retry predicate
 * @returns The resolved value of the provided function `fn`
 * @throws The final error encountered if the maximum number of attempts is exhausted
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 5,
    baseDelayMs = 500,
    maxDelayMs = 10_000,
    shouldRetry = () => true,
    label = "operation",
    sleep: wait = sleep
  } = options;

  let attempt = 1;
  // small jitter to avoid thundering herd
  const jitter = () => (baseDelayMs > 0 ? Math.random() * 100 : 0);

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay =
        Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + jitter();

      console.warn(
        `[${label}] Retryable error on attempt ${attempt}/${maxAttempts}, retrying in ${Math.round(
          delay
        )}ms: ${err instanceof Error ? err.message : String(err)}`
      );

      await wait(delay);
      attempt += 1;
    }
  }
}
