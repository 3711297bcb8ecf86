export interface RetryOptions {
  readonly maxAttempts?: number;
  /** Decides whether a failed attempt is worth another one. Defaults to always. */
  readonly shouldRetry?: (err: unknown, attempt: number) => boolean;
  /** Runs between a failed attempt and the next one. */
  readonly onRetry?: (err: unknown, attempt: number) => void | Promise<void>;
}

const DEFAULT_MAX_ATTEMPTS = 3;

/** Runs `fn` until it succeeds, the attempts run out, or `shouldRetry` says no. */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const isLast = attempt >= maxAttempts - 1;
      if (isLast || (opts?.shouldRetry && !opts.shouldRetry(err, attempt))) {
        throw err;
      }
      await opts?.onRetry?.(err, attempt);
    }
  }

  throw lastError;
}
