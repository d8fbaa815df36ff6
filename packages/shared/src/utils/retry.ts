export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier?: number;
  // Return false to rethrow immediately without further attempts
  shouldRetry?: (err: Error, attempt: number) => boolean;
  onRetry?: (err: Error, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Run `fn` with bounded exponential backoff and report how many attempts it took.
 * The final error carries the attempt count in `attempts`.
 */
export async function retryWithAttempts<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<RetryResult<T>> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error("retry: no attempts were made");
  let delay = opts.baseDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      Object.assign(lastError, { attempts: attempt });
      if (attempt === opts.maxAttempts) break;
      if (opts.shouldRetry && !opts.shouldRetry(lastError, attempt)) break;
      opts.onRetry?.(lastError, attempt, delay);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
      delay = Math.min(delay * (opts.backoffMultiplier ?? 2), opts.maxDelayMs);
    }
  }

  throw lastError;
}

export function attemptsOf(err: unknown): number {
  if (err instanceof Error && "attempts" in err && typeof err.attempts === "number") {
    return err.attempts;
  }
  return 1;
}
