/**
 * Exponential backoff for upload retries
 */

export interface BackoffOptions {
  /** Delay before the first retry in milliseconds */
  initialDelay: number;
  maxDelay: number;
  /** Retries allowed after the first attempt */
  maxRetries: number;
}

export interface BackoffStep {
  /** Zero-based retry number */
  retry: number;
  delay: number;
  exhausted: boolean;
}

export interface Backoff {
  /** Delay before the next retry; advances the retry counter */
  next(): BackoffStep;
}

/**
 * Doubling delays from `initialDelay`, capped at `maxDelay`
 */
export function createBackoff({ initialDelay, maxDelay, maxRetries }: BackoffOptions): Backoff {
  let retry = 0;

  return {
    next: () => {
      const step: BackoffStep =
        retry >= maxRetries
          ? { retry, delay: 0, exhausted: true }
          : { retry, delay: Math.min(initialDelay * 2 ** retry, maxDelay), exhausted: false };
      retry++;
      return step;
    },
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
