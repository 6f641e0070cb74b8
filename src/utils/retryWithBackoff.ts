import { logger } from '@/services/logger';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  /** Fraction of the delay added as random jitter (0 disables). */
  jitter?: number;
  exponentialBase?: number;
  /** Only errors for which this returns true are retried. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

export function backoffDelay(attempt: number, options: Required<Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'jitter' | 'exponentialBase'>>, random: () => number = Math.random): number {
  const exponentialDelay = options.initialDelay * Math.pow(options.exponentialBase, attempt);
  const jitterAmount = options.jitter > 0 ? random() * options.jitter * exponentialDelay : 0;
  return Math.min(exponentialDelay + jitterAmount, options.maxDelay);
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 100,
    maxDelay = 5000,
    jitter = 0.2,
    exponentialBase = 2,
    shouldRetry = () => true,
    label = 'operation',
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, { initialDelay, maxDelay, jitter, exponentialBase });
      logger.warn('retry:attempt', {
        label,
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
