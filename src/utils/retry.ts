import { logger } from './logger.js';
import { classifyError, ErrorCategory, errorMessage } from './errors.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Default retry options
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

/**
 * Calculate backoff delay with jitter. `attempt` is zero-based.
 */
export function calculateDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier' | 'jitter'>
): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const clampedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitterAmount = clampedDelay * options.jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(clampedDelay + jitterAmount));
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is retryable (default implementation)
 */
export function isRetryableError(error: unknown): boolean {
  return classifyError(error) === ErrorCategory.TRANSIENT;
}

/**
 * Execute a function with retry logic
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const log = logger('Retry');

  let lastError: unknown;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      // Check if we should retry
      const shouldRetry = opts.retryOn ? opts.retryOn(error) : isRetryableError(error);

      if (!shouldRetry || attempt === opts.maxAttempts - 1) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);

      // Call onRetry callback if provided
      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error, delayMs);
      } else {
        log.warn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms`, {
          error: errorMessage(error),
        });
      }

      await sleep(delayMs);
    }
  }

  // This should never be reached, but TypeScript needs it
  throw lastError;
}
