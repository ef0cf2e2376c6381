import { LoggerAdapter, RetryConfig, RetryExhaustedException, BackoffStrategy } from '../types';

/**
 * Calculate backoff delay based on retry strategy
 */
export function calculateBackoffDelay(
  attempt: number,
  strategy: BackoffStrategy,
  initialDelay: number,
  maxDelay: number,
  multiplier?: number
): number {
  let delay: number;

  switch (strategy) {
    case 'fixed':
      delay = initialDelay;
      break;
    case 'linear':
      delay = initialDelay * attempt;
      break;
    case 'exponential':
      delay = initialDelay * Math.pow(multiplier || 2, attempt - 1);
      break;
    default:
      delay = initialDelay;
  }

  return Math.min(delay, maxDelay);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  config: RetryConfig;
  operation: string;
  logger?: LoggerAdapter;
  sleep?: (ms: number) => Promise<void>;
  /** Errors for which this returns false are rethrown immediately. */
  isRetryable?: (error: Error) => boolean;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { config, operation, logger } = options;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(config.maxAttempts, 1);

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await fn();

      if (attempt > 1) {
        logger?.debug(`${operation} succeeded on attempt ${attempt}/${maxAttempts}`);
      }

      return result;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (options.isRetryable && !options.isRetryable(lastError)) {
        throw lastError;
      }

      logger?.warn(`${operation} failed on attempt ${attempt}/${maxAttempts}: ${lastError.message}`);

      if (attempt === maxAttempts) {
        throw new RetryExhaustedException(operation, lastError, maxAttempts, config);
      }

      const delay = calculateBackoffDelay(
        attempt,
        config.strategy || 'exponential',
        config.initialDelay ?? 1000,
        config.maxDelay ?? 10000,
        config.multiplier
      );

      logger?.debug(`Waiting ${delay}ms before retry attempt ${attempt + 1}`);

      await wait(delay);
    }
  }

  throw lastError || new Error('Unexpected retry loop termination');
}
