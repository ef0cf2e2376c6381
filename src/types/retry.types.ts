export type BackoffStrategy = 'fixed' | 'exponential' | 'linear';

export interface RetryConfig {
  maxAttempts: number;
  strategy?: BackoffStrategy;
  initialDelay?: number;
  maxDelay?: number;
  multiplier?: number;
}
