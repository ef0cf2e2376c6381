import { RetryConfig } from './retry.types';

/**
 * A queue transport call that kept failing until its attempts ran out.
 */
export class RetryExhaustedException extends Error {
  constructor(
    public readonly operation: string,
    public readonly originalError: Error,
    public readonly attempts: number,
    public readonly retryConfig: RetryConfig
  ) {
    super(`${operation} failed after ${attempts} attempts: ${originalError.message}`);
    this.name = 'RetryExhaustedException';
    Object.setPrototypeOf(this, RetryExhaustedException.prototype);

    this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
  }
}
