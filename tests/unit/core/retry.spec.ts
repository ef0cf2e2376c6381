import { calculateBackoffDelay, withRetry } from '../../../src/core/retry';
import { RetryExhaustedException } from '../../../src/types';
import { createTestLogger } from '../../helpers/test-context';

describe('calculateBackoffDelay', () => {
  it.each([
    [1, 100],
    [2, 200],
    [3, 400],
    [4, 800],
  ])('should double the delay on attempt %i', (attempt, expected) => {
    expect(calculateBackoffDelay(attempt, 'exponential', 100, 10000, 2)).toBe(expected);
  });

  it('should cap at maxDelay', () => {
    expect(calculateBackoffDelay(3, 'exponential', 100, 250, 2)).toBe(250);
  });

  it('should support linear and fixed strategies', () => {
    expect(calculateBackoffDelay(3, 'linear', 100, 10000)).toBe(300);
    expect(calculateBackoffDelay(3, 'fixed', 100, 10000)).toBe(100);
  });
});

describe('withRetry', () => {
  const config = { maxAttempts: 3, strategy: 'exponential' as const, initialDelay: 10, maxDelay: 1000, multiplier: 2 };

  it('should retry until the call succeeds', async () => {
    const waits: number[] = [];
    const logger = createTestLogger();
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) {
          throw new Error('connection reset');
        }
        return 'task-1';
      },
      {
        config,
        operation: 'Submitting openfoam/run.sh',
        logger,
        sleep: async ms => {
          waits.push(ms);
        },
      }
    );

    expect(result).toBe('task-1');
    expect(waits).toEqual([10, 20]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Submitting openfoam/run.sh failed on attempt 1/3: connection reset');
  });

  it('should throw RetryExhaustedException after the last attempt', async () => {
    const fn = jest.fn(async () => {
      throw new Error('broker unavailable');
    });

    const error = await withRetry(fn, { config, operation: 'submit', sleep: async () => undefined }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(RetryExhaustedException);
    expect(fn).toHaveBeenCalledTimes(3);
    if (error instanceof RetryExhaustedException) {
      expect(error.attempts).toBe(3);
      expect(error.originalError.message).toBe('broker unavailable');
      expect(error.operation).toBe('submit');
      expect(error.message).toBe('submit failed after 3 attempts: broker unavailable');
    }
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const fn = jest.fn(async () => {
      throw new TypeError('bad payload');
    });

    await expect(
      withRetry(fn, {
        config,
        operation: 'submit',
        sleep: async () => undefined,
        isRetryable: error => !(error instanceof TypeError),
      })
    ).rejects.toThrow(TypeError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
