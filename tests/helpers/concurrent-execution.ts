export type ConcurrentOutcome<T> =
  | { index: number; status: 'fulfilled'; value: T }
  | { index: number; status: 'rejected'; reason: Error };

/**
 * Starts `count` callers in the same tick and collects how each one settled.
 */
export async function executeConcurrently<T>(
  count: number,
  fn: (index: number) => Promise<T>
): Promise<ConcurrentOutcome<T>[]> {
  return Promise.all(
    Array.from({ length: count }, async (_, index): Promise<ConcurrentOutcome<T>> => {
      try {
        return { index, status: 'fulfilled', value: await fn(index) };
      } catch (error) {
        return { index, status: 'rejected', reason: error instanceof Error ? error : new Error(String(error)) };
      }
    })
  );
}

export function fulfilledValues<T>(outcomes: ConcurrentOutcome<T>[]): T[] {
  const values: T[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      values.push(outcome.value);
    }
  }

  return values;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
