import { ExecutionMetrics } from '../types';

function createEmptyMetrics(): ExecutionMetrics {
  return {
    executionCount: 0,
    failureCount: 0,
    avgExecutionTime: 0,
    successRate: 100,
    lastExecutionTime: null,
  };
}

function successRateOf(executionCount: number, failureCount: number): number {
  if (executionCount === 0) {
    return 100;
  }

  return ((executionCount - failureCount) / executionCount) * 100;
}

/**
 * Per-node running statistics used by adaptive routing.
 *
 * Every update is one synchronous read-modify-write, so updates for the same
 * node never interleave on the event loop.
 */
export class ExecutionMetricsRegistry {
  private metrics: Map<string, ExecutionMetrics> = new Map();
  // Successes that reported a duration; the mean is taken over these.
  private timedSuccesses: Map<string, number> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Without `executionTimeSeconds` the success is counted but the mean is left as is.
   */
  recordSuccess(node: string, executionTimeSeconds?: number): ExecutionMetrics {
    const current = this.metrics.get(node) ?? createEmptyMetrics();
    const timed = this.timedSuccesses.get(node) ?? 0;
    const executionCount = current.executionCount + 1;

    let avgExecutionTime = current.avgExecutionTime;

    if (executionTimeSeconds !== undefined) {
      avgExecutionTime = (current.avgExecutionTime * timed + executionTimeSeconds) / (timed + 1);
      this.timedSuccesses.set(node, timed + 1);
    }

    const updated: ExecutionMetrics = {
      executionCount,
      failureCount: current.failureCount,
      avgExecutionTime,
      successRate: successRateOf(executionCount, current.failureCount),
      lastExecutionTime: this.now(),
    };

    this.metrics.set(node, updated);

    return this.copy(updated);
  }

  recordFailure(node: string): ExecutionMetrics {
    const current = this.metrics.get(node) ?? createEmptyMetrics();
    const executionCount = current.executionCount + 1;
    const failureCount = current.failureCount + 1;

    const updated: ExecutionMetrics = {
      executionCount,
      failureCount,
      avgExecutionTime: current.avgExecutionTime,
      successRate: successRateOf(executionCount, failureCount),
      lastExecutionTime: this.now(),
    };

    this.metrics.set(node, updated);

    return this.copy(updated);
  }

  /**
   * Runs `fn`, recording its wall time on success or a failure on rejection.
   */
  async track<T>(node: string, fn: () => Promise<T> | T): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await fn();
      this.recordSuccess(node, (Date.now() - startTime) / 1000);
      return result;
    } catch (error) {
      this.recordFailure(node);
      throw error;
    }
  }

  get(node: string): ExecutionMetrics | undefined {
    const metrics = this.metrics.get(node);

    return metrics ? this.copy(metrics) : undefined;
  }

  has(node: string): boolean {
    return this.metrics.has(node);
  }

  snapshot(): Record<string, ExecutionMetrics> {
    const result: Record<string, ExecutionMetrics> = {};

    for (const [node, metrics] of this.metrics.entries()) {
      result[node] = this.copy(metrics);
    }

    return result;
  }

  reset(node?: string): void {
    if (node === undefined) {
      this.metrics.clear();
      this.timedSuccesses.clear();
      return;
    }

    this.metrics.delete(node);
    this.timedSuccesses.delete(node);
  }

  private copy(metrics: ExecutionMetrics): ExecutionMetrics {
    return Object.freeze({ ...metrics });
  }
}
