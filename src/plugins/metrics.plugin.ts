import { CircuitBreakerRegistry } from '../core/circuit-breaker-registry';
import { ExecutionMetricsRegistry } from '../core/execution-metrics-registry';
import type { OrchestrationContext } from '../core/orchestration-context';
import { OrchestrationPlugin, TaskState, TaskStatus } from '../types';

export interface MetricsPluginConfig {
  metrics?: ExecutionMetricsRegistry;
  circuitBreakers?: CircuitBreakerRegistry;
}

/**
 * Feeds settled tasks into execution metrics and circuit breakers, keyed by
 * tool. Without explicit registries it uses the context's.
 */
export class MetricsPlugin implements OrchestrationPlugin {
  name = 'MetricsPlugin';

  private metrics?: ExecutionMetricsRegistry;
  private circuitBreakers?: CircuitBreakerRegistry;

  constructor(config: MetricsPluginConfig = {}) {
    this.metrics = config.metrics;
    this.circuitBreakers = config.circuitBreakers;
  }

  onInit(context: OrchestrationContext): void {
    this.metrics = this.metrics ?? context.metrics;
    this.circuitBreakers = this.circuitBreakers ?? context.circuitBreakers;
  }

  onTaskSettled(status: TaskStatus): void {
    const node = status.tool;

    if (!node || status.state === TaskState.CANCELLED) {
      return;
    }

    if (status.state === TaskState.SUCCESS) {
      this.metrics?.recordSuccess(node, status.result?.durationSeconds);
      this.circuitBreakers?.recordSuccess(node);
      return;
    }

    if (status.state === TaskState.FAILURE || status.state === TaskState.TIMEOUT) {
      this.metrics?.recordFailure(node);
      this.circuitBreakers?.recordFailure(node);
    }
  }
}
