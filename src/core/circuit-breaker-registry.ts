import { CircuitBreakerState, ConfigurationError, WorkflowRoutingState } from '../types';

export function nextCircuitBreakerState(previous: CircuitBreakerState, success: boolean): CircuitBreakerState {
  if (success) {
    return { open: false, failureCount: 0, threshold: previous.threshold };
  }

  const failureCount = previous.failureCount + 1;

  return { open: failureCount >= previous.threshold, failureCount, threshold: previous.threshold };
}

export function assertValidThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 1) {
    throw new ConfigurationError(`Circuit breaker threshold must be a positive integer, got ${threshold}`);
  }
}

export class CircuitBreakerRegistry {
  private states: Map<string, CircuitBreakerState> = new Map();

  constructor(
    private readonly defaultThreshold: number = 5,
    private readonly thresholds: Record<string, number> = {}
  ) {
    assertValidThreshold(defaultThreshold);

    for (const threshold of Object.values(thresholds)) {
      assertValidThreshold(threshold);
    }
  }

  recordSuccess(node: string): CircuitBreakerState {
    return this.update(node, true);
  }

  recordFailure(node: string): CircuitBreakerState {
    return this.update(node, false);
  }

  get(node: string): CircuitBreakerState {
    return Object.freeze({ ...(this.states.get(node) ?? this.closedState(node)) });
  }

  isOpen(node: string): boolean {
    return this.states.get(node)?.open ?? false;
  }

  /**
   * Returns a copy of `state` carrying this node's breaker fields.
   */
  applyTo<TState extends WorkflowRoutingState>(state: TState, node: string): TState {
    const breaker = this.get(node);

    return {
      ...state,
      circuitBreakerOpen: breaker.open,
      circuitBreakerFailures: breaker.failureCount,
      circuitBreakerThreshold: breaker.threshold,
    };
  }

  reset(node?: string): void {
    if (node === undefined) {
      this.states.clear();
      return;
    }

    this.states.delete(node);
  }

  private update(node: string, success: boolean): CircuitBreakerState {
    const previous = this.states.get(node) ?? this.closedState(node);
    const next = nextCircuitBreakerState(previous, success);

    this.states.set(node, next);

    return Object.freeze({ ...next });
  }

  private closedState(node: string): CircuitBreakerState {
    return { open: false, failureCount: 0, threshold: this.thresholds[node] ?? this.defaultThreshold };
  }
}
