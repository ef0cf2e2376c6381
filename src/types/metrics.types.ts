export interface ExecutionMetrics {
  executionCount: number;
  failureCount: number;
  /** Running mean over successful executions that reported a duration, in seconds. */
  avgExecutionTime: number;
  /** Percentage in [0, 100]; 100 when nothing has executed yet. */
  successRate: number;
  lastExecutionTime: Date | null;
}

export interface CircuitBreakerState {
  open: boolean;
  failureCount: number;
  threshold: number;
}
