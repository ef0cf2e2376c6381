import { LoggerAdapter } from './adapter.types';
import { ExecutionMetrics } from './metrics.types';

/**
 * Node id that ends the workflow.
 */
export const TERMINAL = '__terminal__';

export type NodeId = string;

export enum NodeStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  TIMEOUT = 'timeout',
  SKIPPED = 'skipped',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum RoutingStrategy {
  SUCCESS_PATH = 'success_path',
  ERROR_FALLBACK = 'error_fallback',
  RETRY_WITH_BACKOFF = 'retry_with_backoff',
  PARALLEL_BRANCH = 'parallel_branch',
  ADAPTIVE_SELECTION = 'adaptive_selection',
  CIRCUIT_BREAKER = 'circuit_breaker',
  CONDITIONAL_BRANCH = 'conditional_branch',
}

export interface RoutingError {
  message: string;
  node?: NodeId;
  [key: string]: unknown;
}

/**
 * Immutable output of every routing call.
 */
export interface RoutingDecision {
  readonly nextNode: NodeId;
  readonly strategy: RoutingStrategy;
  readonly reason: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly fallbackNodes: readonly NodeId[];
}

/**
 * Context handed to the router by the orchestrator. The router only reads it.
 */
export interface WorkflowRoutingState {
  nodeStatus: Record<NodeId, NodeStatus>;
  nodeResults: Record<NodeId, Record<string, unknown>>;

  errors?: RoutingError[];
  errorSeverity?: ErrorSeverity;

  executionMetrics?: Record<NodeId, ExecutionMetrics>;

  retryCount?: number;
  maxRetries?: number;
  backoffMultiplier?: number;

  circuitBreakerOpen?: boolean;
  circuitBreakerFailures?: number;
  circuitBreakerThreshold?: number;

  workflowContext?: Record<string, unknown>;

  resourceLimits?: Record<string, number>;
  currentResourceUsage?: Record<string, number>;
}

export type ReadonlyRoutingState = Readonly<WorkflowRoutingState>;

export interface ContextRoutingRule {
  condition: (value: unknown) => boolean;
  node: NodeId;
  reason?: string;
}

export type PerformanceMetric = 'successRate' | 'avgExecutionTime';

export interface CircuitBreakerUpdate {
  circuitBreakerOpen: boolean;
  circuitBreakerFailures: number;
}

export interface WorkflowRouterConfig {
  maxRetries?: number;
  circuitBreakerThreshold?: number;
  backoffMultiplier?: number;
  recordHistory?: boolean;
  logger?: LoggerAdapter;
}
