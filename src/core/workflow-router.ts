import {
  CircuitBreakerUpdate,
  ConfigurationError,
  ContextRoutingRule,
  ErrorSeverity,
  LoggerAdapter,
  NodeId,
  NodeStatus,
  PerformanceMetric,
  ReadonlyRoutingState,
  RoutingDecision,
  RoutingStrategy,
  TERMINAL,
  WorkflowRouterConfig,
} from '../types';
import { assertValidThreshold, nextCircuitBreakerState } from './circuit-breaker-registry';

interface DecisionInput {
  nextNode: NodeId;
  strategy: RoutingStrategy;
  reason: string;
  metadata?: Record<string, unknown>;
  fallbackNodes?: NodeId[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Copies arrays and plain objects before freezing them so the caller's state stays untouched.
 */
function freezeCopy(value: unknown): unknown {
  if (Array.isArray(value)) {
    return Object.freeze(value.map(item => freezeCopy(item)));
  }

  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};

    for (const [key, nested] of Object.entries(value)) {
      copy[key] = freezeCopy(nested);
    }

    return Object.freeze(copy);
  }

  return value;
}

/**
 * Decides which node runs next. Every method reads the state it is given and
 * returns frozen decisions; nothing here mutates caller-owned data.
 */
export class WorkflowRouter {
  private readonly maxRetries: number;
  private readonly circuitBreakerThreshold: number;
  private readonly backoffMultiplier: number;
  private readonly recordHistory: boolean;
  private readonly logger?: LoggerAdapter;

  private history: RoutingDecision[] = [];

  constructor(config: WorkflowRouterConfig = {}) {
    this.maxRetries = config.maxRetries ?? 3;
    this.circuitBreakerThreshold = config.circuitBreakerThreshold ?? 5;
    this.backoffMultiplier = config.backoffMultiplier ?? 2.0;
    this.recordHistory = config.recordHistory ?? true;
    this.logger = config.logger;

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new ConfigurationError(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
    }

    assertValidThreshold(this.circuitBreakerThreshold);

    if (!Number.isFinite(this.backoffMultiplier) || this.backoffMultiplier < 1) {
      throw new ConfigurationError(`backoffMultiplier must be a finite number >= 1, got ${this.backoffMultiplier}`);
    }
  }

  routeAfterExecution(
    state: ReadonlyRoutingState,
    currentNode: NodeId,
    successNode: NodeId,
    errorNode: NodeId,
    retryNode?: NodeId
  ): RoutingDecision {
    const status = state.nodeStatus[currentNode];
    const errors = state.errors ?? [];

    if (state.errorSeverity === ErrorSeverity.CRITICAL) {
      return this.decide({
        nextNode: TERMINAL,
        strategy: RoutingStrategy.ERROR_FALLBACK,
        reason: `Critical error in ${currentNode}, terminating workflow`,
        metadata: { errors },
      });
    }

    if (state.circuitBreakerOpen) {
      return this.decide({
        nextNode: errorNode,
        strategy: RoutingStrategy.CIRCUIT_BREAKER,
        reason: `Circuit breaker open for ${currentNode}`,
        metadata: { circuitBreakerState: 'open' },
        fallbackNodes: [TERMINAL],
      });
    }

    if (status === NodeStatus.COMPLETED) {
      return this.decide({
        nextNode: successNode,
        strategy: RoutingStrategy.SUCCESS_PATH,
        reason: `Node ${currentNode} completed successfully`,
        metadata: { executionStatus: 'success' },
      });
    }

    if (status === NodeStatus.FAILED) {
      const retryCount = state.retryCount ?? 0;
      const maxRetries = state.maxRetries ?? this.maxRetries;

      if (retryNode !== undefined && retryCount < maxRetries) {
        const multiplier = state.backoffMultiplier ?? this.backoffMultiplier;

        return this.decide({
          nextNode: retryNode,
          strategy: RoutingStrategy.RETRY_WITH_BACKOFF,
          reason: `Retrying ${currentNode} (attempt ${retryCount + 1}/${maxRetries})`,
          metadata: {
            retryCount: retryCount + 1,
            backoffSeconds: Math.pow(multiplier, retryCount),
            errors,
          },
          fallbackNodes: [errorNode, TERMINAL],
        });
      }

      return this.decide({
        nextNode: errorNode,
        strategy: RoutingStrategy.ERROR_FALLBACK,
        reason: `Max retries exceeded for ${currentNode}`,
        metadata: { retryCount, errors },
      });
    }

    if (status === NodeStatus.TIMEOUT) {
      return this.decide({
        nextNode: errorNode,
        strategy: RoutingStrategy.ERROR_FALLBACK,
        reason: `Timeout in ${currentNode}`,
        metadata: { errorType: 'timeout' },
      });
    }

    return this.decide({
      nextNode: successNode,
      strategy: RoutingStrategy.SUCCESS_PATH,
      reason: `Default routing for ${currentNode}`,
      metadata: { note: 'Status unclear, proceeding with success path' },
    });
  }

  /**
   * Branches on one field of a node's output. Strings, numbers and booleans
   * are matched by their string form.
   */
  routeByOutputValue(
    state: ReadonlyRoutingState,
    currentNode: NodeId,
    outputKey: string,
    routingMap: Readonly<Record<string, NodeId>>,
    defaultNode: NodeId
  ): RoutingDecision {
    const outputValue = state.nodeResults[currentNode]?.[outputKey];

    let nextNode = defaultNode;

    if (typeof outputValue === 'string' || typeof outputValue === 'number' || typeof outputValue === 'boolean') {
      const key = String(outputValue);

      if (Object.prototype.hasOwnProperty.call(routingMap, key)) {
        nextNode = routingMap[key];
      }
    }

    return this.decide({
      nextNode,
      strategy: RoutingStrategy.CONDITIONAL_BRANCH,
      reason: `Routing based on ${outputKey}=${String(outputValue)}`,
      metadata: { outputKey, outputValue, routingMap },
    });
  }

  routeByContext(
    state: ReadonlyRoutingState,
    contextKey: string,
    rules: readonly ContextRoutingRule[],
    defaultNode: NodeId
  ): RoutingDecision {
    const contextValue = state.workflowContext?.[contextKey];

    for (const [ruleIndex, rule] of rules.entries()) {
      if (rule.condition(contextValue)) {
        return this.decide({
          nextNode: rule.node,
          strategy: RoutingStrategy.CONDITIONAL_BRANCH,
          reason: rule.reason ?? `Context rule matched: ${contextKey}`,
          metadata: { contextKey, contextValue, ruleIndex },
        });
      }
    }

    return this.decide({
      nextNode: defaultNode,
      strategy: RoutingStrategy.CONDITIONAL_BRANCH,
      reason: `No context rules matched for ${contextKey}, using default`,
      metadata: { contextKey, contextValue },
    });
  }

  /**
   * One decision per branch. Joining the branches is left to the orchestrator.
   */
  routeParallelSplit(
    _state: ReadonlyRoutingState,
    parallelNodes: readonly NodeId[],
    joinNode: NodeId
  ): RoutingDecision[] {
    return parallelNodes.map(node =>
      this.decide({
        nextNode: node,
        strategy: RoutingStrategy.PARALLEL_BRANCH,
        reason: `Parallel execution of ${node}`,
        metadata: { parallelGroup: parallelNodes, joinNode, branchNode: node },
      })
    );
  }

  routeByResourceAvailability(
    state: ReadonlyRoutingState,
    intensiveNode: NodeId,
    lightweightNode: NodeId,
    resourceType: string,
    threshold: number
  ): RoutingDecision {
    const limit = state.resourceLimits?.[resourceType] ?? 100;
    const usage = state.currentResourceUsage?.[resourceType] ?? 0;
    const available = limit - usage;
    const metadata = { resourceType, available, threshold };

    if (available >= threshold) {
      return this.decide({
        nextNode: intensiveNode,
        strategy: RoutingStrategy.ADAPTIVE_SELECTION,
        reason: `Sufficient ${resourceType} available for intensive path`,
        metadata,
      });
    }

    return this.decide({
      nextNode: lightweightNode,
      strategy: RoutingStrategy.ADAPTIVE_SELECTION,
      reason: `Insufficient ${resourceType}, using lightweight path`,
      metadata,
    });
  }

  /**
   * Picks the option with the highest success rate or the lowest mean
   * execution time. Options without metrics are skipped.
   */
  routeByPerformanceMetrics(
    state: ReadonlyRoutingState,
    nodeOptions: readonly NodeId[],
    metric: PerformanceMetric = 'successRate'
  ): RoutingDecision {
    if (nodeOptions.length === 0) {
      throw new ConfigurationError('routeByPerformanceMetrics requires at least one node option');
    }

    const executionMetrics = state.executionMetrics ?? {};

    let bestNode: NodeId | undefined;
    let bestValue: number | undefined;

    for (const node of nodeOptions) {
      const metrics = executionMetrics[node];

      if (!metrics) {
        continue;
      }

      const value = metrics[metric];
      const better =
        bestValue === undefined || (metric === 'successRate' ? value > bestValue : value < bestValue);

      if (better) {
        bestNode = node;
        bestValue = value;
      }
    }

    const nextNode = bestNode ?? nodeOptions[0];

    return this.decide({
      nextNode,
      strategy: RoutingStrategy.ADAPTIVE_SELECTION,
      reason: `Selected ${nextNode} based on ${metric}=${bestValue ?? 'N/A'}`,
      metadata: { metric, value: bestValue ?? null, nodeOptions },
    });
  }

  /**
   * Returns the breaker fields for the next state; spread them into it.
   */
  updateCircuitBreaker(state: ReadonlyRoutingState, node: NodeId, success: boolean): CircuitBreakerUpdate {
    const next = nextCircuitBreakerState(
      {
        open: state.circuitBreakerOpen ?? false,
        failureCount: state.circuitBreakerFailures ?? 0,
        threshold: state.circuitBreakerThreshold ?? this.circuitBreakerThreshold,
      },
      success
    );

    if (next.open && !state.circuitBreakerOpen) {
      this.logger?.warn(`Circuit breaker opened for ${node} after ${next.failureCount} failures`);
    }

    return { circuitBreakerOpen: next.open, circuitBreakerFailures: next.failureCount };
  }

  getRoutingHistory(): RoutingDecision[] {
    return [...this.history];
  }

  clearRoutingHistory(): void {
    this.history = [];
  }

  private decide(input: DecisionInput): RoutingDecision {
    const metadata: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(input.metadata ?? {})) {
      metadata[key] = freezeCopy(value);
    }

    const decision: RoutingDecision = Object.freeze({
      nextNode: input.nextNode,
      strategy: input.strategy,
      reason: input.reason,
      metadata: Object.freeze(metadata),
      fallbackNodes: Object.freeze([...(input.fallbackNodes ?? [])]),
    });

    if (this.recordHistory) {
      this.history.push(decision);
    }

    this.logger?.debug(`Routing to ${decision.nextNode} (${decision.strategy}): ${decision.reason}`);

    return decision;
  }
}
