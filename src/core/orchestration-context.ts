import { OrchestrationConfig, OrchestrationConfigInput, resolveOrchestrationConfig } from '../config/orchestration.config';
import { ConsoleLoggerAdapter } from '../adapters/console-logger.adapter';
import { LoggerAdapter, OrchestrationPlugin, SubmittedTask, TaskStatus } from '../types';
import { CircuitBreakerRegistry } from './circuit-breaker-registry';
import { ExecutionMetricsRegistry } from './execution-metrics-registry';
import { sleep } from './retry';

export interface OrchestrationContextOptions {
  config?: OrchestrationConfigInput;
  logger?: LoggerAdapter;
  plugins?: OrchestrationPlugin[];
  /** Per-node breaker thresholds; other nodes use `config.router.circuitBreakerThreshold`. */
  circuitBreakerThresholds?: Record<string, number>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Process-wide state shared by the task client and the aggregator: resolved
 * config, logger, plugins and the execution metrics and breaker registries.
 */
export class OrchestrationContext {
  readonly config: OrchestrationConfig;
  readonly logger: LoggerAdapter;
  readonly metrics: ExecutionMetricsRegistry;
  readonly circuitBreakers: CircuitBreakerRegistry;
  readonly sleep: (ms: number) => Promise<void>;

  private readonly plugins: OrchestrationPlugin[];
  private initPromise?: Promise<void>;
  private closed = false;

  constructor(options: OrchestrationContextOptions = {}) {
    this.config = resolveOrchestrationConfig(options.config);
    this.logger = options.logger ?? new ConsoleLoggerAdapter();
    this.plugins = [...(options.plugins ?? [])];
    this.metrics = new ExecutionMetricsRegistry();
    this.circuitBreakers = new CircuitBreakerRegistry(
      this.config.router.circuitBreakerThreshold,
      options.circuitBreakerThresholds
    );
    this.sleep = options.sleep ?? sleep;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getPlugins(): readonly OrchestrationPlugin[] {
    return this.plugins;
  }

  /**
   * Runs every plugin's onInit. Repeated calls share the first run.
   */
  init(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = this.callHook('onInit', plugin => plugin.onInit?.(this));
    }

    return this.initPromise;
  }

  async dispose(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    await this.callHook('onDispose', plugin => plugin.onDispose?.());
    this.logger.debug('Orchestration context disposed');
  }

  async notifyTaskSubmitted(task: SubmittedTask): Promise<void> {
    if (this.closed) {
      return;
    }

    await this.init();
    await this.callHook('onTaskSubmitted', plugin => plugin.onTaskSubmitted?.(task));
  }

  async notifyTaskSettled(status: TaskStatus): Promise<void> {
    if (this.closed) {
      return;
    }

    await this.init();
    await this.callHook('onTaskSettled', plugin => plugin.onTaskSettled?.(status));
  }

  private async callHook(
    hookName: keyof OrchestrationPlugin,
    invoke: (plugin: OrchestrationPlugin) => Promise<void> | void
  ): Promise<void> {
    for (const plugin of this.plugins) {
      try {
        await invoke(plugin);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Plugin ${plugin.name} failed in ${hookName}: ${message}`);
      }
    }
  }
}
