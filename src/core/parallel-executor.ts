import { cpus } from 'os';
import PQueue from 'p-queue';
import {
  ConfigurationError,
  ExecuteMapOptions,
  ExecuteParallelOptions,
  LocalSweepOptions,
  LocalSweepResult,
  LocalTask,
  LoggerAdapter,
  ParallelExecutorOptions,
  ParamGrid,
  TaskParams,
  TaskResult,
} from '../types';
import type { OrchestrationContext } from './orchestration-context';
import { expandParamGrid, validateParamGrid } from './parameter-grid';

interface SlotOutcome<T> {
  value: T;
  startTime: number;
}

class SlotTimeoutError extends Error {
  constructor(
    timeoutMs: number,
    public readonly startTime: number
  ) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'SlotTimeoutError';
    Object.setPrototypeOf(this, SlotTimeoutError.prototype);
  }
}

/**
 * Bounded local pool for independent callables. Slots are async; a callable
 * that needs another core starts its own worker or child process.
 *
 * A slot stays taken until its callable settles, also after the caller has
 * been handed a timeout.
 */
export class ParallelExecutor {
  readonly maxWorkers: number;

  private readonly logger?: LoggerAdapter;
  private queue?: PQueue;

  constructor(options: ParallelExecutorOptions = {}) {
    this.maxWorkers = options.maxWorkers ?? Math.max(cpus().length, 1);
    this.logger = options.logger;

    if (!Number.isInteger(this.maxWorkers) || this.maxWorkers < 1) {
      throw new ConfigurationError(`maxWorkers must be a positive integer, got ${this.maxWorkers}`);
    }
  }

  /**
   * Pool sized by `config.maxWorkers` and logging through the context's logger.
   */
  static fromContext(context: OrchestrationContext, options: ParallelExecutorOptions = {}): ParallelExecutor {
    return new ParallelExecutor({ maxWorkers: context.config.maxWorkers, logger: context.logger, ...options });
  }

  /**
   * Starts a pool, hands it to `fn` and shuts it down afterwards, even when `fn` throws.
   */
  static async run<T>(options: ParallelExecutorOptions, fn: (executor: ParallelExecutor) => Promise<T>): Promise<T> {
    const executor = new ParallelExecutor(options);
    executor.start();

    try {
      return await fn(executor);
    } finally {
      await executor.shutdown();
    }
  }

  get isRunning(): boolean {
    return this.queue !== undefined;
  }

  start(): void {
    if (this.queue) {
      return;
    }

    this.queue = new PQueue({ concurrency: this.maxWorkers });
    this.logger?.debug(`Parallel executor started with ${this.maxWorkers} worker(s)`);
  }

  /**
   * Drops queued items and waits until every started callable has settled.
   */
  async shutdown(): Promise<void> {
    const queue = this.queue;

    if (!queue) {
      return;
    }

    this.queue = undefined;
    queue.clear();
    await queue.onIdle();
    this.logger?.debug('Parallel executor shut down');
  }

  /**
   * Runs every task and resolves with their results in completion order.
   * A task that throws or times out yields a failed result instead of rejecting.
   */
  async executeParallel<T>(tasks: LocalTask<T>[], options: ExecuteParallelOptions<T> = {}): Promise<TaskResult<T>[]> {
    const queue = this.requireQueue();
    const results: TaskResult<T>[] = [];

    await Promise.all(
      tasks.map(async task => {
        const result = await this.runTask(queue, task, options.timeoutMs);
        results.push(result);
        options.callback?.(result);
      })
    );

    return results;
  }

  /**
   * Applies `fn` to every item and resolves with the outputs in input order.
   * Rejects with the first failure.
   */
  async executeMap<I, R>(
    fn: (item: I, index: number) => R | Promise<R>,
    items: readonly I[],
    options: ExecuteMapOptions<R> = {}
  ): Promise<R[]> {
    const queue = this.requireQueue();

    return Promise.all(
      items.map(async (item, index) => {
        const { value } = await this.occupySlot(queue, () => fn(item, index), options.timeoutMs);
        options.callback?.(index, value);
        return value;
      })
    );
  }

  /**
   * Calls `fn` once per combination of the grid, on top of `baseParams`.
   * Results come back in combination order, each with its parameters.
   */
  async parameterSweep<R>(
    fn: (params: TaskParams) => R | Promise<R>,
    paramGrid: ParamGrid,
    options: LocalSweepOptions<R> = {}
  ): Promise<LocalSweepResult<R>[]> {
    validateParamGrid(paramGrid);

    const combinations = expandParamGrid(paramGrid, options.baseParams);
    const paramsById = new Map(
      combinations.map((params, index): [string, TaskParams] => [`sweep_${index}`, params])
    );
    const tasks: LocalTask<R>[] = [...paramsById].map(([id, params]) => ({ id, fn: () => fn(params) }));

    this.logger?.debug(`Running local parameter sweep with ${combinations.length} combination(s)`);

    const completed = await this.executeParallel(tasks, {
      timeoutMs: options.timeoutMs,
      callback: result => options.callback?.(paramsById.get(result.taskId) ?? {}, result),
    });
    const byId = new Map(completed.map((result): [string, TaskResult<R>] => [result.taskId, result]));

    const results: LocalSweepResult<R>[] = [];

    for (const [id, params] of paramsById) {
      const result = byId.get(id);

      if (result) {
        results.push({ ...result, params });
      }
    }

    const successful = results.filter(result => result.status === 'success').length;
    this.logger?.debug(`Local parameter sweep complete: ${successful}/${results.length} successful`);

    return results;
  }

  private async runTask<T>(queue: PQueue, task: LocalTask<T>, timeoutMs?: number): Promise<TaskResult<T>> {
    try {
      const { value, startTime } = await this.occupySlot(queue, task.fn, timeoutMs);
      const endTime = Date.now();

      this.logger?.debug(`Local task ${task.id} completed in ${endTime - startTime}ms`);

      return { status: 'success', taskId: task.id, result: value, startTime, endTime, duration: endTime - startTime };
    } catch (error) {
      const endTime = Date.now();
      const startTime = error instanceof SlotTimeoutError ? error.startTime : endTime;
      const message = error instanceof Error ? error.message : String(error);

      this.logger?.debug(`Local task ${task.id} failed: ${message}`);

      return { status: 'failed', taskId: task.id, error: message, startTime, endTime, duration: endTime - startTime };
    }
  }

  /**
   * Runs `fn` in a pool slot. With `timeoutMs`, the returned promise rejects
   * once the deadline passes, while the slot is only released when `fn` settles.
   */
  private occupySlot<T>(queue: PQueue, fn: () => T | Promise<T>, timeoutMs?: number): Promise<SlotOutcome<T>> {
    return new Promise<SlotOutcome<T>>((resolve, reject) => {
      queue
        .add(async () => {
          const startTime = Date.now();
          const timer =
            timeoutMs === undefined
              ? undefined
              : setTimeout(() => reject(new SlotTimeoutError(timeoutMs, startTime)), timeoutMs);

          try {
            resolve({ value: await fn(), startTime });
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)));
          } finally {
            clearTimeout(timer);
          }
        })
        .catch(reject);
    });
  }

  private requireQueue(): PQueue {
    if (!this.queue) {
      throw new Error('Executor not initialized. Call start() or use ParallelExecutor.run()');
    }

    return this.queue;
  }
}
