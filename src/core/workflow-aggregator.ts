import {
  CancellationFailure,
  CancelWorkflowOptions,
  CancelWorkflowResult,
  ConfigurationError,
  ParallelExecutionStats,
  ParamGrid,
  ParameterSweepOptions,
  SubmissionError,
  SubmitBatchOptions,
  SubmitWorkflowOptions,
  TaskSpec,
  TaskState,
  TaskStatus,
  TaskTimeoutError,
  WaitForAnyOptions,
  WaitForAnyResult,
  WaitForWorkflowOptions,
  WorkflowStatusView,
  WorkflowTaskInput,
} from '../types';
import { OrchestrationContext } from './orchestration-context';
import { expandParamGrid, validateParamGrid } from './parameter-grid';
import { TaskClient, validateTaskSpec } from './task-client';

/**
 * Multi-task operations built on top of TaskClient.
 */
export class WorkflowAggregator {
  constructor(
    private readonly client: TaskClient,
    private readonly context: OrchestrationContext
  ) {}

  /**
   * Submits every task. In sequential mode each task is awaited before the
   * next is submitted; a task that fails or times out is logged and skipped.
   */
  async submitWorkflow(tasks: WorkflowTaskInput[], options: SubmitWorkflowOptions = {}): Promise<string[]> {
    const specs = tasks.map(task => validateTaskSpec(task));
    const sequential = options.sequential ?? true;
    const taskIds: string[] = [];

    for (const spec of specs) {
      const taskId = await this.submit(spec);
      taskIds.push(taskId);

      if (sequential && specs.length > 1) {
        try {
          await this.client.waitForTask(taskId, options.taskTimeoutMs);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.context.logger.warn(`Workflow task ${taskId} did not succeed, continuing: ${message}`);
        }
      }
    }

    this.context.logger.debug(`Submitted workflow of ${taskIds.length} task(s)`, { sequential });

    return taskIds;
  }

  async getWorkflowStatus(taskIds: string[]): Promise<WorkflowStatusView> {
    const tasks: Record<string, TaskStatus> = {};
    let completed = 0;
    let failed = 0;
    let running = 0;
    let pending = 0;

    for (const taskId of taskIds) {
      const status = await this.client.getTaskStatus(taskId);
      tasks[taskId] = status;

      if (status.ready) {
        if (status.successful) {
          completed++;
        } else {
          failed++;
        }
      } else if (status.state === TaskState.RUNNING) {
        running++;
      } else {
        pending++;
      }
    }

    return {
      total: taskIds.length,
      completed,
      failed,
      running,
      pending,
      allComplete: completed + failed === taskIds.length,
      tasks,
    };
  }

  /**
   * Polls until every task is ready. Failed tasks count as complete.
   */
  async waitForWorkflow(taskIds: string[], options: WaitForWorkflowOptions = {}): Promise<WorkflowStatusView> {
    const timeoutMs = options.timeoutMs ?? this.context.config.defaultTimeoutMs;
    const interval = options.pollIntervalMs ?? this.context.config.pollIntervalMs;
    const startTime = Date.now();

    for (;;) {
      const view = await this.getWorkflowStatus(taskIds);

      if (options.callback) {
        await options.callback(view);
      }

      if (view.allComplete) {
        return view;
      }

      const elapsed = Date.now() - startTime;

      if (timeoutMs !== undefined && elapsed >= timeoutMs) {
        throw new TaskTimeoutError(
          `Workflow did not complete within ${timeoutMs}ms (${view.completed + view.failed}/${view.total} done)`,
          timeoutMs,
          elapsed
        );
      }

      await this.context.sleep(timeoutMs === undefined ? interval : Math.min(interval, timeoutMs - elapsed));
    }
  }

  async submitBatchWorkflow(tasks: WorkflowTaskInput[], options: SubmitBatchOptions = {}): Promise<string[]> {
    const batchSize = options.batchSize ?? this.context.config.batchSize;

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const specs = tasks.map(task => validateTaskSpec(task));
    const taskIds: string[] = [];

    for (let offset = 0; offset < specs.length; offset += batchSize) {
      const batch = specs.slice(offset, offset + batchSize);

      for (const spec of batch) {
        taskIds.push(await this.submit(spec));
      }

      const batchNum = offset / batchSize + 1;
      this.context.logger.debug(`Submitted batch ${batchNum} (${taskIds.length}/${specs.length})`);

      options.callback?.({ batchNum, batchSize: batch.length, submitted: taskIds.length, total: specs.length });
    }

    return taskIds;
  }

  /**
   * Submits one task per combination of the grid, on top of `baseParams`.
   */
  async parameterSweep(
    tool: string,
    script: string,
    paramGrid: ParamGrid,
    options: ParameterSweepOptions = {}
  ): Promise<string[]> {
    const spec = validateTaskSpec({ tool, script, params: options.baseParams });
    validateParamGrid(paramGrid);

    const combinations = expandParamGrid(paramGrid, spec.params);
    const taskIds: string[] = [];

    this.context.logger.debug(`Starting parameter sweep of ${combinations.length} combination(s) for ${tool}`);

    for (const [index, params] of combinations.entries()) {
      const taskId = await this.submit({ tool: spec.tool, script: spec.script, params });
      taskIds.push(taskId);

      options.callback?.({ index, params, taskId, submitted: taskIds.length, total: combinations.length });
    }

    return taskIds;
  }

  /**
   * Resolves with the first task found ready. With `claim`, a ready task only
   * wins if this caller acquires its lock.
   */
  async waitForAny(taskIds: string[], options: WaitForAnyOptions = {}): Promise<WaitForAnyResult> {
    if (taskIds.length === 0) {
      throw new SubmissionError('waitForAny requires at least one task id', 'taskIds');
    }

    const timeoutMs = options.timeoutMs ?? this.context.config.defaultTimeoutMs;
    const interval = options.pollIntervalMs ?? this.context.config.pollIntervalMs;
    const claim = options.claim;
    const startTime = Date.now();

    for (;;) {
      for (const taskId of taskIds) {
        const status = await this.client.getTaskStatus(taskId);

        if (!status.ready) {
          continue;
        }

        if (claim && !(await claim.lock.acquire(`workflow:any:${taskId}`, claim.owner, claim.ttlMs))) {
          continue;
        }

        return { taskId, status };
      }

      const elapsed = Date.now() - startTime;

      if (timeoutMs !== undefined && elapsed >= timeoutMs) {
        throw new TaskTimeoutError(`No task completed within ${timeoutMs}ms`, timeoutMs, elapsed);
      }

      await this.context.sleep(timeoutMs === undefined ? interval : Math.min(interval, timeoutMs - elapsed));
    }
  }

  async getParallelExecutionStats(taskIds: string[]): Promise<ParallelExecutionStats> {
    const view = await this.getWorkflowStatus(taskIds);
    const durations: number[] = [];

    for (const taskId of taskIds) {
      const status = view.tasks[taskId];
      const duration = status.result?.durationSeconds;

      if (status.ready && status.successful && typeof duration === 'number') {
        durations.push(duration);
      }
    }

    const totalDuration = durations.reduce((sum, duration) => sum + duration, 0);
    const maxDuration = durations.length > 0 ? Math.max(...durations) : 0;
    const avgDuration = durations.length > 0 ? totalDuration / durations.length : 0;
    const speedup = maxDuration > 0 ? totalDuration / maxDuration : 1;

    return {
      total: view.total,
      completed: view.completed,
      failed: view.failed,
      running: view.running,
      pending: view.pending,
      totalDuration,
      avgDuration,
      maxDuration,
      speedup,
      efficiency: view.completed > 0 ? speedup / view.completed : 0,
    };
  }

  async cancelWorkflow(taskIds: string[], options: CancelWorkflowOptions = {}): Promise<CancelWorkflowResult> {
    const cancelled: string[] = [];
    const rejected: string[] = [];

    for (const taskId of taskIds) {
      if (await this.client.cancelTask(taskId)) {
        cancelled.push(taskId);
      } else {
        rejected.push(taskId);
      }
    }

    this.context.logger.log(`Cancelled ${cancelled.length}/${taskIds.length} workflow task(s)`);

    if (options.failOnReject && rejected.length > 0) {
      throw new CancellationFailure(rejected);
    }

    return { cancelled, rejected };
  }

  private submit(spec: TaskSpec): Promise<string> {
    return this.client.submitTask(spec.tool, spec.script, spec.params);
  }
}
