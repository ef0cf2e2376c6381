import {
  err,
  ok,
  QueueAdapter,
  RemoteExecutionFailure,
  Result,
  SimulationOutput,
  SubmissionError,
  TaskParams,
  TaskSpec,
  TaskState,
  TaskStatus,
  TaskStatusCallback,
  TaskTimeoutError,
  WorkflowTaskInput,
} from '../types';
import { OrchestrationContext } from './orchestration-context';
import { withRetry } from './retry';
import { isTerminalState, normalizeTaskState } from './task-state';

function requireNonEmpty(value: unknown, field: 'tool' | 'script'): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new SubmissionError(`Task ${field} must be a non-empty string`, field);
  }

  return value;
}

export function validateTaskSpec(input: WorkflowTaskInput): TaskSpec {
  const tool = requireNonEmpty(input.tool, 'tool');
  const script = requireNonEmpty(input.script, 'script');
  const params = input.params;

  if (params === undefined) {
    return { tool, script };
  }

  if (params === null || typeof params !== 'object' || Array.isArray(params)) {
    throw new SubmissionError('Task params must be an object', 'params');
  }

  return { tool, script, params: { ...params } };
}

/**
 * Submits simulation jobs to a queue and follows them until they settle.
 */
export class TaskClient {
  private submitted: Map<string, TaskSpec> = new Map();
  private settled: Set<string> = new Set();

  constructor(
    private readonly queue: QueueAdapter,
    private readonly context: OrchestrationContext
  ) {}

  async submitTask(tool: string, script: string, params?: TaskParams): Promise<string> {
    const spec = validateTaskSpec({ tool, script, params });

    const taskId = await withRetry(() => this.queue.submit(spec), {
      config: this.context.config.retry,
      operation: `Submitting ${spec.tool}/${spec.script}`,
      logger: this.context.logger,
      sleep: this.context.sleep,
      isRetryable: error => !(error instanceof SubmissionError),
    });

    this.submitted.set(taskId, spec);
    this.context.logger.debug(`Submitted task ${taskId} (${spec.tool}/${spec.script})`);

    await this.context.notifyTaskSubmitted({ taskId, spec, submittedAt: new Date() });

    return taskId;
  }

  async getTaskStatus(taskId: string): Promise<TaskStatus> {
    const snapshot = await this.queue.poll(taskId);
    const state = normalizeTaskState(snapshot.state);
    const ready = isTerminalState(state);
    const remembered = this.submitted.get(taskId);

    const status: TaskStatus = {
      taskId,
      state,
      ready,
      successful: ready ? state === TaskState.SUCCESS : null,
    };

    const tool = snapshot.tool ?? remembered?.tool;
    const script = snapshot.script ?? remembered?.script;

    if (snapshot.progress !== undefined) status.progress = snapshot.progress;
    if (tool !== undefined) status.tool = tool;
    if (script !== undefined) status.script = script;
    if (snapshot.result !== undefined) status.result = snapshot.result;
    if (snapshot.error !== undefined) status.error = snapshot.error;

    if (ready && !this.settled.has(taskId)) {
      this.settled.add(taskId);
      this.context.logger.debug(`Task ${taskId} settled in state ${state}`);
      await this.context.notifyTaskSettled({ ...status });
    }

    return status;
  }

  /**
   * Polls until the task is ready, handing every snapshot to `callback`.
   * Resolves with the final snapshot.
   */
  async monitorTask(taskId: string, callback: TaskStatusCallback, pollIntervalMs?: number): Promise<TaskStatus> {
    const interval = pollIntervalMs ?? this.context.config.pollIntervalMs;

    for (;;) {
      const status = await this.getTaskStatus(taskId);
      await callback(status);

      if (status.ready) {
        return status;
      }

      await this.context.sleep(interval);
    }
  }

  async waitForTaskResult(taskId: string, timeoutMs?: number): Promise<Result<SimulationOutput | undefined>> {
    const deadline = timeoutMs ?? this.context.config.defaultTimeoutMs;
    const interval = this.context.config.pollIntervalMs;
    const startTime = Date.now();

    for (;;) {
      const status = await this.getTaskStatus(taskId);

      if (status.ready) {
        if (status.state === TaskState.SUCCESS) {
          return ok(status.result);
        }

        const failure = new RemoteExecutionFailure(taskId, status.state, status.error ?? status.result?.error);

        return err(status.state === TaskState.CANCELLED ? 'cancelled' : 'failed', failure);
      }

      const elapsed = Date.now() - startTime;

      if (deadline !== undefined && elapsed >= deadline) {
        return err(
          'timeout',
          new TaskTimeoutError(`Task ${taskId} did not complete within ${deadline}ms`, deadline, elapsed)
        );
      }

      await this.context.sleep(deadline === undefined ? interval : Math.min(interval, deadline - elapsed));
    }
  }

  /**
   * Waits for the task and returns its result, throwing when it does not succeed in time.
   */
  async waitForTask(taskId: string, timeoutMs?: number): Promise<SimulationOutput | undefined> {
    const result = await this.waitForTaskResult(taskId, timeoutMs);

    if (!result.ok) {
      throw result.error;
    }

    return result.value;
  }

  async cancelTask(taskId: string): Promise<boolean> {
    try {
      const accepted = await this.queue.cancel(taskId);
      this.context.logger.debug(`Cancel request for task ${taskId} ${accepted ? 'accepted' : 'rejected'}`);
      return accepted;
    } catch (error) {
      this.context.logger.error(
        `Failed to cancel task ${taskId}`,
        error instanceof Error ? error : new Error(String(error))
      );
      return false;
    }
  }

  /**
   * Asks the queue whether it is reachable. Queues without a health hook
   * count as healthy; a hook that throws counts as unhealthy.
   */
  async healthCheck(): Promise<boolean> {
    if (!this.queue.healthCheck) {
      return true;
    }

    try {
      const healthy = await this.queue.healthCheck();

      if (!healthy) {
        this.context.logger.warn('Queue health check reported unhealthy');
      }

      return healthy;
    } catch (error) {
      this.context.logger.error(
        'Queue health check failed',
        error instanceof Error ? error : new Error(String(error))
      );
      return false;
    }
  }

  getSubmittedSpec(taskId: string): TaskSpec | undefined {
    return this.submitted.get(taskId);
  }

  get trackedTaskCount(): number {
    return new Set([...this.submitted.keys(), ...this.settled]).size;
  }

  /**
   * Drops the remembered spec and settlement of each task. A later poll of a
   * forgotten task that is still terminal notifies plugins again.
   */
  forget(taskIds: readonly string[]): void {
    for (const taskId of taskIds) {
      this.submitted.delete(taskId);
      this.settled.delete(taskId);
    }
  }

  cleanup(): void {
    this.submitted.clear();
    this.settled.clear();
  }
}
