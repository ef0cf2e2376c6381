import Redis from 'ioredis';
import type { OrchestrationConfig } from '../config/orchestration.config';
import { isTerminalState, normalizeTaskState } from '../core/task-state';
import { ConfigurationError, QueueAdapter, QueueTaskSnapshot, SimulationOutput, TaskSpec } from '../types';

export interface RedisQueueAdapterOptions {
  queueName?: string;
  keyPrefix?: string;
}

const OUTPUT_STATUSES: readonly string[] = ['success', 'failed', 'timeout', 'error'];

function isSimulationOutput(value: unknown): value is SimulationOutput {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'status' in value &&
    typeof value.status === 'string' &&
    OUTPUT_STATUSES.includes(value.status)
  );
}

/**
 * Queue backed by Redis. Each task is a hash at `<prefix>:task:<id>`; new ids
 * are pushed onto the list `<prefix>:queue:<name>`. Workers pop ids from the
 * list and write `state`, `progress`, `result` (JSON) and `error` back into
 * the hash.
 */
export class RedisQueueAdapter implements QueueAdapter {
  private readonly queueName: string;
  private readonly keyPrefix: string;

  private ownsClient = false;

  constructor(
    private readonly redis: Redis,
    options: RedisQueueAdapterOptions = {}
  ) {
    this.queueName = options.queueName ?? 'simulations';
    this.keyPrefix = options.keyPrefix ?? 'simrelay';
  }

  /**
   * Adapter for `config.queue`. Without a client one is created from
   * `redisUrl`; it connects on first use and is closed by `close()`.
   */
  static fromConfig(queue: OrchestrationConfig['queue'], redis?: Redis): RedisQueueAdapter {
    if (redis) {
      return new RedisQueueAdapter(redis, { queueName: queue.name });
    }

    if (!queue.redisUrl) {
      throw new ConfigurationError('queue.redisUrl is required when no Redis client is given');
    }

    const adapter = new RedisQueueAdapter(new Redis(queue.redisUrl, { lazyConnect: true }), {
      queueName: queue.name,
    });
    adapter.ownsClient = true;

    return adapter;
  }

  get queueKey(): string {
    return `${this.keyPrefix}:queue:${this.queueName}`;
  }

  taskKey(taskId: string): string {
    return `${this.keyPrefix}:task:${taskId}`;
  }

  async submit(spec: TaskSpec): Promise<string> {
    const taskId = `task_${Date.now()}_${Math.random().toString(36).substring(7)}`;

    const results = await this.redis
      .multi()
      .hset(this.taskKey(taskId), {
        state: 'PENDING',
        tool: spec.tool,
        script: spec.script,
        params: JSON.stringify(spec.params ?? {}),
        submittedAt: new Date().toISOString(),
      })
      .rpush(this.queueKey, taskId)
      .exec();

    if (!results) {
      throw new Error(`Redis transaction for task ${taskId} was aborted`);
    }

    for (const [error] of results) {
      if (error) {
        throw error;
      }
    }

    return taskId;
  }

  async poll(taskId: string): Promise<QueueTaskSnapshot> {
    const fields = await this.redis.hgetall(this.taskKey(taskId));

    if (!fields.state) {
      return { state: 'PENDING' };
    }

    const snapshot: QueueTaskSnapshot = { state: fields.state };

    if (fields.tool) snapshot.tool = fields.tool;
    if (fields.script) snapshot.script = fields.script;
    if (fields.error) snapshot.error = fields.error;

    if (fields.progress) {
      const progress = Number(fields.progress);

      if (!Number.isNaN(progress)) {
        snapshot.progress = progress;
      }
    }

    if (fields.result) {
      try {
        const parsed: unknown = JSON.parse(fields.result);

        if (isSimulationOutput(parsed)) {
          snapshot.result = parsed;
        } else {
          snapshot.error = snapshot.error ?? 'Worker reported a result without a valid status';
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        snapshot.error = snapshot.error ?? `Unreadable result payload: ${message}`;
      }
    }

    return snapshot;
  }

  /**
   * A task nobody has picked up yet is removed from the list and revoked.
   * A running task gets `cancelRequested` set for its worker to observe.
   */
  async cancel(taskId: string): Promise<boolean> {
    const key = this.taskKey(taskId);
    const state = await this.redis.hget(key, 'state');

    if (state === null || isTerminalState(normalizeTaskState(state))) {
      return false;
    }

    if (state.toUpperCase() === 'PENDING') {
      const removed = await this.redis.lrem(this.queueKey, 1, taskId);

      if (removed > 0) {
        await this.redis.hset(key, { state: 'REVOKED', cancelRequested: '1' });
        return true;
      }
    }

    await this.redis.hset(key, { cancelRequested: '1' });

    return true;
  }

  async healthCheck(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG';
  }

  /**
   * Closes the client if this adapter created it. A client passed in is left open.
   */
  async close(): Promise<void> {
    if (!this.ownsClient) {
      return;
    }

    if (this.redis.status === 'ready') {
      await this.redis.quit();
    } else {
      this.redis.disconnect();
    }
  }
}
