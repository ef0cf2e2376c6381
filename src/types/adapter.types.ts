import { QueueTaskSnapshot, TaskSpec } from './task.types';

/**
 * Boundary to the external worker pool. Implementations may sit on any transport.
 */
export interface QueueAdapter {
  submit(spec: TaskSpec): Promise<string>;
  poll(taskId: string): Promise<QueueTaskSnapshot>;
  cancel(taskId: string): Promise<boolean>;
  healthCheck?(): Promise<boolean>;
  close?(): Promise<void>;
}

export interface LockAdapter {
  acquire(key: string, owner: string, ttl?: number): Promise<boolean>;
  release(key: string): Promise<void>;
  isLocked(key: string): Promise<boolean>;
  extend(key: string, ttl: number): Promise<boolean>;
}

export interface LoggerAdapter {
  log(message: string, context?: unknown): void;
  error(message: string, error?: Error, context?: unknown): void;
  warn(message: string, context?: unknown): void;
  debug(message: string, context?: unknown): void;
}
