import { LoggerAdapter } from './adapter.types';
import { TaskParams } from './task.types';

interface TaskTiming {
  taskId: string;
  startTime: number;
  endTime: number;
  /** Milliseconds. */
  duration: number;
}

export interface SuccessfulTaskResult<T> extends TaskTiming {
  status: 'success';
  result: T;
}

export interface FailedTaskResult extends TaskTiming {
  status: 'failed';
  error: string;
}

export type TaskResult<T = unknown> = SuccessfulTaskResult<T> | FailedTaskResult;

export interface LocalTask<T = unknown> {
  id: string;
  fn: () => T | Promise<T>;
}

export interface ExecuteParallelOptions<T> {
  callback?: (result: TaskResult<T>) => void;
  timeoutMs?: number;
}

export interface ExecuteMapOptions<R> {
  callback?: (index: number, result: R) => void;
  timeoutMs?: number;
}

export interface ParallelExecutorOptions {
  maxWorkers?: number;
  logger?: LoggerAdapter;
}

export interface LocalSweepOptions<R> {
  baseParams?: TaskParams;
  timeoutMs?: number;
  callback?: (params: TaskParams, result: TaskResult<R>) => void;
}

export type LocalSweepResult<R> = TaskResult<R> & { params: TaskParams };
