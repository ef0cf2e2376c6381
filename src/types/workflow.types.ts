import { LockAdapter } from './adapter.types';
import { TaskParams, TaskSpec, TaskStatus } from './task.types';

export interface WorkflowStatusView {
  total: number;
  completed: number;
  failed: number;
  running: number;
  pending: number;
  allComplete: boolean;
  tasks: Record<string, TaskStatus>;
}

export type WorkflowStatusCallback = (status: WorkflowStatusView) => void | Promise<void>;

export interface SubmitWorkflowOptions {
  sequential?: boolean;
  /** Per-task wait bound in sequential mode. */
  taskTimeoutMs?: number;
}

export interface WaitForWorkflowOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  callback?: WorkflowStatusCallback;
}

export interface BatchProgress {
  batchNum: number;
  batchSize: number;
  submitted: number;
  total: number;
}

export interface SubmitBatchOptions {
  batchSize?: number;
  callback?: (progress: BatchProgress) => void;
}

export type ParamGrid = Record<string, unknown[]>;

export interface SweepProgress {
  index: number;
  params: TaskParams;
  taskId: string;
  submitted: number;
  total: number;
}

export interface ParameterSweepOptions {
  baseParams?: TaskParams;
  callback?: (progress: SweepProgress) => void;
}

export interface WaitForAnyClaim {
  lock: LockAdapter;
  owner: string;
  ttlMs?: number;
}

export interface WaitForAnyOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  /** Restricts the winner to the caller that acquires the task's lock. */
  claim?: WaitForAnyClaim;
}

export interface WaitForAnyResult {
  taskId: string;
  status: TaskStatus;
}

export interface ParallelExecutionStats {
  total: number;
  completed: number;
  failed: number;
  running: number;
  pending: number;
  totalDuration: number;
  avgDuration: number;
  maxDuration: number;
  speedup: number;
  efficiency: number;
}

export interface CancelWorkflowOptions {
  failOnReject?: boolean;
}

export interface CancelWorkflowResult {
  cancelled: string[];
  rejected: string[];
}

export type WorkflowTaskInput = Partial<TaskSpec>;
