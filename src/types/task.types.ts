export enum TaskState {
  PENDING = 'pending',
  RUNNING = 'running',
  SUCCESS = 'success',
  FAILURE = 'failure',
  TIMEOUT = 'timeout',
  CANCELLED = 'cancelled',
}

export type TaskParams = Record<string, unknown>;

export interface TaskSpec {
  tool: string;
  script: string;
  params?: TaskParams;
}

/**
 * Result payload a worker reports for a finished simulation.
 */
export interface SimulationOutput {
  status: 'success' | 'failed' | 'timeout' | 'error';
  durationSeconds?: number;
  returncode?: number;
  stdout?: string;
  stderr?: string;
  artifacts?: string[];
  error?: string;
  [key: string]: unknown;
}

/**
 * Raw snapshot returned by a queue. `state` is in the queue's own vocabulary.
 */
export interface QueueTaskSnapshot {
  state: string;
  progress?: number;
  tool?: string;
  script?: string;
  result?: SimulationOutput;
  error?: string;
}

export interface TaskStatus {
  taskId: string;
  state: TaskState;
  ready: boolean;
  successful: boolean | null;
  progress?: number;
  tool?: string;
  script?: string;
  result?: SimulationOutput;
  error?: string;
}

export interface SubmittedTask {
  taskId: string;
  spec: TaskSpec;
  submittedAt: Date;
}

export type TaskStatusCallback = (status: TaskStatus) => void | Promise<void>;
