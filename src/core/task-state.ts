import { TaskState } from '../types';

const TERMINAL_STATES: ReadonlySet<TaskState> = new Set([
  TaskState.SUCCESS,
  TaskState.FAILURE,
  TaskState.TIMEOUT,
  TaskState.CANCELLED,
]);

// Native vocabularies seen on the queues we talk to, upper-cased.
const STATE_ALIASES: Record<string, TaskState> = {
  PENDING: TaskState.PENDING,
  RECEIVED: TaskState.PENDING,
  QUEUED: TaskState.PENDING,
  RETRY: TaskState.PENDING,
  STARTED: TaskState.RUNNING,
  RUNNING: TaskState.RUNNING,
  PROGRESS: TaskState.RUNNING,
  SUCCESS: TaskState.SUCCESS,
  SUCCEEDED: TaskState.SUCCESS,
  COMPLETED: TaskState.SUCCESS,
  FAILURE: TaskState.FAILURE,
  FAILED: TaskState.FAILURE,
  ERROR: TaskState.FAILURE,
  TIMEOUT: TaskState.TIMEOUT,
  TIMED_OUT: TaskState.TIMEOUT,
  REVOKED: TaskState.CANCELLED,
  CANCELLED: TaskState.CANCELLED,
  CANCELED: TaskState.CANCELLED,
};

/**
 * Maps a queue-native state string onto TaskState. Unknown states count as pending.
 */
export function normalizeTaskState(raw: string): TaskState {
  return STATE_ALIASES[raw.trim().toUpperCase()] ?? TaskState.PENDING;
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}
