import { TaskState } from './task.types';

export class RemoteExecutionFailure extends Error {
  constructor(
    public readonly taskId: string,
    public readonly state: TaskState,
    public readonly remoteError?: string
  ) {
    super(`Task ${taskId} ended in state ${state}${remoteError ? `: ${remoteError}` : ''}`);
    this.name = 'RemoteExecutionFailure';
    Object.setPrototypeOf(this, RemoteExecutionFailure.prototype);
  }
}
