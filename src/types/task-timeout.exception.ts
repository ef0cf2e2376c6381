export class TaskTimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    public readonly elapsedMs: number
  ) {
    super(message);
    this.name = 'TaskTimeoutError';
    Object.setPrototypeOf(this, TaskTimeoutError.prototype);
  }
}
