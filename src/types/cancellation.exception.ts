export class CancellationFailure extends Error {
  constructor(public readonly taskIds: string[]) {
    super(`Cancellation rejected for ${taskIds.length} task(s): ${taskIds.join(', ')}`);
    this.name = 'CancellationFailure';
    Object.setPrototypeOf(this, CancellationFailure.prototype);
  }
}
