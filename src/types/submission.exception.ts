export class SubmissionError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'SubmissionError';
    Object.setPrototypeOf(this, SubmissionError.prototype);
  }
}
