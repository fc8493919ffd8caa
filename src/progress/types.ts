export class ProgressSourceError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "ProgressSourceError";
  }
}
