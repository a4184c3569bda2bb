export abstract class BaseError extends Error {
  constructor(
    public readonly code: string,
    message?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}
