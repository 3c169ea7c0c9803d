export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly retryable = statusCode >= 500,
  ) {
    super(message);
    this.name = "AppError";
  }
}
