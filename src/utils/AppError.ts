/**
 * AppError - Custom error class for application errors
 * Distinguishes operational failures (bad input, refused API call) from
 * programming errors and misconfiguration
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * Extracts a loggable message from anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
