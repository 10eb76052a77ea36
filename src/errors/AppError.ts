/**
 * AppError - Unified application error class
 *
 * Base class for all application errors, carrying an HTTP-style status and a
 * machine-readable code. Use the factories instead of creating
 * domain-specific error classes.
 *
 * @example
 * throw AppError.tooManyRequests('HTTP 429 Too Many Requests', 30);
 * throw AppError.upstreamData('Upstream reported errors', errors);
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * 400 Bad Request - Invalid caller input
   */
  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(message, 400, 'BAD_REQUEST', details);
  }

  /**
   * 429 Too Many Requests - Upstream rate limit hit
   */
  static tooManyRequests(message: string, retryAfter?: number): AppError {
    return new AppError(message, 429, 'RATE_LIMITED', { retryAfter });
  }

  /**
   * 502 - Transport succeeded but the payload reports an error
   */
  static upstreamData(message: string, details?: unknown): AppError {
    return new AppError(message, 502, 'UPSTREAM_DATA_ERROR', details);
  }

  /**
   * 502 - Upstream answered with a non-OK status that isn't a rate limit
   */
  static upstreamHttp(status: number, statusText: string): AppError {
    const message = `HTTP ${status}${statusText ? ` ${statusText}` : ''}`;
    return new AppError(message, 502, 'UPSTREAM_HTTP_ERROR', { status });
  }

  /**
   * Check if an error is an AppError
   */
  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
