/**
 * Base Error Class
 *
 * Every failure the recognition cache reports carries a stable code and the
 * structured context it is logged with.
 */

/**
 * Extract a message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export class CacheError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options: {
      cause?: unknown;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super(message);
    this.name = 'CacheError';
    this.code = code;
    this.context = options.context ?? {};

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Fields for a log line: the code, the context, and the underlying reason
   * (the cause's message when there is one)
   */
  logContext(): Record<string, unknown> {
    return {
      code: this.code,
      reason: this.cause !== undefined ? getErrorMessage(this.cause) : this.message,
      ...this.context,
    };
  }
}
