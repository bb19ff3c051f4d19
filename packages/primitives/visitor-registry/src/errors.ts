/**
 * Thrown when request input fails validation. Nothing has been written.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a visitor name was admitted within the rate-limit window.
 */
export class RateLimitError extends Error {
  constructor(
    message: string,
    readonly retryAfterMs: number
  ) {
    super(message);
    this.name = "RateLimitError";
  }
}

/**
 * Thrown when storage operations fail (read, write, connection issues).
 */
export class StorageError extends Error {
  constructor(
    message: string,
    readonly operation?: "read" | "write" | "delete" | "init",
    cause?: unknown
  ) {
    super(message);
    this.name = "StorageError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export const isDomainError = (err: unknown): err is ValidationError | RateLimitError | StorageError =>
  err instanceof ValidationError || err instanceof RateLimitError || err instanceof StorageError;
