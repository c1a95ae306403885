/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors (database, network)
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError' | 'TimeoutError';
  readonly retryable: boolean;
}

/**
 * Validation errors (input validation failures)
 */
export interface ValidationError extends AppError {
  readonly type: 'ValidationError';
  readonly field?: string | undefined;
  readonly value?: unknown;
}

/**
 * Error body sent by every REST route
 */
export interface ErrorResponseBody {
  ok: false;
  error: string;
  message: string;
}

export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  retryable: true,
  cause,
});

export const createValidationError = (
  message: string,
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  ...(field !== undefined && { field }),
  ...(value !== undefined && { value }),
});

/**
 * Builds the public error body. Infrastructure messages are replaced so that
 * driver internals never reach the client.
 */
export const toErrorResponse = (error: AppError): ErrorResponseBody => ({
  ok: false,
  error: error.type,
  message: error.type === 'DatabaseError' ? 'An unexpected database error occurred' : error.message,
});
