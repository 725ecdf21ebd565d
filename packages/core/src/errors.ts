/**
 * Error taxonomy for the replenishment core
 *
 * Operational errors (bad input, unknown products, storage failures) carry a
 * stable code and HTTP status and are safe to show to a caller. Anything else
 * is a programming error and is reported as a generic 500.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'DATABASE_CONNECTION_ERROR'
  | 'DATABASE_OPERATION_ERROR'
  | 'INTERNAL_ERROR';

const STATUS_BY_CODE: Readonly<Record<ErrorCode, number>> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  DATABASE_CONNECTION_ERROR: 503,
  DATABASE_OPERATION_ERROR: 500,
  INTERNAL_ERROR: 500,
};

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

const INTERNAL_ERROR: SafeErrorDetails = Object.freeze({
  code: 'INTERNAL_ERROR',
  message: 'An unexpected error occurred',
  statusCode: 500,
});

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational = true;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
  }

  /**
   * Code, message and status only: no stack, no cause
   */
  toSafeError(): SafeErrorDetails {
    return { code: this.code, message: this.message, statusCode: this.statusCode };
  }
}

/**
 * Rejected input: a request body, an out-of-range service level, a stored
 * parameter that does not parse
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND');
  }
}

export class DatabaseConnectionError extends AppError {
  constructor(message = 'Database connection failed') {
    super(message, 'DATABASE_CONNECTION_ERROR');
  }
}

export class DatabaseOperationError extends AppError {
  constructor(
    public readonly operation: string,
    reason: string,
    cause?: Error
  ) {
    super(`Database ${operation} failed: ${reason}`, 'DATABASE_OPERATION_ERROR', { cause });
  }
}

export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  return isOperationalError(error) ? error.toSafeError() : { ...INTERNAL_ERROR };
}

/**
 * Wrap a storage failure, keeping the operation name and the cause
 */
export function toDatabaseError(operation: string, error: unknown): DatabaseOperationError {
  if (error instanceof DatabaseOperationError) return error;
  if (error instanceof Error) return new DatabaseOperationError(operation, error.message, error);
  return new DatabaseOperationError(operation, String(error));
}
