/**
 * Error taxonomy shared by the organizer core and the CLI
 */

import { logger } from './logger.js';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'ACCESS_DENIED'
  | 'STORAGE_ERROR'
  | 'PATH_OCCUPIED'
  | 'INTERNAL_ERROR'
  | 'UNKNOWN_ERROR';

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, context);
    this.name = 'NotFoundError';
  }
}

export class InvalidArgumentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, context);
    this.name = 'InvalidArgumentError';
  }
}

export class AccessDeniedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ACCESS_DENIED', 403, context);
    this.name = 'AccessDeniedError';
  }
}

export class StorageError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORAGE_ERROR', 500, context);
    this.name = 'StorageError';
  }
}

/** The exact path an operation must write to is already taken. */
export class PathOccupiedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PATH_OCCUPIED', 409, context);
    this.name = 'PathOccupiedError';
  }
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Translate a Node.js filesystem error into the taxonomy.
 */
export function toFileSystemError(error: unknown, path: string): AppError {
  if (error instanceof AppError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const context = { path, cause: message };

  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new NotFoundError(`No such file or directory: ${path}`, context);
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return new AccessDeniedError(`Permission denied: ${path}`, context);
    case 'EEXIST':
      return new PathOccupiedError(`Path already exists: ${path}`, context);
    default:
      return new AppError(message, 'INTERNAL_ERROR', 500, context);
  }
}

/**
 * Wrap a failure of the SQLite store.
 */
export function toStorageError(error: unknown, operation: string): StorageError {
  if (error instanceof StorageError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`Storage failure during ${operation}: ${message}`, { operation });
}

/**
 * Log and normalise any thrown value
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context ? { context } : undefined);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    logger.error(error.message, error, context ? { context } : undefined);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  logger.error(String(error), undefined, context ? { context } : undefined);
  return appError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
