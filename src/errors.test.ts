import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AccessDeniedError,
  AppError,
  InvalidArgumentError,
  NotFoundError,
  PathOccupiedError,
  StorageError,
  errorMessage,
  handleError,
  toFileSystemError,
  toStorageError,
} from './errors.js';

function errnoError(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: failed`);
  error.code = code;
  return error;
}

describe('AppError', () => {
  it('should carry code, status and context', () => {
    const error = new AppError('Test error', 'INTERNAL_ERROR', 500, { path: '/tmp/x' });
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.statusCode).toBe(500);
    expect(error.context).toEqual({ path: '/tmp/x' });
    expect(error instanceof Error).toBe(true);
  });

  it('should default to an unknown error', () => {
    const error = new AppError('Error');
    expect(error.code).toBe('UNKNOWN_ERROR');
    expect(error.statusCode).toBe(500);
  });

  it('should give each subclass its code', () => {
    expect(new NotFoundError('x').code).toBe('NOT_FOUND');
    expect(new InvalidArgumentError('x').statusCode).toBe(400);
    expect(new AccessDeniedError('x').code).toBe('ACCESS_DENIED');
    expect(new StorageError('x').code).toBe('STORAGE_ERROR');
    expect(new PathOccupiedError('x').statusCode).toBe(409);
  });
});

describe('toFileSystemError', () => {
  it('should map missing paths to not-found', () => {
    const error = toFileSystemError(errnoError('ENOENT'), '/missing');
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('No such file or directory: /missing');
  });

  it('should map permission failures to access-denied', () => {
    expect(toFileSystemError(errnoError('EACCES'), '/x')).toBeInstanceOf(AccessDeniedError);
    expect(toFileSystemError(errnoError('EPERM'), '/x')).toBeInstanceOf(AccessDeniedError);
  });

  it('should map EEXIST to path-occupied', () => {
    expect(toFileSystemError(errnoError('EEXIST'), '/x')).toBeInstanceOf(PathOccupiedError);
  });

  it('should wrap other errors and keep existing AppErrors', () => {
    const wrapped = toFileSystemError(errnoError('EIO'), '/x');
    expect(wrapped.code).toBe('INTERNAL_ERROR');

    const known = new InvalidArgumentError('bad');
    expect(toFileSystemError(known, '/x')).toBe(known);
  });
});

describe('toStorageError', () => {
  it('should name the failed operation', () => {
    const error = toStorageError(new Error('disk I/O error'), 'append move');
    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toBe('Storage failure during append move: disk I/O error');
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should normalise plain errors and thrown values', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(handleError(new Error('boom')).code).toBe('INTERNAL_ERROR');
    expect(handleError('oops').code).toBe('UNKNOWN_ERROR');
    expect(errorMessage(42)).toBe('42');
  });
});
