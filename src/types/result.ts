/**
 * Result Pattern
 *
 * Services return Result<T> and never throw. Repository errors are folded in
 * at the service boundary with failureFrom().
 */

import type { ErrorCode, RepositoryError } from './errors.js';

export interface Success<T> {
  success: true;
  data: T;
}

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface Failure {
  success: false;
  error: ServiceError;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * `details` is only present on the error when given
 */
export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: ServiceError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error };
}

/**
 * The repository kind becomes the error code
 */
export function failureFrom(error: RepositoryError): Failure {
  return failure(error.kind, error.message, error.details);
}

/**
 * Transform the data of a success; a failure passes through untouched
 */
export function mapResult<T, U>(result: Result<T>, transform: (data: T) => U): Result<U> {
  return result.success ? success(transform(result.data)) : result;
}
