/**
 * Backend Error Mapping
 * Normalizes PostgREST, Auth admin and thrown failures into RepositoryError kinds
 */

import { RepositoryError, isRepositoryError, type RepositoryErrorKind } from '../types/index.js';

/**
 * Shape of a PostgREST error as returned by the query builder
 */
export interface PostgrestFailure {
  code: string;
  message: string;
  details?: string | null;
  hint?: string | null;
}

/**
 * Shape of an Auth admin error
 */
export interface DirectoryFailure {
  message: string;
  status?: number | undefined;
}

const POSTGREST_KINDS: Readonly<Record<string, RepositoryErrorKind>> = {
  PGRST116: 'NOT_FOUND',
  '23505': 'CONFLICT',
  '23503': 'NOT_FOUND',
  '22P02': 'VALIDATION_ERROR',
  '42703': 'VALIDATION_ERROR',
  PGRST100: 'VALIDATION_ERROR',
};

const ALREADY_REGISTERED = /already (been )?(registered|exists)/i;

export function postgrestErrorKind(code: string): RepositoryErrorKind {
  return POSTGREST_KINDS[code] ?? 'BACKEND_ERROR';
}

export function fromPostgrestError(error: PostgrestFailure, action: string): RepositoryError {
  const details: Record<string, unknown> = { code: error.code };
  if (error.details !== undefined && error.details !== null && error.details !== '') {
    details.backendDetails = error.details;
  }
  return new RepositoryError(postgrestErrorKind(error.code), `Failed to ${action}: ${error.message}`, {
    cause: error,
    details,
  });
}

export function directoryErrorKind(error: DirectoryFailure): RepositoryErrorKind {
  if (error.status === 404) {
    return 'NOT_FOUND';
  }
  if (error.status === 422 && ALREADY_REGISTERED.test(error.message)) {
    return 'CONFLICT';
  }
  if (error.status === 400 || error.status === 422) {
    return 'VALIDATION_ERROR';
  }
  return 'BACKEND_ERROR';
}

export function fromDirectoryError(error: DirectoryFailure, action: string): RepositoryError {
  return new RepositoryError(directoryErrorKind(error), `Failed to ${action}: ${error.message}`, {
    cause: error,
    details: error.status !== undefined ? { status: error.status } : undefined,
  });
}

/**
 * Run a backend call; anything thrown that is not already a RepositoryError
 * becomes BACKEND_ERROR
 */
export async function guard<T>(action: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (isRepositoryError(error)) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new RepositoryError('BACKEND_ERROR', `Failed to ${action}: ${message}`, { cause: error });
  }
}
