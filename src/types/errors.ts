/**
 * Error taxonomy shared by repositories, services and the HTTP layer
 */

export const ERROR_CODES = [
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'CONFLICT',
  'BACKEND_ERROR',
  'INTERNAL_ERROR',
  'UNAUTHORIZED',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/**
 * Kinds a repository adapter may raise. UNAUTHORIZED only exists at the HTTP edge.
 */
export type RepositoryErrorKind = Exclude<ErrorCode, 'UNAUTHORIZED'>;

/**
 * Error thrown by repository adapters after a backend failure has been
 * normalized into one of the repository kinds.
 */
export class RepositoryError extends Error {
  readonly kind: RepositoryErrorKind;
  readonly details: Record<string, unknown> | undefined;

  constructor(
    kind: RepositoryErrorKind,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RepositoryError';
    this.kind = kind;
    this.details = options?.details;
  }
}

export function isRepositoryError(value: unknown): value is RepositoryError {
  return value instanceof RepositoryError;
}
