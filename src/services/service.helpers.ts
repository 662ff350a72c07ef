/**
 * Shared service plumbing: error-to-Result mapping and paged reads
 */

import type { Logger } from '../lib/logger.js';
import {
  failure,
  failureFrom,
  isRepositoryError,
  mapResult,
  normalizeListOptions,
  success,
  toPaginatedResult,
  type Failure,
  type FilterOption,
  type FilterOptionInput,
  type ListOptions,
  type ListOptionsInput,
  type PaginatedResult,
  type QueryConfig,
  type Result,
  type SearchResult,
} from '../types/index.js';
import { identifierSchema, validate } from '../validation/index.js';

/**
 * Turn anything a repository threw into a Failure.
 * Errors that are not RepositoryErrors are internal.
 */
export function toFailure(error: unknown, log: Logger, action: string): Failure {
  if (isRepositoryError(error)) {
    if (error.kind === 'BACKEND_ERROR' || error.kind === 'INTERNAL_ERROR') {
      log.error({ err: error, action }, `Failed to ${action}`);
    } else {
      log.debug({ kind: error.kind, action }, error.message);
    }
    return failureFrom(error);
  }

  log.error({ err: error, action }, `Unexpected error while trying to ${action}`);
  return failure('INTERNAL_ERROR', `Failed to ${action}`);
}

/**
 * Run a repository operation and wrap its outcome in a Result
 */
export async function execute<T>(
  log: Logger,
  action: string,
  operation: () => Promise<T>
): Promise<Result<T>> {
  try {
    return success(await operation());
  } catch (error) {
    return toFailure(error, log, action);
  }
}

export function checkIdentifier(id: string): Result<{ id: string }> {
  return validate(identifierSchema, { id });
}

/**
 * Validate filters the way list options are validated
 */
export function normalizeFilters(
  filters: readonly FilterOptionInput[] | undefined,
  config: QueryConfig
): Result<FilterOption[]> {
  return mapResult(
    normalizeListOptions({ filters: filters ? [...filters] : [] }, config),
    (options) => options.filters
  );
}

export interface Searchable<T> {
  search(options: ListOptions): Promise<SearchResult<T>>;
}

/**
 * Normalize a list request, run it as a search and wrap it in a pagination envelope.
 * `scope` filters are appended to the caller's filters.
 */
export async function paginate<T>(
  repository: Searchable<T>,
  input: ListOptionsInput,
  config: QueryConfig,
  log: Logger,
  action: string,
  scope: readonly FilterOption[] = []
): Promise<Result<PaginatedResult<T>>> {
  const normalized = normalizeListOptions(input, config);
  if (!normalized.success) {
    return normalized;
  }

  const options: ListOptions = {
    ...normalized.data,
    filters: [...normalized.data.filters, ...scope],
  };

  return execute(log, action, async () =>
    toPaginatedResult(await repository.search(options), options.page, options.perPage)
  );
}
