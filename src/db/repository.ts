/**
 * Repository Contract
 * One interface for every resource, whichever backend stores it
 */

import {
  RepositoryError,
  isRepositoryError,
  type FilterOption,
  type FilterValue,
  type ListOptions,
  type SearchResult,
} from '../types/index.js';

export interface Repository<TCreate, TUpdate extends { id: string }, TRead> {
  create(value: TCreate): Promise<TRead>;
  /** Throws NOT_FOUND when no entity has this id */
  findById(id: string): Promise<TRead>;
  update(value: TUpdate): Promise<TRead>;
  delete(id: string): Promise<void>;
  exists(id: string): Promise<boolean>;
  findByField(field: string, value: FilterValue): Promise<TRead[]>;
  list(options: ListOptions): Promise<TRead[]>;
  count(filters: readonly FilterOption[]): Promise<number>;
  search(options: ListOptions): Promise<SearchResult<TRead>>;
  bulkCreate(values: readonly TCreate[]): Promise<TRead[]>;
  bulkUpdate(values: readonly TUpdate[]): Promise<TRead[]>;
  bulkDelete(ids: readonly string[]): Promise<void>;
}

/**
 * Single-item operations an adapter implements itself
 */
export type RepositoryCore<TCreate, TUpdate extends { id: string }, TRead> = Omit<
  Repository<TCreate, TUpdate, TRead>,
  'bulkCreate' | 'bulkUpdate' | 'bulkDelete'
>;

/**
 * Apply an operation to each item in order, stopping at the first failure.
 * Items before the failing one stay applied.
 */
export async function runSequentially<I, O>(
  items: readonly I[],
  action: string,
  operation: (item: I) => Promise<O>
): Promise<O[]> {
  const results: O[] = [];
  for (const [index, item] of items.entries()) {
    try {
      results.push(await operation(item));
    } catch (error) {
      const kind = isRepositoryError(error) ? error.kind : 'BACKEND_ERROR';
      const message = error instanceof Error ? error.message : String(error);
      throw new RepositoryError(kind, `${action} failed at element ${index}: ${message}`, {
        cause: error,
        details: { completed: index, failedIndex: index },
      });
    }
  }
  return results;
}

/**
 * Complete an adapter core with the sequential bulk operations
 */
export function withBulkOperations<TCreate, TUpdate extends { id: string }, TRead>(
  core: RepositoryCore<TCreate, TUpdate, TRead>
): Repository<TCreate, TUpdate, TRead> {
  return {
    ...core,
    bulkCreate: (values) => runSequentially(values, 'bulk create', (value) => core.create(value)),
    bulkUpdate: (values) => runSequentially(values, 'bulk update', (value) => core.update(value)),
    async bulkDelete(ids) {
      await runSequentially(ids, 'bulk delete', (id) => core.delete(id));
    },
  };
}
