/**
 * Table Repository Adapter
 * Implements the repository contract over a PostgREST table through supabase-js.
 *
 * Filters and sort fields are checked against the definition's field map
 * before any request is sent. `search` issues two requests: an exact head
 * count carrying the same predicates, then the paginated select.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import {
  RepositoryError,
  type FilterOption,
  type FilterScalar,
  type FilterValue,
  type ListOptions,
  type SearchResult,
} from '../types/index.js';

import { fromPostgrestError, guard } from './errors.js';
import {
  resolveFilter,
  resolveFilters,
  resolveSortField,
  type FieldMap,
  type ResolvedFilter,
} from './filters.js';
import { withBulkOperations, type Repository } from './repository.js';

export interface TableDefinition<TCreate, TUpdate extends { id: string }, TRead, TRow> {
  table: string;
  /** Human readable resource name used in error messages */
  resource: string;
  /** Column list for reads, including embedded relations */
  select: string;
  /** Filterable and sortable read-model fields */
  fields: FieldMap;
  /** Columns matched by the free-text search term */
  searchColumns: readonly string[];
  /** Whether update refreshes an `updated_at` column */
  hasUpdatedAt: boolean;
  toInsertRow(value: TCreate): Record<string, unknown>;
  toUpdateRow(value: TUpdate): Record<string, unknown>;
  fromRow(row: TRow): TRead;
}

const POSTGREST_RESERVED = /[,.:()"\\]/;

/**
 * Quote a value for PostgREST's logical and list syntax when it holds
 * reserved characters
 */
export function quoteFilterValue(value: string): string {
  if (!POSTGREST_RESERVED.test(value)) {
    return value;
  }
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * Escape LIKE wildcards so the term matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_*]/g, '\\$&');
}

export function toQueryParam(value: FilterScalar): string | number | boolean {
  return value instanceof Date ? value.toISOString() : value;
}

/**
 * Build the `or` expression matching the term in any search column
 */
export function buildSearchExpression(columns: readonly string[], term: string): string {
  const pattern = quoteFilterValue(`%${escapeLikePattern(term)}%`);
  return columns.map((column) => `${column}.ilike.${pattern}`).join(',');
}

function likePattern(filter: ResolvedFilter): string {
  const term = escapeLikePattern(String(filter.value));
  switch (filter.operator) {
    case 'starts_with':
      return `${term}%`;
    case 'ends_with':
      return `%${term}`;
    default:
      return `%${term}%`;
  }
}

function withoutUndefined(row: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(row).filter(([, value]) => value !== undefined));
}

/**
 * Create a repository over one table
 */
export function createTableRepository<TCreate, TUpdate extends { id: string }, TRead, TRow>(
  supabase: SupabaseClient,
  definition: TableDefinition<TCreate, TUpdate, TRead, TRow>
): Repository<TCreate, TUpdate, TRead> {
  const { table, resource } = definition;

  function filteredQuery(
    columns: string,
    filters: readonly ResolvedFilter[],
    search: string,
    countOnly: boolean
  ) {
    let query = supabase
      .from(table)
      .select(columns, countOnly ? { count: 'exact', head: true } : undefined);

    for (const filter of filters) {
      if (filter.operator === 'in') {
        query = query.in(filter.column, filter.value.map(toQueryParam));
        continue;
      }
      if (filter.operator === 'not_in') {
        const list = filter.value.map((item) => quoteFilterValue(String(toQueryParam(item))));
        query = query.not(filter.column, 'in', `(${list.join(',')})`);
        continue;
      }

      const value = toQueryParam(filter.value);
      switch (filter.operator) {
        case 'eq':
          query = query.eq(filter.column, value);
          break;
        case 'ne':
          query = query.neq(filter.column, value);
          break;
        case 'gt':
          query = query.gt(filter.column, value);
          break;
        case 'lt':
          query = query.lt(filter.column, value);
          break;
        case 'gte':
          query = query.gte(filter.column, value);
          break;
        case 'lte':
          query = query.lte(filter.column, value);
          break;
        case 'like':
        case 'starts_with':
        case 'ends_with':
          query = query.ilike(filter.column, likePattern(filter));
          break;
      }
    }

    if (search !== '' && definition.searchColumns.length > 0) {
      query = query.or(buildSearchExpression(definition.searchColumns, search));
    }

    return query;
  }

  async function countMatching(filters: readonly ResolvedFilter[], search: string): Promise<number> {
    return guard(`count ${resource}s`, async () => {
      const { count, error } = await filteredQuery('id', filters, search, true);
      if (error !== null) {
        throw fromPostgrestError(error, `count ${resource}s`);
      }
      return count ?? 0;
    });
  }

  async function fetchPage(options: ListOptions): Promise<TRead[]> {
    const filters = resolveFilters(options.filters, definition.fields);
    const sort =
      options.sortBy !== undefined ? resolveSortField(options.sortBy, definition.fields) : undefined;

    return guard(`list ${resource}s`, async () => {
      let query = filteredQuery(definition.select, filters, options.search, false);
      if (sort !== undefined) {
        query = query.order(sort.column, { ascending: options.sortOrder === 'asc' });
      }
      const from = (options.page - 1) * options.perPage;
      const { data, error } = await query.range(from, from + options.perPage - 1);

      if (error !== null) {
        throw fromPostgrestError(error, `list ${resource}s`);
      }
      return ((data ?? []) as TRow[]).map((row) => definition.fromRow(row));
    });
  }

  async function findById(id: string): Promise<TRead> {
    return guard(`get ${resource}`, async () => {
      const { data, error } = await supabase
        .from(table)
        .select(definition.select)
        .eq('id', id)
        .maybeSingle();

      if (error !== null) {
        throw fromPostgrestError(error, `get ${resource}`);
      }
      if (data === null) {
        throw new RepositoryError('NOT_FOUND', `${resource} ${id} not found`, { details: { id } });
      }
      return definition.fromRow(data as TRow);
    });
  }

  return withBulkOperations<TCreate, TUpdate, TRead>({
    async create(value: TCreate): Promise<TRead> {
      return guard(`create ${resource}`, async () => {
        const { data, error } = await supabase
          .from(table)
          .insert(withoutUndefined(definition.toInsertRow(value)))
          .select(definition.select)
          .single();

        if (error !== null) {
          throw fromPostgrestError(error, `create ${resource}`);
        }
        return definition.fromRow(data as TRow);
      });
    },

    findById,

    async update(value: TUpdate): Promise<TRead> {
      const patch = withoutUndefined(definition.toUpdateRow(value));
      if (definition.hasUpdatedAt && patch.updated_at === undefined) {
        patch.updated_at = new Date().toISOString();
      }
      if (Object.keys(patch).length === 0) {
        return findById(value.id);
      }

      return guard(`update ${resource}`, async () => {
        const { data, error } = await supabase
          .from(table)
          .update(patch)
          .eq('id', value.id)
          .select(definition.select)
          .maybeSingle();

        if (error !== null) {
          throw fromPostgrestError(error, `update ${resource}`);
        }
        if (data === null) {
          throw new RepositoryError('NOT_FOUND', `${resource} ${value.id} not found`, {
            details: { id: value.id },
          });
        }
        return definition.fromRow(data as TRow);
      });
    },

    async delete(id: string): Promise<void> {
      await guard(`delete ${resource}`, async () => {
        const { error, count } = await supabase
          .from(table)
          .delete({ count: 'exact' })
          .eq('id', id);

        if (error !== null) {
          throw fromPostgrestError(error, `delete ${resource}`);
        }
        if ((count ?? 0) === 0) {
          throw new RepositoryError('NOT_FOUND', `${resource} ${id} not found`, { details: { id } });
        }
      });
    },

    async exists(id: string): Promise<boolean> {
      return guard(`check ${resource}`, async () => {
        const { count, error } = await supabase
          .from(table)
          .select('id', { count: 'exact', head: true })
          .eq('id', id);

        if (error !== null) {
          throw fromPostgrestError(error, `check ${resource}`);
        }
        return (count ?? 0) > 0;
      });
    },

    async findByField(field: string, value: FilterValue): Promise<TRead[]> {
      const filter = resolveFilter(
        { field, operator: Array.isArray(value) ? 'in' : 'eq', value },
        definition.fields
      );

      return guard(`find ${resource}s`, async () => {
        const { data, error } = await filteredQuery(definition.select, [filter], '', false);
        if (error !== null) {
          throw fromPostgrestError(error, `find ${resource}s`);
        }
        return ((data ?? []) as TRow[]).map((row) => definition.fromRow(row));
      });
    },

    list: fetchPage,

    async count(filters: readonly FilterOption[]): Promise<number> {
      return countMatching(resolveFilters(filters, definition.fields), '');
    },

    async search(options: ListOptions): Promise<SearchResult<TRead>> {
      const total = await countMatching(
        resolveFilters(options.filters, definition.fields),
        options.search
      );
      const items = await fetchPage(options);
      return { items, total };
    },
  });
}
