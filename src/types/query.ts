/**
 * Query Model
 * List, filter, sort and paginate descriptors shared by every repository
 */

import { failure, success, type Result } from './result.js';

export const FILTER_OPERATORS = [
  'eq',
  'ne',
  'gt',
  'lt',
  'gte',
  'lte',
  'in',
  'not_in',
  'like',
  'starts_with',
  'ends_with',
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const SORT_ORDERS = ['asc', 'desc'] as const;

export type SortOrder = (typeof SORT_ORDERS)[number];

/**
 * Scalar a filter can compare against. Dates are compared as timestamps.
 */
export type FilterScalar = string | number | boolean | Date;

/**
 * Value carried by a filter; arrays only make sense for `in` / `not_in`
 */
export type FilterValue = FilterScalar | readonly (string | number)[];

export interface FilterOption {
  field: string;
  operator: FilterOperator;
  value: FilterValue;
}

/**
 * Normalized list descriptor handed to repositories
 */
export interface ListOptions {
  page: number;
  perPage: number;
  sortBy?: string;
  sortOrder: SortOrder;
  filters: FilterOption[];
  search: string;
}

/**
 * Untrusted filter as it arrives from a caller
 */
export interface FilterOptionInput {
  field: string;
  operator: string;
  value: FilterValue;
}

/**
 * Untrusted list descriptor as it arrives from a caller
 */
export interface ListOptionsInput {
  page?: number;
  perPage?: number;
  sortBy?: string;
  sortOrder?: string;
  filters?: FilterOptionInput[];
  search?: string;
}

/**
 * Defaults the query model applies during normalization
 */
export interface QueryConfig {
  defaultPerPage: number;
  maxPerPage: number;
  defaultSortBy?: string;
  defaultSortOrder: SortOrder;
}

export const DEFAULT_QUERY_CONFIG: QueryConfig = {
  defaultPerPage: 10,
  maxPerPage: 100,
  defaultSortBy: 'createdAt',
  defaultSortOrder: 'desc',
};

export function isFilterOperator(value: string): value is FilterOperator {
  return (FILTER_OPERATORS as readonly string[]).includes(value);
}

export function isSortOrder(value: string): value is SortOrder {
  return (SORT_ORDERS as readonly string[]).includes(value);
}

/**
 * Check a list descriptor without changing it.
 * Every problem is collected so the caller sees all of them at once.
 */
export function validateListOptions(input: ListOptionsInput): Result<void> {
  const problems: string[] = [];

  if (
    input.sortOrder !== undefined &&
    input.sortOrder !== '' &&
    !isSortOrder(input.sortOrder)
  ) {
    problems.push(`invalid sort order "${input.sortOrder}"`);
  }

  (input.filters ?? []).forEach((filter, index) => {
    if (filter.field.trim() === '') {
      problems.push(`filter ${index}: field cannot be empty`);
    }
    if (filter.operator.trim() === '') {
      problems.push(`filter ${index}: operator cannot be empty`);
    } else if (!isFilterOperator(filter.operator)) {
      problems.push(`filter ${index}: unknown operator "${filter.operator}"`);
    } else if (
      (filter.operator === 'in' || filter.operator === 'not_in') &&
      !Array.isArray(filter.value)
    ) {
      problems.push(`filter ${index}: operator "${filter.operator}" needs a list value`);
    } else if (
      filter.operator !== 'in' &&
      filter.operator !== 'not_in' &&
      Array.isArray(filter.value)
    ) {
      problems.push(`filter ${index}: operator "${filter.operator}" needs a single value`);
    }
  });

  if (problems.length > 0) {
    return failure(
      'VALIDATION_ERROR',
      `list options validation failed: ${problems.join('; ')}`,
      { problems }
    );
  }

  return success(undefined);
}

function clampPage(page: number | undefined): number {
  if (page === undefined || !Number.isFinite(page) || page < 1) {
    return 1;
  }
  return Math.floor(page);
}

function clampPerPage(perPage: number | undefined, config: QueryConfig): number {
  if (perPage === undefined || !Number.isFinite(perPage) || perPage < 1) {
    return config.defaultPerPage;
  }
  return Math.min(Math.floor(perPage), config.maxPerPage);
}

/**
 * Validate then normalize a list descriptor.
 * page < 1 becomes 1, perPage < 1 the default, perPage above the maximum the maximum.
 */
export function normalizeListOptions(
  input: ListOptionsInput,
  config: QueryConfig = DEFAULT_QUERY_CONFIG
): Result<ListOptions> {
  const validation = validateListOptions(input);
  if (!validation.success) {
    return validation;
  }

  const filters: FilterOption[] = [];
  for (const filter of input.filters ?? []) {
    // validated above
    if (isFilterOperator(filter.operator)) {
      filters.push({
        field: filter.field.trim(),
        operator: filter.operator,
        value: filter.value,
      });
    }
  }

  const sortOrder =
    input.sortOrder !== undefined && isSortOrder(input.sortOrder)
      ? input.sortOrder
      : config.defaultSortOrder;

  const options: ListOptions = {
    page: clampPage(input.page),
    perPage: clampPerPage(input.perPage, config),
    sortOrder,
    filters,
    search: input.search?.trim() ?? '',
  };

  const sortBy =
    input.sortBy !== undefined && input.sortBy.trim() !== ''
      ? input.sortBy.trim()
      : config.defaultSortBy;
  if (sortBy !== undefined) {
    options.sortBy = sortBy;
  }

  return success(options);
}

/**
 * Build equality filters from a plain record, skipping undefined entries
 */
export function buildEqualityFilters(
  values: Record<string, FilterValue | undefined>
): FilterOption[] {
  const filters: FilterOption[] = [];
  for (const [field, value] of Object.entries(values)) {
    if (value !== undefined) {
      filters.push({ field, operator: 'eq', value });
    }
  }
  return filters;
}
