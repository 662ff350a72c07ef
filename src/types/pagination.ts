/**
 * Pagination Types
 * Envelope attached to every list and search response
 */

/**
 * Pagination metadata, derived on every call and never persisted
 */
export interface Pagination {
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
  hasNextPage: boolean;
}

/**
 * A page of items together with its pagination envelope
 */
export interface PaginatedResult<T> {
  items: T[];
  pagination: Pagination;
}

/**
 * Items matching a search plus the unpaginated total
 */
export interface SearchResult<T> {
  items: T[];
  total: number;
}

export function buildPagination(
  total: number,
  page: number,
  perPage: number
): Pagination {
  return {
    total,
    page,
    perPage,
    totalPages: perPage > 0 ? Math.ceil(total / perPage) : 0,
    hasNextPage: page * perPage < total,
  };
}

export function toPaginatedResult<T>(
  result: SearchResult<T>,
  page: number,
  perPage: number
): PaginatedResult<T> {
  return {
    items: result.items,
    pagination: buildPagination(result.total, page, perPage),
  };
}

/**
 * Slice an already-loaded list into one page
 */
export function paginateResults<T>(
  items: readonly T[],
  page: number,
  perPage: number
): PaginatedResult<T> {
  const start = (page - 1) * perPage;
  const pageItems = start >= items.length ? [] : items.slice(start, start + perPage);

  return {
    items: pageItems,
    pagination: buildPagination(items.length, page, perPage),
  };
}
