/**
 * Directory Repository Adapter
 * Implements the repository contract over the identity directory.
 *
 * The directory only pages; it cannot filter or sort. Filters and search are
 * applied in memory to the fetched page, so a filtered page may hold fewer than
 * `perPage` entries, and sorting only reorders that page. `count` and
 * `findByField` walk every page instead of trusting a server-side total.
 */

import { z } from 'zod';

import {
  RepositoryError,
  type FilterOption,
  type FilterScalar,
  type FilterValue,
  type ListOptions,
  type SearchResult,
} from '../types/index.js';

import type {
  DirectoryAttributes,
  DirectoryClient,
  DirectoryEntry,
  DirectoryResponse,
} from './directory.client.js';
import { fromDirectoryError, guard } from './errors.js';
import {
  compareScalars,
  matchesAll,
  resolveFilter,
  resolveFilters,
  resolveSortField,
  type FieldMap,
  type FieldType,
  type ResolvedFilter,
} from './filters.js';
import { withBulkOperations, type Repository } from './repository.js';

export const DIRECTORY_SCAN_PAGE_SIZE = 1000;

export interface DirectoryDefinition<TCreate, TUpdate extends { id: string }, TRead> {
  resource: string;
  /** Read-model fields mapped onto directory entry attributes */
  fields: FieldMap;
  /** Entry attributes matched by the free-text search term */
  searchColumns: readonly DirectoryColumn[];
  toAttributes(value: TCreate): DirectoryAttributes;
  toUpdateAttributes(value: TUpdate): DirectoryAttributes;
  fromEntry(entry: DirectoryEntry): TRead;
}

export type DirectoryColumn = keyof DirectoryEntry;

const DIRECTORY_COLUMNS: readonly DirectoryColumn[] = [
  'id',
  'email',
  'phone',
  'role',
  'last_sign_in_at',
  'created_at',
  'updated_at',
];

const uuidFormat = z.string().uuid();

function isDirectoryColumn(column: string): column is DirectoryColumn {
  return (DIRECTORY_COLUMNS as readonly string[]).includes(column);
}

/**
 * Read an entry attribute as a typed value
 */
export function readEntryField(
  entry: DirectoryEntry,
  column: string,
  type: FieldType
): FilterScalar | null {
  if (!isDirectoryColumn(column)) {
    return null;
  }
  const raw = entry[column];
  if (raw === undefined || raw === '') {
    return null;
  }
  if (type === 'timestamp') {
    const date = new Date(raw);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return raw;
}

function unwrap<T>(response: DirectoryResponse<T>, action: string): T {
  if (response.error !== null) {
    throw fromDirectoryError(response.error, action);
  }
  return response.data;
}

function withoutUndefined(attributes: DirectoryAttributes): DirectoryAttributes {
  const result: DirectoryAttributes = {};
  if (attributes.email !== undefined) result.email = attributes.email;
  if (attributes.password !== undefined) result.password = attributes.password;
  if (attributes.phone !== undefined) result.phone = attributes.phone;
  if (attributes.role !== undefined) result.role = attributes.role;
  if (attributes.email_confirm !== undefined) result.email_confirm = attributes.email_confirm;
  return result;
}

/**
 * Create a repository over the identity directory
 */
export function createDirectoryRepository<TCreate, TUpdate extends { id: string }, TRead>(
  client: DirectoryClient,
  definition: DirectoryDefinition<TCreate, TUpdate, TRead>
): Repository<TCreate, TUpdate, TRead> {
  const { resource, fields } = definition;

  function assertIdentifier(id: string): void {
    if (!uuidFormat.safeParse(id).success) {
      throw new RepositoryError('VALIDATION_ERROR', `${resource} id "${id}" is not a valid UUID`, {
        details: { id },
      });
    }
  }

  function columnType(column: string): FieldType {
    for (const mapping of Object.values(fields)) {
      if (mapping.column === column) {
        return mapping.type;
      }
    }
    return 'string';
  }

  function matches(entry: DirectoryEntry, filters: readonly ResolvedFilter[], search: string): boolean {
    if (!matchesAll((column) => readEntryField(entry, column, columnType(column)), filters)) {
      return false;
    }
    if (search === '') {
      return true;
    }
    const term = search.toLowerCase();
    return definition.searchColumns.some((column) => {
      const value = entry[column];
      return value !== undefined && value.toLowerCase().includes(term);
    });
  }

  async function fetchPage(page: number, perPage: number): Promise<DirectoryEntry[]> {
    return guard(`list ${resource}s`, async () =>
      unwrap(await client.listUsers({ page, perPage }), `list ${resource}s`)
    );
  }

  /**
   * Visit every directory entry, one scan page at a time
   */
  async function scan(visit: (entry: DirectoryEntry) => void): Promise<void> {
    for (let page = 1; ; page++) {
      const entries = await fetchPage(page, DIRECTORY_SCAN_PAGE_SIZE);
      entries.forEach(visit);
      if (entries.length < DIRECTORY_SCAN_PAGE_SIZE) {
        return;
      }
    }
  }

  async function countMatching(filters: readonly ResolvedFilter[], search: string): Promise<number> {
    let total = 0;
    await scan((entry) => {
      if (matches(entry, filters, search)) {
        total++;
      }
    });
    return total;
  }

  async function list(options: ListOptions): Promise<TRead[]> {
    const filters = resolveFilters(options.filters, fields);
    const sort = options.sortBy !== undefined ? resolveSortField(options.sortBy, fields) : undefined;

    const entries = (await fetchPage(options.page, options.perPage)).filter((entry) =>
      matches(entry, filters, options.search)
    );

    if (sort !== undefined) {
      const direction = options.sortOrder === 'asc' ? 1 : -1;
      entries.sort(
        (a, b) =>
          direction *
          compareScalars(
            readEntryField(a, sort.column, sort.type),
            readEntryField(b, sort.column, sort.type)
          )
      );
    }

    return entries.map((entry) => definition.fromEntry(entry));
  }

  async function findById(id: string): Promise<TRead> {
    assertIdentifier(id);
    return guard(`get ${resource}`, async () =>
      definition.fromEntry(unwrap(await client.getUserById(id), `get ${resource}`))
    );
  }

  return withBulkOperations<TCreate, TUpdate, TRead>({
    async create(value: TCreate): Promise<TRead> {
      return guard(`create ${resource}`, async () => {
        const attributes = withoutUndefined(definition.toAttributes(value));
        return definition.fromEntry(unwrap(await client.createUser(attributes), `create ${resource}`));
      });
    },

    findById,

    async update(value: TUpdate): Promise<TRead> {
      assertIdentifier(value.id);
      const attributes = withoutUndefined(definition.toUpdateAttributes(value));
      if (Object.keys(attributes).length === 0) {
        return findById(value.id);
      }
      return guard(`update ${resource}`, async () =>
        definition.fromEntry(
          unwrap(await client.updateUserById(value.id, attributes), `update ${resource}`)
        )
      );
    },

    async delete(id: string): Promise<void> {
      assertIdentifier(id);
      await guard(`delete ${resource}`, async () => {
        unwrap(await client.deleteUser(id), `delete ${resource}`);
      });
    },

    async exists(id: string): Promise<boolean> {
      if (!uuidFormat.safeParse(id).success) {
        return false;
      }
      try {
        await findById(id);
        return true;
      } catch (error) {
        if (error instanceof RepositoryError && error.kind === 'NOT_FOUND') {
          return false;
        }
        throw error;
      }
    },

    async findByField(field: string, value: FilterValue): Promise<TRead[]> {
      const filter = resolveFilter(
        { field, operator: Array.isArray(value) ? 'in' : 'eq', value },
        fields
      );
      const found: TRead[] = [];
      await scan((entry) => {
        if (matches(entry, [filter], '')) {
          found.push(definition.fromEntry(entry));
        }
      });
      return found;
    },

    list,

    async count(filters: readonly FilterOption[]): Promise<number> {
      return countMatching(resolveFilters(filters, fields), '');
    },

    async search(options: ListOptions): Promise<SearchResult<TRead>> {
      const filters = resolveFilters(options.filters, fields);
      const items = await list(options);
      const total = await countMatching(filters, options.search);
      return { items, total };
    },
  });
}
