export type { Repository, RepositoryCore } from './repository.js';
export { runSequentially, withBulkOperations } from './repository.js';
export type { FieldType, FieldMapping, FieldMap, ResolvedFilter } from './filters.js';
export {
  coerceScalar,
  compareScalars,
  matchesAll,
  matchesFilter,
  resolveFilter,
  resolveFilters,
  resolveSortField,
  supportsOperator,
} from './filters.js';
export type { PostgrestFailure, DirectoryFailure } from './errors.js';
export {
  directoryErrorKind,
  fromDirectoryError,
  fromPostgrestError,
  guard,
  postgrestErrorKind,
} from './errors.js';
export type { TableDefinition } from './table.repository.js';
export {
  buildSearchExpression,
  createTableRepository,
  escapeLikePattern,
  quoteFilterValue,
  toQueryParam,
} from './table.repository.js';
export type {
  DirectoryAttributes,
  DirectoryClient,
  DirectoryEntry,
  DirectoryPage,
  DirectoryResponse,
} from './directory.client.js';
export { createSupabaseDirectoryClient } from './directory.client.js';
export type { DirectoryColumn, DirectoryDefinition } from './directory.repository.js';
export {
  DIRECTORY_SCAN_PAGE_SIZE,
  createDirectoryRepository,
  readEntryField,
} from './directory.repository.js';
